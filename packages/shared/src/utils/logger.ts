import { pino } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

export type LogContext = Map<string, string | number>;

export const contextStorage = new AsyncLocalStorage<LogContext>();

const CONTEXT_KEYS = ['batchId', 'profileIndex'] as const;

const logger = pino({
    name: 'persona-forge',
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
        : undefined,
    // Identity records must never reach the logs with their financial or government ids
    redact: {
        paths: [
            'creditCard',
            'creditCardCvv',
            'creditCardExpiry',
            'bankAccount',
            'nationalId',
            'passportNumber',
            'driverLicense',
            '*.creditCard',
            '*.creditCardCvv',
            '*.creditCardExpiry',
            '*.bankAccount',
            '*.nationalId',
            '*.passportNumber',
            '*.driverLicense'
        ],
        censor: '[REDACTED]'
    },
    mixin() {
        const store = contextStorage.getStore();
        const context: Record<string, string | number> = {};

        if (store) {
            for (const key of CONTEXT_KEYS) {
                const value = store.get(key);
                if (value !== undefined) {
                    context[key] = value;
                }
            }
        }

        return context;
    }
});

export default logger;
