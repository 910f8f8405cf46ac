import 'dotenv/config';
import { createInterface, type Interface } from 'readline/promises';
import { logger, validateEnvironment } from '@persona-forge/shared';
import { runCli, type CliIO } from './run.js';

// Validate environment before generating anything
const env = validateEnvironment();

async function main(): Promise<void> {
    const session: { rl?: Interface } = {};

    const io: CliIO = {
        print: line => console.log(line),
        error: line => console.error(line),
        prompt: question => {
            session.rl ??= createInterface({ input: process.stdin, output: process.stdout });
            return session.rl.question(question);
        }
    };

    try {
        process.exitCode = await runCli(process.argv.slice(2), { env, io });
    } finally {
        session.rl?.close();
    }
}

main().catch(error => {
    logger.fatal({ error }, 'Unexpected CLI failure');
    process.exit(1);
});
