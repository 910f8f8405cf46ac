import { InvalidArgumentError } from '../types/errors.js';

export function assertBatchCount(count: number, max: number = Number.MAX_SAFE_INTEGER): void {
    if (!Number.isInteger(count) || count < 1) {
        throw new InvalidArgumentError('Batch count must be a positive integer', [
            { field: 'count', message: `Expected an integer >= 1, received ${count}` }
        ]);
    }
    if (count > max) {
        throw new InvalidArgumentError(`Batch count exceeds the limit of ${max}`, [
            { field: 'count', message: `Expected at most ${max}, received ${count}` }
        ]);
    }
}
