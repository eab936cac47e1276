import { InvalidArgumentError } from 'commander';

// -t/--timeout: milliseconds, 0 disables the send guard
export function parseTimeoutOption(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
        throw new InvalidArgumentError('timeout must be a non-negative number of milliseconds');
    }
    return n;
}
