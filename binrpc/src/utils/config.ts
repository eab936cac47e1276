import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import type { LevelWithSilent } from 'pino';
import { DEFAULT_BINRPC_PORT } from '../protocol/constants';

export type BinRpcConfigState = {
    host: string;
    port: number;
    timeoutMs: number | null; // null: no send guard
    logLevel: LevelWithSilent;
};

const DEFAULTS: BinRpcConfigState = {
    host: '127.0.0.1',
    port: DEFAULT_BINRPC_PORT,
    timeoutMs: 2000,
    logLevel: process.env['NODE_ENV'] === 'production' ? 'info' : 'debug',
};

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLogLevel(val: string | undefined): LevelWithSilent | undefined {
    return LOG_LEVELS.find((l) => l === val?.toLowerCase());
}

function parseNumber(val: string | undefined): number | null {
    if (val === undefined || val === '') {
        return null;
    }
    const n = Number(val);
    return Number.isFinite(n) ? n : null;
}

export function parsePort(val: string | number | undefined): number | null {
    if (val === undefined || val === '') {
        return null;
    }
    const n = typeof val === 'number' ? val : Number(val);
    if (!Number.isInteger(n) || n < 1 || n > 65535) {
        return null;
    }
    return n;
}

function fromRecord(src: Record<string, string | undefined>): Partial<BinRpcConfigState> {
    const res: Partial<BinRpcConfigState> = {};
    if (src['BINRPC_HOST'] !== undefined && src['BINRPC_HOST'] !== '') {
        res.host = src['BINRPC_HOST'];
    }
    const port = parsePort(src['BINRPC_PORT']);
    if (port !== null) {
        res.port = port;
    }
    if (src['BINRPC_TIMEOUT_MS'] !== undefined) {
        res.timeoutMs = parseNumber(src['BINRPC_TIMEOUT_MS']);
    }
    const level = parseLogLevel(src['LOG_LEVEL']);
    if (level !== undefined) {
        res.logLevel = level;
    }
    return res;
}

function loadFromEnvFile(envPath: string): Partial<BinRpcConfigState> {
    if (!existsSync(envPath)) {
        return {};
    }
    return fromRecord(dotenv.parse(readFileSync(envPath)));
}

function loadFromProcessEnv(): Partial<BinRpcConfigState> {
    return fromRecord(process.env);
}

function validateAndNormalize(s: BinRpcConfigState): BinRpcConfigState {
    const out = { ...s };
    if (!out.host.trim()) {
        out.host = DEFAULTS.host;
    }
    out.port = parsePort(out.port) ?? DEFAULTS.port;
    // non-positive timeout disables the guard
    if (out.timeoutMs !== null && (!Number.isFinite(out.timeoutMs) || out.timeoutMs <= 0)) {
        out.timeoutMs = null;
    }
    out.logLevel = parseLogLevel(out.logLevel) ?? DEFAULTS.logLevel;
    return out;
}

export class BinRpcConfig {
    private state: BinRpcConfigState;

    constructor(envPath?: string) {
        const path = envPath ?? resolve(process.cwd(), '.env');
        // process.env wins over the file
        this.state = validateAndNormalize({
            ...DEFAULTS,
            ...loadFromEnvFile(path),
            ...loadFromProcessEnv(),
        });
    }

    get host(): string {
        return this.state.host;
    }

    get port(): number {
        return this.state.port;
    }

    get timeoutMs(): number | null {
        return this.state.timeoutMs;
    }

    get logLevel(): LevelWithSilent {
        return this.state.logLevel;
    }

    snapshot(): BinRpcConfigState {
        return { ...this.state };
    }

    // Applies a partial override. The returned function restores the previous state.
    applyOverrides(partial: Partial<BinRpcConfigState>): () => void {
        const prev = { ...this.state };
        const next = validateAndNormalize({ ...this.state, ...partial });
        this.state = next;
        return () => {
            this.state = prev;
        };
    }
}

const binRpcConfig = new BinRpcConfig();
export default binRpcConfig;
