import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, TransportTargetOptions } from 'pino';
import type { PrettyOptions } from 'pino-pretty';

// stdout carries command output; logs go to stderr
const STDERR = 2;

export interface LoggerOptions {
    isDev?: boolean;
    destination?: DestinationStream; // bypasses the transport targets
}

export function createLogger(level: LevelWithSilent, opts: LoggerOptions = {}): Logger {
    if (opts.destination) {
        return pino({ level }, opts.destination);
    }
    const isDev = opts.isDev ?? process.env['NODE_ENV'] !== 'production';
    const targets: TransportTargetOptions[] = [];
    if (isDev) {
        const pretty: PrettyOptions = {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:HH:MM:ss.l',
            destination: STDERR,
        };
        targets.push({ target: 'pino-pretty', options: pretty, level });
    } else {
        targets.push({ target: 'pino/file', options: { destination: STDERR }, level });
    }
    return pino({ level }, pino.transport({ targets }));
}
