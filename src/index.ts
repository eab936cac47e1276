#!/usr/bin/env node
// must load before the config module reads NODE_ENV and BINRPC_*
import 'dotenv/config';
import { Command } from 'commander';
import binRpcConfig from '../binrpc/src/utils/config';
import { BinRpcClient } from '../binrpc/src/client/client';
import { describeError, isBinRpcError } from '../binrpc/src/protocol/errors';
import { parseTimeoutOption } from './utils/cli-options';
import { createLogger } from './utils/logger';

const program = new Command();

program
    .name('binrpc-invoke')
    .description('Invoke a Kamailio ctl RPC method over binrpc/UDP')
    .version('0.1.0')
    .argument('<method>', 'RPC method name, e.g. dispatcher.reload')
    .option('-H, --host <host>', 'ctl listener host', binRpcConfig.host)
    .option('-p, --port <port>', 'ctl listener port', String(binRpcConfig.port))
    .option('-t, --timeout <ms>', 'send timeout in ms (0 disables)', parseTimeoutOption)
    .option('--json', 'print the result as JSON', false)
    .action(async (method: string, options: { host: string; port: string; timeout?: number; json: boolean }) => {
        const restore = options.timeout !== undefined
            ? binRpcConfig.applyOverrides({ timeoutMs: options.timeout })
            : () => undefined;
        const log = createLogger(binRpcConfig.logLevel);
        const client = new BinRpcClient({ host: options.host, port: options.port, logger: log });
        try {
            const res = await client.invoke(method);
            if (options.json) {
                console.log(JSON.stringify({ method: res.method, host: res.host, port: res.port, cookie: res.cookie, bytes: res.bytes }));
            } else {
                console.log(`sent ${res.method} to ${res.host}:${res.port} (cookie 0x${res.cookie.toString(16).padStart(8, '0')}, ${res.bytes} bytes)`);
            }
        } catch (err) {
            log.error({ code: isBinRpcError(err) ? err.code : undefined }, describeError(err));
            process.exitCode = 1;
        } finally {
            client.close();
            restore();
        }
    });

program.parseAsync(process.argv).catch((err) => {
    console.error(err);
    process.exit(1);
});
