import { EventEmitter } from 'events';
import pino from 'pino';
import type { Logger } from 'pino';
import { parsePort } from '../utils/config';
import { CookieSource } from '../protocol/cookie';
import { ConnectionError, describeError, isBinRpcError } from '../protocol/errors';
import { BinRpcClientCodec } from './codec';
import { InvokeAttemptEvent, InvokeFailedEvent, InvokeResult, InvokeSentEvent } from './types';
import { UdpTransport } from './udp-transport';

export interface InvokeOptions {
  timeoutMs?: number | null;
  cookieSource?: CookieSource;
  logger?: Logger;
  emitter?: EventEmitter; // receives 'attempt' | 'sent' | 'failed'
}

const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Sends one binrpc request naming `method` to a ctl listener over UDP.
 * Resolves once the datagram is written; no reply is awaited or read.
 * The socket is closed on every exit path.
 */
export async function invoke(method: string, host: string, port: number | string, options: InvokeOptions = {}): Promise<InvokeResult> {
  const log = (options.logger ?? silentLogger).child({ method, host, port });
  const portNum = parsePort(port);
  // invalid ports are reported as port 0
  const eventPort = portNum ?? 0;
  const attempt: InvokeAttemptEvent = { type: 'attempt', method, host, port: eventPort };
  options.emitter?.emit('attempt', attempt);

  let transport: UdpTransport | undefined;
  try {
    if (portNum === null) {
      throw new ConnectionError(`failed to connect to kamailio RPC server: invalid port ${String(port)}`);
    }
    transport = await UdpTransport.connect(host, portNum, { timeoutMs: options.timeoutMs });
    const codec = new BinRpcClientCodec(transport, options.cookieSource);
    const { cookie, packet, payload } = await codec.writeRequest(method);
    log.debug({ cookie, bytes: packet.length, payloadBytes: payload.length }, 'binrpc request sent');
    const sent: InvokeSentEvent = { type: 'sent', method, host, port: portNum, cookie, bytes: packet.length };
    options.emitter?.emit('sent', sent);
    return { method, host, port: portNum, cookie, bytes: packet.length, packet };
  } catch (e) {
    log.warn({ err: e }, 'binrpc invoke failed');
    emitFailed(options.emitter, method, host, eventPort, e);
    throw e;
  } finally {
    transport?.close();
  }
}

function emitFailed(emitter: EventEmitter | undefined, method: string, host: string, port: number, err: unknown): void {
  if (!emitter) return;
  const ev: InvokeFailedEvent = {
    type: 'failed',
    method,
    host,
    port,
    code: isBinRpcError(err) ? err.code : 'UNKNOWN',
    message: describeError(err),
  };
  emitter.emit('failed', ev);
}
