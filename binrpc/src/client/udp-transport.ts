import * as dgram from 'dgram';
import { isIPv6 } from 'net';
import { BinRpcErrorCode, ConnectionError, describeError } from '../protocol/errors';
import { DatagramTransport } from '../protocol/packet';

export interface UdpTransportOptions {
  timeoutMs?: number | null; // guard for connect and each send; null/undefined disables
}

/**
 * Connected UDP socket. The socket is owned by this transport and released by close();
 * a datagram send is the only write.
 */
export class UdpTransport implements DatagramTransport {
  private closed = false;
  private lastError: Error | null = null;

  private constructor(
    private readonly sock: dgram.Socket,
    readonly host: string,
    readonly port: number,
    private readonly timeoutMs: number | null,
  ) {
    // late ICMP errors (e.g. ECONNREFUSED) surface on the next write
    sock.on('error', (e) => { this.lastError = e; });
  }

  static async connect(host: string, port: number, opts: UdpTransportOptions = {}): Promise<UdpTransport> {
    const sock = dgram.createSocket(isIPv6(host) ? 'udp6' : 'udp4');
    const timeoutMs = opts.timeoutMs ?? null;
    const transport = new UdpTransport(sock, host, port, timeoutMs);
    try {
      await transport.guard(new Promise<void>((resolve, reject) => {
        sock.connect(port, host, (err?: Error) => (err ? reject(err) : resolve()));
      }), 'connect');
    } catch (e) {
      transport.close();
      throw wrapConnectionError(`failed to connect to kamailio RPC server ${host}:${port}`, e);
    }
    return transport;
  }

  async write(packet: Buffer): Promise<void> {
    if (this.closed) {
      throw new ConnectionError('failed to invoke RPC method: transport closed');
    }
    if (this.lastError) {
      const e = this.lastError;
      this.lastError = null;
      throw wrapConnectionError('failed to invoke RPC method', e);
    }
    try {
      await this.guard(new Promise<void>((resolve, reject) => {
        this.sock.send(packet, (err) => (err ? reject(err) : resolve()));
      }), 'send');
    } catch (e) {
      throw wrapConnectionError('failed to invoke RPC method', e);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sock.close();
  }

  private guard(p: Promise<void>, stage: string): Promise<void> {
    if (this.timeoutMs === null) return p;
    const ms = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ConnectionError(`${stage} timed out after ${ms}ms`, { code: BinRpcErrorCode.TIMEOUT })), ms);
    });
    return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
  }
}

function wrapConnectionError(context: string, err: unknown): ConnectionError {
  if (err instanceof ConnectionError) {
    return new ConnectionError(`${context}: ${err.message}`, { cause: err, code: err.code === BinRpcErrorCode.TIMEOUT ? BinRpcErrorCode.TIMEOUT : BinRpcErrorCode.CONNECTION });
  }
  return new ConnectionError(`${context}: ${describeError(err)}`, { cause: err });
}
