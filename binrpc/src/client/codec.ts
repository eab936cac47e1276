import { CookieSource, defaultCookieSource } from '../protocol/cookie';
import { UnsupportedError } from '../protocol/errors';
import { AssembledPacket, DatagramTransport, writePacket } from '../protocol/packet';
import { str } from '../protocol/value';

// Request side of a binrpc exchange: the method name goes out as a single String record.
export class BinRpcClientCodec {
  constructor(
    private readonly transport: DatagramTransport,
    private readonly cookies: CookieSource = defaultCookieSource,
  ) {}

  writeRequest(method: string): Promise<AssembledPacket> {
    return writePacket(this.transport, str(method), this.cookies);
  }

  // Replies are never read on this path.
  async readResponse(): Promise<never> {
    throw new UnsupportedError('reading binrpc responses is not supported');
  }
}
