import { CookieSource, defaultCookieSource } from './cookie';
import { EncodingError } from './errors';
import { buildHeader } from './header';
import { buildPayload } from './payload';
import { BinRpcValue } from './value';

export interface AssembledPacket {
  cookie: number;
  header: Buffer;
  payload: Buffer;
  packet: Buffer; // header followed by payload
}

// Anything that takes a whole datagram in one write.
export interface DatagramTransport {
  write(packet: Buffer): Promise<void>;
}

function wrap(stage: string, err: unknown): EncodingError {
  const msg = err instanceof Error ? err.message : String(err);
  return new EncodingError(`failed to construct ${stage}: ${msg}`, { cause: err });
}

/**
 * Payload first (the header has to declare its length), then a fresh cookie,
 * then the header.
 */
export function assemblePacket(values: BinRpcValue | BinRpcValue[], cookies: CookieSource = defaultCookieSource): AssembledPacket {
  let payload: Buffer;
  try {
    payload = buildPayload(...(Array.isArray(values) ? values : [values]));
  } catch (e) {
    throw wrap('payload', e);
  }
  const cookie = cookies.next();
  let header: Buffer;
  try {
    header = buildHeader(payload.length, cookie);
  } catch (e) {
    throw wrap('header', e);
  }
  return { cookie, header, payload, packet: Buffer.concat([header, payload]) };
}

// One write per packet; a failed write is not retried.
export async function writePacket(transport: DatagramTransport, values: BinRpcValue | BinRpcValue[], cookies?: CookieSource): Promise<AssembledPacket> {
  const assembled = assemblePacket(values, cookies);
  await transport.write(assembled.packet);
  return assembled;
}
