import { BINRPC_FLAGS_NONE, BINRPC_MAGIC_VERSION, COOKIE_BYTES, MAX_LENGTH } from './constants';
import { EncodingError } from './errors';
import { byteWidth, uintBE } from './payload';

export interface HeaderFields {
  flags: number;
  lengthBytes: number; // LL + 1
  cookieBytes: number; // CL + 1
}

export function headerSize(payloadLength: number): number {
  return 2 + byteWidth(payloadLength) + COOKIE_BYTES;
}

/**
 * Header for an already built payload. The payload length is a required input:
 * the header never inspects the payload itself.
 *
 * The length field is as wide as the length needs (1..4 bytes), so every length
 * up to 255 is written as a single byte.
 */
export function buildHeader(payloadLength: number, cookie: number): Buffer {
  if (!Number.isInteger(payloadLength) || payloadLength < 0 || payloadLength > MAX_LENGTH) {
    throw new EncodingError(`invalid payload length ${payloadLength}`);
  }
  if (!Number.isInteger(cookie) || cookie < 0 || cookie > 0xffffffff) {
    throw new EncodingError(`cookie ${cookie} is not an unsigned 32-bit integer`);
  }
  const lengthBytes = byteWidth(payloadLength);
  const flagsByte = (BINRPC_FLAGS_NONE << 4) | ((lengthBytes - 1) << 2) | (COOKIE_BYTES - 1);
  return Buffer.concat([
    Buffer.from([BINRPC_MAGIC_VERSION, flagsByte]),
    uintBE(payloadLength, lengthBytes),
    uintBE(cookie, COOKIE_BYTES),
  ]);
}

export function splitFlagsByte(b: number): HeaderFields {
  return {
    flags: (b >> 4) & 0x0f,
    lengthBytes: ((b >> 2) & 0x03) + 1,
    cookieBytes: (b & 0x03) + 1,
  };
}
