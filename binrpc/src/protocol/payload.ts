import { BinRpcType, MAX_INLINE_SIZE, MAX_LENGTH, MAX_LENGTH_BYTES } from './constants';
import { EncodingError } from './errors';
import { BinRpcValue, isScalar, terminatedString, typeTag, valueBody } from './value';

// Minimal number of bytes needed to hold n (at least 1).
export function byteWidth(n: number): number {
  if (!Number.isInteger(n) || n < 0 || n > MAX_LENGTH) {
    throw new EncodingError(`cannot determine byte width of length ${n}`);
  }
  let width = 1;
  let rest = n;
  while (rest > 0xff) {
    rest = Math.floor(rest / 256);
    width++;
  }
  if (width > MAX_LENGTH_BYTES) {
    throw new EncodingError(`length ${n} needs ${width} bytes (max ${MAX_LENGTH_BYTES})`);
  }
  return width;
}

export function uintBE(n: number, width: number): Buffer {
  const buf = Buffer.alloc(width);
  buf.writeUIntBE(n, 0, width);
  return buf;
}

/**
 * Frames one body as a record: size flag, size, type, optional explicit length, body.
 * Bodies up to 8 bytes are sized inline; longer ones get a big-endian length field
 * whose width goes into the size subfield.
 */
export function buildRecord(type: BinRpcType, body: Uint8Array): Buffer {
  const length = body.length;
  let sizeFlag = 0;
  let size = length;
  let lengthField: Buffer | null = null;
  if (length > MAX_INLINE_SIZE) {
    sizeFlag = 1;
    size = byteWidth(length);
    lengthField = uintBE(length, size);
  }
  // size 8 overflows the 3-bit subfield into the flag bit; kept for wire compatibility
  const lead = Buffer.from([((sizeFlag << 7) | (size << 4) | type) & 0xff]);
  return lengthField ? Buffer.concat([lead, lengthField, body]) : Buffer.concat([lead, body]);
}

// Struct/array delimiters: size 0, flag bit clear on open, set on close.
export function buildMarker(type: BinRpcType.Struct | BinRpcType.Array, end: boolean): Buffer {
  return Buffer.from([((end ? 1 : 0) << 7) | type]);
}

function collect(value: BinRpcValue, out: Buffer[]): void {
  if (isScalar(value)) {
    out.push(buildRecord(typeTag(value), valueBody(value)));
    return;
  }
  switch (value.kind) {
    case 'avp':
      out.push(buildRecord(BinRpcType.Avp, terminatedString(value.name)));
      collect(value.value, out);
      return;
    case 'struct':
      out.push(buildMarker(BinRpcType.Struct, false));
      for (const member of value.members) collect(member, out);
      out.push(buildMarker(BinRpcType.Struct, true));
      return;
    case 'array':
      out.push(buildMarker(BinRpcType.Array, false));
      for (const item of value.items) collect(item, out);
      out.push(buildMarker(BinRpcType.Array, true));
      return;
  }
}

// Encodes a sequence of top-level values into one payload.
export function buildPayload(...values: BinRpcValue[]): Buffer {
  const out: Buffer[] = [];
  for (const v of values) collect(v, out);
  return Buffer.concat(out);
}
