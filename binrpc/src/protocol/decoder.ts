/*
 Packet reader mirroring the encoder's framing rules. Used to inspect captured
 datagrams; the invoke path itself never reads replies.
*/
import { BINRPC_MAGIC_VERSION, BinRpcType, DOUBLE_SCALE, MAX_INLINE_SIZE, MAX_LENGTH_BYTES } from './constants';
import { DecodeError } from './errors';
import { splitFlagsByte } from './header';
import { AvpValue, BinRpcValue } from './value';

export interface ParsedHeader {
  flags: number;
  payloadLength: number;
  cookie: number;
  headerLength: number;
}

export interface ParsedPacket extends ParsedHeader {
  values: BinRpcValue[];
}

export function parseHeader(buf: Uint8Array): ParsedHeader {
  const b = Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
  if (b.length < 2) throw new DecodeError(`header truncated (${b.length} bytes)`);
  if (b[0] !== BINRPC_MAGIC_VERSION) {
    throw new DecodeError(`bad magic/version byte 0x${b[0].toString(16)}`);
  }
  const { flags, lengthBytes, cookieBytes } = splitFlagsByte(b[1]);
  const headerLength = 2 + lengthBytes + cookieBytes;
  if (b.length < headerLength) {
    throw new DecodeError(`header truncated: need ${headerLength} bytes, have ${b.length}`);
  }
  return {
    flags,
    payloadLength: b.readUIntBE(2, lengthBytes),
    cookie: b.readUIntBE(2 + lengthBytes, cookieBytes),
    headerLength,
  };
}

type Token =
  | { kind: 'value'; value: BinRpcValue }
  | { kind: 'end'; type: BinRpcType.Struct | BinRpcType.Array };

class RecordReader {
  private pos = 0;

  constructor(private readonly buf: Buffer) {}

  get done(): boolean {
    return this.pos >= this.buf.length;
  }

  private take(n: number, what: string): Buffer {
    if (this.pos + n > this.buf.length) {
      throw new DecodeError(`${what} truncated at offset ${this.pos}: need ${n} bytes, have ${this.buf.length - this.pos}`);
    }
    const out = this.buf.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  next(): Token {
    const lead = this.take(1, 'record')[0];
    const flag = lead >> 7;
    const size = (lead >> 4) & 0x07;
    const type = lead & 0x0f;

    if (type === BinRpcType.Struct || type === BinRpcType.Array) {
      const container = type === BinRpcType.Struct ? BinRpcType.Struct : BinRpcType.Array;
      if (flag) return { kind: 'end', type: container };
      return { kind: 'value', value: this.container(container) };
    }

    let length = size;
    if (flag && size === 0) {
      // an inline size of 8 spills into the flag bit
      length = MAX_INLINE_SIZE;
    } else if (flag) {
      if (size > MAX_LENGTH_BYTES) {
        throw new DecodeError(`unsupported length field width ${size}`);
      }
      length = this.take(size, 'length field').readUIntBE(0, size);
    }
    const body = this.take(length, 'record body');

    switch (type) {
      case BinRpcType.Int:
        return { kind: 'value', value: { kind: 'int', value: readInt(body) } };
      case BinRpcType.String:
        return { kind: 'value', value: { kind: 'str', value: readString(body) } };
      case BinRpcType.Double:
        return { kind: 'value', value: { kind: 'double', value: readInt(body) / DOUBLE_SCALE } };
      case BinRpcType.Bytes:
        return { kind: 'value', value: { kind: 'bytes', value: Buffer.from(body) } };
      case BinRpcType.Avp: {
        const inner = this.next();
        if (inner.kind !== 'value') throw new DecodeError('AVP without a value');
        return { kind: 'value', value: { kind: 'avp', name: readString(body), value: inner.value } };
      }
      default:
        throw new DecodeError(`unknown record type 0x${type.toString(16)}`);
    }
  }

  private container(type: BinRpcType.Struct | BinRpcType.Array): BinRpcValue {
    const items: BinRpcValue[] = [];
    for (;;) {
      if (this.done) throw new DecodeError(`unterminated ${type === BinRpcType.Struct ? 'struct' : 'array'}`);
      const tok = this.next();
      if (tok.kind === 'end') {
        if (tok.type !== type) throw new DecodeError('mismatched container end marker');
        break;
      }
      items.push(tok.value);
    }
    if (type === BinRpcType.Array) return { kind: 'array', items };
    const members: AvpValue[] = [];
    for (const item of items) {
      if (item.kind !== 'avp') throw new DecodeError(`struct member is ${item.kind}, expected avp`);
      members.push(item);
    }
    return { kind: 'struct', members };
  }
}

// Ints may be sent with fewer than 4 bytes; a full 4-byte body is two's complement.
function readInt(body: Buffer): number {
  if (body.length === 0) return 0;
  if (body.length > 4) throw new DecodeError(`integer body of ${body.length} bytes`);
  const n = body.readUIntBE(0, body.length);
  return body.length === 4 ? n | 0 : n;
}

function readString(body: Buffer): string {
  const end = body.length > 0 && body[body.length - 1] === 0x00 ? body.length - 1 : body.length;
  return body.toString('utf8', 0, end);
}

export function parseRecords(payload: Uint8Array): BinRpcValue[] {
  const reader = new RecordReader(Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength));
  const values: BinRpcValue[] = [];
  while (!reader.done) {
    const tok = reader.next();
    if (tok.kind === 'end') throw new DecodeError('container end marker outside a container');
    values.push(tok.value);
  }
  return values;
}

export function parsePacket(buf: Uint8Array): ParsedPacket {
  const header = parseHeader(buf);
  const actual = buf.byteLength - header.headerLength;
  if (actual !== header.payloadLength) {
    throw new DecodeError(`declared payload length ${header.payloadLength} does not match actual ${actual}`);
  }
  const payload = buf.subarray(header.headerLength);
  return { ...header, values: parseRecords(payload) };
}
