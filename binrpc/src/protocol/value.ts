import { BinRpcType, DOUBLE_SCALE, INT_BYTES } from './constants';
import { EncodingError } from './errors';

// Values that can ride in a binrpc packet. Scalars carry a body; struct/array/avp
// are containers framed by marker records (see payload.ts).
export interface IntValue { kind: 'int'; value: number; }
export interface StrValue { kind: 'str'; value: string; }
export interface DoubleValue { kind: 'double'; value: number; }
export interface BytesValue { kind: 'bytes'; value: Uint8Array; }
export interface AvpValue { kind: 'avp'; name: string; value: BinRpcValue; }
export interface StructValue { kind: 'struct'; members: AvpValue[]; }
export interface ArrayValue { kind: 'array'; items: BinRpcValue[]; }

export type BinRpcValue = IntValue | StrValue | DoubleValue | BytesValue | AvpValue | StructValue | ArrayValue;
export type ScalarValue = IntValue | StrValue | DoubleValue | BytesValue;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

function assertInt32(n: number, what: string): void {
  if (!Number.isInteger(n) || n < INT32_MIN || n > INT32_MAX) {
    throw new EncodingError(`${what} ${n} does not fit a 32-bit signed integer`);
  }
}

export function int(value: number): IntValue {
  assertInt32(value, 'integer');
  return { kind: 'int', value };
}

export function str(value: string): StrValue {
  return { kind: 'str', value };
}

export function double(value: number): DoubleValue {
  if (!Number.isFinite(value)) {
    throw new EncodingError(`double ${value} is not finite`);
  }
  return { kind: 'double', value };
}

export function bytes(value: Uint8Array | string): BytesValue {
  return { kind: 'bytes', value: typeof value === 'string' ? Buffer.from(value, 'utf8') : value };
}

export function avp(name: string, value: BinRpcValue): AvpValue {
  return { kind: 'avp', name, value };
}

export function struct(members: Record<string, BinRpcValue> | AvpValue[]): StructValue {
  const list = Array.isArray(members)
    ? members
    : Object.entries(members).map(([name, value]) => avp(name, value));
  return { kind: 'struct', members: list };
}

export function array(items: BinRpcValue[]): ArrayValue {
  return { kind: 'array', items };
}

export function isScalar(value: BinRpcValue): value is ScalarValue {
  return value.kind === 'int' || value.kind === 'str' || value.kind === 'double' || value.kind === 'bytes';
}

export function typeTag(value: BinRpcValue): BinRpcType {
  switch (value.kind) {
    case 'int': return BinRpcType.Int;
    case 'str': return BinRpcType.String;
    case 'double': return BinRpcType.Double;
    case 'bytes': return BinRpcType.Bytes;
    case 'avp': return BinRpcType.Avp;
    case 'struct': return BinRpcType.Struct;
    case 'array': return BinRpcType.Array;
  }
}

function int32Body(n: number): Buffer {
  const buf = Buffer.alloc(INT_BYTES);
  buf.writeInt32BE(n, 0);
  return buf;
}

// NUL terminator is part of the body and counted in its length
export function terminatedString(s: string): Buffer {
  return Buffer.concat([Buffer.from(s, 'utf8'), Buffer.from([0x00])]);
}

// Serialized big-endian body of a scalar value.
export function valueBody(value: ScalarValue): Buffer {
  switch (value.kind) {
    case 'int':
      assertInt32(value.value, 'integer');
      return int32Body(value.value);
    case 'str':
      return terminatedString(value.value);
    case 'double': {
      const scaled = Math.trunc(value.value * DOUBLE_SCALE);
      assertInt32(scaled, 'scaled double');
      return int32Body(scaled);
    }
    case 'bytes':
      return Buffer.from(value.value);
  }
}
