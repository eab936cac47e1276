// binrpc error taxonomy. New codes are added here only; callers match on BinRpcErrorCode.
export enum BinRpcErrorCode {
  ENCODING = 'BINRPC_ENCODING',
  DECODE = 'BINRPC_DECODE',
  CONNECTION = 'BINRPC_CONNECTION',
  TIMEOUT = 'BINRPC_TIMEOUT',
  UNSUPPORTED = 'BINRPC_UNSUPPORTED',
}

export type KnownBinRpcErrorCode = `${BinRpcErrorCode}`;

export class BinRpcError extends Error {
  readonly code: BinRpcErrorCode;

  constructor(code: BinRpcErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BinRpcError';
    this.code = code;
  }
}

export class EncodingError extends BinRpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(BinRpcErrorCode.ENCODING, message, options);
    this.name = 'EncodingError';
  }
}

export class DecodeError extends BinRpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(BinRpcErrorCode.DECODE, message, options);
    this.name = 'DecodeError';
  }
}

export class ConnectionError extends BinRpcError {
  constructor(message: string, options?: { cause?: unknown; code?: BinRpcErrorCode.CONNECTION | BinRpcErrorCode.TIMEOUT }) {
    super(options?.code ?? BinRpcErrorCode.CONNECTION, message, options);
    this.name = 'ConnectionError';
  }
}

export class UnsupportedError extends BinRpcError {
  constructor(message: string) {
    super(BinRpcErrorCode.UNSUPPORTED, message);
    this.name = 'UnsupportedError';
  }
}

export function isBinRpcError(err: unknown): err is BinRpcError {
  return err instanceof BinRpcError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
