// Invocation lifecycle events emitted by BinRpcClient / invoke({ emitter })
import { KnownBinRpcErrorCode } from '../protocol/errors';

export interface InvokeBaseEvent { type: 'attempt' | 'sent' | 'failed'; method: string; host: string; port: number; }
export interface InvokeAttemptEvent extends InvokeBaseEvent { type: 'attempt'; }
export interface InvokeSentEvent extends InvokeBaseEvent { type: 'sent'; cookie: number; bytes: number; }
export interface InvokeFailedEvent extends InvokeBaseEvent { type: 'failed'; code: KnownBinRpcErrorCode | 'UNKNOWN'; message: string; }
export type InvokeEvent = InvokeAttemptEvent | InvokeSentEvent | InvokeFailedEvent;

export interface InvokeResult {
  method: string;
  host: string;
  port: number;
  cookie: number;
  bytes: number;
  packet: Buffer;
}

export interface InvokeTelemetrySnapshot {
  version: number;
  startedAt: number;
  attempts: number;
  sent: number;
  failed: number;
  bytesSent: number;
  errorsByCode: Record<string, number>;
  lastCookie?: number;
  lastErrorCode?: string;
}
