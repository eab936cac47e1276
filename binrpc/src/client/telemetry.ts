/* In-process counters for binrpc invocations */
import { EventEmitter } from 'events';
import { InvokeFailedEvent, InvokeSentEvent, InvokeTelemetrySnapshot } from './types';

export class InvokeTelemetry {
  private readonly startedAt = Date.now();
  private attempts = 0;
  private sent = 0;
  private failed = 0;
  private bytesSent = 0;
  private readonly errorsByCode: Record<string, number> = {};
  private lastCookie: number | undefined;
  private lastErrorCode: string | undefined;
  private attached = new WeakSet<EventEmitter>();

  hook(emitter: EventEmitter): void {
    if (this.attached.has(emitter)) return; // no double counting
    this.attached.add(emitter);
    emitter.on('attempt', () => { this.attempts++; });
    emitter.on('sent', (ev: InvokeSentEvent) => {
      this.sent++;
      this.bytesSent += ev.bytes;
      this.lastCookie = ev.cookie;
    });
    emitter.on('failed', (ev: InvokeFailedEvent) => {
      this.failed++;
      this.errorsByCode[ev.code] = (this.errorsByCode[ev.code] ?? 0) + 1;
      this.lastErrorCode = ev.code;
    });
  }

  snapshot(): InvokeTelemetrySnapshot {
    return {
      version: 1,
      startedAt: this.startedAt,
      attempts: this.attempts,
      sent: this.sent,
      failed: this.failed,
      bytesSent: this.bytesSent,
      errorsByCode: { ...this.errorsByCode },
      lastCookie: this.lastCookie,
      lastErrorCode: this.lastErrorCode,
    };
  }
}
