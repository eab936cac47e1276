import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import binRpcConfig, { BinRpcConfig } from '../utils/config';
import { CookieSource } from '../protocol/cookie';
import { invoke } from './invoke';
import { registerTelemetryProvider, unregisterTelemetryProvider } from './metrics';
import { InvokeTelemetry } from './telemetry';
import { InvokeResult, InvokeTelemetrySnapshot } from './types';

export interface BinRpcClientOptions {
  host?: string;
  port?: number | string;
  timeoutMs?: number | null;
  cookieSource?: CookieSource;
  logger?: Logger;
  config?: BinRpcConfig;
  registerMetrics?: boolean; // expose through renderMetrics(); default false
}

// Thin client bound to one ctl endpoint. Emits 'attempt' | 'sent' | 'failed' per call.
export class BinRpcClient extends EventEmitter {
  readonly host: string;
  readonly port: number | string;
  private readonly timeoutMs: number | null;
  private readonly telemetry = new InvokeTelemetry();
  private readonly provider = () => this.telemetry.snapshot();
  private registered = false;

  constructor(private readonly opts: BinRpcClientOptions = {}) {
    super();
    const cfg = opts.config ?? binRpcConfig;
    this.host = opts.host ?? cfg.host;
    this.port = opts.port ?? cfg.port;
    this.timeoutMs = opts.timeoutMs !== undefined ? opts.timeoutMs : cfg.timeoutMs;
    this.telemetry.hook(this);
    if (opts.registerMetrics) {
      registerTelemetryProvider(this.provider);
      this.registered = true;
    }
  }

  invoke(method: string): Promise<InvokeResult> {
    return invoke(method, this.host, this.port, {
      timeoutMs: this.timeoutMs,
      cookieSource: this.opts.cookieSource,
      logger: this.opts.logger,
      emitter: this,
    });
  }

  getTelemetry(): InvokeTelemetrySnapshot {
    return this.telemetry.snapshot();
  }

  close(): void {
    if (!this.registered) return;
    unregisterTelemetryProvider(this.provider);
    this.registered = false;
  }
}
