import { InvokeTelemetrySnapshot } from './types';

type Provider = () => InvokeTelemetrySnapshot | undefined;

const providers: Set<Provider> = new Set();

export function registerTelemetryProvider(p: Provider): void {
  providers.add(p);
}

export function unregisterTelemetryProvider(p: Provider): void {
  providers.delete(p);
}

// Prometheus text exposition
export function renderMetrics(): string {
  const agg = { clients: 0, attempts: 0, sent: 0, failed: 0, bytesSent: 0 };
  const byCode: Record<string, number> = {};
  for (const p of providers) {
    const snap = p();
    if (!snap) continue;
    agg.clients += 1;
    agg.attempts += snap.attempts;
    agg.sent += snap.sent;
    agg.failed += snap.failed;
    agg.bytesSent += snap.bytesSent;
    for (const [code, n] of Object.entries(snap.errorsByCode)) {
      byCode[code] = (byCode[code] ?? 0) + n;
    }
  }
  const lines: string[] = [];
  const push = (name: string, help: string, type: 'counter' | 'gauge', value: number) => {
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} ${type}`);
    lines.push(`${name} ${value}`);
  };
  push('binrpc_clients', 'Registered binrpc clients', 'gauge', agg.clients);
  push('binrpc_invocations_total', 'Total invocation attempts', 'counter', agg.attempts);
  push('binrpc_sent_total', 'Total requests written to the transport', 'counter', agg.sent);
  push('binrpc_failed_total', 'Total failed invocations', 'counter', agg.failed);
  push('binrpc_bytes_sent_total', 'Total datagram bytes written', 'counter', agg.bytesSent);
  const codes = Object.keys(byCode).sort();
  if (codes.length) {
    lines.push('# HELP binrpc_errors_total Failed invocations by error code');
    lines.push('# TYPE binrpc_errors_total counter');
    for (const code of codes) lines.push(`binrpc_errors_total{code="${code}"} ${byCode[code]}`);
  }
  return lines.join('\n') + '\n';
}
