import dgram from 'dgram';

export interface CapturingListener {
  port: number;
  socket: dgram.Socket;
  next(timeoutMs?: number): Promise<Buffer>;
  close(): Promise<void>;
}

// In-process UDP listener standing in for the ctl module; collects datagrams in order.
export async function createCapturingListener(): Promise<CapturingListener> {
  const socket = dgram.createSocket('udp4');
  const queue: Buffer[] = [];
  const waiters: Array<(b: Buffer) => void> = [];
  socket.on('message', (msg) => {
    const w = waiters.shift();
    if (w) w(msg);
    else queue.push(msg);
  });
  await new Promise<void>((resolve) => socket.bind(0, '127.0.0.1', resolve));
  const { port } = socket.address();
  return {
    port,
    socket,
    next: (timeoutMs = 2000) => {
      const ready = queue.shift();
      if (ready) return Promise.resolve(ready);
      return new Promise<Buffer>((resolve, reject) => {
        const timer = setTimeout(() => reject(new Error('no datagram received')), timeoutMs);
        waiters.push((b) => { clearTimeout(timer); resolve(b); });
      });
    },
    close: () => new Promise<void>((r) => socket.close(() => r())),
  };
}

export async function withCapturingListener(fn: (l: CapturingListener) => Promise<void>): Promise<void> {
  const l = await createCapturingListener();
  try {
    await fn(l);
  } finally {
    await l.close();
  }
}
