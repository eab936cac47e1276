import { assemblePacket, writePacket, DatagramTransport } from '../../src/protocol/packet';
import { sequenceCookieSource, defaultCookieSource, CookieSource } from '../../src/protocol/cookie';
import { EncodingError } from '../../src/protocol/errors';
import { bytes, int, str } from '../../src/protocol/value';

const fixed = (c: number): CookieSource => ({ next: () => c });

describe('packet assembler', () => {
  test('dispatcher.list packet bytes', () => {
    const p = assemblePacket(str('dispatcher.list'), fixed(0xcafebabe));
    expect(p.cookie).toBe(0xcafebabe);
    expect(p.payload.length).toBe(18);
    expect(p.header.toString('hex')).toBe('a10312cafebabe');
    expect(p.packet.toString('hex')).toBe('a10312cafebabe' + '9110' + Buffer.from('dispatcher.list\0').toString('hex'));
  });

  test('header declares the true payload length', () => {
    for (let n = 0; n <= 250; n++) {
      const p = assemblePacket(bytes(Buffer.alloc(n, 0x2a)), fixed(1));
      expect(p.packet[2]).toBe(p.payload.length);
      expect(p.packet.length).toBe(7 + p.payload.length);
    }
  });

  test('integer packet', () => {
    const p = assemblePacket(int(-1), fixed(7));
    expect(p.packet.toString('hex')).toBe('a1030500000007' + '40ffffffff');
  });

  test('multiple values share one header', () => {
    const p = assemblePacket([str('core.uptime'), int(1)], fixed(1));
    expect(p.payload.length).toBe(14 + 5);
    expect(p.packet[2]).toBe(19);
  });

  test('payload errors are wrapped as EncodingError', () => {
    expect(() => assemblePacket({ kind: 'int', value: 1.25 }, fixed(1))).toThrow(/failed to construct payload/);
  });

  test('header errors are wrapped as EncodingError', () => {
    expect(() => assemblePacket(int(1), fixed(-5))).toThrow(EncodingError);
    expect(() => assemblePacket(int(1), fixed(-5))).toThrow(/failed to construct header/);
  });

  test('writePacket issues a single write of header + payload', async () => {
    const writes: Buffer[] = [];
    const transport: DatagramTransport = { write: async (b) => { writes.push(b); } };
    const res = await writePacket(transport, str('a'), sequenceCookieSource(10));
    expect(writes).toHaveLength(1);
    expect(writes[0].equals(res.packet)).toBe(true);
    expect(res.cookie).toBe(10);
  });

  test('write failure propagates', async () => {
    const transport: DatagramTransport = { write: async () => { throw new Error('boom'); } };
    await expect(writePacket(transport, str('a'))).rejects.toThrow('boom');
  });
});

describe('cookie sources', () => {
  test('sequence source increments and wraps', () => {
    const s = sequenceCookieSource(0xffffffff);
    expect(s.next()).toBe(0xffffffff);
    expect(s.next()).toBe(0);
    expect(s.next()).toBe(1);
  });

  test('default source yields uint32 values that rarely repeat', () => {
    const seen = new Set<number>();
    for (let i = 0; i < 50; i++) {
      const c = defaultCookieSource.next();
      expect(Number.isInteger(c)).toBe(true);
      expect(c).toBeGreaterThanOrEqual(0);
      expect(c).toBeLessThanOrEqual(0xffffffff);
      seen.add(c);
    }
    expect(seen.size).toBeGreaterThan(45);
  });
});
