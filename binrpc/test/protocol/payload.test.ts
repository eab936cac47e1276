import { buildPayload, buildRecord, byteWidth } from '../../src/protocol/payload';
import { BinRpcType } from '../../src/protocol/constants';
import { EncodingError } from '../../src/protocol/errors';
import { array, bytes, double, int, str, struct } from '../../src/protocol/value';

const hex = (b: Buffer) => b.toString('hex');

describe('payload builder', () => {
  test('integer: type 0, inline size 4', () => {
    for (const n of [0, 1, -1, 123456789, -0x80000000, 0x7fffffff]) {
      const rec = buildPayload(int(n));
      expect(rec.length).toBe(5);
      expect(rec[0]).toBe(0x40);
      expect(rec.readInt32BE(1)).toBe(n);
    }
  });

  test('empty string has size 1 (terminator only)', () => {
    expect(hex(buildPayload(str('')))).toBe('1100');
  });

  test('short string is sized inline', () => {
    expect(hex(buildPayload(str('abc')))).toBe('4161626300');
  });

  test('exactly 8 bytes stays inline', () => {
    // 7 chars + NUL; 8 << 4 lands on the flag bit
    expect(hex(buildPayload(str('abcdefg')))).toBe('81' + '61626364656667' + '00');
  });

  test('9 bytes switches to an explicit 1-byte length', () => {
    expect(hex(buildPayload(str('abcdefgh')))).toBe('9109' + '6162636465666768' + '00');
  });

  test('9-char string gets explicit length 10', () => {
    const rec = buildPayload(str('123456789'));
    expect(rec[0]).toBe(0x91);
    expect(rec[1]).toBe(10);
    expect(rec.length).toBe(12);
    expect(rec[11]).toBe(0x00);
  });

  test('dispatcher.list record', () => {
    expect(hex(buildPayload(str('dispatcher.list')))).toBe('9110' + Buffer.from('dispatcher.list\0').toString('hex'));
  });

  test('length above 255 uses a 2-byte length field', () => {
    const rec = buildPayload(str('x'.repeat(300)));
    expect(rec[0]).toBe(0xa1);
    expect(rec.readUInt16BE(1)).toBe(301);
    expect(rec.length).toBe(304);
  });

  test('double and bytes records', () => {
    expect(hex(buildPayload(double(1.5)))).toBe('42000005dc');
    expect(hex(buildPayload(bytes(Uint8Array.from([1, 2, 3]))))).toBe('36010203');
  });

  test('struct members are name AVPs between start/end markers', () => {
    expect(hex(buildPayload(struct({ a: int(1) })))).toBe('03' + '256100' + '4000000001' + '83');
  });

  test('array items between start/end markers', () => {
    expect(hex(buildPayload(array([str('x'), int(2)])))).toBe('04' + '217800' + '4000000002' + '84');
  });

  test('several top-level values are concatenated', () => {
    expect(hex(buildPayload(str('a'), int(7)))).toBe('216100' + '4000000007');
  });

  test('buildRecord with raw body', () => {
    expect(hex(buildRecord(BinRpcType.Bytes, Buffer.alloc(0)))).toBe('06');
  });
});

describe('byteWidth', () => {
  test('minimal widths', () => {
    expect(byteWidth(0)).toBe(1);
    expect(byteWidth(255)).toBe(1);
    expect(byteWidth(256)).toBe(2);
    expect(byteWidth(65535)).toBe(2);
    expect(byteWidth(65536)).toBe(3);
    expect(byteWidth(0xffffffff)).toBe(4);
  });

  test('rejects undeterminable lengths', () => {
    expect(() => byteWidth(-1)).toThrow(EncodingError);
    expect(() => byteWidth(2 ** 32)).toThrow(EncodingError);
    expect(() => byteWidth(1.5)).toThrow(/byte width/);
  });
});
