import { BinRpcClientCodec } from '../../src/client/codec';
import { DatagramTransport } from '../../src/protocol/packet';
import { UnsupportedError } from '../../src/protocol/errors';
import { parsePacket } from '../../src/protocol/decoder';

function recordingTransport(): DatagramTransport & { writes: Buffer[] } {
  const writes: Buffer[] = [];
  return { writes, write: async (b: Buffer) => { writes.push(b); } };
}

describe('BinRpcClientCodec', () => {
  test('writeRequest encodes the method as one String record', async () => {
    const t = recordingTransport();
    const codec = new BinRpcClientCodec(t, { next: () => 42 });
    const sent = await codec.writeRequest('core.version');
    expect(t.writes).toHaveLength(1);
    expect(sent.cookie).toBe(42);
    const parsed = parsePacket(t.writes[0]);
    expect(parsed.cookie).toBe(42);
    expect(parsed.values).toEqual([{ kind: 'str', value: 'core.version' }]);
  });

  test('readResponse is explicitly unsupported', async () => {
    const codec = new BinRpcClientCodec(recordingTransport());
    await expect(codec.readResponse()).rejects.toBeInstanceOf(UnsupportedError);
    await expect(codec.readResponse()).rejects.toThrow(/not supported/);
  });
});
