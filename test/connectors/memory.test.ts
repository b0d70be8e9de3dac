import { describe, it, expect } from 'vitest';
import { MemoryConnector } from '../../src/connectors/memory.js';

const BYTES = Uint8Array.from({ length: 16 }, (_, i) => i * 2);

describe('MemoryConnector', () => {
  it('should return a view over the registered bytes', async () => {
    const connector = new MemoryConnector({ 'a.bin': BYTES });
    const result = await connector.read('a.bin', 2, 3);

    expect([...result]).toEqual([4, 6, 8]);
    expect(result.buffer).toBe(BYTES.buffer);
  });

  it('should clamp reads to the end of the data', async () => {
    const connector = new MemoryConnector({ 'a.bin': BYTES });

    expect([...await connector.read('a.bin', 14, 8)]).toEqual([28, 30]);
    expect(await connector.read('a.bin', 20, 4)).toHaveLength(0);
    expect([...await connector.read('a.bin', -3, 2)]).toEqual([0, 2]);
  });

  it('should register and replace files with set', async () => {
    const connector = new MemoryConnector();
    connector.set('b.bin', new Uint8Array([1]));
    connector.set('b.bin', new Uint8Array([9, 9]));

    expect([...await connector.read('b.bin', 0, 4)]).toEqual([9, 9]);
  });

  it('should reject an unknown path', async () => {
    const connector = new MemoryConnector();
    await expect(connector.read('nope.bin', 0, 1))
      .rejects.toThrow('ENOENT: no in-memory file registered for nope.bin');
  });

  it('should drop every file on close', async () => {
    const connector = new MemoryConnector({ 'a.bin': BYTES });
    await connector.close();

    await expect(connector.read('a.bin', 0, 1)).rejects.toThrow(/ENOENT/);
  });
});
