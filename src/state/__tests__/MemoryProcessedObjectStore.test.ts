import { MemoryProcessedObjectStore } from '../MemoryProcessedObjectStore';

describe('MemoryProcessedObjectStore', () => {
  it('should start empty', async () => {
    const store = new MemoryProcessedObjectStore();

    await expect(store.processedObjects()).resolves.toEqual([]);
  });

  it('should report marked keys in marking order', async () => {
    const store = new MemoryProcessedObjectStore();

    await store.markProcessed('a');
    await store.markProcessed('b');
    await store.markProcessed('a');

    await expect(store.processedObjects()).resolves.toEqual(['b', 'a']);
    expect(store.size).toBe(2);
  });

  it('should evict the oldest keys beyond its capacity', async () => {
    const store = new MemoryProcessedObjectStore(2);

    await store.markProcessed('first');
    await store.markProcessed('second');
    await store.markProcessed('third');

    await expect(store.processedObjects()).resolves.toEqual(['second', 'third']);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new MemoryProcessedObjectStore(0)).toThrow('maxKeys must be a positive integer, got 0');
  });
});
