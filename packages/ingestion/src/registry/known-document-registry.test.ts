import { describe, expect, test, vi } from 'vitest';

import { KnownDocumentRegistry } from './known-document-registry';

describe('KnownDocumentRegistry', () => {
  test('reserves an unknown document and knows it after commit', async () => {
    const registry = new KnownDocumentRegistry();

    expect(await registry.reserve('doc')).toBe('reserved');
    expect(registry.isReserved('doc')).toBe(true);
    expect(registry.isKnown('doc')).toBe(false);

    registry.commit('doc');

    expect(registry.isReserved('doc')).toBe(false);
    expect(registry.isKnown('doc')).toBe(true);
    expect(await registry.reserve('doc')).toBe('known');
  });

  test('forgets a released reservation', async () => {
    const registry = new KnownDocumentRegistry();

    await registry.reserve('doc');
    registry.release('doc');

    expect(registry.isKnown('doc')).toBe(false);
    expect(await registry.reserve('doc')).toBe('reserved');
  });

  test('forcing reserves a known document', async () => {
    const registry = new KnownDocumentRegistry();
    await registry.reserve('doc');
    registry.commit('doc');

    expect(await registry.reserve('doc', { force: true })).toBe('reserved');
  });

  test('lets only one of two concurrent callers reserve', async () => {
    const store = {
      existsByDocId: vi.fn(
        () =>
          new Promise<boolean>((resolve) => {
            setTimeout(() => resolve(false), 5);
          }),
      ),
    };
    const registry = new KnownDocumentRegistry(store);

    const outcomes = await Promise.all([
      registry.reserve('doc'),
      registry.reserve('doc', { force: true }),
    ]);

    expect(outcomes).toEqual(['reserved', 'in-progress']);
    expect(store.existsByDocId).toHaveBeenCalledTimes(1);
  });

  test('consults the store for documents it has not seen', async () => {
    const store = {
      existsByDocId: vi.fn(async (docId: string) => docId === 'stored'),
    };
    const registry = new KnownDocumentRegistry(store);

    expect(await registry.reserve('stored')).toBe('known');
    expect(registry.isKnown('stored')).toBe(true);
    expect(registry.isReserved('stored')).toBe(false);
    expect(await registry.reserve('fresh')).toBe('reserved');

    await registry.reserve('stored');
    expect(store.existsByDocId).toHaveBeenCalledTimes(2);
  });

  test('releases the reservation when the store lookup fails', async () => {
    const store = {
      existsByDocId: vi.fn().mockRejectedValue(new Error('store offline')),
    };
    const registry = new KnownDocumentRegistry(store);

    await expect(registry.reserve('doc')).rejects.toThrow('store offline');
    expect(registry.isReserved('doc')).toBe(false);
  });
});
