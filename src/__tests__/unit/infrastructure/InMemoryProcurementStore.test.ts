import { describe, it, expect } from 'vitest';
import { InMemoryProcurementStore } from '../../../infrastructure/adapters/storage/InMemoryProcurementStore.js';
import { InMemoryRunLock } from '../../../infrastructure/adapters/lock/InMemoryRunLock.js';
import { LOAD_TIME, acceptedRow } from '../../utils/fixtures.js';

describe('InMemoryProcurementStore', () => {
  it('leaves the committed snapshot untouched when a new snapshot is invalid', async () => {
    const store = new InMemoryProcurementStore();
    await store.commitDerived({ vendorMap: [], accepted: [acceptedRow({ purchaseId: 'KEEP' })], rejected: [], facts: [] });

    await expect(
      store.commitDerived({
        vendorMap: [],
        accepted: [acceptedRow({ purchaseId: 'X' }), acceptedRow({ purchaseId: 'X' })],
        rejected: [],
        facts: [],
      }),
    ).rejects.toThrow('Duplicate purchase id in clean gate: X');

    expect((await store.loadAccepted()).map((txn) => txn.purchaseId)).toEqual(['KEEP']);
  });

  it('upserts and deletes vendor overrides by raw name', async () => {
    const store = new InMemoryProcurementStore();
    await store.upsertVendorOverride({ rawVendorName: 'Acme', cleanVendorName: 'ACME ONE', updatedAt: LOAD_TIME });
    await store.upsertVendorOverride({ rawVendorName: 'Acme', cleanVendorName: 'ACME TWO', updatedAt: LOAD_TIME });

    expect((await store.listVendorOverrides()).map((override) => override.cleanVendorName)).toEqual(['ACME TWO']);
    expect(await store.deleteVendorOverride('Acme')).toBe(true);
    expect(await store.deleteVendorOverride('Acme')).toBe(false);
  });

  it('returns copies so callers cannot mutate stored rows lists', async () => {
    const store = new InMemoryProcurementStore();
    const rows = await store.readRawTransactions();
    rows.push({
      purchaseId: 'GHOST',
      vendorName: null,
      category: null,
      subCategory: null,
      spendAmount: null,
      purchaseDate: null,
      region: null,
      paymentTerms: null,
      deliveryTimeDays: null,
      qualityScore: null,
      vendorScore: null,
    });

    expect(await store.readRawTransactions()).toEqual([]);
  });
});

describe('InMemoryRunLock', () => {
  it('hands out the lock once until it is released', async () => {
    const lock = new InMemoryRunLock();
    const release = await lock.tryAcquire();

    expect(release).not.toBeNull();
    expect(await lock.tryAcquire()).toBeNull();

    await release?.();
    await release?.();

    const again = await lock.tryAcquire();
    expect(again).not.toBeNull();
    expect(await lock.tryAcquire()).toBeNull();
  });
});
