import { describe, expect, it, vi } from 'vitest';

import type { Snapshot } from '../../models/snapshot';
import { TeslafiApiError } from '../../utils/errors';
import { FallbackSnapshotStore } from '../fallbackSnapshot.store';
import { SnapshotReconciler } from '../snapshotReconciler.service';
import type { SnapshotSource } from '../teslafi.service';
import { asleepSnapshot, awakeSnapshot, withFields } from '../../__tests__/fixtures/snapshots';

const createSource = () => {
  const fetchSnapshot = vi.fn<(command?: string) => Promise<Snapshot>>();
  const source: SnapshotSource = { fetchSnapshot };
  return { source, fetchSnapshot };
};

const lastGood = withFields(awakeSnapshot, { outside_temp: '15', battery_level: '64' });

describe('SnapshotReconciler', () => {
  it('uses a complete snapshot as its own fallback and caches it', async () => {
    const { source, fetchSnapshot } = createSource();
    fetchSnapshot.mockResolvedValueOnce(awakeSnapshot);
    const reconciler = new SnapshotReconciler({ source });

    const result = await reconciler.reconcile();

    expect(result).toEqual({
      current: awakeSnapshot,
      fallback: awakeSnapshot,
      fallbackSource: 'current',
    });
    expect(result.fallback).toBe(result.current);
    expect(reconciler.fallbackStore.peek()).toBe(awakeSnapshot);
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
  });

  it('fetches the last good snapshot once when nothing is cached', async () => {
    const { source, fetchSnapshot } = createSource();
    fetchSnapshot.mockResolvedValueOnce(asleepSnapshot).mockResolvedValueOnce(lastGood);
    const reconciler = new SnapshotReconciler({ source, fallbackCommand: 'lastGoodTemp' });

    const result = await reconciler.reconcile();

    expect(result.current).toBe(asleepSnapshot);
    expect(result.fallback).toBe(lastGood);
    expect(result.fallbackSource).toBe('fetched');
    expect(fetchSnapshot).toHaveBeenNthCalledWith(1);
    expect(fetchSnapshot).toHaveBeenNthCalledWith(2, 'lastGoodTemp');
  });

  it('serves later incomplete snapshots from the cache', async () => {
    const { source, fetchSnapshot } = createSource();
    fetchSnapshot
      .mockResolvedValueOnce(asleepSnapshot)
      .mockResolvedValueOnce(lastGood)
      .mockResolvedValueOnce(asleepSnapshot);
    const reconciler = new SnapshotReconciler({ source });

    await reconciler.reconcile();
    const second = await reconciler.reconcile();

    expect(second.fallbackSource).toBe('cache');
    expect(second.fallback).toBe(lastGood);
    expect(fetchSnapshot).toHaveBeenCalledTimes(3);
  });

  it('refreshes the cache whenever a complete snapshot arrives', async () => {
    const { source, fetchSnapshot } = createSource();
    const store = new FallbackSnapshotStore();
    store.replace(lastGood);
    fetchSnapshot.mockResolvedValueOnce(awakeSnapshot).mockResolvedValueOnce(asleepSnapshot);
    const reconciler = new SnapshotReconciler({ source, store });

    await reconciler.reconcile();
    const afterSleep = await reconciler.reconcile();

    expect(afterSleep.fallback).toBe(awakeSnapshot);
    expect(afterSleep.fallbackSource).toBe('cache');
  });

  it('propagates a failed fallback fetch and leaves the cache empty', async () => {
    const { source, fetchSnapshot } = createSource();
    const rejected = new TeslafiApiError('UPSTREAM_REJECTED', 'Unsuccessful TeslaFi API response: busy', {
      detail: 'busy',
      command: 'lastGoodTemp',
    });
    fetchSnapshot.mockResolvedValueOnce(asleepSnapshot).mockRejectedValueOnce(rejected);
    const reconciler = new SnapshotReconciler({ source });

    await expect(reconciler.reconcile()).rejects.toBe(rejected);
    expect(reconciler.fallbackStore.hasSnapshot()).toBe(false);
  });

  it('leaves the cache untouched when the current fetch fails', async () => {
    const { source, fetchSnapshot } = createSource();
    const store = new FallbackSnapshotStore();
    store.replace(lastGood);
    fetchSnapshot.mockRejectedValueOnce(
      new TeslafiApiError('TRANSPORT', 'Error calling TeslaFi API: HTTP 502', { status: 502 }),
    );
    const reconciler = new SnapshotReconciler({ source, store });

    await expect(reconciler.reconcile()).rejects.toBeInstanceOf(TeslafiApiError);
    expect(store.peek()).toBe(lastGood);
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
  });

  it('serves a complete scrape while a fallback fetch is still pending', async () => {
    const { source, fetchSnapshot } = createSource();
    let currentReads = 0;
    fetchSnapshot.mockImplementation((command) => {
      if (command) {
        return new Promise<Snapshot>(() => undefined);
      }

      currentReads += 1;
      return Promise.resolve(currentReads === 1 ? asleepSnapshot : awakeSnapshot);
    });
    const reconciler = new SnapshotReconciler({ source });

    void reconciler.reconcile();
    await vi.waitFor(() => expect(fetchSnapshot).toHaveBeenCalledWith('lastGoodTemp'));
    const awake = await reconciler.reconcile();

    expect(awake).toEqual({
      current: awakeSnapshot,
      fallback: awakeSnapshot,
      fallbackSource: 'current',
    });
    expect(reconciler.fallbackStore.peek()).toBe(awakeSnapshot);
  });

  it('fetches the fallback once for overlapping incomplete scrapes', async () => {
    const { source, fetchSnapshot } = createSource();
    fetchSnapshot.mockImplementation(async (command) => (command ? lastGood : asleepSnapshot));
    const reconciler = new SnapshotReconciler({ source });

    const results = await Promise.all([reconciler.reconcile(), reconciler.reconcile()]);

    expect(fetchSnapshot.mock.calls.filter(([command]) => command === 'lastGoodTemp')).toHaveLength(1);
    expect(results.map((result) => result.fallbackSource).sort()).toEqual(['cache', 'fetched']);
    expect(results.every((result) => result.fallback === lastGood)).toBe(true);
  });
});
