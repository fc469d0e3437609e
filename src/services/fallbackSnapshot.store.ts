import type { Snapshot } from '../models/snapshot';

export type FallbackLoadResult = {
  snapshot: Snapshot;
  loaded: boolean;
};

/**
 * Holds the last snapshot known to carry the temperature fields. Overlapping
 * callers of `loadIfAbsent` share one in-flight load, and a load that resolves
 * after `replace` never overwrites the newer snapshot.
 */
export class FallbackSnapshotStore {
  private snapshot: Snapshot | null = null;

  private inflight: Promise<Snapshot> | null = null;

  peek(): Snapshot | null {
    return this.snapshot;
  }

  hasSnapshot(): boolean {
    return this.snapshot !== null;
  }

  replace(snapshot: Snapshot): void {
    this.snapshot = snapshot;
  }

  /** Returns the cached snapshot, invoking `loader` only while the cache is empty. */
  async loadIfAbsent(loader: () => Promise<Snapshot>): Promise<FallbackLoadResult> {
    if (this.snapshot) {
      return { snapshot: this.snapshot, loaded: false };
    }

    if (this.inflight) {
      const shared = await this.inflight;
      return { snapshot: this.snapshot ?? shared, loaded: false };
    }

    const inflight = loader();
    this.inflight = inflight;

    try {
      const loaded = await inflight;
      if (this.snapshot) {
        return { snapshot: this.snapshot, loaded: false };
      }

      this.snapshot = loaded;
      return { snapshot: loaded, loaded: true };
    } finally {
      if (this.inflight === inflight) {
        this.inflight = null;
      }
    }
  }
}
