import { DEFAULT_FALLBACK_COMMAND } from '../config/teslafiConfig';
import { isSnapshotComplete, type Snapshot } from '../models/snapshot';
import { logger } from '../utils/logger';
import { FallbackSnapshotStore } from './fallbackSnapshot.store';
import type { SnapshotSource } from './teslafi.service';

/** Where the fallback half of a reconciled pair came from. */
export type FallbackSource = 'current' | 'cache' | 'fetched';

export type ReconciledSnapshots = {
  current: Snapshot;
  fallback: Snapshot;
  fallbackSource: FallbackSource;
};

export type SnapshotReconcilerOptions = {
  source: SnapshotSource;
  store?: FallbackSnapshotStore;
  fallbackCommand?: string;
};

export class SnapshotReconciler {
  private readonly source: SnapshotSource;

  private readonly store: FallbackSnapshotStore;

  private readonly fallbackCommand: string;

  constructor(options: SnapshotReconcilerOptions) {
    this.source = options.source;
    this.store = options.store ?? new FallbackSnapshotStore();
    this.fallbackCommand = options.fallbackCommand ?? DEFAULT_FALLBACK_COMMAND;
  }

  get fallbackStore(): FallbackSnapshotStore {
    return this.store;
  }

  async reconcile(): Promise<ReconciledSnapshots> {
    const current = await this.source.fetchSnapshot();

    if (isSnapshotComplete(current)) {
      this.store.replace(current);
      return { current, fallback: current, fallbackSource: 'current' };
    }

    const { snapshot, loaded } = await this.store.loadIfAbsent(() => {
      logger.info(
        { command: this.fallbackCommand },
        'vehicle snapshot incomplete and no fallback cached; fetching last good snapshot',
      );
      return this.source.fetchSnapshot(this.fallbackCommand);
    });

    logger.debug({ fallbackSource: loaded ? 'fetched' : 'cache' }, 'vehicle snapshot incomplete');

    return { current, fallback: snapshot, fallbackSource: loaded ? 'fetched' : 'cache' };
  }
}
