import type { AxiosInstance } from 'axios';

import type { TeslafiConfig } from '../config/teslafiConfig';
import { logger } from '../utils/logger';
import { FallbackSnapshotStore } from './fallbackSnapshot.store';
import { MetricMapper, type MetricBatch } from './metricMapper.service';
import { SnapshotReconciler } from './snapshotReconciler.service';
import { TeslafiService } from './teslafi.service';

export type ExporterServiceOptions = {
  reconciler: SnapshotReconciler;
  mapper?: MetricMapper;
};

export class ExporterService {
  private readonly reconciler: SnapshotReconciler;

  private readonly mapper: MetricMapper;

  constructor(options: ExporterServiceOptions) {
    this.reconciler = options.reconciler;
    this.mapper = options.mapper ?? new MetricMapper();
  }

  get fallbackStore(): FallbackSnapshotStore {
    return this.reconciler.fallbackStore;
  }

  /** One scrape: fetch, reconcile against the fallback, map to the metric catalog. */
  async collect(): Promise<MetricBatch> {
    const reconciled = await this.reconciler.reconcile();
    const batch = this.mapper.map(reconciled);

    logger.debug(
      { fallbackSource: batch.fallbackSource, metricCount: batch.metrics.length },
      'metric batch collected',
    );

    return batch;
  }
}

export const createExporterService = (
  config: TeslafiConfig,
  http?: AxiosInstance,
): ExporterService => {
  const source = new TeslafiService(config, http);

  return new ExporterService({
    reconciler: new SnapshotReconciler({
      source,
      store: new FallbackSnapshotStore(),
      fallbackCommand: config.fallbackCommand,
    }),
    mapper: new MetricMapper({ chargeTimeUnit: config.chargeTimeUnit }),
  });
};
