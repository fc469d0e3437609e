import { Router } from 'express';

import { renderMetricBatch } from '../integrations/prometheus/registryRenderer';
import type { ExporterService } from '../services/exporter.service';
import { logger } from '../utils/logger';

export const createMetricsRouter = (exporter: ExporterService): Router => {
  const metricsRouter = Router();

  metricsRouter.get('/', async (_req, res, next) => {
    try {
      const batch = await exporter.collect();
      const rendered = await renderMetricBatch(batch);

      logger.debug(
        { fallbackSource: batch.fallbackSource, metricCount: batch.metrics.length },
        'metrics scraped',
      );

      res.setHeader('Content-Type', rendered.contentType);
      res.send(rendered.body);
    } catch (error) {
      next(error);
    }
  });

  return metricsRouter;
};
