import { randomUUID } from 'crypto';
import express, { type Application } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';

import { apiKeyMiddleware } from './middleware/apiKey.middleware';
import { errorHandler } from './middleware/errorHandler.middleware';
import { createMetricsRouter } from './controllers/metrics.controller';
import { getAppConfig, type AppConfig } from './config/appConfig';
import type { ExporterService } from './services/exporter.service';
import { logger } from './utils/logger';

const extractRequestId = (req: { id?: unknown }): string | undefined =>
  typeof req.id === 'string' ? req.id : undefined;

export type CreateAppOptions = {
  exporter: ExporterService;
  config?: AppConfig;
};

export const createApp = ({ exporter, config }: CreateAppOptions): Application => {
  const appConfig = config ?? getAppConfig();
  const app = express();

  const redactPaths = appConfig.logging.redactHeaders.map((header) => {
    const sanitized = header.toLowerCase();
    return /^[a-z0-9_]+$/.test(sanitized)
      ? `req.headers.${sanitized}`
      : `req.headers["${sanitized}"]`;
  });

  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const incomingHeader = req.headers[appConfig.requestIdHeader];
        const candidate = Array.isArray(incomingHeader)
          ? incomingHeader[0]
          : incomingHeader;
        const requestId = candidate && candidate.length > 0 ? candidate : randomUUID();
        res.setHeader(appConfig.requestIdHeader, requestId);
        return requestId;
      },
      redact: {
        paths: redactPaths,
        remove: true,
      },
      serializers: {
        req(req) {
          const { id, method, url } = req;
          return { id, method, url };
        },
        res(res) {
          const { statusCode } = res;
          return { statusCode };
        },
      },
    }),
  );

  app.use(helmet());
  app.use(
    rateLimit({
      windowMs: appConfig.rateLimit.windowMs,
      limit: appConfig.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        const retryAfterSeconds = Math.ceil(appConfig.rateLimit.windowMs / 1000);
        res.setHeader('Retry-After', retryAfterSeconds.toString());
        const requestId = extractRequestId(req);
        res.status(429).json({
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests. Slow down before retrying.',
            details: {
              windowMs: appConfig.rateLimit.windowMs,
              maxRequests: appConfig.rateLimit.max,
              retryAfterSeconds,
              requestId,
            },
            requestId,
          },
        });
      },
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      fallbackCached: exporter.fallbackStore.hasSnapshot(),
    });
  });

  app.use(
    appConfig.metrics.path,
    apiKeyMiddleware(appConfig.metrics.apiKey),
    createMetricsRouter(exporter),
  );

  app.use((req, res) => {
    const requestId = extractRequestId(req);
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
        requestId,
      },
    });
  });

  app.use(errorHandler);

  return app;
};
