import type { ErrorRequestHandler } from 'express';

import { HttpError, SnapshotFieldError, TeslafiApiError } from '../utils/errors';
import { logger } from '../utils/logger';

const toHttpError = (error: unknown): HttpError | null => {
  if (error instanceof HttpError) {
    return error;
  }

  if (error instanceof TeslafiApiError) {
    return new HttpError(502, `TESLAFI_${error.kind}`, error.message, {
      detail: error.detail,
      status: error.status,
      command: error.command,
    });
  }

  if (error instanceof SnapshotFieldError) {
    return new HttpError(500, `SNAPSHOT_${error.reason}`, error.message, {
      field: error.field,
      metric: error.metric,
    });
  }

  return null;
};

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const httpError = toHttpError(error);

  if (httpError) {
    if (httpError.status >= 500) {
      logger.error({ err: error, path: req.path }, 'scrape failed');
    }

    res.status(httpError.status).json({
      error: {
        code: httpError.code,
        message: httpError.message,
        details: httpError.details,
      },
    });
    return;
  }

  logger.error({ error }, 'unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Something went wrong. Try again later.',
    },
  });
};
