import type { RequestHandler } from 'express';

import { unauthorizedError } from '../utils/errors';

const BEARER_PREFIX = 'bearer ';

const extractProvidedKey = (
  apiKeyHeader: string | undefined,
  authorization: string | undefined,
): string | undefined => {
  if (apiKeyHeader) {
    return apiKeyHeader;
  }

  if (authorization && authorization.toLowerCase().startsWith(BEARER_PREFIX)) {
    return authorization.slice(BEARER_PREFIX.length).trim();
  }

  return undefined;
};

/**
 * Guards the scrape endpoint when an API key is configured. Prometheus can only
 * send a bearer token, so `Authorization: Bearer <key>` is accepted next to `x-api-key`.
 */
export const apiKeyMiddleware =
  (configuredKey: string | undefined): RequestHandler =>
  (req, _res, next) => {
    if (!configuredKey) {
      next();
      return;
    }

    const providedKey = extractProvidedKey(req.header('x-api-key'), req.header('authorization'));
    if (!providedKey || providedKey !== configuredKey) {
      next(unauthorizedError('Invalid API key'));
      return;
    }

    next();
  };
