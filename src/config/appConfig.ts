const DEFAULT_PORT = 9998;

const parseInteger = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return parsed;
};

const normalizePath = (value: string | undefined, fallback: string): string => {
  const candidate = value?.trim();
  if (!candidate) {
    return fallback;
  }

  return candidate.startsWith('/') ? candidate : `/${candidate}`;
};

export type AppConfigOverrides = {
  port?: number;
};

export const getAppConfig = (overrides: AppConfigOverrides = {}) => ({
  port: overrides.port ?? parseInteger(process.env.PORT, DEFAULT_PORT),
  metrics: {
    path: normalizePath(process.env.METRICS_PATH, '/metrics'),
    apiKey: process.env.METRICS_API_KEY?.trim() || undefined,
  },
  rateLimit: {
    windowMs: parseInteger(process.env.RATE_LIMIT_WINDOW_MS, 60_000),
    max: parseInteger(process.env.RATE_LIMIT_MAX, 120),
  },
  requestIdHeader: (process.env.REQUEST_ID_HEADER || 'x-request-id').toLowerCase(),
  logging: {
    redactHeaders: ['authorization', 'cookie', 'x-api-key'],
  },
});

export type AppConfig = ReturnType<typeof getAppConfig>;
