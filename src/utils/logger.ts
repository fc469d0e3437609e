import pino from 'pino';

// LOGLEVEL is the older variable name; it accepted WARNING and CRITICAL.
const LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'fatal',
};

const DEFAULT_LEVEL = 'info';

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): string => {
  const configured = env.LOG_LEVEL || env.LOGLEVEL;
  if (!configured) {
    return env.NODE_ENV === 'test' ? 'silent' : DEFAULT_LEVEL;
  }

  const normalized = configured.trim().toLowerCase();
  const level = LEVEL_ALIASES[normalized] ?? normalized;
  return level === 'silent' || level in pino.levels.values ? level : DEFAULT_LEVEL;
};

export const logger = pino({
  name: 'teslafi-exporter',
  level: resolveLogLevel(),
  redact: {
    paths: ['token', 'apiToken', 'config.apiToken'],
    censor: '[redacted]',
  },
});
