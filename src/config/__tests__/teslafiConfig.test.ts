import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';

import {
  DEFAULT_FALLBACK_COMMAND,
  DEFAULT_TESLAFI_BASE_URL,
  chargeTimeMultiplier,
  getTeslafiConfig,
} from '../teslafiConfig';

const TESLAFI_ENV = [
  'TESLAFI_API_TOKEN',
  'TESLAFI_BASE_URL',
  'TESLAFI_FALLBACK_COMMAND',
  'TESLAFI_CHARGE_TIME_UNIT',
  'TESLAFI_TIMEOUT_MS',
];

describe('getTeslafiConfig', () => {
  beforeEach(() => {
    TESLAFI_ENV.forEach((name) => vi.stubEnv(name, ''));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('applies defaults around the token', () => {
    vi.stubEnv('TESLAFI_API_TOKEN', 'test-secret');

    expect(getTeslafiConfig()).toEqual({
      apiToken: 'test-secret',
      baseUrl: DEFAULT_TESLAFI_BASE_URL,
      fallbackCommand: DEFAULT_FALLBACK_COMMAND,
      chargeTimeUnit: 'minutes',
      timeoutMs: 0,
    });
  });

  it('prefers the token given on the command line', () => {
    vi.stubEnv('TESLAFI_API_TOKEN', 'env-token');

    expect(getTeslafiConfig({ apiToken: 'cli-token' }).apiToken).toBe('cli-token');
  });

  it('requires a token', () => {
    expect(() => getTeslafiConfig()).toThrow(ZodError);
    expect(() => getTeslafiConfig()).toThrow('TESLAFI_API_TOKEN is required');
  });

  it('reads the optional settings', () => {
    vi.stubEnv('TESLAFI_API_TOKEN', 'test-secret');
    vi.stubEnv('TESLAFI_BASE_URL', 'http://127.0.0.1:8080/feed.php');
    vi.stubEnv('TESLAFI_FALLBACK_COMMAND', 'lastGood');
    vi.stubEnv('TESLAFI_CHARGE_TIME_UNIT', 'Hours');
    vi.stubEnv('TESLAFI_TIMEOUT_MS', '2500');

    expect(getTeslafiConfig()).toEqual({
      apiToken: 'test-secret',
      baseUrl: 'http://127.0.0.1:8080/feed.php',
      fallbackCommand: 'lastGood',
      chargeTimeUnit: 'hours',
      timeoutMs: 2500,
    });
  });

  it('rejects an unknown charge time unit', () => {
    vi.stubEnv('TESLAFI_API_TOKEN', 'test-secret');
    vi.stubEnv('TESLAFI_CHARGE_TIME_UNIT', 'days');

    expect(() => getTeslafiConfig()).toThrow(ZodError);
  });
});

describe('chargeTimeMultiplier', () => {
  it('converts minutes and hours to seconds', () => {
    expect(chargeTimeMultiplier('minutes')).toBe(60);
    expect(chargeTimeMultiplier('hours')).toBe(3600);
  });
});
