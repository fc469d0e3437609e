import { z } from 'zod';

export const DEFAULT_TESLAFI_BASE_URL = 'https://www.teslafi.com/feed.php';
export const DEFAULT_FALLBACK_COMMAND = 'lastGoodTemp';

const chargeTimeUnitSchema = z.enum(['minutes', 'hours']);

export type ChargeTimeUnit = z.infer<typeof chargeTimeUnitSchema>;

const teslafiConfigSchema = z.object({
  apiToken: z
    .string({ required_error: 'TESLAFI_API_TOKEN is required' })
    .trim()
    .min(1, 'TESLAFI_API_TOKEN is required'),
  baseUrl: z.string().url(),
  fallbackCommand: z.string().trim().min(1),
  // TeslaFi switched time_to_full_charge between minutes and hours across schema
  // revisions; the feed itself does not say which one it sends.
  chargeTimeUnit: chargeTimeUnitSchema,
  timeoutMs: z.coerce.number().int().min(0),
});

export type TeslafiConfig = z.infer<typeof teslafiConfigSchema>;

export type TeslafiConfigOverrides = {
  apiToken?: string;
};

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value : undefined;

export const getTeslafiConfig = (overrides: TeslafiConfigOverrides = {}): TeslafiConfig =>
  teslafiConfigSchema.parse({
    apiToken: overrides.apiToken ?? blankToUndefined(process.env.TESLAFI_API_TOKEN),
    baseUrl: blankToUndefined(process.env.TESLAFI_BASE_URL) ?? DEFAULT_TESLAFI_BASE_URL,
    fallbackCommand:
      blankToUndefined(process.env.TESLAFI_FALLBACK_COMMAND) ?? DEFAULT_FALLBACK_COMMAND,
    chargeTimeUnit: (
      blankToUndefined(process.env.TESLAFI_CHARGE_TIME_UNIT) ?? 'minutes'
    ).toLowerCase(),
    timeoutMs: blankToUndefined(process.env.TESLAFI_TIMEOUT_MS) ?? 0,
  });

export const chargeTimeMultiplier = (unit: ChargeTimeUnit): number =>
  unit === 'hours' ? 3600 : 60;
