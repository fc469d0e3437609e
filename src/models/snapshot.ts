import { z } from 'zod';

export type SnapshotValue = string | number | boolean | null;

/** One frozen read of the TeslaFi feed: field name to scalar value. */
export type Snapshot = Readonly<Record<string, SnapshotValue | undefined>>;

/** Field whose nullness marks a snapshot taken while the car was asleep. */
export const COMPLETENESS_SENTINEL_FIELD = 'outside_temp';

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const feedBodySchema = z.record(z.string(), z.unknown());

const envelopeResultSchema = z.object({
  result: z.union([z.string(), z.number(), z.boolean()]),
});

export type FeedBodyParseResult =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; reason: 'rejected'; result: string }
  | { ok: false; reason: 'malformed'; message: string };

const extractEnvelopeResult = (response: unknown): string => {
  const parsed = envelopeResultSchema.safeParse(response);
  return parsed.success ? String(parsed.data.result) : '';
};

export const toSnapshot = (body: Record<string, unknown>): Snapshot => {
  const entries = Object.entries(body).reduce<Array<[string, SnapshotValue]>>(
    (accumulator, [field, value]) => {
      const scalar = scalarSchema.safeParse(value);
      if (scalar.success) {
        accumulator.push([field, scalar.data]);
      }

      return accumulator;
    },
    [],
  );

  return Object.freeze(Object.fromEntries(entries));
};

/**
 * Interprets an already JSON-decoded feed body. TeslaFi reports its own failures
 * inside a `response` wrapper instead of through the HTTP status.
 */
export const parseFeedBody = (body: unknown): FeedBodyParseResult => {
  const parsed = feedBodySchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      reason: 'malformed',
      message: 'TeslaFi feed body is not a JSON object',
    };
  }

  if ('response' in parsed.data) {
    return {
      ok: false,
      reason: 'rejected',
      result: extractEnvelopeResult(parsed.data.response),
    };
  }

  return { ok: true, snapshot: toSnapshot(parsed.data) };
};

export const hasValue = (value: SnapshotValue | undefined): value is string | number | boolean =>
  value !== null && value !== undefined && value !== '';

export const isSnapshotComplete = (snapshot: Snapshot): boolean => {
  const sentinel = snapshot[COMPLETENESS_SENTINEL_FIELD];
  return sentinel !== null && sentinel !== undefined;
};
