import {
  metricCatalog as defaultCatalog,
  type FieldParser,
  type InfoDescriptor,
  type MetricCatalog,
  type NumericDescriptor,
  type StateSetDescriptor,
} from '../catalog/metricCatalog';
import { buildUnitMultipliers, type UnitMultipliers } from '../catalog/unitConversions';
import type { ChargeTimeUnit } from '../config/teslafiConfig';
import { hasValue, type Snapshot } from '../models/snapshot';
import { SnapshotFieldError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { FallbackSource, ReconciledSnapshots } from './snapshotReconciler.service';

/** State name used when a state-set field is absent, empty or a known placeholder. */
export const ABSENT_STATE = 'None';

export type MetricLabels = Record<string, string>;

export type MetricSample = {
  labels: MetricLabels;
  value: number;
};

export type InfoMetric = {
  kind: 'info';
  name: string;
  help: string;
  labels: MetricLabels;
};

export type NumericMetric = {
  kind: 'gauge' | 'counter';
  name: string;
  help: string;
  labelNames: string[];
  samples: MetricSample[];
};

export type StateObservation =
  | { kind: 'known'; state: string }
  | { kind: 'unrecognized'; state: string };

export type StateFlag = {
  state: string;
  active: boolean;
};

export type StateSetMetric = {
  kind: 'stateset';
  name: string;
  help: string;
  labels: MetricLabels;
  observation: StateObservation;
  flags: StateFlag[];
};

export type MaterializedMetric = InfoMetric | NumericMetric | StateSetMetric;

export type MetricBatch = {
  collectedAt: string;
  fallbackSource: FallbackSource;
  metrics: MaterializedMetric[];
};

/**
 * Value of `field` from `current`, else from `fallback`, else `defaultValue`.
 * Null and empty strings count as absent.
 */
export const resolveField = (
  current: Snapshot,
  fallback: Snapshot,
  field: string,
  defaultValue?: string | number | boolean,
): string | number | boolean | undefined => {
  const fromCurrent = current[field];
  if (hasValue(fromCurrent)) {
    return fromCurrent;
  }

  const fromFallback = fallback[field];
  if (hasValue(fromFallback)) {
    return fromFallback;
  }

  return defaultValue;
};

const parseDecimal = (value: string | number | boolean): number | null => {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

const TRUE_FLAGS = new Set(['true', '1']);
const FALSE_FLAGS = new Set(['false', '0']);

const parseFlag = (value: string | number | boolean): number | null => {
  const normalized = String(value).trim().toLowerCase();
  if (TRUE_FLAGS.has(normalized)) {
    return 1;
  }

  if (FALSE_FLAGS.has(normalized)) {
    return 0;
  }

  return null;
};

/** Returns null when the value cannot be read with the given parser. */
export const parseFieldValue = (
  parser: FieldParser,
  value: string | number | boolean,
): number | null => {
  switch (parser) {
    case 'flag':
      return parseFlag(value);
    case 'integer': {
      const parsed = parseDecimal(value);
      return parsed === null ? null : Math.trunc(parsed);
    }
    case 'number':
    default:
      return parseDecimal(value);
  }
};

export const observeState = (
  descriptor: StateSetDescriptor,
  value: string | number | boolean | undefined,
): StateObservation => {
  const observed =
    value === undefined || descriptor.absentAliases.includes(String(value))
      ? ABSENT_STATE
      : String(value);

  return descriptor.states.includes(observed)
    ? { kind: 'known', state: observed }
    : { kind: 'unrecognized', state: observed };
};

export const buildStateFlags = (
  descriptor: StateSetDescriptor,
  observation: StateObservation,
): StateFlag[] => {
  const flags = descriptor.states.map((state) => ({
    state,
    active: state === observation.state,
  }));

  if (observation.kind === 'unrecognized') {
    flags.push({ state: observation.state, active: true });
  }

  return flags;
};

const toLabelValue = (value: string | number | boolean | undefined): string =>
  value === undefined ? '' : String(value);

/** The snapshot field behind one numeric sample, with its fallback default. */
type FieldSource = {
  field: string;
  defaultValue?: number;
};

export type MetricMapperOptions = {
  catalog?: MetricCatalog;
  chargeTimeUnit?: ChargeTimeUnit;
};

export class MetricMapper {
  private readonly catalog: MetricCatalog;

  private readonly multipliers: UnitMultipliers;

  constructor(options: MetricMapperOptions = {}) {
    this.catalog = options.catalog ?? defaultCatalog;
    this.multipliers = buildUnitMultipliers(options.chargeTimeUnit ?? 'minutes');
  }

  map(reconciled: ReconciledSnapshots, collectedAt: Date = new Date()): MetricBatch {
    const { current, fallback } = reconciled;
    const identity = this.resolveLabels(current, fallback, this.catalog.identityLabels);

    const metrics = this.catalog.metrics.map<MaterializedMetric>((descriptor) => {
      switch (descriptor.kind) {
        case 'info':
          return this.mapInfo(descriptor, current, fallback);
        case 'stateset':
          return this.mapStateSet(descriptor, current, fallback, identity);
        default:
          return this.mapNumeric(descriptor, current, fallback, identity);
      }
    });

    return {
      collectedAt: collectedAt.toISOString(),
      fallbackSource: reconciled.fallbackSource,
      metrics,
    };
  }

  private resolveLabels(current: Snapshot, fallback: Snapshot, fields: string[]): MetricLabels {
    return Object.fromEntries(
      fields.map((field) => [field, toLabelValue(resolveField(current, fallback, field))]),
    );
  }

  private mapInfo(descriptor: InfoDescriptor, current: Snapshot, fallback: Snapshot): InfoMetric {
    return {
      kind: 'info',
      name: descriptor.name,
      help: descriptor.help,
      labels: this.resolveLabels(current, fallback, descriptor.fields),
    };
  }

  private mapNumeric(
    descriptor: NumericDescriptor,
    current: Snapshot,
    fallback: Snapshot,
    identity: MetricLabels,
  ): NumericMetric {
    const identityNames = Object.keys(identity);

    if ('instances' in descriptor) {
      return {
        kind: descriptor.kind,
        name: descriptor.name,
        help: descriptor.help,
        labelNames: [...identityNames, descriptor.dimension],
        samples: descriptor.instances.map((instance) => ({
          labels: { ...identity, [descriptor.dimension]: instance.label },
          value: this.readNumber(descriptor, instance, current, fallback),
        })),
      };
    }

    return {
      kind: descriptor.kind,
      name: descriptor.name,
      help: descriptor.help,
      labelNames: identityNames,
      samples: [
        {
          labels: { ...identity },
          value: this.readNumber(descriptor, descriptor, current, fallback),
        },
      ],
    };
  }

  private mapStateSet(
    descriptor: StateSetDescriptor,
    current: Snapshot,
    fallback: Snapshot,
    identity: MetricLabels,
  ): StateSetMetric {
    const observation = observeState(
      descriptor,
      resolveField(current, fallback, descriptor.field),
    );

    if (observation.kind === 'unrecognized') {
      logger.info(
        { metric: descriptor.name, field: descriptor.field, value: observation.state },
        'unknown or unexpected state value',
      );
    }

    return {
      kind: 'stateset',
      name: descriptor.name,
      help: descriptor.help,
      labels: { ...identity },
      observation,
      flags: buildStateFlags(descriptor, observation),
    };
  }

  private readNumber(
    descriptor: NumericDescriptor,
    source: FieldSource,
    current: Snapshot,
    fallback: Snapshot,
  ): number {
    const { field, defaultValue } = source;
    const raw = resolveField(current, fallback, field);

    if (raw === undefined) {
      if (defaultValue === undefined) {
        throw new SnapshotFieldError('MISSING_FIELD', { field, metric: descriptor.name });
      }

      return defaultValue;
    }

    const parsed = parseFieldValue(descriptor.parse, raw);
    if (parsed === null) {
      throw new SnapshotFieldError('INVALID_VALUE', {
        field,
        metric: descriptor.name,
        value: raw,
      });
    }

    return descriptor.convert ? parsed * this.multipliers[descriptor.convert] : parsed;
  }
}
