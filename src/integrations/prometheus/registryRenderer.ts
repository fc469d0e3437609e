import { Counter, Gauge, Registry } from 'prom-client';

import type {
  InfoMetric,
  MaterializedMetric,
  MetricBatch,
  NumericMetric,
  StateSetMetric,
} from '../../services/metricMapper.service';

export type RenderedMetrics = {
  contentType: string;
  body: string;
};

const registerInfo = (registry: Registry, metric: InfoMetric): void => {
  const gauge = new Gauge({
    name: `${metric.name}_info`,
    help: metric.help,
    labelNames: Object.keys(metric.labels),
    registers: [registry],
  });
  gauge.set(metric.labels, 1);
};

const registerNumeric = (registry: Registry, metric: NumericMetric): void => {
  if (metric.kind === 'counter') {
    const counter = new Counter({
      name: `${metric.name}_total`,
      help: metric.help,
      labelNames: metric.labelNames,
      registers: [registry],
    });
    metric.samples.forEach((sample) => counter.inc(sample.labels, sample.value));
    return;
  }

  const gauge = new Gauge({
    name: metric.name,
    help: metric.help,
    labelNames: metric.labelNames,
    registers: [registry],
  });
  metric.samples.forEach((sample) => gauge.set(sample.labels, sample.value));
};

// Text format 0.0.4 has no state-set type: one gauge sample per state, labelled
// with the metric's own name.
const registerStateSet = (registry: Registry, metric: StateSetMetric): void => {
  const gauge = new Gauge({
    name: metric.name,
    help: metric.help,
    labelNames: [...Object.keys(metric.labels), metric.name],
    registers: [registry],
  });
  metric.flags.forEach((flag) =>
    gauge.set({ ...metric.labels, [metric.name]: flag.state }, flag.active ? 1 : 0),
  );
};

const register = (registry: Registry, metric: MaterializedMetric): void => {
  switch (metric.kind) {
    case 'info':
      registerInfo(registry, metric);
      break;
    case 'stateset':
      registerStateSet(registry, metric);
      break;
    default:
      registerNumeric(registry, metric);
  }
};

/** Each batch gets its own registry so overlapping scrapes never share metric state. */
export const buildRegistry = (batch: MetricBatch): Registry => {
  const registry = new Registry();
  batch.metrics.forEach((metric) => register(registry, metric));
  return registry;
};

export const renderMetricBatch = async (batch: MetricBatch): Promise<RenderedMetrics> => {
  const registry = buildRegistry(batch);
  return {
    contentType: registry.contentType,
    body: await registry.metrics(),
  };
};
