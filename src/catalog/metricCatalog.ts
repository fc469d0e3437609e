import { z } from 'zod';

import catalogDocument from './metrics.catalog.json';
import { UNIT_CONVERSIONS } from './unitConversions';

const metricNameSchema = z
  .string()
  .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'metric names must be valid Prometheus names');

const labelNameSchema = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'label names must be valid Prometheus label names')
  .refine((name) => !name.startsWith('__'), 'label names starting with __ are reserved');

const fieldNameSchema = z.string().min(1);

export const fieldParserSchema = z.enum(['number', 'integer', 'flag']);

export type FieldParser = z.infer<typeof fieldParserSchema>;

const numericShape = {
  name: metricNameSchema,
  help: z.string().min(1),
  parse: fieldParserSchema,
  convert: z.enum(UNIT_CONVERSIONS).optional(),
};

// emitted as-is, no parsing or conversion, when neither snapshot has the field
const defaultValueSchema = z.number().finite().optional();

const infoDescriptorSchema = z.object({
  kind: z.literal('info'),
  name: metricNameSchema,
  help: z.string().min(1),
  fields: z.array(labelNameSchema).min(1),
});

const singleNumericDescriptorSchema = z.object({
  kind: z.enum(['gauge', 'counter']),
  ...numericShape,
  field: fieldNameSchema,
  defaultValue: defaultValueSchema,
});

const multiNumericDescriptorSchema = z.object({
  kind: z.literal('gauge'),
  ...numericShape,
  dimension: labelNameSchema,
  instances: z
    .array(
      z.object({
        label: z.string().min(1),
        field: fieldNameSchema,
        defaultValue: defaultValueSchema,
      }),
    )
    .min(1),
});

const stateSetDescriptorSchema = z.object({
  kind: z.literal('stateset'),
  name: metricNameSchema,
  help: z.string().min(1),
  field: fieldNameSchema,
  states: z.array(z.string().min(1)).min(1),
  absentAliases: z.array(z.string()).default([]),
});

const metricDescriptorSchema = z.union([
  infoDescriptorSchema,
  singleNumericDescriptorSchema,
  multiNumericDescriptorSchema,
  stateSetDescriptorSchema,
]);

const hasDuplicates = (values: string[]): boolean => new Set(values).size !== values.length;

const metricCatalogSchema = z
  .object({
    identityLabels: z.array(labelNameSchema).min(1),
    metrics: z.array(metricDescriptorSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    if (hasDuplicates(catalog.metrics.map((metric) => metric.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'metric names must be unique' });
    }

    catalog.metrics.forEach((metric, index) => {
      if (metric.kind === 'stateset' && hasDuplicates(metric.states)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['metrics', index, 'states'],
          message: `states of ${metric.name} must be unique`,
        });
      }

      if ('instances' in metric) {
        if (hasDuplicates(metric.instances.map((instance) => instance.label))) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['metrics', index, 'instances'],
            message: `instance labels of ${metric.name} must be unique`,
          });
        }

        if (catalog.identityLabels.includes(metric.dimension)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['metrics', index, 'dimension'],
            message: `dimension of ${metric.name} collides with an identity label`,
          });
        }
      }
    });
  });

export type InfoDescriptor = z.infer<typeof infoDescriptorSchema>;
export type SingleNumericDescriptor = z.infer<typeof singleNumericDescriptorSchema>;
export type MultiNumericDescriptor = z.infer<typeof multiNumericDescriptorSchema>;
export type NumericDescriptor = SingleNumericDescriptor | MultiNumericDescriptor;
export type StateSetDescriptor = z.infer<typeof stateSetDescriptorSchema>;
export type MetricDescriptor = z.infer<typeof metricDescriptorSchema>;
export type MetricCatalog = z.infer<typeof metricCatalogSchema>;

export const loadMetricCatalog = (document: unknown): MetricCatalog =>
  metricCatalogSchema.parse(document);

export const metricCatalog: MetricCatalog = loadMetricCatalog(catalogDocument);
