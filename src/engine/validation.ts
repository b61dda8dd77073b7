/**
 * Boundary validation for clinical metrics.
 *
 * Coerces raw form/CLI input into a typed ClinicalMetrics bundle and reports
 * every violated constraint at once.
 */

import { z } from 'zod';
import type { ClinicalMetrics, MetricField, ThresholdTable } from '@/types';
import { CORE_REQUIRED_FIELDS, METRIC_FIELDS, METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { round1 } from '@/utils/format';
import { readMetric } from './criteria';
import { getEngineConfig, type EngineConfig } from './config';
import {
  UnsupportedInjuryTypeError,
  ValidationError,
  type EngineResult,
  type FieldViolation,
} from './errors';

/** Raw textual or form input, keyed by metric field */
export type RawMetricInput = Partial<Record<MetricField, unknown>> & Record<string, unknown>;

/**
 * Treat blank text and null as absent; convert numeric text to numbers.
 * Anything else is passed through for the schema to reject.
 */
function toNumeric(value: unknown): unknown {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : Number(trimmed);
  }
  return value;
}

function describeRange(field: MetricField): string {
  const { min, max } = METRIC_FIELD_SPECS[field];
  return max === null ? `at least ${min}` : `between ${min} and ${max}`;
}

function fieldSchema(field: MetricField) {
  const spec = METRIC_FIELD_SPECS[field];
  const rangeMessage = `${spec.label} must be ${describeRange(field)}`;

  let schema = z
    .number({ invalid_type_error: `${spec.label} must be a number` })
    .finite({ message: `${spec.label} must be a finite number` });
  if (spec.integer) {
    schema = schema.int({ message: `${spec.label} must be a whole number` });
  }
  schema = schema.min(spec.min, { message: rangeMessage });
  if (spec.max !== null) {
    schema = schema.max(spec.max, { message: rangeMessage });
  }
  return schema.optional();
}

function toViolation(field: MetricField, issue: z.ZodIssue): FieldViolation {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return { field, code: issue.expected === 'integer' ? 'not_integer' : 'invalid_type', message: issue.message };
    case z.ZodIssueCode.not_finite:
      return { field, code: 'invalid_type', message: issue.message };
    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big:
      return { field, code: 'out_of_range', message: issue.message };
    default:
      return { field, code: 'invalid_type', message: issue.message };
  }
}

export function missingViolation(field: MetricField): FieldViolation {
  return { field, code: 'missing', message: `${METRIC_FIELD_SPECS[field].label} is required` };
}

/** Fields a table needs, core fields first */
export function requiredFieldsOf(table: ThresholdTable): MetricField[] {
  return [...new Set([...CORE_REQUIRED_FIELDS, ...table.requiredFields])];
}

/**
 * Required fields that are absent or not finite numbers
 */
export function findMissingFields(table: ThresholdTable, metrics: ClinicalMetrics): MetricField[] {
  return requiredFieldsOf(table).filter(field => readMetric(metrics, field) === undefined);
}

/**
 * LSI from limb forces: weaker / stronger * 100, one decimal
 */
export function computeLimbSymmetryIndex(left: number, right: number): number | undefined {
  const stronger = Math.max(left, right);
  if (stronger <= 0) return undefined;
  return round1((Math.min(left, right) / stronger) * 100);
}

/**
 * Validate and coerce raw input for an injury type.
 *
 * LSI is derived from leftLimbForce/rightLimbForce when not given directly.
 * Unknown keys in the input are ignored.
 */
export function validateMetrics(
  injuryType: string,
  rawInput: RawMetricInput,
  config: EngineConfig = getEngineConfig()
): EngineResult<ClinicalMetrics> {
  const type = injuryType.trim();
  const table = config.tables.get(type);
  if (!table) {
    return { ok: false, error: new UnsupportedInjuryTypeError(type, config.injuryTypes) };
  }

  const values: Partial<Record<MetricField, number>> = {};
  const issues = new Map<MetricField, FieldViolation[]>();

  for (const field of METRIC_FIELDS) {
    const parsed = fieldSchema(field).safeParse(toNumeric(rawInput[field]));
    if (parsed.success) {
      if (parsed.data !== undefined) values[field] = parsed.data;
    } else {
      issues.set(field, parsed.error.issues.map(issue => toViolation(field, issue)));
    }
  }

  if (values.limbSymmetryIndex === undefined && !issues.has('limbSymmetryIndex')
      && values.leftLimbForce !== undefined && values.rightLimbForce !== undefined) {
    const derived = computeLimbSymmetryIndex(values.leftLimbForce, values.rightLimbForce);
    if (derived !== undefined) values.limbSymmetryIndex = derived;
  }

  const required = requiredFieldsOf(table);
  const violations = METRIC_FIELDS.flatMap(field => {
    const fieldIssues = issues.get(field);
    if (fieldIssues) return fieldIssues;
    return required.includes(field) && values[field] === undefined ? [missingViolation(field)] : [];
  });

  const { limbSymmetryIndex, painScore } = values;
  if (violations.length > 0 || limbSymmetryIndex === undefined || painScore === undefined) {
    return { ok: false, error: new ValidationError(violations) };
  }

  const metrics: ClinicalMetrics = { injuryType: table.injuryType, limbSymmetryIndex, painScore };
  for (const field of METRIC_FIELDS) {
    const value = values[field];
    if (value !== undefined) metrics[field] = value;
  }
  return { ok: true, value: metrics };
}
