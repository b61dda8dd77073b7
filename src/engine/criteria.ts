/**
 * Interval criteria over clinical metrics.
 *
 * A criterion over a field the metrics do not carry is not satisfied.
 */

import type { Bound, ClinicalMetrics, Criterion, CriterionOutcome, MetricField } from '@/types';
import { METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { formatNumber } from '@/utils/format';

export function isMetricField(name: string): name is MetricField {
  return Object.prototype.hasOwnProperty.call(METRIC_FIELD_SPECS, name);
}

/**
 * Read a metric as a finite number, or undefined when absent/unusable
 */
export function readMetric(metrics: ClinicalMetrics, field: MetricField): number | undefined {
  const value = metrics[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function satisfiesLower(value: number, bound: Bound | undefined): boolean {
  if (!bound) return true;
  return bound.inclusive ? value >= bound.value : value > bound.value;
}

function satisfiesUpper(value: number, bound: Bound | undefined): boolean {
  if (!bound) return true;
  return bound.inclusive ? value <= bound.value : value < bound.value;
}

/**
 * Human-readable form of a criterion, e.g. "Pain ≤ 1" or "85 ≤ LSI < 90"
 */
export function describeCriterion(criterion: Criterion): string {
  const label = METRIC_FIELD_SPECS[criterion.field].label;
  const { min, max } = criterion;

  if (min && max) {
    return `${formatNumber(min.value)} ${min.inclusive ? '≤' : '<'} ${label} ${max.inclusive ? '≤' : '<'} ${formatNumber(max.value)}`;
  }
  if (min) return `${label} ${min.inclusive ? '≥' : '>'} ${formatNumber(min.value)}`;
  if (max) return `${label} ${max.inclusive ? '≤' : '<'} ${formatNumber(max.value)}`;
  return `${label} recorded`;
}

export function evaluateCriterion(criterion: Criterion, metrics: ClinicalMetrics): CriterionOutcome {
  const actual = readMetric(metrics, criterion.field);
  const satisfied = actual !== undefined
    && satisfiesLower(actual, criterion.min)
    && satisfiesUpper(actual, criterion.max);

  return {
    field: criterion.field,
    description: describeCriterion(criterion),
    actual: actual ?? null,
    satisfied,
  };
}

/**
 * Fill {metricField} placeholders in an alert message template
 */
export function formatMessage(template: string, metrics: ClinicalMetrics): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    if (!isMetricField(name)) return placeholder;
    return formatNumber(readMetric(metrics, name));
  });
}

// Bound helpers for building tables
export const atLeast = (value: number): Bound => ({ value, inclusive: true });
export const above = (value: number): Bound => ({ value, inclusive: false });
export const atMost = (value: number): Bound => ({ value, inclusive: true });
export const below = (value: number): Bound => ({ value, inclusive: false });
