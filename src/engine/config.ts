/**
 * Threshold Configuration
 *
 * injuryType -> ThresholdTable mapping. Validated and frozen once; the
 * process-wide instance is created on first use from the built-in
 * definitions and is never mutated afterwards.
 */

import { z } from 'zod';
import type { Criterion, MetricField, ThresholdTable } from '@/types';
import { CORE_REQUIRED_FIELDS, METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { isMetricField } from './criteria';
import { ConfigurationError } from './errors';
import { buildDefaultThresholdTables } from './tables';

export interface EngineConfig {
  readonly tables: ReadonlyMap<string, ThresholdTable>;
  /** Injury types in declared order */
  readonly injuryTypes: readonly string[];
}

export interface InjuryTypeOption {
  value: string;
  label: string;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const metricFieldSchema = z.custom<MetricField>(
  value => typeof value === 'string' && isMetricField(value),
  { message: 'Unknown metric field' }
);

const boundSchema = z.object({
  value: z.number().finite(),
  inclusive: z.boolean(),
});

const criterionSchema = z.object({
  field: metricFieldSchema,
  min: boundSchema.optional(),
  max: boundSchema.optional(),
});

const phaseRuleSchema = z.object({
  phase: z.enum(['Return to Sport', 'Late', 'Mid', 'Early']),
  priority: z.number().int(),
  match: z.enum(['all', 'any']),
  criteria: z.array(criterionSchema).min(1),
});

const alertRuleSchema = z.object({
  id: z.string().min(1),
  severity: z.enum(['info', 'warning', 'critical']),
  criteria: z.array(criterionSchema).min(1),
  message: z.string().min(1),
});

const thresholdTableSchema = z.object({
  injuryType: z.string().trim().min(1),
  displayName: z.string().min(1),
  description: z.string(),
  rfdUnit: z.string(),
  requiredFields: z.array(metricFieldSchema),
  phases: z.array(phaseRuleSchema).min(1),
  alerts: z.array(alertRuleSchema),
});

// ---------------------------------------------------------------------------
// Cross-field checks
// ---------------------------------------------------------------------------

function isEmptyInterval({ min, max }: Criterion): boolean {
  if (!min || !max) return false;
  if (min.value > max.value) return true;
  return min.value === max.value && !(min.inclusive && max.inclusive);
}

function findDuplicates<T>(values: T[]): T[] {
  return values.filter((v, i) => values.indexOf(v) !== i);
}

function checkTable(table: ThresholdTable): string[] {
  const problems: string[] = [];
  const label = table.injuryType;

  for (const priority of new Set(findDuplicates(table.phases.map(p => p.priority)))) {
    problems.push(`${label}: phase priority ${priority} is declared more than once`);
  }
  for (const id of new Set(findDuplicates(table.alerts.map(a => a.id)))) {
    problems.push(`${label}: alert rule id "${id}" is declared more than once`);
  }
  for (const field of CORE_REQUIRED_FIELDS) {
    if (!table.requiredFields.includes(field)) {
      problems.push(`${label}: requiredFields must include ${field}`);
    }
  }

  table.phases.forEach(rule => rule.criteria.forEach(c => {
    if (isEmptyInterval(c)) {
      problems.push(`${label}: ${rule.phase} criterion on ${METRIC_FIELD_SPECS[c.field].label} has an empty interval`);
    }
  }));
  table.alerts.forEach(rule => rule.criteria.forEach(c => {
    if (isEmptyInterval(c)) {
      problems.push(`${label}: alert "${rule.id}" criterion on ${METRIC_FIELD_SPECS[c.field].label} has an empty interval`);
    }
  }));

  return problems;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Build an independent, frozen configuration.
 * @throws ConfigurationError listing every problem found
 */
export function createEngineConfig(tables: readonly ThresholdTable[]): EngineConfig {
  const problems: string[] = [];
  const validated: ThresholdTable[] = [];

  tables.forEach((table, index) => {
    const parsed = thresholdTableSchema.safeParse(table);
    if (!parsed.success) {
      const label = typeof table?.injuryType === 'string' && table.injuryType ? table.injuryType : `table #${index + 1}`;
      parsed.error.issues.forEach(issue => {
        problems.push(`${label}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      });
      return;
    }
    problems.push(...checkTable(parsed.data));
    validated.push(parsed.data);
  });

  for (const injuryType of new Set(findDuplicates(validated.map(t => t.injuryType)))) {
    problems.push(`${injuryType}: injury type is declared more than once`);
  }
  if (tables.length === 0) {
    problems.push('at least one threshold table is required');
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const injuryTypes = validated.map(t => t.injuryType);
  const map = new Map(validated.map(t => [t.injuryType, deepFreeze(t)] as const));

  return Object.freeze({
    tables: map,
    injuryTypes: Object.freeze(injuryTypes),
  });
}

/** Process-wide configuration, created once */
let processConfig: EngineConfig | null = null;

/**
 * Get the process-wide configuration built from the built-in definitions
 */
export function getEngineConfig(): EngineConfig {
  if (!processConfig) {
    processConfig = createEngineConfig(buildDefaultThresholdTables());
  }
  return processConfig;
}

/**
 * Injury type options for forms and CLI help, in declared order
 */
export function listInjuryTypes(config: EngineConfig = getEngineConfig()): InjuryTypeOption[] {
  return config.injuryTypes.flatMap(injuryType => {
    const table = config.tables.get(injuryType);
    return table ? [{ value: injuryType, label: `${injuryType} - ${table.displayName}` }] : [];
  });
}
