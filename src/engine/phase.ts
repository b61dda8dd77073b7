/**
 * Rehabilitation Phase Determination
 *
 * Pure mapping from current clinical metrics to a phase plus alerts:
 * 1. Look up the injury's threshold table
 * 2. Evaluate every phase rule; the satisfied rule with the highest declared
 *    priority wins (array position is irrelevant)
 * 3. No satisfied rule -> 'Unclassified'
 * 4. Evaluate alert rules independently of the phase
 */

import type {
  ClinicalMetrics,
  PhaseEvaluation,
  PhaseResult,
  PhaseRule,
  RehabPhase,
  ThresholdTable,
} from '@/types';
import { PHASE_MESSAGES } from '@/constants/phase-guidance';
import { evaluateCriterion } from './criteria';
import { evaluateAlerts } from './alerts';
import { getEngineConfig, type EngineConfig } from './config';
import { findMissingFields, missingViolation } from './validation';
import {
  UnsupportedInjuryTypeError,
  ValidationError,
  type EngineResult,
  type FieldViolation,
} from './errors';

export interface DeterminePhaseOptions {
  /** Attach a trace of every phase rule evaluation */
  explain?: boolean;
  /** Configuration to use instead of the process-wide one */
  config?: EngineConfig;
}

export const DEFAULT_PHASE: RehabPhase = 'Unclassified';

/** Phase rules sorted by declared priority, most advanced first */
export function rulesByPriority(table: ThresholdTable): PhaseRule[] {
  return [...table.phases].sort((a, b) => b.priority - a.priority);
}

export function evaluatePhaseRule(rule: PhaseRule, metrics: ClinicalMetrics): PhaseEvaluation {
  const criteria = rule.criteria.map(c => evaluateCriterion(c, metrics));
  const satisfied = rule.match === 'all'
    ? criteria.every(c => c.satisfied)
    : criteria.some(c => c.satisfied);

  return {
    phase: rule.phase,
    priority: rule.priority,
    match: rule.match,
    satisfied,
    criteria,
  };
}

function copyMetrics(metrics: ClinicalMetrics, injuryType: string): ClinicalMetrics {
  return { ...metrics, injuryType };
}

/**
 * Determine the rehabilitation phase and alerts for one assessment.
 * Injury types are trimmed, as validateMetrics does.
 * Never throws; errors are returned for the caller to display.
 */
export function determinePhase(
  injuryType: string,
  metrics: ClinicalMetrics,
  options: DeterminePhaseOptions = {}
): EngineResult<PhaseResult> {
  const config = options.config ?? getEngineConfig();
  const type = injuryType.trim();
  const table = config.tables.get(type);
  if (!table) {
    return { ok: false, error: new UnsupportedInjuryTypeError(type, config.injuryTypes) };
  }

  const violations: FieldViolation[] = findMissingFields(table, metrics).map(missingViolation);
  const recordedType = metrics.injuryType.trim();
  if (recordedType !== type) {
    violations.unshift({
      field: 'injuryType',
      code: 'inconsistent',
      message: `Metrics were recorded for "${recordedType}", not "${type}"`,
    });
  }
  if (violations.length > 0) {
    return { ok: false, error: new ValidationError(violations) };
  }

  const evaluations = rulesByPriority(table).map(rule => evaluatePhaseRule(rule, metrics));
  const phase = evaluations.find(e => e.satisfied)?.phase ?? DEFAULT_PHASE;

  const result: PhaseResult = {
    injuryType: table.injuryType,
    phase,
    message: PHASE_MESSAGES[phase],
    alerts: evaluateAlerts(table, metrics),
    metrics: copyMetrics(metrics, table.injuryType),
  };

  if (options.explain) {
    result.trace = { selectedPhase: phase, evaluations };
  }

  return { ok: true, value: result };
}
