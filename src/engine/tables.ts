/**
 * Threshold table generation.
 *
 * Turns the static gate values of an injury into ordered phase rules and
 * alert rules. Bound inclusivity is stated per criterion via the
 * atLeast/above/atMost/below helpers.
 */

import type { AlertRule, InjuryThresholdDefinition, PhaseGate, PhaseRule, ThresholdTable } from '@/types';
import {
  ALERT_THRESHOLDS,
  CORE_REQUIRED_FIELDS,
  DEFAULT_RFD_UNIT,
  INJURY_THRESHOLD_DEFINITIONS,
} from '@/constants/injury-thresholds';
import { above, atLeast, atMost, below } from './criteria';

/**
 * Phase rules, most advanced first.
 *
 * Return to Sport / Late / Mid require every gate metric at or past its gate
 * (lsi >=, rfd >=, pain <=). Early matches when any metric misses the
 * earlyToMid gate (pain >, lsi <, rfd <), i.e. the complement of Mid when
 * all three metrics are present.
 */
function buildPhaseRules({ gates }: InjuryThresholdDefinition): PhaseRule[] {
  const passesGate = (gate: PhaseGate) => [
    { field: 'limbSymmetryIndex' as const, min: atLeast(gate.lsi) },
    { field: 'rateOfForceDevelopment' as const, min: atLeast(gate.rfd) },
    { field: 'painScore' as const, max: atMost(gate.pain) },
  ];

  return [
    { phase: 'Return to Sport', priority: 4, match: 'all', criteria: passesGate(gates.lateToReturn) },
    { phase: 'Late', priority: 3, match: 'all', criteria: passesGate(gates.midToLate) },
    { phase: 'Mid', priority: 2, match: 'all', criteria: passesGate(gates.earlyToMid) },
    {
      phase: 'Early',
      priority: 1,
      match: 'any',
      criteria: [
        { field: 'painScore', min: above(gates.earlyToMid.pain) },
        { field: 'limbSymmetryIndex', max: below(gates.earlyToMid.lsi) },
        { field: 'rateOfForceDevelopment', max: below(gates.earlyToMid.rfd) },
      ],
    },
  ];
}

/**
 * Alert rules: shared safety rules first, then gate-derived ones.
 */
function buildAlertRules({ displayName, gates }: InjuryThresholdDefinition): AlertRule[] {
  const { earlyToMid, midToLate, lateToReturn } = gates;

  return [
    {
      id: 'pain-with-asymmetry',
      severity: 'critical',
      criteria: [
        { field: 'painScore', min: atLeast(ALERT_THRESHOLDS.HIGH_PAIN) },
        { field: 'limbSymmetryIndex', max: below(ALERT_THRESHOLDS.SEVERE_ASYMMETRY_LSI) },
      ],
      message: 'High pain ({painScore}/10) with marked asymmetry (LSI {limbSymmetryIndex}%). Review loading and consider medical referral.',
    },
    {
      id: 'high-pain',
      severity: 'warning',
      criteria: [{ field: 'painScore', min: atLeast(ALERT_THRESHOLDS.HIGH_PAIN) }],
      message: 'High pain score ({painScore}/10). Consider clinical reassessment and pain management.',
    },
    {
      id: 'swelling',
      severity: 'warning',
      criteria: [{ field: 'swellingGrade', min: atLeast(ALERT_THRESHOLDS.SWELLING_GRADE) }],
      message: 'Swelling grade {swellingGrade} recorded. Reduce load until the effusion settles.',
    },
    {
      id: 'rfd-floor',
      severity: 'warning',
      criteria: [{ field: 'rateOfForceDevelopment', max: below(earlyToMid.rfd) }],
      message: `RFD {rateOfForceDevelopment}% is below the ${earlyToMid.rfd}% floor for ${displayName}. Prioritise explosive strength work.`,
    },
    {
      id: 'persistent-pain',
      severity: 'warning',
      criteria: [
        { field: 'painScore', min: above(ALERT_THRESHOLDS.PERSISTENT_PAIN) },
        { field: 'limbSymmetryIndex', min: atLeast(midToLate.lsi) },
      ],
      message: 'Persistent pain ({painScore}/10) despite LSI {limbSymmetryIndex}%. Needs clinical review before further progression.',
    },
    {
      id: 'reinjury-risk',
      severity: 'info',
      criteria: [
        { field: 'limbSymmetryIndex', min: atLeast(midToLate.lsi), max: below(ALERT_THRESHOLDS.REINJURY_TARGET_LSI) },
        { field: 'rateOfForceDevelopment', min: atLeast(midToLate.rfd) },
        { field: 'painScore', max: atMost(midToLate.pain) },
      ],
      message: `LSI {limbSymmetryIndex}% is below the ${ALERT_THRESHOLDS.REINJURY_TARGET_LSI}% target, which increases re-injury risk.`,
    },
    {
      id: 'explosive-deficit',
      severity: 'info',
      criteria: [
        { field: 'limbSymmetryIndex', min: atLeast(lateToReturn.lsi) },
        { field: 'rateOfForceDevelopment', max: below(lateToReturn.rfd) },
      ],
      message: 'Strength symmetry achieved but RFD {rateOfForceDevelopment}% lags. Consider more explosive strength training.',
    },
    {
      id: 'limb-dominance-reversed',
      severity: 'info',
      criteria: [{ field: 'limbSymmetryIndex', min: above(ALERT_THRESHOLDS.LIMB_DOMINANCE_REVERSED_LSI) }],
      message: `LSI {limbSymmetryIndex}% exceeds ${ALERT_THRESHOLDS.LIMB_DOMINANCE_REVERSED_LSI}%. Confirm the injured and uninjured limb assignment.`,
    },
  ];
}

export function buildThresholdTable(definition: InjuryThresholdDefinition): ThresholdTable {
  return {
    injuryType: definition.injuryType,
    displayName: definition.displayName,
    description: definition.description,
    rfdUnit: DEFAULT_RFD_UNIT,
    requiredFields: [...CORE_REQUIRED_FIELDS],
    phases: buildPhaseRules(definition),
    alerts: buildAlertRules(definition),
  };
}

/** Tables for every built-in injury type, in display order */
export function buildDefaultThresholdTables(): ThresholdTable[] {
  return INJURY_THRESHOLD_DEFINITIONS.map(buildThresholdTable);
}
