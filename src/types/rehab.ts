/**
 * Rehabilitation Phase & Alert Engine - Type Definitions
 */

/** Built-in injury type identifiers */
export type InjuryType =
  | 'ACL'
  | 'Achilles'
  | 'Hamstring'
  | 'Patellar Tendon'
  | 'Rotator Cuff'
  | 'Groin'
  | 'Proximal Hamstring Tendinopathy'
  | 'ATFL Ligament Injury'
  | 'Generic';

/**
 * Rehabilitation phase label.
 * 'Unclassified' is the default when no phase rule matches; it is never a rule target.
 */
export type RehabPhase =
  | 'Return to Sport'  // Competition-ready metrics
  | 'Late'             // Sport-specific strength and power
  | 'Mid'              // Progressive loading
  | 'Early'            // Pain management, foundational strength
  | 'Unclassified';    // Insufficient data to place the patient

/** Phases a threshold table may target */
export type RulePhase = Exclude<RehabPhase, 'Unclassified'>;

export type AlertSeverity = 'info' | 'warning' | 'critical';

/** One assessment's clinical inputs */
export interface ClinicalMetrics {
  injuryType: string;
  limbSymmetryIndex: number;         // LSI %, 0-200
  painScore: number;                 // 0-10 integer
  rateOfForceDevelopment?: number;   // unit per injury table (built-ins: % of baseline)
  peakForce?: number;                // N
  leftLimbForce?: number;            // N
  rightLimbForce?: number;           // N
  daysSinceInjury?: number;
  daysSinceSurgery?: number;
  rangeOfMotion?: number;            // degrees
  swellingGrade?: number;            // 0-4 integer
}

/** Numeric metric fields a criterion can test */
export type MetricField = Exclude<keyof ClinicalMetrics, 'injuryType'>;

/** Declared range and presentation of a metric field */
export interface MetricFieldSpec {
  label: string;
  unit: string;
  min: number;
  max: number | null;     // null = unbounded above
  integer: boolean;
  cliFlag: string;
}

/** One side of an interval. Absence of a bound means unbounded in that direction. */
export interface Bound {
  value: number;
  inclusive: boolean;
}

/** Interval test over a single metric field */
export interface Criterion {
  field: MetricField;
  min?: Bound;
  max?: Bound;
}

/** Phase predicate; higher priority = more advanced phase, checked first */
export interface PhaseRule {
  phase: RulePhase;
  priority: number;
  match: 'all' | 'any';
  criteria: Criterion[];
}

/** Alert predicate; all criteria must hold. Message placeholders use {metricField}. */
export interface AlertRule {
  id: string;
  severity: AlertSeverity;
  criteria: Criterion[];
  message: string;
}

/** Per-injury configuration consumed by the engine */
export interface ThresholdTable {
  injuryType: string;
  displayName: string;
  description: string;
  rfdUnit: string;
  requiredFields: MetricField[];
  phases: PhaseRule[];
  alerts: AlertRule[];
}

/** Progression gate between two phases */
export interface PhaseGate {
  lsi: number;
  rfd: number;
  pain: number;
}

/** Static definition a built-in threshold table is generated from */
export interface InjuryThresholdDefinition {
  injuryType: InjuryType;
  displayName: string;
  description: string;
  gates: {
    earlyToMid: PhaseGate;
    midToLate: PhaseGate;
    lateToReturn: PhaseGate;
  };
}

export interface Alert {
  ruleId: string;
  severity: AlertSeverity;
  message: string;
}

/** Outcome of one criterion in an explanation trace */
export interface CriterionOutcome {
  field: MetricField;
  description: string;
  actual: number | null;
  satisfied: boolean;
}

/** One phase rule's evaluation in an explanation trace */
export interface PhaseEvaluation {
  phase: RulePhase;
  priority: number;
  match: 'all' | 'any';
  satisfied: boolean;
  criteria: CriterionOutcome[];
}

export interface PhaseTrace {
  selectedPhase: RehabPhase;
  evaluations: PhaseEvaluation[];
}

export interface PhaseResult {
  injuryType: string;
  phase: RehabPhase;
  message: string;
  alerts: Alert[];
  metrics: ClinicalMetrics;
  trace?: PhaseTrace;
}

/** Focus and exercise guidance for a phase */
export interface PhaseGuidance {
  focus: string[];
  exerciseTypes: string[];
  avoid: string[];
}
