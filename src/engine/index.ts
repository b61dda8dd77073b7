/**
 * Rehabilitation Phase & Alert Engine
 *
 * Exports for the engine module.
 */

export {
  // Boundary validation
  validateMetrics,
  computeLimbSymmetryIndex,
  findMissingFields,

  type RawMetricInput,
} from './validation';

export {
  // Phase determination
  determinePhase,
  evaluatePhaseRule,
  rulesByPriority,
  DEFAULT_PHASE,

  type DeterminePhaseOptions,
} from './phase';

export {
  // Alerts
  evaluateAlerts,
  highestSeverity,
} from './alerts';

export {
  // Configuration
  createEngineConfig,
  getEngineConfig,
  listInjuryTypes,

  type EngineConfig,
  type InjuryTypeOption,
} from './config';

export { buildThresholdTable, buildDefaultThresholdTables } from './tables';
export { describeCriterion, evaluateCriterion } from './criteria';

export {
  ValidationError,
  UnsupportedInjuryTypeError,
  ConfigurationError,

  type EngineError,
  type EngineResult,
  type FieldViolation,
  type ViolationCode,
} from './errors';
