/**
 * Engine error kinds.
 *
 * ValidationError and UnsupportedInjuryTypeError are returned to the caller
 * inside an EngineResult for display. ConfigurationError is thrown while
 * building the threshold configuration and should abort startup.
 */

import type { MetricField } from '@/types';

export type ViolationCode = 'missing' | 'invalid_type' | 'not_integer' | 'out_of_range' | 'inconsistent';

/** A single field-level constraint violation */
export interface FieldViolation {
  field: MetricField | 'injuryType';
  code: ViolationCode;
  message: string;
}

export class ValidationError extends Error {
  readonly kind = 'validation';
  readonly violations: FieldViolation[];

  constructor(violations: FieldViolation[]) {
    super(
      violations.length === 1
        ? violations[0].message
        : `${violations.length} problems: ${violations.map(v => v.message).join('; ')}`
    );
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export class UnsupportedInjuryTypeError extends Error {
  readonly kind = 'unsupported_injury_type';
  readonly injuryType: string;
  readonly supported: readonly string[];

  constructor(injuryType: string, supported: readonly string[]) {
    super(`Unsupported injury type "${injuryType}". Supported: ${supported.join(', ')}`);
    this.name = 'UnsupportedInjuryTypeError';
    this.injuryType = injuryType;
    this.supported = supported;
  }
}

export class ConfigurationError extends Error {
  readonly kind = 'configuration';
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid threshold configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export type EngineError = ValidationError | UnsupportedInjuryTypeError;

/** Result of an engine call: a value, or a well-typed error for the caller to display */
export type EngineResult<T, E extends EngineError = EngineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };
