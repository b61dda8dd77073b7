import type { PhaseResult, SessionRecord } from '@/types';

export interface SessionRecordOptions {
  /** Defaults to now */
  timestamp?: Date | string;
  notes?: string;
}

/**
 * Build a session record from an assessment result
 * @throws Error if patientId is blank or the timestamp is not a date
 */
export function buildSessionRecord(
  patientId: string,
  result: PhaseResult,
  options: SessionRecordOptions = {}
): SessionRecord {
  const id = patientId.trim();
  if (!id) {
    throw new Error('Patient ID is required to log a session');
  }

  const date = options.timestamp === undefined ? new Date() : new Date(options.timestamp);
  if (isNaN(date.getTime())) {
    throw new Error(`Invalid session timestamp: ${String(options.timestamp)}`);
  }

  return {
    patientId: id,
    timestamp: date.toISOString(),
    injuryType: result.injuryType,
    metrics: { ...result.metrics },
    phase: result.phase,
    alerts: result.alerts.map(alert => ({ ...alert })),
    notes: (options.notes ?? '').trim(),
  };
}
