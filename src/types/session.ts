import type { Alert, ClinicalMetrics, RehabPhase } from './rehab';

/** Persisted session row. Append-only; owned by the session store. */
export interface SessionRecord {
  patientId: string;
  timestamp: string;          // ISO date string
  injuryType: string;
  metrics: ClinicalMetrics;
  phase: RehabPhase;
  alerts: Alert[];
  notes: string;
}

/** Progress summary over a patient's sessions */
export interface SessionSummary {
  patientId: string;
  sessionCount: number;
  firstTimestamp: string | null;
  latestTimestamp: string | null;
  latestPhase: RehabPhase | null;
  lsiChange: number | null;     // latest - first
  painChange: number | null;    // latest - first
  rfdChange: number | null;     // latest - first, when both record RFD
  peakForceChange: number | null;
  lsiTrend: number | null;      // mean LSI step over the last 3 sessions
  lsiTrendingDown: boolean;
  criticalAlertCount: number;
  phaseHistory: { timestamp: string; phase: RehabPhase }[];
}
