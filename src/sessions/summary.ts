/**
 * Progress summary over a patient's logged sessions
 */

import type { MetricField, SessionRecord, SessionSummary } from '@/types';
import { round1 } from '@/utils/format';

/** Sessions the LSI trend looks back over */
export const LSI_TREND_WINDOW = 3;

/** Oldest first; equal timestamps keep log order */
export function sortByTimestamp(records: readonly SessionRecord[]): SessionRecord[] {
  return [...records].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/** Latest minus first, when both sessions recorded the metric */
function change(first: SessionRecord, latest: SessionRecord, field: MetricField): number | null {
  const from = first.metrics[field];
  const to = latest.metrics[field];
  return from === undefined || to === undefined ? null : round1(to - from);
}

/**
 * Mean session-to-session LSI change over the last LSI_TREND_WINDOW sessions
 */
function lsiTrendOf(sorted: readonly SessionRecord[]): number | null {
  if (sorted.length < LSI_TREND_WINDOW) return null;
  const recent = sorted.slice(-LSI_TREND_WINDOW).map(r => r.metrics.limbSymmetryIndex);
  const steps = recent.slice(1).map((lsi, i) => lsi - recent[i]);
  return steps.reduce((sum, step) => sum + step, 0) / steps.length;
}

/**
 * Summarize sessions. Changes are latest minus first and need two sessions.
 * @param patientId - Used when there are no records to take it from
 */
export function summarizeSessions(records: readonly SessionRecord[], patientId = ''): SessionSummary {
  const sorted = sortByTimestamp(records);
  const first = sorted[0];
  const latest = sorted[sorted.length - 1];

  if (!first || !latest) {
    return {
      patientId,
      sessionCount: 0,
      firstTimestamp: null,
      latestTimestamp: null,
      latestPhase: null,
      lsiChange: null,
      painChange: null,
      rfdChange: null,
      peakForceChange: null,
      lsiTrend: null,
      lsiTrendingDown: false,
      criticalAlertCount: 0,
      phaseHistory: [],
    };
  }

  const hasChange = sorted.length > 1;
  const lsiTrend = lsiTrendOf(sorted);

  return {
    patientId: latest.patientId,
    sessionCount: sorted.length,
    firstTimestamp: first.timestamp,
    latestTimestamp: latest.timestamp,
    latestPhase: latest.phase,
    lsiChange: hasChange ? round1(latest.metrics.limbSymmetryIndex - first.metrics.limbSymmetryIndex) : null,
    painChange: hasChange ? latest.metrics.painScore - first.metrics.painScore : null,
    rfdChange: hasChange ? change(first, latest, 'rateOfForceDevelopment') : null,
    peakForceChange: hasChange ? change(first, latest, 'peakForce') : null,
    lsiTrend: lsiTrend === null ? null : round1(lsiTrend),
    lsiTrendingDown: lsiTrend !== null && lsiTrend < 0,
    criticalAlertCount: sorted.reduce(
      (count, r) => count + r.alerts.filter(a => a.severity === 'critical').length,
      0
    ),
    phaseHistory: sorted.map(r => ({ timestamp: r.timestamp, phase: r.phase })),
  };
}
