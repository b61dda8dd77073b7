import { describe, it, expect } from 'vitest';
import type { ClinicalMetrics, RehabPhase, SessionRecord } from '@/types';
import { summarizeSessions } from './summary';

function session(timestamp: string, phase: RehabPhase, lsi: number, pain: number, critical = 0): SessionRecord {
  return {
    patientId: 'P-001',
    timestamp,
    injuryType: 'ACL',
    metrics: { injuryType: 'ACL', limbSymmetryIndex: lsi, painScore: pain },
    phase,
    alerts: Array.from({ length: critical }, () => ({
      ruleId: 'pain-with-asymmetry',
      severity: 'critical' as const,
      message: 'High pain with marked asymmetry.',
    })),
    notes: '',
  };
}

function withMetrics(record: SessionRecord, metrics: Partial<ClinicalMetrics>): SessionRecord {
  return { ...record, metrics: { ...record.metrics, ...metrics } };
}

describe('summarizeSessions', () => {
  it('summarizes an empty history', () => {
    expect(summarizeSessions([], 'P-404')).toEqual({
      patientId: 'P-404',
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
    });
  });

  it('sorts by timestamp before comparing first and latest', () => {
    const summary = summarizeSessions([
      session('2026-02-01T09:00:00.000Z', 'Mid', 76.4, 3),
      session('2026-01-01T09:00:00.000Z', 'Early', 55.2, 8, 1),
      session('2026-03-01T09:00:00.000Z', 'Late', 86.1, 2),
    ]);

    expect(summary.sessionCount).toBe(3);
    expect(summary.firstTimestamp).toBe('2026-01-01T09:00:00.000Z');
    expect(summary.latestTimestamp).toBe('2026-03-01T09:00:00.000Z');
    expect(summary.latestPhase).toBe('Late');
    expect(summary.lsiChange).toBe(30.9);
    expect(summary.painChange).toBe(-6);
    expect(summary.criticalAlertCount).toBe(1);
    expect(summary.phaseHistory.map(h => h.phase)).toEqual(['Early', 'Mid', 'Late']);
  });

  it('reports no change for a single session', () => {
    const summary = summarizeSessions([session('2026-01-01T09:00:00.000Z', 'Early', 55, 8, 2)]);

    expect(summary.patientId).toBe('P-001');
    expect(summary.lsiChange).toBeNull();
    expect(summary.painChange).toBeNull();
    expect(summary.criticalAlertCount).toBe(2);
  });

  it('reports RFD and peak force change when both ends recorded them', () => {
    const summary = summarizeSessions([
      withMetrics(session('2026-01-01T09:00:00.000Z', 'Early', 60, 5), { rateOfForceDevelopment: 55, peakForce: 420 }),
      session('2026-01-15T09:00:00.000Z', 'Mid', 72, 3),
      withMetrics(session('2026-02-01T09:00:00.000Z', 'Mid', 78, 2), { rateOfForceDevelopment: 72.5 }),
    ]);

    expect(summary.rfdChange).toBe(17.5);
    expect(summary.peakForceChange).toBeNull();
  });

  it('averages the LSI steps over the last three sessions', () => {
    const summary = summarizeSessions([
      session('2026-01-01T09:00:00.000Z', 'Early', 70, 4),
      session('2026-01-08T09:00:00.000Z', 'Mid', 75, 3),
      session('2026-01-15T09:00:00.000Z', 'Mid', 80, 2),
      session('2026-01-22T09:00:00.000Z', 'Mid', 79.5, 2),
    ]);

    expect(summary.lsiTrend).toBe(2.3);
    expect(summary.lsiTrendingDown).toBe(false);
  });

  it('flags a downward LSI trend', () => {
    const summary = summarizeSessions([
      session('2026-01-01T09:00:00.000Z', 'Mid', 80, 2),
      session('2026-01-08T09:00:00.000Z', 'Late', 86, 2),
      session('2026-01-15T09:00:00.000Z', 'Mid', 78, 3),
    ]);

    expect(summary.lsiTrend).toBe(-1);
    expect(summary.lsiTrendingDown).toBe(true);
  });

  it('needs three sessions for a trend', () => {
    const summary = summarizeSessions([
      session('2026-01-01T09:00:00.000Z', 'Mid', 80, 2),
      session('2026-01-08T09:00:00.000Z', 'Mid', 70, 3),
    ]);

    expect(summary.lsiChange).toBe(-10);
    expect(summary.lsiTrend).toBeNull();
    expect(summary.lsiTrendingDown).toBe(false);
  });
});
