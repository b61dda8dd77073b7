import { describe, it, expect } from 'vitest';
import type { PhaseResult, SessionSummary } from '@/types';
import { determinePhase, validateMetrics } from '@/engine';
import { formatErrorText, formatPhaseResultText, formatSummaryText } from './text';

const result: PhaseResult = {
  injuryType: 'ACL',
  phase: 'Early',
  message: 'Early phase.',
  metrics: { injuryType: 'ACL', limbSymmetryIndex: 55, painScore: 8, rateOfForceDevelopment: 42.5, daysSinceSurgery: 21 },
  alerts: [
    { ruleId: 'pain-with-asymmetry', severity: 'critical', message: 'Refer.' },
    { ruleId: 'high-pain', severity: 'warning', message: 'Reassess pain.' },
  ],
};

describe('formatPhaseResultText', () => {
  it('prints phase, metrics and alerts', () => {
    expect(formatPhaseResultText(result)).toBe([
      'Injury: ACL',
      'Phase: Early',
      'Early phase.',
      '',
      'Metrics:',
      '  LSI: 55%',
      '  Pain: 8/10',
      '  RFD: 42.5%',
      '  Days since surgery: 21 d',
      '',
      'Alerts:',
      '  [CRITICAL] Refer.',
      '  [WARNING] Reassess pain.',
    ].join('\n'));
  });

  it('says when there are no alerts', () => {
    const text = formatPhaseResultText({ ...result, alerts: [] });
    expect(text.split('\n').pop()).toBe('Alerts: none');
  });

  it('appends the explanation when present', () => {
    const explained = determinePhase(
      'ACL',
      { injuryType: 'ACL', limbSymmetryIndex: 88, rateOfForceDevelopment: 82, painScore: 2 },
      { explain: true }
    );
    expect(explained.ok).toBe(true);
    if (!explained.ok) return;

    const lines = formatPhaseResultText(explained.value).split('\n');
    expect(lines).toContain('Explanation:');
    expect(lines).toContain('  ✗ Return to Sport (priority 4, match all)');
    expect(lines).toContain('      ✗ LSI ≥ 90 (actual 88)');
    expect(lines).toContain('  ✓ Late (priority 3, match all)');
    expect(lines[lines.length - 1]).toBe('  Selected: Late');
  });
});

describe('formatSummaryText', () => {
  it('prints progress since the first session', () => {
    const summary: SessionSummary = {
      patientId: 'P-001',
      sessionCount: 2,
      firstTimestamp: '2026-01-01T09:00:00.000Z',
      latestTimestamp: '2026-02-01T09:30:00.000Z',
      latestPhase: 'Mid',
      lsiChange: 21.2,
      painChange: -5,
      rfdChange: 18.5,
      peakForceChange: null,
      lsiTrend: null,
      lsiTrendingDown: false,
      criticalAlertCount: 1,
      phaseHistory: [
        { timestamp: '2026-01-01T09:00:00.000Z', phase: 'Early' },
        { timestamp: '2026-02-01T09:30:00.000Z', phase: 'Mid' },
      ],
    };

    expect(formatSummaryText(summary)).toBe([
      'Patient: P-001',
      'Sessions: 2',
      'First session: 2026-01-01 09:00',
      'Latest session: 2026-02-01 09:30',
      'Current phase: Mid',
      'LSI change: +21.2',
      'Pain change: -5',
      'RFD change: +18.5',
      'Peak force change: --',
      'LSI trend: --',
      'Critical alerts: 1',
      'Phase history:',
      '  2026-01-01 09:00  Early',
      '  2026-02-01 09:30  Mid',
    ].join('\n'));
  });

  it('warns when LSI is trending down', () => {
    const summary: SessionSummary = {
      patientId: 'P-002',
      sessionCount: 3,
      firstTimestamp: '2026-01-01T09:00:00.000Z',
      latestTimestamp: '2026-01-15T09:00:00.000Z',
      latestPhase: 'Mid',
      lsiChange: -2,
      painChange: 1,
      rfdChange: null,
      peakForceChange: -35,
      lsiTrend: -1,
      lsiTrendingDown: true,
      criticalAlertCount: 0,
      phaseHistory: [],
    };

    const lines = formatSummaryText(summary).split('\n');
    expect(lines.slice(5, 12)).toEqual([
      'LSI change: -2',
      'Pain change: +1',
      'RFD change: --',
      'Peak force change: -35',
      'LSI trend: -1 per session',
      'Critical alerts: 0',
      'Warning: LSI trending downward - assess training load',
    ]);
  });

  it('handles a patient with no sessions', () => {
    const summary: SessionSummary = {
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
    };
    expect(formatSummaryText(summary)).toBe('Patient: P-404\nNo sessions logged.');
  });
});

describe('formatErrorText', () => {
  it('lists each violation', () => {
    const validated = validateMetrics('ACL', { painScore: 15 });
    expect(validated.ok).toBe(false);
    if (validated.ok) return;

    expect(formatErrorText(validated.error)).toBe(
      'Invalid metrics:\n  - LSI is required\n  - Pain must be between 0 and 10'
    );
  });
});
