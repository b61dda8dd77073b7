/**
 * Plain-text output for the CLI
 */

import type { ClinicalMetrics, PhaseResult, PhaseTrace, SessionSummary } from '@/types';
import { METRIC_FIELDS, METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { formatDelta, formatNumber, formatTimestamp, formatWithUnit } from '@/utils/format';
import type { EngineError } from '@/engine/errors';

export const LSI_TRENDING_DOWN_MESSAGE = 'LSI trending downward - assess training load';

/** "Label: value" lines for every recorded metric, in field order */
export function metricLines(metrics: ClinicalMetrics): string[] {
  return METRIC_FIELDS.flatMap(field => {
    const value = metrics[field];
    if (value === undefined) return [];
    const { label, unit } = METRIC_FIELD_SPECS[field];
    return [`${label}: ${formatWithUnit(value, unit)}`];
  });
}

function traceLines(trace: PhaseTrace): string[] {
  const lines = ['Explanation:'];
  for (const evaluation of trace.evaluations) {
    const mark = evaluation.satisfied ? '✓' : '✗';
    lines.push(`  ${mark} ${evaluation.phase} (priority ${evaluation.priority}, match ${evaluation.match})`);
    for (const c of evaluation.criteria) {
      lines.push(`      ${c.satisfied ? '✓' : '✗'} ${c.description} (actual ${formatNumber(c.actual)})`);
    }
  }
  lines.push(`  Selected: ${trace.selectedPhase}`);
  return lines;
}

export function formatPhaseResultText(result: PhaseResult): string {
  const lines = [
    `Injury: ${result.injuryType}`,
    `Phase: ${result.phase}`,
    result.message,
    '',
    'Metrics:',
    ...metricLines(result.metrics).map(line => `  ${line}`),
    '',
  ];

  if (result.alerts.length === 0) {
    lines.push('Alerts: none');
  } else {
    lines.push('Alerts:');
    result.alerts.forEach(a => lines.push(`  [${a.severity.toUpperCase()}] ${a.message}`));
  }

  if (result.trace) {
    lines.push('', ...traceLines(result.trace));
  }

  return lines.join('\n');
}

export function formatSummaryText(summary: SessionSummary): string {
  if (summary.sessionCount === 0) {
    return `Patient: ${summary.patientId}\nNo sessions logged.`;
  }

  const when = (iso: string | null) => (iso ? formatTimestamp(iso) : '--');
  const lines = [
    `Patient: ${summary.patientId}`,
    `Sessions: ${summary.sessionCount}`,
    `First session: ${when(summary.firstTimestamp)}`,
    `Latest session: ${when(summary.latestTimestamp)}`,
    `Current phase: ${summary.latestPhase ?? '--'}`,
    `LSI change: ${formatDelta(summary.lsiChange)}`,
    `Pain change: ${formatDelta(summary.painChange)}`,
    `RFD change: ${formatDelta(summary.rfdChange)}`,
    `Peak force change: ${formatDelta(summary.peakForceChange)}`,
    `LSI trend: ${summary.lsiTrend === null ? '--' : `${formatDelta(summary.lsiTrend)} per session`}`,
    `Critical alerts: ${summary.criticalAlertCount}`,
  ];
  if (summary.lsiTrendingDown) lines.push(`Warning: ${LSI_TRENDING_DOWN_MESSAGE}`);
  lines.push('Phase history:', ...summary.phaseHistory.map(h => `  ${formatTimestamp(h.timestamp)}  ${h.phase}`));
  return lines.join('\n');
}

/** One line per problem */
export function formatErrorText(error: EngineError): string {
  if (error.kind === 'unsupported_injury_type') return error.message;
  return ['Invalid metrics:', ...error.violations.map(v => `  - ${v.message}`)].join('\n');
}
