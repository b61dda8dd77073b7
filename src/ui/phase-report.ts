/**
 * Phase Report
 *
 * HTML fragment for one assessment:
 * - Phase badge and clinician message
 * - Recorded metrics
 * - Alerts, most severe first
 * - Phase guidance and recommended exercises
 */

import type { AlertSeverity, Exercise, PhaseResult, PhaseTrace, RehabPhase } from '@/types';
import { METRIC_FIELDS, METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { getPhaseGuidance } from '@/constants/phase-guidance';
import { escapeHtml, formatNumber, formatWithUnit } from '@/utils/format';
import type { EngineError, EngineResult } from '@/engine/errors';
import { renderDocument } from './document';

export const PHASE_BADGE_CLASSES: Record<RehabPhase, string> = {
  'Return to Sport': 'bg-emerald-600 text-white',
  'Late': 'bg-sky-600 text-white',
  'Mid': 'bg-amber-500 text-gray-900',
  'Early': 'bg-rose-600 text-white',
  'Unclassified': 'bg-gray-600 text-white',
};

const ALERT_CLASSES: Record<AlertSeverity, string> = {
  critical: 'bg-red-900/40 border-red-700 text-red-200',
  warning: 'bg-amber-900/40 border-amber-700 text-amber-200',
  info: 'bg-sky-900/40 border-sky-700 text-sky-200',
};

export interface PhaseReportOptions {
  /** Shown under the guidance when given */
  exercises?: Exercise[];
}

export function renderPhaseBadge(phase: RehabPhase): string {
  return `<span class="px-3 py-1 rounded-full text-sm font-semibold ${PHASE_BADGE_CLASSES[phase]}">${escapeHtml(phase)}</span>`;
}

function renderMetrics(result: PhaseResult): string {
  const rows = METRIC_FIELDS.flatMap(field => {
    const value = result.metrics[field];
    if (value === undefined) return [];
    const { label, unit } = METRIC_FIELD_SPECS[field];
    return [`<tr><td class="pr-4 text-gray-400">${escapeHtml(label)}</td><td class="text-white">${escapeHtml(formatWithUnit(value, unit))}</td></tr>`];
  });

  return `
    <table class="text-sm">
      <tbody>
        ${rows.join('\n        ')}
      </tbody>
    </table>`;
}

function renderAlerts(result: PhaseResult): string {
  if (result.alerts.length === 0) {
    return '<p class="text-sm text-gray-400">No alerts.</p>';
  }
  const items = result.alerts.map(alert =>
    `<li class="border rounded-lg px-3 py-2 ${ALERT_CLASSES[alert.severity]}" data-rule="${escapeHtml(alert.ruleId)}"><strong>${alert.severity.toUpperCase()}</strong> ${escapeHtml(alert.message)}</li>`
  );
  return `<ul class="space-y-2">${items.join('')}</ul>`;
}

function renderGuidance(phase: RehabPhase, exercises: Exercise[] | undefined): string {
  const guidance = getPhaseGuidance(phase);
  const list = (items: string[]) => items.map(i => `<li>${escapeHtml(i)}</li>`).join('');

  const exerciseList = exercises && exercises.length > 0
    ? `
      <h3 class="text-sm font-semibold text-white mt-4">Recommended exercises</h3>
      <ul class="text-sm text-gray-300 list-disc ml-5">${exercises.map(e =>
        `<li>${escapeHtml(e.name)} <span class="text-gray-500">(${escapeHtml(e.type)})</span></li>`).join('')}</ul>`
    : '';

  return `
      <h3 class="text-sm font-semibold text-white">Focus</h3>
      <ul class="text-sm text-gray-300 list-disc ml-5">${list(guidance.focus)}</ul>
      <h3 class="text-sm font-semibold text-white mt-4">Avoid</h3>
      <ul class="text-sm text-gray-300 list-disc ml-5">${list(guidance.avoid)}</ul>${exerciseList}`;
}

function renderTrace(trace: PhaseTrace): string {
  const rows = trace.evaluations.map(e => {
    const criteria = e.criteria.map(c =>
      `<li class="${c.satisfied ? 'text-emerald-300' : 'text-gray-500'}">${escapeHtml(c.description)} (actual ${formatNumber(c.actual)})</li>`
    ).join('');
    return `<li><span class="${e.satisfied ? 'text-emerald-400' : 'text-gray-400'}">${escapeHtml(e.phase)} (${e.match})</span><ul class="ml-4">${criteria}</ul></li>`;
  });
  return `
    <details class="mt-4 text-sm">
      <summary class="cursor-pointer text-gray-400">Why ${escapeHtml(trace.selectedPhase)}?</summary>
      <ul class="mt-2 space-y-1">${rows.join('')}</ul>
    </details>`;
}

/**
 * Render the assessment result. All dynamic text is escaped.
 */
export function renderPhaseReport(result: PhaseResult, options: PhaseReportOptions = {}): string {
  return `
  <section class="bg-gray-900 border border-gray-800 rounded-xl p-5 space-y-4">
    <div class="flex items-center justify-between">
      <h2 class="text-lg font-semibold text-white">${escapeHtml(result.injuryType)} assessment</h2>
      ${renderPhaseBadge(result.phase)}
    </div>
    <p class="text-sm text-gray-300">${escapeHtml(result.message)}</p>
    ${renderMetrics(result)}
    ${renderAlerts(result)}
    <div>${renderGuidance(result.phase, options.exercises)}
    </div>${result.trace ? renderTrace(result.trace) : ''}
  </section>`;
}

/**
 * Render every validation problem as a list
 */
export function renderValidationErrors(error: EngineError): string {
  const messages = error.kind === 'validation'
    ? error.violations.map(v => v.message)
    : [error.message];

  return `
  <div class="bg-red-900/40 border border-red-700 rounded-lg p-4" role="alert">
    <p class="text-sm font-semibold text-red-200">Please correct the following:</p>
    <ul class="text-sm text-red-200 list-disc ml-5">${messages.map(m => `<li>${escapeHtml(m)}</li>`).join('')}</ul>
  </div>`;
}

/**
 * Standalone page for an assessment outcome: the report, or the problems
 * that stopped it
 */
export function renderAssessmentPage(
  outcome: EngineResult<PhaseResult>,
  injuryType: string,
  options: PhaseReportOptions = {}
): string {
  const title = `${injuryType} assessment`;
  return outcome.ok
    ? renderDocument(title, renderPhaseReport(outcome.value, options))
    : renderDocument(title, renderValidationErrors(outcome.error));
}
