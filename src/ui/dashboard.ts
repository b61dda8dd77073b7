/**
 * Patient Dashboard
 *
 * Standalone HTML page with the progress summary and the session log.
 */

import type { AlertSeverity, SessionRecord, SessionSummary } from '@/types';
import { escapeHtml, formatDelta, formatNumber, formatTimestamp } from '@/utils/format';
import { sortByTimestamp, summarizeSessions } from '@/sessions/summary';
import { highestSeverity } from '@/engine/alerts';
import { renderPhaseBadge } from './phase-report';
import { renderDocument } from './document';
import { LSI_TRENDING_DOWN_MESSAGE } from './text';

/** Alerts cell colour by the session's worst alert */
const ALERT_CELL_CLASSES: Record<AlertSeverity, string> = {
  critical: 'text-red-400',
  warning: 'text-amber-400',
  info: 'text-sky-400',
};

function statCard(label: string, value: string): string {
  return `
        <div class="bg-gray-900 border border-gray-800 rounded-xl p-4">
          <p class="text-xs text-gray-400">${escapeHtml(label)}</p>
          <p class="text-xl font-semibold text-white">${escapeHtml(value)}</p>
        </div>`;
}

function renderSummary(summary: SessionSummary): string {
  return `
      <div class="grid grid-cols-2 md:grid-cols-4 gap-3">${[
        statCard('Sessions', String(summary.sessionCount)),
        statCard('Current phase', summary.latestPhase ?? '--'),
        statCard('LSI change', formatDelta(summary.lsiChange)),
        statCard('Pain change', formatDelta(summary.painChange)),
        statCard('RFD change', formatDelta(summary.rfdChange)),
        statCard('Peak force change', formatDelta(summary.peakForceChange)),
        statCard('LSI trend', formatDelta(summary.lsiTrend)),
        statCard('Critical alerts', String(summary.criticalAlertCount)),
      ].join('')}
      </div>${summary.lsiTrendingDown ? `
    <p class="bg-amber-900/40 border border-amber-700 text-amber-200 rounded-lg px-3 py-2 text-sm" role="alert">${escapeHtml(LSI_TRENDING_DOWN_MESSAGE)}</p>` : ''}`;
}

function renderSessionRow(record: SessionRecord): string {
  const { metrics } = record;
  const alerts = record.alerts.map(a => escapeHtml(a.ruleId)).join(', ') || '--';
  const worst = highestSeverity(record.alerts);
  return `
          <tr class="border-t border-gray-800">
            <td class="py-2 pr-4">${escapeHtml(formatTimestamp(record.timestamp))}</td>
            <td class="py-2 pr-4">${renderPhaseBadge(record.phase)}</td>
            <td class="py-2 pr-4">${formatNumber(metrics.limbSymmetryIndex)}</td>
            <td class="py-2 pr-4">${formatNumber(metrics.rateOfForceDevelopment)}</td>
            <td class="py-2 pr-4">${formatNumber(metrics.painScore)}</td>
            <td class="py-2 pr-4${worst ? ` ${ALERT_CELL_CLASSES[worst]}` : ''}">${alerts}</td>
            <td class="py-2">${escapeHtml(record.notes)}</td>
          </tr>`;
}

function renderSessionTable(records: readonly SessionRecord[]): string {
  if (records.length === 0) {
    return '<p class="text-gray-400">No sessions logged yet.</p>';
  }
  return `
      <table class="w-full text-sm text-left text-gray-300">
        <thead class="text-xs text-gray-400">
          <tr><th>Date</th><th>Phase</th><th>LSI %</th><th>RFD</th><th>Pain</th><th>Alerts</th><th>Notes</th></tr>
        </thead>
        <tbody>${sortByTimestamp(records).map(renderSessionRow).join('')}
        </tbody>
      </table>`;
}

/**
 * Render the dashboard document for one patient
 */
export function renderDashboardPage(patientId: string, records: readonly SessionRecord[]): string {
  const summary = summarizeSessions(records, patientId);

  return renderDocument(`Rehab progress: ${patientId}`, `${renderSummary(summary)}
    <section class="bg-gray-900 border border-gray-800 rounded-xl p-4">${renderSessionTable(records)}
    </section>`);
}
