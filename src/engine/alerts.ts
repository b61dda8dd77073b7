/**
 * Clinical alert evaluation.
 *
 * Every rule is evaluated; each match contributes one alert. Alerts never
 * depend on the selected phase.
 */

import type { Alert, AlertRule, AlertSeverity, ClinicalMetrics, ThresholdTable } from '@/types';
import { evaluateCriterion, formatMessage } from './criteria';

const SEVERITY_ORDER: Record<AlertSeverity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};

export function alertRuleMatches(rule: AlertRule, metrics: ClinicalMetrics): boolean {
  return rule.criteria.every(c => evaluateCriterion(c, metrics).satisfied);
}

/**
 * Evaluate all alert rules of a table.
 * Ordered by severity (critical first), then by declaration order.
 */
export function evaluateAlerts(table: ThresholdTable, metrics: ClinicalMetrics): Alert[] {
  return table.alerts
    .filter(rule => alertRuleMatches(rule, metrics))
    .map(rule => ({
      ruleId: rule.id,
      severity: rule.severity,
      message: formatMessage(rule.message, metrics),
    }))
    .sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

/**
 * Most severe level among alerts, or null when there are none
 */
export function highestSeverity(alerts: Alert[]): AlertSeverity | null {
  return alerts.reduce<AlertSeverity | null>(
    (worst, alert) => (worst === null || SEVERITY_ORDER[alert.severity] < SEVERITY_ORDER[worst] ? alert.severity : worst),
    null
  );
}
