export {
  renderPhaseReport,
  renderValidationErrors,
  renderAssessmentPage,
  renderPhaseBadge,
  type PhaseReportOptions,
} from './phase-report';
export { renderDocument } from './document';
export { renderDashboardPage } from './dashboard';
export { formatPhaseResultText, formatSummaryText, formatErrorText, metricLines, LSI_TRENDING_DOWN_MESSAGE } from './text';
