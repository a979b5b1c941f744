export * from './types/comparison-types.js';
export { classifyOutcome, countOutcomes, createComparisonResult } from './services/outcome-utils.js';
export { buildRunSummary, type BuildRunSummaryInput } from './services/report-builder.js';
export {
  AccountComparator,
  DEFAULT_MAX_CONCURRENCY,
  type AccountComparatorOptions,
  type CompareOptions,
} from './services/account-comparator.js';
export {
  createReportRenderer,
  renderReport,
  type RenderOptions,
  type ReportFormat,
  type ReportRenderer,
} from './reports/report-renderer.js';
export { JsonReportRenderer, toJsonReport, type JsonReport, type JsonReportAccount } from './reports/json-report-renderer.js';
export { TextReportRenderer } from './reports/text-report-renderer.js';
