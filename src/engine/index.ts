/**
 * Normalization and reconciliation engine
 */

export * from './document.js';
export * from './errors.js';
export { DEFAULT_LAYERS, deepMerge, mergeDefaults, mergeLayers, mergeWithLayers } from './merge.js';
export type { DefaultLayer, DefaultLayers } from './merge.js';
export { normalize, normalizeItem } from './normalize.js';
export type { CanonicalItem, NormalizeOptions, NormalizeResult } from './normalize.js';
export {
  computeChanges,
  diff,
  diffSingleton,
  hasChanges,
  indexByKey,
  isReadOnlyItem,
  summarizeChanges,
} from './diff.js';
export type {
  ChangeAction,
  ChangeRecord,
  CreateRecord,
  DeleteRecord,
  DiffOptions,
  FieldChange,
  RemoteItem,
  UnchangedRecord,
  UpdateRecord,
} from './diff.js';
export { DEPENDENCY_TABLE, dependenciesOf, order, stageOf, validateDependencyTable } from './order.js';
export type { DependencyStage } from './order.js';
export { buildReport, emptySummary, executionOrder, reconcile, summarize } from './reconcile.js';
export type {
  ExecutionReport,
  ExecutionSummary,
  ItemAction,
  ItemResult,
  ReconcileOptions,
} from './reconcile.js';
export {
  buildDesiredSet,
  diffOptionsFor,
  matchesSelector,
  planChanges,
  runReconciliation,
} from './pipeline.js';
export type {
  DesiredSet,
  DesiredState,
  PipelineOptions,
  ResourceInput,
  RunReport,
  TypeReport,
  TypeStatus,
} from './pipeline.js';
export {
  formatCompactReport,
  formatHumanReport,
  formatJsonReport,
  generateReport,
} from './report.js';
export type { FormattedReport, ReportFormat, ReportOptions } from './report.js';
