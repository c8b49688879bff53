export { runInventory, selectAdapters, mapWithConcurrency } from './orchestrator/run';
export type {
  FetcherFactory,
  InventoryRun,
  InventoryRunOptions,
  SourceRunStats,
  SourceStatus,
} from './orchestrator/types';
export {
  buildInventoryReport,
  reportFileName,
  writeInventoryReport,
  type InventoryReport,
  type ReportEntity,
} from './report/inventory-report';
export { createProgram, CLI_NAME, CLI_VERSION } from './program';
export { formatRunSummary, parseConcurrency, parseSourceList } from './commands/run';
