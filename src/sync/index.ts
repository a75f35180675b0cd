export { SyncOrchestrator } from './sync-orchestrator.js';
export type { SyncOrchestratorOptions } from './sync-orchestrator.js';
export { SaveCatalog, rankCandidates } from './save-catalog.js';
export { silentReporter } from './silent-reporter.js';
export type {
  RunContext,
  BackupSet,
  SaveCandidate,
  ReconciledSave,
  SyncPhase,
  FailureStage,
  DeviceOutcome,
  DeviceFailure,
  DeviceReport,
  SyncRunResult,
  SyncReporter,
} from './types.js';
