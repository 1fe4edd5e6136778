// Logger
export { default as logger } from './logger';
export type { Logger } from './logger';

// Configuration
export { loadConfig, parseConfig, stackConfigSchema, defaultRepositories, DEFAULT_CONFIG_FILE } from './config';
export type { StackConfig, StackConfigInput, RepositoryConfig, ServiceConfig } from './config';
export { createContext } from './context';
export type { DeployContext } from './context';

// Errors
export {
  OrchestratorError,
  ConfigError,
  PrerequisiteError,
  CommandError,
  HealthCheckError,
  BackupError,
  RollbackError,
  AbortedError,
} from './errors';

// External commands
export { createProcessRunner } from './command-runner';
export type { CommandRunner, CommandResult, RunOptions } from './command-runner';

// Versions and topology
export { isValidVersion, parseVersion, compareVersions, majorOf, toTag } from './version';
export { resolveOrder, reverseOrder } from './topology';
export { loadManifest, saveManifest, checkCompatibility, versionFor } from './manifest';
export type { VersionManifest, CompatibilityResult } from './manifest';

// Health
export { probeService, checkServices, waitForServices } from './health';
export type { ServiceHealth, StackHealthReport } from './health';
export { startHealthCheckServer } from './healthcheck';
export type { HealthCheckService, OnPingCallback, HealthCheckStatus } from './healthcheck';
export { startMonitor } from './monitor';
export type { Monitor, MonitorOptions } from './monitor';

// Steps
export { definePipeline, stepOutput } from './pipeline';
export type { PipelineConfig, PipelineInstance, PipelineResult, PipelineStep, StepOutput } from './pipeline';
export { createBackup, pruneBackups, pruneOldBackups, runBackup } from './backup';
export type { BackupResult, BackupManifest, CreatedBackup } from './backup';
export { planRollback, executeRollback, assessIssues, formatPlan } from './rollback';
export type { RollbackPlan, IssueAssessment } from './rollback';
export { createOrchestrator } from './orchestrator';
export type { Orchestrator } from './orchestrator';

// Shutdown management
export { setupShutdownHandlers, abortOnSignal } from './shutdown';
export type { ShutdownSignal, OnShutdownCallback } from './shutdown';
