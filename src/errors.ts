import type { StackHealthReport } from './health';

/**
 * Base class for every failure the orchestrator reports on purpose.
 * `exitCode` is what the CLI exits with.
 */
export class OrchestratorError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrchestratorError';
  }
}

export class ConfigError extends OrchestratorError {
  override readonly exitCode = 2;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class PrerequisiteError extends OrchestratorError {
  override readonly exitCode = 3;

  constructor(readonly tool: string) {
    super(`Required tool not found on PATH: ${tool}`);
    this.name = 'PrerequisiteError';
  }
}

export class CommandError extends OrchestratorError {
  override readonly exitCode = 4;

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly status: number | null,
    readonly stderr: string
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim().split('\n').slice(-3).join(' | ')}` : '';
    super(`Command failed (exit ${status ?? 'signal'}): ${[command, ...args].join(' ')}${detail}`);
    this.name = 'CommandError';
  }
}

export class HealthCheckError extends OrchestratorError {
  override readonly exitCode = 5;

  constructor(readonly report: StackHealthReport) {
    const failing = report.services.filter(s => s.critical && !s.healthy).map(s => s.name);
    super(`Critical services unhealthy: ${failing.join(', ')}`);
    this.name = 'HealthCheckError';
  }
}

export class BackupError extends OrchestratorError {
  override readonly exitCode = 6;

  constructor(message: string) {
    super(message);
    this.name = 'BackupError';
  }
}

export class RollbackError extends OrchestratorError {
  override readonly exitCode = 7;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RollbackError';
  }
}

export class AbortedError extends OrchestratorError {
  override readonly exitCode = 130;

  constructor(readonly step: string) {
    super(`Aborted before step "${step}"`);
    this.name = 'AbortedError';
  }
}
