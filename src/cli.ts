#!/usr/bin/env node
import path from 'node:path';
import { parseArgs } from 'node:util';
import type { BackupResult } from './backup';
import { loadConfig } from './config';
import type { StackConfig } from './config';
import { createContext } from './context';
import type { DeployContext } from './context';
import { env } from './env';
import { ConfigError, HealthCheckError, OrchestratorError } from './errors';
import type { StackHealthReport } from './health';
import logger from './logger';
import { loadManifest } from './manifest';
import { startMonitor } from './monitor';
import { createOrchestrator } from './orchestrator';
import type { VersionsResult } from './orchestrator';
import { formatPlan } from './rollback';
import type { IssueAssessment } from './rollback';
import { abortOnSignal, setupShutdownHandlers } from './shutdown';

export const COMMANDS = [
  'init',
  'build',
  'start',
  'stop',
  'restart',
  'status',
  'backup',
  'deploy',
  'versions',
  'rollback',
  'monitor',
  'help',
] as const;

export type Command = (typeof COMMANDS)[number];

export const USAGE = `Usage: stackpilot <command> [options]

Commands:
  init       Clone or update every repository and copy config templates
  build      Build Docker images
  start      Start all services and wait for them to become healthy
  stop       Stop all services
  restart    Stop, then start all services
  status     Check service health
  backup     Back up database, Redis, configuration and volumes
  deploy     init, build and start in one go
  versions   Show the version manifest, deployed tags and release order
  rollback   Roll the stack back to the releases pinned by --to <manifest>
  monitor    Keep checking health and serve it on GET /health
  help       Show this help

Options:
  -c, --config <file>   Stack config (default: stackpilot.json or $STACKPILOT_CONFIG)
      --pinned          init/deploy: check out the tags pinned by versions.json
      --to <file>       rollback: target version manifest
      --dry-run         rollback: print the plan without executing it
      --no-backup       rollback: skip the backup taken before rolling back
      --auto            rollback: only proceed when the stack is unhealthy
      --port <n>        monitor: port for the status server
      --json            Print results as JSON
  -h, --help            Show this help

Examples:
  stackpilot init
  stackpilot build
  stackpilot start
  stackpilot rollback --to releases/1.2.0.json --dry-run`;

export interface CliFlags {
  config?: string;
  pinned: boolean;
  to?: string;
  dryRun: boolean;
  backup: boolean;
  auto: boolean;
  port?: number;
  json: boolean;
}

export type ParsedCli = { command: Command; flags: CliFlags } | { command: undefined; input: string };

const isCommand = (value: string): value is Command => COMMANDS.some(command => command === value);

/**
 * Parse argv (without node and script). Unknown options throw; an unknown
 * command comes back as `{ command: undefined, input }`.
 */
export const parseCli = (argv: string[]): ParsedCli => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      pinned: { type: 'boolean', default: false },
      to: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      'no-backup': { type: 'boolean', default: false },
      auto: { type: 'boolean', default: false },
      port: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const input = positionals[0] ?? '';
  const command = values.help ? 'help' : input;
  if (!isCommand(command)) return { command: undefined, input };

  let port: number | undefined;
  if (values.port !== undefined) {
    port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65_535) {
      throw new ConfigError(`Invalid --port: ${values.port}`);
    }
  }

  return {
    command,
    flags: {
      config: values.config,
      pinned: values.pinned ?? false,
      to: values.to,
      dryRun: values['dry-run'] ?? false,
      backup: !(values['no-backup'] ?? false),
      auto: values.auto ?? false,
      port,
      json: values.json ?? false,
    },
  };
};

export interface CliDeps {
  /** Build the context for a loaded config; tests inject fakes here. */
  context?: (config: StackConfig, signal: AbortSignal) => DeployContext;
  print?: (line: string) => void;
  cwd?: string;
}

export const formatReport = (report: StackHealthReport): string[] =>
  report.services.map(s =>
    s.healthy
      ? `✓ ${s.name} healthy (HTTP ${s.status}, ${s.latencyMs}ms)`
      : `${s.critical ? '✗' : '!'} ${s.name} ${s.critical ? 'unhealthy' : 'degraded'}: ${s.error ?? 'unknown error'}`
  );

const formatAssessment = (assessment: IssueAssessment): string =>
  `Severity: ${assessment.severity}, recommendation: ${assessment.recommendation}`;

const formatVersions = (result: VersionsResult): string[] => {
  const lines: string[] = [];
  if (result.manifest) {
    lines.push(`Release ${result.manifest.release}`);
  } else {
    lines.push('No version manifest');
  }
  lines.push(`Release order: ${result.order.join(' -> ')}`);
  for (const name of result.order) {
    lines.push(`  ${name}: ${result.deployed[name] ?? 'not deployed'}`);
  }
  if (result.compatibility) {
    lines.push(result.compatibility.compatible ? 'Manifest is consistent' : 'Manifest issues:');
    for (const issue of result.compatibility.issues) lines.push(`  - ${issue}`);
  }
  return lines;
};

const formatBackup = (result: BackupResult): string[] => [
  `Backup written to ${result.dir}`,
  ...result.manifest.components.map(c => `  ${c.ok ? '✓' : '✗'} ${c.name}${c.ok ? ` (${c.size} bytes)` : `: ${c.error}`}`),
  `Total size: ${result.manifest.totalSize} bytes`,
  ...(result.pruned.length ? [`Removed old backups: ${result.pruned.join(', ')}`] : []),
];

/**
 * Run one CLI invocation and resolve with the exit code.
 */
export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  const print = deps.print ?? ((line: string) => console.log(line));

  let parsed: ParsedCli;
  try {
    parsed = parseCli(argv);
  } catch (error) {
    print(error instanceof Error ? error.message : String(error));
    print('');
    print(USAGE);
    return 1;
  }

  if (parsed.command === undefined) {
    print(parsed.input ? `Unknown command: ${parsed.input}` : 'No command given');
    print('');
    print(USAGE);
    return 1;
  }

  const { command, flags } = parsed;
  if (command === 'help') {
    print(USAGE);
    return 0;
  }

  const cwd = deps.cwd ?? process.cwd();
  // monitor installs its own handlers; everything else stops between steps.
  const { signal, dispose } =
    command === 'monitor' ? { signal: new AbortController().signal, dispose: () => {} } : abortOnSignal();

  try {
    const config = await loadConfig(flags.config ?? env.STACKPILOT_CONFIG, cwd);
    const ctx = deps.context ? deps.context(config, signal) : createContext(config, { signal });
    const orchestrator = createOrchestrator(ctx);
    const emit = (value: unknown, lines: () => string[]) => {
      if (flags.json) {
        print(JSON.stringify(value, null, 2));
      } else {
        lines().forEach(line => print(line));
      }
    };

    switch (command) {
      case 'init':
      case 'deploy': {
        const result = await orchestrator[command]({ pinned: flags.pinned });
        emit(result, () => [`${command} completed in ${result.durationMs}ms`]);
        return 0;
      }
      case 'build':
      case 'start':
      case 'stop':
      case 'restart': {
        const result = await orchestrator[command]();
        emit(result, () => [`${command} completed in ${result.durationMs}ms`]);
        return 0;
      }
      case 'status': {
        const result = await orchestrator.status();
        emit(result, () => [...formatReport(result.report), formatAssessment(result.assessment)]);
        if (!result.report.healthy) throw new HealthCheckError(result.report);
        return 0;
      }
      case 'backup': {
        const result = await orchestrator.backup();
        emit(result, () => formatBackup(result));
        return 0;
      }
      case 'versions': {
        const result = await orchestrator.versions();
        emit(result, () => formatVersions(result));
        if (result.compatibility && !result.compatibility.compatible) {
          throw new ConfigError('Version manifest is not consistent');
        }
        return 0;
      }
      case 'rollback': {
        if (!flags.to) throw new ConfigError('rollback needs --to <manifest>');
        const target = await loadManifest(path.resolve(cwd, flags.to));
        const result = await orchestrator.rollback({
          target,
          dryRun: flags.dryRun,
          backup: flags.backup,
          auto: flags.auto,
        });
        emit(result, () => [
          formatPlan(result.plan),
          ...(result.assessment ? [formatAssessment(result.assessment)] : []),
          result.outcome.executed ? `Rolled back to ${result.plan.toRelease}` : 'Rollback not executed',
        ]);
        return 0;
      }
      case 'monitor': {
        const monitor = startMonitor(ctx, { ...config.monitor, port: flags.port ?? config.monitor.port });
        let port: number;
        try {
          port = await monitor.ready;
        } catch (error) {
          await monitor.stop();
          throw error;
        }
        setupShutdownHandlers(() => monitor.stop());
        print(`Monitoring ${config.services.length} services, status on http://localhost:${port}/health`);
        return 0;
      }
    }
  } catch (error) {
    if (error instanceof OrchestratorError) {
      logger.error({ err: error }, error.message);
      return error.exitCode;
    }
    logger.error({ err: error }, 'Unexpected failure');
    return 1;
  } finally {
    dispose();
  }
};

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'Unhandled error');
      process.exitCode = 1;
    }
  );
}
