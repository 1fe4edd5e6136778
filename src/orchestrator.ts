import { access } from 'node:fs/promises';
import type { DeployContext } from './context';
import { createBackup, pruneOldBackups } from './backup';
import type { BackupResult, CreatedBackup } from './backup';
import { composeDown, composeUp, ensureEnvFile } from './compose';
import { ConfigError } from './errors';
import { checkServices, logHealthReport, waitForServices } from './health';
import type { StackHealthReport } from './health';
import { buildImages } from './images';
import { checkCompatibility, loadManifest } from './manifest';
import type { CompatibilityResult, VersionManifest } from './manifest';
import { definePipeline, stepOutput } from './pipeline';
import type { PipelineResult, PipelineStep } from './pipeline';
import { checkDockerDaemon, checkPrerequisites } from './prerequisites';
import { copyConfigTemplates, deployedVersion, orderedRepositories, syncRepositories } from './repositories';
import { assessIssues, executeRollback, findVersionMismatches, planRollback } from './rollback';
import type { IssueAssessment, Recommendation, RollbackOutcome, RollbackPlan, VersionMismatch } from './rollback';
import { compareVersions, isValidVersion } from './version';

/** Assessments under which `rollback --auto` goes ahead. */
const ROLLBACK_RECOMMENDATIONS: readonly Recommendation[] = ['immediate_rollback', 'recommended_rollback'];

export interface InitOptions {
  /** Check out the tags pinned by the version manifest. */
  pinned?: boolean;
}

export interface StatusResult {
  report: StackHealthReport;
  assessment: IssueAssessment;
}

export interface VersionsResult {
  manifest?: VersionManifest;
  compatibility?: CompatibilityResult;
  order: string[];
  deployed: Record<string, string | null>;
}

export interface RollbackRequest {
  target: VersionManifest;
  dryRun?: boolean;
  backup?: boolean;
  /** Only proceed when the current state warrants a rollback. */
  auto?: boolean;
}

export interface RollbackResult {
  plan: RollbackPlan;
  assessment?: IssueAssessment;
  outcome: RollbackOutcome;
}

export interface Orchestrator {
  init(options?: InitOptions): Promise<PipelineResult>;
  build(): Promise<PipelineResult>;
  start(): Promise<PipelineResult>;
  stop(): Promise<PipelineResult>;
  restart(): Promise<PipelineResult>;
  deploy(options?: InitOptions): Promise<PipelineResult>;
  status(): Promise<StatusResult>;
  backup(): Promise<BackupResult>;
  versions(): Promise<VersionsResult>;
  rollback(request: RollbackRequest): Promise<RollbackResult>;
}

/**
 * Wire the stack commands together. Every mutating command is a pipeline
 * of named steps that stops at the first failure.
 */
export const createOrchestrator = (ctx: DeployContext): Orchestrator => {
  const run = (name: string, steps: PipelineStep[]) =>
    definePipeline({ name, steps, signal: ctx.signal, logger: ctx.logger }).run();

  const readManifest = async (): Promise<VersionManifest | undefined> => {
    try {
      await access(ctx.config.manifest);
    } catch {
      return undefined;
    }
    return loadManifest(ctx.config.manifest);
  };

  const prerequisites = (): PipelineStep => ({ name: 'prerequisites', run: () => checkPrerequisites(ctx) });

  const initSteps = (options: InitOptions = {}): PipelineStep[] => [
    prerequisites(),
    {
      name: 'sync repositories',
      run: async () => {
        const manifest = options.pinned ? await readManifest() : undefined;
        if (options.pinned && !manifest) {
          ctx.logger.warn({ manifest: ctx.config.manifest }, 'No version manifest, using branch heads');
        }
        await syncRepositories(ctx, { manifest });
      },
    },
    {
      name: 'config templates',
      run: async () => {
        await copyConfigTemplates(ctx);
      },
    },
  ];

  const buildSteps = (): PipelineStep[] => [
    {
      name: 'build images',
      run: async () => {
        await buildImages(ctx);
      },
    },
  ];

  const startSteps = (): PipelineStep[] => [
    {
      name: 'env file',
      run: async () => {
        await ensureEnvFile(ctx);
      },
    },
    { name: 'compose up', run: () => composeUp(ctx) },
    {
      name: 'health check',
      run: async () => {
        await waitForServices(ctx);
      },
    },
  ];

  const stopSteps = (): PipelineStep[] => [{ name: 'compose down', run: () => composeDown(ctx) }];

  const status = async (): Promise<StatusResult> => {
    const report = stepOutput<StackHealthReport>('check services');
    const mismatches = stepOutput<VersionMismatch[]>('version drift');

    await run('status', [
      {
        name: 'check services',
        run: async () => {
          const checked = await checkServices(ctx);
          logHealthReport(ctx, checked);
          report.set(checked);
        },
      },
      {
        name: 'version drift',
        run: async () => {
          const manifest = await readManifest();
          mismatches.set(manifest ? await findVersionMismatches(ctx, manifest) : []);
        },
      },
    ]);

    return { report: report.get(), assessment: assessIssues(report.get(), mismatches.get()) };
  };

  const backup = async (): Promise<BackupResult> => {
    const created = stepOutput<CreatedBackup>('backup');
    const pruned = stepOutput<string[]>('prune');

    await run('backup', [
      { name: 'docker daemon', run: () => checkDockerDaemon(ctx) },
      { name: 'backup', run: async () => created.set(await createBackup(ctx)) },
      { name: 'prune', run: async () => pruned.set(await pruneOldBackups(ctx)) },
    ]);

    return { ...created.get(), pruned: pruned.get() };
  };

  const versions = async (): Promise<VersionsResult> => {
    const manifest = stepOutput<VersionManifest | undefined>('read manifest');
    const deployed = stepOutput<Record<string, string | null>>('deployed tags');
    const repos = orderedRepositories(ctx);

    await run('versions', [
      { name: 'read manifest', run: async () => manifest.set(await readManifest()) },
      {
        name: 'deployed tags',
        run: async () => {
          const tags: Record<string, string | null> = {};
          for (const repo of repos) {
            tags[repo.name] = (await deployedVersion(ctx, repo)) ?? null;
          }
          deployed.set(tags);
        },
      },
    ]);

    const current = manifest.get();
    return {
      manifest: current,
      compatibility: current ? checkCompatibility(current, ctx.config.repositories) : undefined,
      order: repos.map(r => r.name),
      deployed: deployed.get(),
    };
  };

  const rollback = async (request: RollbackRequest): Promise<RollbackResult> => {
    const current = stepOutput<VersionManifest>('current manifest');
    const assessment = stepOutput<IssueAssessment | undefined>('assess');
    const plan = stepOutput<RollbackPlan>('plan');
    const outcome = stepOutput<RollbackOutcome>('execute');
    const { target } = request;

    await run('rollback', [
      {
        name: 'current manifest',
        run: async () => {
          const manifest = await readManifest();
          if (!manifest) {
            throw new ConfigError(`No current version manifest at ${ctx.config.manifest}`);
          }
          current.set(manifest);
        },
      },
      {
        name: 'validate target',
        run: async () => {
          const compatibility = checkCompatibility(target, ctx.config.repositories);
          if (!compatibility.compatible) {
            throw new ConfigError(`Target manifest is not consistent: ${compatibility.issues.join('; ')}`);
          }
          const from = current.get().release;
          if (isValidVersion(from) && compareVersions(target.release, from) >= 0) {
            ctx.logger.warn({ from, to: target.release }, 'Target release is not older than the current one');
          }
        },
      },
      {
        name: 'assess',
        run: async () => {
          if (!request.auto) {
            assessment.set(undefined);
            return;
          }
          const report = await checkServices(ctx);
          assessment.set(assessIssues(report, await findVersionMismatches(ctx, current.get())));
        },
      },
      { name: 'plan', run: async () => plan.set(planRollback(ctx.config, current.get(), target)) },
      {
        name: 'execute',
        run: async () => {
          const assessed = assessment.get();
          if (assessed && !ROLLBACK_RECOMMENDATIONS.includes(assessed.recommendation)) {
            ctx.logger.info({ severity: assessed.severity }, 'Stack does not need a rollback');
            outcome.set({ executed: false });
            return;
          }
          outcome.set(
            await executeRollback(ctx, plan.get(), target, { dryRun: request.dryRun, backup: request.backup })
          );
        },
      },
    ]);

    return { plan: plan.get(), assessment: assessment.get(), outcome: outcome.get() };
  };

  return {
    init: options => run('init', initSteps(options)),
    build: () => run('build', [prerequisites(), ...buildSteps()]),
    start: () => run('start', [prerequisites(), ...startSteps()]),
    stop: () => run('stop', stopSteps()),
    restart: () => run('restart', [prerequisites(), ...stopSteps(), ...startSteps()]),
    deploy: options => run('deploy', [...initSteps(options), ...buildSteps(), ...startSteps()]),
    status,
    backup,
    versions,
    rollback,
  };
};
