import type { RepositoryConfig, StackConfig } from './config';
import type { DeployContext } from './context';
import { runBackup } from './backup';
import { composeDown, composeUp } from './compose';
import { AbortedError, RollbackError } from './errors';
import { pollServices } from './health';
import type { StackHealthReport } from './health';
import { buildImage } from './images';
import { saveManifest, versionFor } from './manifest';
import type { VersionManifest } from './manifest';
import { definePipeline } from './pipeline';
import type { PipelineStep } from './pipeline';
import { checkoutVersion, deployedVersion } from './repositories';
import { resolveOrder, sortByOrder } from './topology';
import { majorOf, sameVersion, toTag } from './version';

export type ProblemSeverity = 'high' | 'medium' | 'low';
export type Severity = 'none' | 'low' | 'high' | 'critical';
export type Recommendation = 'continue' | 'monitor' | 'recommended_rollback' | 'immediate_rollback';
export type RiskLevel = 'low' | 'medium' | 'high';

export interface Problem {
  source: string;
  severity: ProblemSeverity;
  message: string;
}

export interface IssueAssessment {
  problems: Problem[];
  severity: Severity;
  recommendation: Recommendation;
}

export interface VersionMismatch {
  repo: string;
  expected: string;
  deployed?: string;
}

export interface RepositoryRollback {
  name: string;
  fromVersion: string;
  toVersion: string;
  steps: string[];
}

export interface RollbackPlan {
  fromRelease: string;
  toRelease: string;
  order: string[];
  repositories: RepositoryRollback[];
  risk: RiskLevel;
  estimatedMinutes: number;
}

export interface RollbackOptions {
  dryRun?: boolean;
  /** Take a backup before touching anything. Defaults to true. */
  backup?: boolean;
}

export interface RollbackOutcome {
  executed: boolean;
  report?: StackHealthReport;
}

const RECOMMENDATIONS: Record<Severity, Recommendation> = {
  critical: 'immediate_rollback',
  high: 'recommended_rollback',
  low: 'monitor',
  none: 'continue',
};

const RISK_MINUTES: Record<RiskLevel, number> = { low: 0, medium: 5, high: 10 };

export const determineSeverity = (problems: readonly Problem[]): Severity => {
  if (!problems.length) return 'none';
  if (problems.some(p => p.severity === 'high')) return 'critical';
  if (problems.some(p => p.severity === 'medium')) return 'high';
  return 'low';
};

/**
 * Turn a health report and deployed-tag drift into a rollback recommendation.
 * A failing critical service weighs high, a failing optional service or a
 * tag that differs from the manifest weighs medium.
 */
export const assessIssues = (
  report: StackHealthReport,
  mismatches: readonly VersionMismatch[] = []
): IssueAssessment => {
  const problems: Problem[] = [
    ...report.services
      .filter(s => !s.healthy)
      .map((s): Problem => ({
        source: s.name,
        severity: s.critical ? 'high' : 'medium',
        message: `${s.name} unhealthy: ${s.error ?? 'unknown error'}`,
      })),
    ...mismatches.map((m): Problem => ({
      source: m.repo,
      severity: 'medium',
      message: `${m.repo} runs ${m.deployed ?? 'an untagged revision'}, manifest pins ${m.expected}`,
    })),
  ];

  const severity = determineSeverity(problems);
  return { problems, severity, recommendation: RECOMMENDATIONS[severity] };
};

export const findVersionMismatches = async (
  ctx: DeployContext,
  manifest: VersionManifest
): Promise<VersionMismatch[]> => {
  const mismatches: VersionMismatch[] = [];
  for (const repo of ctx.config.repositories) {
    const expected = repo.manifestKey ? versionFor(manifest, repo.manifestKey) : undefined;
    if (!expected) continue;
    const deployed = await deployedVersion(ctx, repo);
    if (!deployed || !sameVersion(deployed, expected)) mismatches.push({ repo: repo.name, expected, deployed });
  }
  return mismatches;
};

export const assessRisk = (fromRelease: string, toRelease: string, repoCount: number): RiskLevel => {
  let factors = 0;
  if (majorOf(fromRelease) !== majorOf(toRelease)) factors += 3;
  if (repoCount > 3) factors += 2;

  if (factors >= 3) return 'high';
  if (factors >= 1) return 'medium';
  return 'low';
};

export const estimateMinutes = (repoCount: number, risk: RiskLevel): number => 5 + repoCount * 2 + RISK_MINUTES[risk];

const repositorySteps = (config: StackConfig, repo: RepositoryConfig, toVersion: string): string[] => [
  `git fetch --tags origin (${repo.name})`,
  `git checkout tags/${toTag(toVersion)} (${repo.name})`,
  ...(repo.image ? [`docker build -t ${repo.image}:${config.imageTag} ${repo.dir}`] : []),
];

/**
 * Work out which repositories change between two manifests and in which
 * order to restore them (dependencies first).
 */
export const planRollback = (config: StackConfig, from: VersionManifest, to: VersionManifest): RollbackPlan => {
  const order = resolveOrder(config.repositories);
  const repositories: RepositoryRollback[] = [];

  for (const repo of sortByOrder(config.repositories, order)) {
    if (!repo.manifestKey) continue;
    const fromVersion = versionFor(from, repo.manifestKey);
    const toVersion = versionFor(to, repo.manifestKey);
    if (!toVersion || (fromVersion !== undefined && sameVersion(fromVersion, toVersion))) continue;

    repositories.push({
      name: repo.name,
      fromVersion: fromVersion ?? 'unknown',
      toVersion,
      steps: repositorySteps(config, repo, toVersion),
    });
  }

  const risk = assessRisk(from.release, to.release, repositories.length);
  return {
    fromRelease: from.release,
    toRelease: to.release,
    order: repositories.map(r => r.name),
    repositories,
    risk,
    estimatedMinutes: estimateMinutes(repositories.length, risk),
  };
};

/**
 * Human-readable plan, one line per fact.
 */
export const formatPlan = (plan: RollbackPlan): string => {
  const lines = [
    `Rollback ${plan.fromRelease} -> ${plan.toRelease}`,
    `Risk: ${plan.risk}`,
    `Estimated duration: ${plan.estimatedMinutes} min`,
  ];
  if (!plan.repositories.length) {
    lines.push('No repository changes.');
  }
  plan.repositories.forEach((repo, i) => {
    lines.push(`${i + 1}. ${repo.name}: ${repo.fromVersion} -> ${repo.toVersion}`);
    for (const step of repo.steps) lines.push(`   - ${step}`);
  });
  return lines.join('\n');
};

/**
 * Stop the stack, check out and rebuild every repository in the plan,
 * start it again and verify health and tags. On success the target
 * manifest becomes the current one.
 *
 * Runs as a pipeline on `ctx.signal`, so an interrupt stops between steps.
 * Every failure other than an interrupt comes out as RollbackError.
 */
export const executeRollback = async (
  ctx: DeployContext,
  plan: RollbackPlan,
  target: VersionManifest,
  options: RollbackOptions = {}
): Promise<RollbackOutcome> => {
  if (options.dryRun) {
    ctx.logger.info({ from: plan.fromRelease, to: plan.toRelease }, 'Dry run, rollback not executed');
    return { executed: false };
  }
  if (!plan.repositories.length) {
    ctx.logger.info({ from: plan.fromRelease, to: plan.toRelease }, 'No repository changes, rollback not executed');
    return { executed: false };
  }

  const byName = new Map(ctx.config.repositories.map(r => [r.name, r]));
  const backup = options.backup ?? true;
  let report: StackHealthReport | undefined;

  const steps: PipelineStep[] = [
    ...(backup
      ? [
          {
            name: 'backup',
            run: async () => {
              await runBackup(ctx);
            },
          },
        ]
      : []),
    { name: 'compose down', run: () => composeDown(ctx) },
    ...plan.repositories.map(
      (step): PipelineStep => ({
        name: `restore ${step.name}`,
        run: async () => {
          const repo = byName.get(step.name);
          if (!repo) throw new RollbackError(`Repository ${step.name} is not in the stack config`);
          ctx.logger.info({ repo: repo.name, from: step.fromVersion, to: step.toVersion }, 'Rolling back repository');
          await checkoutVersion(ctx, repo, step.toVersion);
          await buildImage(ctx, repo);
        },
      })
    ),
    { name: 'compose up', run: () => composeUp(ctx) },
    {
      name: 'verify',
      run: async () => {
        report = await verifyRollback(ctx, plan);
      },
    },
    { name: 'save manifest', run: () => saveManifest(ctx.config.manifest, target) },
  ];

  try {
    await definePipeline({ name: 'restore', steps, signal: ctx.signal, logger: ctx.logger }).run();
  } catch (error) {
    if (error instanceof RollbackError || error instanceof AbortedError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new RollbackError(`Rollback to ${plan.toRelease} failed: ${message}`, { cause: error });
  }

  ctx.logger.info({ release: plan.toRelease }, 'Rollback completed');
  return { executed: true, report };
};

const verifyRollback = async (ctx: DeployContext, plan: RollbackPlan): Promise<StackHealthReport> => {
  const byName = new Map(ctx.config.repositories.map(r => [r.name, r]));
  const failures: string[] = [];

  for (const step of plan.repositories) {
    const repo = byName.get(step.name);
    const deployed = repo ? await deployedVersion(ctx, repo) : undefined;
    if (!deployed || !sameVersion(deployed, step.toVersion)) {
      failures.push(`${step.name} is at ${deployed ?? 'unknown'}, expected ${step.toVersion}`);
    }
  }

  const report = await pollServices(ctx);
  for (const s of report.services) {
    if (!s.healthy && s.critical) failures.push(`${s.name} unhealthy: ${s.error ?? 'unknown error'}`);
  }

  if (failures.length) {
    throw new RollbackError(`Rollback verification failed: ${failures.join('; ')}`);
  }
  return report;
};
