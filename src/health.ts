import type { ServiceConfig } from './config';
import type { DeployContext } from './context';
import { HealthCheckError } from './errors';

/**
 * Result of probing one service endpoint.
 */
export interface ServiceHealth {
  name: string;
  url: string;
  critical: boolean;
  healthy: boolean;
  status?: number;
  latencyMs: number;
  error?: string;
}

/**
 * Aggregate health of the stack. `healthy` only turns false when a
 * critical service fails; non-critical failures are reported but tolerated.
 */
export interface StackHealthReport {
  healthy: boolean;
  checkedAt: string;
  services: ServiceHealth[];
}

export type FetchLike = (url: string, init: { method: string; signal: AbortSignal }) => Promise<{ status: number }>;

export interface ProbeOptions {
  timeoutMs: number;
  fetch?: FetchLike;
  now?: () => number;
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'timed out';
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
};

export const probeService = async (service: ServiceConfig, options: ProbeOptions): Promise<ServiceHealth> => {
  const doFetch: FetchLike = options.fetch ?? fetch;
  const now = options.now ?? Date.now;
  const started = now();

  try {
    const res = await doFetch(service.url, { method: 'GET', signal: AbortSignal.timeout(options.timeoutMs) });
    const healthy = res.status === service.expectedStatus;
    return {
      name: service.name,
      url: service.url,
      critical: service.critical,
      healthy,
      status: res.status,
      latencyMs: now() - started,
      ...(healthy ? {} : { error: `HTTP ${res.status}` }),
    };
  } catch (error) {
    return {
      name: service.name,
      url: service.url,
      critical: service.critical,
      healthy: false,
      latencyMs: now() - started,
      error: describeError(error),
    };
  }
};

export const checkServices = async (ctx: DeployContext): Promise<StackHealthReport> => {
  const services = await Promise.all(
    ctx.config.services.map(service =>
      probeService(service, { timeoutMs: ctx.config.health.timeoutMs, fetch: ctx.fetch })
    )
  );

  return {
    healthy: services.every(s => s.healthy || !s.critical),
    checkedAt: ctx.now().toISOString(),
    services,
  };
};

export const logHealthReport = (ctx: DeployContext, report: StackHealthReport) => {
  for (const s of report.services) {
    if (s.healthy) {
      ctx.logger.info({ service: s.name, status: s.status, latencyMs: s.latencyMs }, 'Service healthy');
    } else if (s.critical) {
      ctx.logger.error({ service: s.name, url: s.url, error: s.error }, 'Critical service unhealthy');
    } else {
      ctx.logger.warn({ service: s.name, url: s.url, error: s.error }, 'Service may have problems');
    }
  }
};

/**
 * Give freshly started containers the startup grace period, then probe up
 * to `attempts` times until every critical service answers.
 */
export const pollServices = async (ctx: DeployContext): Promise<StackHealthReport> => {
  const { startupGraceMs, attempts, intervalMs } = ctx.config.health;

  if (startupGraceMs > 0) {
    ctx.logger.info({ ms: startupGraceMs }, 'Waiting for services to start');
    await ctx.sleep(startupGraceMs);
  }

  let report = await checkServices(ctx);
  for (let attempt = 2; attempt <= attempts && !report.healthy; attempt++) {
    ctx.logger.debug({ attempt, attempts }, 'Critical services not ready, probing again');
    await ctx.sleep(intervalMs);
    report = await checkServices(ctx);
  }
  return report;
};

/**
 * pollServices, then log the outcome. Throws HealthCheckError if a
 * critical service never came up.
 */
export const waitForServices = async (ctx: DeployContext): Promise<StackHealthReport> => {
  const report = await pollServices(ctx);
  logHealthReport(ctx, report);
  if (!report.healthy) throw new HealthCheckError(report);
  return report;
};
