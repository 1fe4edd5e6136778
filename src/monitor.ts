import type { DeployContext } from './context';
import { checkServices } from './health';
import type { StackHealthReport } from './health';
import { sendJson, startHealthCheckServer } from './healthcheck';
import type { HealthCheckService } from './healthcheck';

export interface MonitorOptions {
  port: number;
  intervalMs: number;
  /** Poll interval while a critical service is failing. */
  degradedIntervalMs: number;
}

export interface Monitor {
  /** Resolves with the bound port. */
  ready: Promise<number>;
  latest(): StackHealthReport | undefined;
  /** Probe now, outside the regular schedule. */
  poll(): Promise<StackHealthReport>;
  stop(): Promise<void>;
}

/**
 * Keep probing the stack and expose the latest report on `GET /health`
 * (200 while healthy, 503 otherwise, 503 before the first probe).
 */
export const startMonitor = (ctx: DeployContext, options: MonitorOptions): Monitor => {
  let last: StackHealthReport | undefined;
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;

  const poll = async (): Promise<StackHealthReport> => {
    const report = await checkServices(ctx);

    if (!last || last.healthy !== report.healthy) {
      const failing = report.services.filter(s => !s.healthy).map(s => s.name);
      if (report.healthy) {
        ctx.logger.info({ failing }, 'Stack healthy');
      } else {
        ctx.logger.warn({ failing }, 'Stack unhealthy');
      }
    }

    last = report;
    return report;
  };

  const schedule = () => {
    if (stopped) return;
    const delay = last && !last.healthy ? options.degradedIntervalMs : options.intervalMs;
    timer = setTimeout(() => {
      poll()
        .catch(err => ctx.logger.error({ err }, 'Health poll failed'))
        .finally(schedule);
    }, delay);
  };

  const server: HealthCheckService = startHealthCheckServer((_, res) => {
    if (!last) {
      sendJson(res, 503, { healthy: false, error: 'No health check has completed yet' });
      return;
    }
    sendJson(res, last.healthy ? 200 : 503, last);
  }, options.port);

  // Polling starts once the server listens; a server that cannot bind stops the monitor.
  const ready = server.ready.then(
    port => {
      poll()
        .catch(err => ctx.logger.error({ err }, 'Health poll failed'))
        .finally(schedule);
      return port;
    },
    (err: unknown) => {
      stopped = true;
      throw err;
    }
  );

  return {
    ready,
    latest: () => last,
    poll,
    stop: async () => {
      stopped = true;
      if (timer) clearTimeout(timer);
      await server.close();
    },
  };
};
