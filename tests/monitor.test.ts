import { afterEach, describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { sendJson, startHealthCheckServer } from '../src/healthcheck';
import type { HealthCheckService } from '../src/healthcheck';
import { startMonitor } from '../src/monitor';
import type { Monitor } from '../src/monitor';
import { fakeFetch, makeConfig, makeContext } from './helpers';

const CORE = 'http://localhost:8090/api/health';
const FRONTEND = 'http://localhost:80/';

describe('startHealthCheckServer', () => {
  let server: HealthCheckService | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('should answer GET /health through the callback', async () => {
    server = startHealthCheckServer((_, res) => sendJson(res, 200, { ok: true }), 0);
    const port = await server.ready;

    const res = await fetch(`http://127.0.0.1:${port}/health?verbose=1`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ ok: true });
  });

  it('should return 404 for other routes and methods', async () => {
    const onPing = vi.fn();
    server = startHealthCheckServer(onPing, 0);
    const port = await server.ready;

    expect((await fetch(`http://127.0.0.1:${port}/metrics`)).status).toBe(404);
    expect((await fetch(`http://127.0.0.1:${port}/health`, { method: 'POST' })).status).toBe(404);
    expect(onPing).not.toHaveBeenCalled();
  });

  it('should report the bound port', async () => {
    server = startHealthCheckServer((_, res) => sendJson(res, 200, {}), 0);
    const port = await server.ready;

    expect(server.status()).toEqual({ listening: true, port });
    expect(port).toBeGreaterThan(0);
  });
});

describe('startMonitor', () => {
  let monitor: Monitor | undefined;
  const options = { port: 0, intervalMs: 60_000, degradedIntervalMs: 60_000 };

  afterEach(async () => {
    await monitor?.stop();
    monitor = undefined;
  });

  it('should serve 503 until the first probe completes', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const fetch = async () => {
      await gate;
      return { status: 200 };
    };
    monitor = startMonitor(makeContext(makeConfig('/srv'), { fetch }), options);
    const port = await monitor.ready;

    const res = await globalThis.fetch(`http://127.0.0.1:${port}/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ healthy: false, error: 'No health check has completed yet' });
    expect(monitor.latest()).toBeUndefined();
    release();
  });

  it('should serve the latest report', async () => {
    monitor = startMonitor(makeContext(makeConfig('/srv')), options);
    const port = await monitor.ready;
    await monitor.poll();

    const res = await fetch(`http://127.0.0.1:${port}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ healthy: true, services: [{ name: 'core' }, { name: 'frontend' }] });
  });

  it('should answer 503 while a critical service is down', async () => {
    monitor = startMonitor(makeContext(makeConfig('/srv'), { fetch: fakeFetch({ [FRONTEND]: 200 }) }), options);
    const port = await monitor.ready;
    await monitor.poll();

    const res = await fetch(`http://127.0.0.1:${port}/health`);

    expect(res.status).toBe(503);
    expect(monitor.latest()?.healthy).toBe(false);
  });

  it('should log when the stack changes state', async () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const info = vi.spyOn(logger, 'info');
    let coreStatus = 200;
    const fetch = async (url: string) => ({ status: url === CORE ? coreStatus : 200 });

    monitor = startMonitor(makeContext(makeConfig('/srv'), { fetch, logger }), options);
    await monitor.ready;
    await monitor.poll();
    info.mockClear();

    coreStatus = 500;
    await monitor.poll();
    await monitor.poll();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({ failing: ['core'] }, 'Stack unhealthy');

    coreStatus = 200;
    await monitor.poll();

    expect(info).toHaveBeenCalledWith({ failing: [] }, 'Stack healthy');
  });

  it('should stop without probing when the port is taken', async () => {
    const taken = startHealthCheckServer((_, res) => sendJson(res, 200, {}), 0);
    const port = await taken.ready;
    const fetch = vi.fn(fakeFetch({ [CORE]: 200, [FRONTEND]: 200 }));

    try {
      monitor = startMonitor(makeContext(makeConfig('/srv'), { fetch }), { ...options, port });

      await expect(monitor.ready).rejects.toThrow(/EADDRINUSE/);
      expect(fetch).not.toHaveBeenCalled();
    } finally {
      await taken.close();
    }
  });
});
