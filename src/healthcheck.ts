import http from 'node:http';
import { promisify } from 'node:util';
import logger from './logger';

/**
 * Handles a `GET /health` request. The callback owns the whole response.
 */
export type OnPingCallback = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export interface HealthCheckStatus {
  listening: boolean;
  port: number;
}

/**
 * Handle for the status server.
 */
export interface HealthCheckService {
  /** Resolves with the bound port once the server is listening. */
  ready: Promise<number>;
  status(): HealthCheckStatus;
  close(): Promise<void>;
}

/**
 * Start an HTTP server that answers `GET /health` through `onPing`.
 * Any other route gets 404. Pass port 0 to bind an ephemeral port.
 */
export const startHealthCheckServer = (onPing: OnPingCallback, port: number): HealthCheckService => {
  const server = http.createServer((req, res) => {
    const pathname = (req.url ?? '').split('?')[0];
    if (pathname === '/health' && req.method === 'GET') {
      onPing(req, res);
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  const boundPort = (): number => {
    const address = server.address();
    return address && typeof address === 'object' ? address.port : port;
  };

  const ready = new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info({ port: boundPort() }, 'Status server listening');
      resolve(boundPort());
    });
  });

  const closeServer = promisify(server.close.bind(server));

  return {
    ready,
    close: async () => {
      if (server.listening) await closeServer();
    },

    status: (): HealthCheckStatus => ({
      listening: server.listening,
      port: boundPort(),
    }),
  };
};

/**
 * Write a JSON body with the given status code.
 */
export const sendJson = (res: http.ServerResponse, statusCode: number, body: unknown): void => {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
};
