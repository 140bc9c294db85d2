import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import type { RequestListener } from 'node:http';
import type { WebSocketServer } from 'ws';
import { serviceLogger, type Logger } from '../lib/logger.js';
import type { HeartbeatOptions } from '../types.js';
import { registerBrowserServer, registerPoolServer } from '../ws/server.js';
import { createApp } from './app.js';
import { SessionRouter } from './sessionRouter.js';

export interface RouterOptions {
  host: string;
  browserPort: number;
  poolPort: number;
  tlsCert?: string;
  tlsKey?: string;
  corsOrigins: string[];
  heartbeat: HeartbeatOptions;
  logger?: Logger;
}

export interface RunningRouter {
  router: SessionRouter;
  browserPort: number;
  poolPort: number;
  close(): Promise<void>;
}

type TlsFiles = { cert: Buffer; key: Buffer } | null;

function readTls(options: RouterOptions): TlsFiles {
  if (!options.tlsCert && !options.tlsKey) return null;
  if (!options.tlsCert || !options.tlsKey) {
    throw new Error('TLS needs both a certificate and a key');
  }
  return {
    cert: fs.readFileSync(options.tlsCert),
    key: fs.readFileSync(options.tlsKey),
  };
}

function createServer(tls: TlsFiles, listener?: RequestListener): http.Server {
  if (tls) return https.createServer(tls, listener);
  return http.createServer(listener);
}

function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve(address && typeof address === 'object' ? address.port : port);
    });
  });
}

function shutdown(server: http.Server, wss: WebSocketServer): Promise<void> {
  for (const client of wss.clients) {
    client.terminate();
  }
  return new Promise((resolve, reject) => {
    wss.close();
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * Starts both router listeners: the browser port (HTTP app plus WebSocket
 * upgrades) and the pool manager port. Port 0 picks a free port.
 */
export async function startRouter(options: RouterOptions): Promise<RunningRouter> {
  const logger = options.logger ?? serviceLogger('router');
  const tls = readTls(options);
  const router = new SessionRouter({ logger });

  const browserServer = createServer(tls, createApp(router, options.corsOrigins));
  const poolServer = createServer(tls);
  const socketOptions = { router, heartbeat: options.heartbeat, logger };
  const browserWss = registerBrowserServer(browserServer, socketOptions);
  const poolWss = registerPoolServer(poolServer, socketOptions);

  const browserPort = await listen(browserServer, options.browserPort, options.host);
  const poolPort = await listen(poolServer, options.poolPort, options.host).catch(
    async (err: unknown) => {
      await shutdown(browserServer, browserWss);
      throw err;
    },
  );

  const scheme = tls ? 'wss' : 'ws';
  logger.info(
    { host: options.host, browserPort, poolPort, tls: tls !== null, scheme },
    'router_started',
  );

  return {
    router,
    browserPort,
    poolPort,
    close: async () => {
      logger.info('router_stopping');
      await Promise.all([shutdown(browserServer, browserWss), shutdown(poolServer, poolWss)]);
      logger.info('router_stopped');
    },
  };
}
