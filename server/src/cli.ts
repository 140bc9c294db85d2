#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { TelnetBridge } from './bridge/bridge.js';
import { config } from './config.js';
import {
  parsePort,
  parseWebSocketUrl,
  resolveTlsPair,
  splitPoolTargets,
  type TlsPair,
} from './lib/cliArgs.js';
import { logger, serviceLogger } from './lib/logger.js';
import { PoolService } from './pool/service.js';
import { SERVICE_VERSION } from './router/app.js';
import { startRouter } from './router/server.js';

function onShutdown(stop: () => Promise<void>): void {
  let stopping = false;
  const handler = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting_down');
    stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'shutdown_failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

const program = new Command();

program
  .name('terminal-relay')
  .description('Relay browser and telnet terminals to a pool of simulator processes')
  .version(SERVICE_VERSION);

program
  .command('router')
  .description('Accept browser sessions and route them to the pool manager')
  .argument('[cert]', 'TLS certificate file', config.router.tlsCert)
  .argument('[key]', 'TLS private key file', config.router.tlsKey)
  .option('--host <host>', 'address to bind', config.router.host)
  .option('--browser-port <port>', 'port for browsers', parsePort, config.router.browserPort)
  .option('--pool-port <port>', 'port for the pool manager', parsePort, config.router.poolPort)
  .action(
    async (
      cert: string | undefined,
      key: string | undefined,
      options: { host: string; browserPort: number; poolPort: number },
    ) => {
      let tls: TlsPair | undefined;
      try {
        tls = resolveTlsPair(cert, key);
      } catch (error) {
        program.error(error instanceof Error ? error.message : String(error));
      }

      const running = await startRouter({
        host: options.host,
        browserPort: options.browserPort,
        poolPort: options.poolPort,
        tlsCert: tls?.cert,
        tlsKey: tls?.key,
        corsOrigins: config.router.corsOrigins,
        heartbeat: config.heartbeat,
        logger: serviceLogger('router'),
      });
      onShutdown(() => running.close());
    },
  );

program
  .command('pool')
  .description('Run simulator sessions for one or more routers')
  .argument('<targets...>', 'router URLs (ws:// or wss://) and optionally the spawn script')
  .action(async (targets: string[]) => {
    const { urls, script } = splitPoolTargets(targets, config.pool.script);
    if (urls.length === 0) {
      program.error('At least one router URL (ws:// or wss://) is required');
    }
    const scriptPath = path.resolve(script);
    if (!fs.existsSync(scriptPath)) {
      program.error(`Script not found: ${scriptPath}`);
    }

    const service = new PoolService({
      urls,
      script: scriptPath,
      heartbeat: config.heartbeat,
      reconnectMaxMs: config.pool.reconnectMaxMs,
      tlsVerify: config.tlsVerify,
      defaultBaud: config.pool.defaultBaud,
      shutdownGraceMs: config.pool.shutdownGraceMs,
      killTimeoutMs: config.pool.killTimeoutMs,
      logger: serviceLogger('pool'),
    });
    onShutdown(() => service.stop());
    await service.start();
  });

program
  .command('bridge')
  .description('Let a telnet client connect to the router over TCP')
  .argument('[port]', 'TCP port to listen on', parsePort, config.bridge.port)
  .argument('[url]', 'router WebSocket URL', parseWebSocketUrl, config.bridge.targetUrl)
  .action(async (port: number, url: string) => {
    const bridge = new TelnetBridge({
      host: config.bridge.host,
      port,
      targetUrl: url,
      heartbeat: config.heartbeat,
      tlsVerify: config.tlsVerify,
      logger: serviceLogger('bridge'),
    });
    await bridge.start();
    onShutdown(() => bridge.stop());
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.fatal({ err }, 'startup_failed');
  process.exit(1);
});
