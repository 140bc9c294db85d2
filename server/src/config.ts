import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z.object({
  LOG_LEVEL: z.string().default('info'),
  ROUTER_HOST: z.string().default('0.0.0.0'),
  ROUTER_BROWSER_PORT: z.coerce.number().int().positive().default(8080),
  ROUTER_POOL_PORT: z.coerce.number().int().positive().default(8081),
  TLS_CERT: z.string().optional(),
  TLS_KEY: z.string().optional(),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:8000,http://127.0.0.1:8000'),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(60_000),
  WS_HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  POOL_SCRIPT: z.string().default('./do.sh'),
  POOL_DEFAULT_BAUD: z.coerce.number().int().positive().default(9600),
  POOL_RECONNECT_MAX_MS: z.coerce.number().int().positive().default(16_000),
  POOL_SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(300),
  POOL_KILL_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(2_000),
  UPLINK_TLS_VERIFY: booleanFlag,
  BRIDGE_HOST: z.string().default('127.0.0.1'),
  BRIDGE_PORT: z.coerce.number().int().positive().default(10018),
  BRIDGE_TARGET_URL: z.string().url().default('ws://localhost:8080'),
});

const parsed = envSchema.parse(process.env);

export const config = {
  logLevel: parsed.LOG_LEVEL,
  router: {
    host: parsed.ROUTER_HOST,
    browserPort: parsed.ROUTER_BROWSER_PORT,
    poolPort: parsed.ROUTER_POOL_PORT,
    tlsCert: parsed.TLS_CERT,
    tlsKey: parsed.TLS_KEY,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
  },
  heartbeat: {
    intervalMs: parsed.WS_HEARTBEAT_MS,
    timeoutMs: parsed.WS_HEARTBEAT_TIMEOUT_MS,
  },
  pool: {
    script: parsed.POOL_SCRIPT,
    defaultBaud: parsed.POOL_DEFAULT_BAUD,
    reconnectMaxMs: parsed.POOL_RECONNECT_MAX_MS,
    shutdownGraceMs: parsed.POOL_SHUTDOWN_GRACE_MS,
    killTimeoutMs: parsed.POOL_KILL_TIMEOUT_MS,
  },
  tlsVerify: parsed.UPLINK_TLS_VERIFY,
  bridge: {
    host: parsed.BRIDGE_HOST,
    port: parsed.BRIDGE_PORT,
    targetUrl: parsed.BRIDGE_TARGET_URL,
  },
};

export type Config = typeof config;
