import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  level: config.logLevel,
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export type ServiceName = 'router' | 'pool' | 'bridge';

export function serviceLogger(service: ServiceName): Logger {
  return logger.child({ service });
}

/** Shortens a raw frame for log output. */
export function preview(raw: string, max = 100): string {
  return raw.length > max ? `${raw.slice(0, max)}…` : raw;
}
