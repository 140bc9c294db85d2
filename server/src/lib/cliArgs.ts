import { InvalidArgumentError } from 'commander';

export function isWebSocketUrl(value: string): boolean {
  return value.startsWith('ws://') || value.startsWith('wss://');
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !Number.isInteger(port) || port > 65_535) {
    throw new InvalidArgumentError(`Invalid port '${value}'`);
  }
  return port;
}

export function parseWebSocketUrl(value: string): string {
  if (!isWebSocketUrl(value)) {
    throw new InvalidArgumentError('WebSocket URL must start with ws:// or wss://');
  }
  return value;
}

export interface PoolTargets {
  urls: string[];
  script: string;
}

/** Router URLs are the `ws://`/`wss://` arguments; any other argument is the script (last wins). */
export function splitPoolTargets(targets: string[], defaultScript: string): PoolTargets {
  const urls = targets.filter(isWebSocketUrl);
  const scripts = targets.filter((target) => !isWebSocketUrl(target));
  return {
    urls,
    script: scripts.at(-1) ?? defaultScript,
  };
}

export interface TlsPair {
  cert: string;
  key: string;
}

/** Both or neither; returns `undefined` for plaintext. */
export function resolveTlsPair(cert?: string, key?: string): TlsPair | undefined {
  if (!cert && !key) return undefined;
  if (!cert || !key) {
    throw new InvalidArgumentError('TLS needs both a certificate and a key');
  }
  return { cert, key };
}
