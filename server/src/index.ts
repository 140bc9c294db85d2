export { config, type Config } from './config.js';
export { logger, serviceLogger, type Logger } from './lib/logger.js';
export { BackoffPolicy } from './lib/backoff.js';

export * from './types.js';
export * from './ws/schemas.js';

export { SessionRouter, type RouterStats } from './router/sessionRouter.js';
export { startRouter, type RouterOptions, type RunningRouter } from './router/server.js';

export { PoolManager, type PoolManagerOptions, type PoolStats } from './pool/poolManager.js';
export { PoolService, type PoolServiceOptions } from './pool/service.js';
export { UplinkConnection, uplinkName, type UplinkState } from './pool/uplink.js';
export { SlotPool, SLOT_COUNT } from './pool/slotPool.js';
export type { TerminalProcess, TerminalSpawner, SpawnRequest } from './pool/terminal.js';

export { TelnetBridge, type BridgeOptions } from './bridge/bridge.js';
export { TelnetDecoder, telnetEscape } from './bridge/telnet.js';
