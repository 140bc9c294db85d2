import { BackoffPolicy } from '../lib/backoff.js';
import { serviceLogger, type Logger } from '../lib/logger.js';
import type { Sleep } from '../lib/sleep.js';
import type { HeartbeatOptions } from '../types.js';
import { PoolManager, type PoolManagerOptions } from './poolManager.js';
import { UplinkConnection } from './uplink.js';

export interface PoolServiceOptions extends PoolManagerOptions {
  urls: string[];
  heartbeat: HeartbeatOptions;
  reconnectMaxMs?: number;
  tlsVerify?: boolean;
  uplinkSleep?: Sleep;
}

/**
 * The pool manager process: one shared {@link PoolManager} and one
 * supervised {@link UplinkConnection} per router URL.
 */
export class PoolService {
  readonly manager: PoolManager;
  readonly uplinks: UplinkConnection[];
  private readonly script: string;
  private readonly log: Logger;
  private readonly inbound = new Map<UplinkConnection, Promise<void>>();
  private running: Promise<void> | null = null;

  constructor(options: PoolServiceOptions) {
    if (options.urls.length === 0) {
      throw new Error('At least one router URL is required');
    }
    this.script = options.script;
    this.log = options.logger ?? serviceLogger('pool');
    this.manager = new PoolManager({ ...options, logger: this.log });
    const backoff = new BackoffPolicy({ maxMs: options.reconnectMaxMs });
    this.uplinks = options.urls.map(
      (url) =>
        new UplinkConnection({
          url,
          heartbeat: options.heartbeat,
          backoff,
          tlsVerify: options.tlsVerify,
          sleep: options.uplinkSleep,
          logger: this.log,
        }),
    );
  }

  /** Starts every uplink supervisor. Resolves once all of them have stopped. */
  start(): Promise<void> {
    if (this.running) return this.running;
    this.log.info(
      { routers: this.uplinks.map((uplink) => uplink.url), script: this.script },
      'pool_starting',
    );
    this.running = Promise.all(
      this.uplinks.map((uplink) =>
        uplink.run({
          onFrame: (raw, source) => this.enqueue(raw, source),
          onDisconnect: (source) => {
            this.manager
              .destroyOwnedBy(source)
              .then(() => this.logStatus('uplink_sessions_released'))
              .catch((err: unknown) => {
                this.log.error({ err, uplink: source.id }, 'uplink_cleanup_failed');
              });
          },
        }),
      ),
    ).then(() => undefined);
    return this.running;
  }

  async stop(): Promise<void> {
    this.logStatus('pool_stopping');
    this.uplinks.forEach((uplink) => uplink.stop());
    await this.running;
    await this.manager.shutdown();
  }

  private logStatus(event: string): void {
    const { sessions, starting, closing, freeSlots, capacity } = this.manager.stats();
    this.log.info(
      {
        sessions: sessions.map(({ id, slot, owner, baudRate }) => ({ id, slot, owner, baudRate })),
        starting,
        closing,
        freeSlots,
        capacity,
      },
      event,
    );
  }

  /** Frames from one router are handled strictly in arrival order. */
  private enqueue(raw: string, source: UplinkConnection): void {
    const previous = this.inbound.get(source) ?? Promise.resolve();
    const next = previous
      .then(() => this.manager.handleMessage(raw, source))
      .catch((err: unknown) => {
        this.log.error({ err, uplink: source.id }, 'frame_handling_failed');
      });
    this.inbound.set(source, next);
  }
}
