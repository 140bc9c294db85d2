import WebSocket from 'ws';
import { BackoffPolicy } from '../lib/backoff.js';
import { serviceLogger, type Logger } from '../lib/logger.js';
import { sleep as defaultSleep, type Sleep } from '../lib/sleep.js';
import type { HeartbeatOptions, PoolEvent } from '../types.js';
import { connectSocket } from '../ws/connect.js';
import { startHeartbeat } from '../ws/heartbeat.js';
import { rawToString, send } from '../ws/utils.js';
import type { SessionOwner } from './simulatorSession.js';

export type UplinkState = 'disconnected' | 'connecting' | 'connected';

type StateChangeCallback = (state: UplinkState, previousState: UplinkState) => void;

export interface UplinkHandlers {
  onFrame(raw: string, uplink: UplinkConnection): void;
  onDisconnect(uplink: UplinkConnection): void;
}

export interface UplinkOptions {
  url: string;
  heartbeat: HeartbeatOptions;
  backoff?: BackoffPolicy;
  tlsVerify?: boolean;
  handshakeTimeoutMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/** `local` for loopback routers, otherwise the router's hostname. */
export function uplinkName(url: string): string {
  try {
    const { hostname } = new URL(url);
    if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '[::1]') {
      return 'local';
    }
    return hostname || url;
  } catch {
    return url;
  }
}

/**
 * The pool manager's link to one router. `run()` supervises it for as long
 * as it lives: connect, serve until the socket closes, wait out the backoff,
 * connect again. There is never more than one socket per uplink.
 */
export class UplinkConnection implements SessionOwner {
  readonly kind = 'uplink' as const;
  readonly id: string;
  readonly url: string;

  private socket: WebSocket | null = null;
  private currentState: UplinkState = 'disconnected';
  private failures = 0;
  private readonly stopController = new AbortController();
  private readonly stateListeners: StateChangeCallback[] = [];
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(private readonly options: UplinkOptions) {
    this.url = options.url;
    this.id = uplinkName(options.url);
    this.backoff = options.backoff ?? new BackoffPolicy();
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? serviceLogger('pool')).child({ uplink: this.id });
  }

  get state(): UplinkState {
    return this.currentState;
  }

  get connected(): boolean {
    return this.currentState === 'connected' && this.socket?.readyState === WebSocket.OPEN;
  }

  get retryCount(): number {
    return this.failures;
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.stateListeners.push(callback);
  }

  send(frame: PoolEvent): boolean {
    const socket = this.socket;
    if (!socket || !this.connected) {
      this.log.error({ session: frame.session, type: frame.type }, 'uplink_not_connected');
      return false;
    }
    return send(socket, frame);
  }

  close(): void {
    this.stop();
  }

  stop(): void {
    if (this.stopped) return;
    this.stopController.abort();
    this.socket?.close(1001, 'Pool manager shutting down');
  }

  /** Supervises the link until `stop()` is called. */
  async run(handlers: UplinkHandlers): Promise<void> {
    const { signal } = this.stopController;
    this.log.info({ url: this.url }, 'uplink_monitor_started');

    let attempts = 0;
    while (!signal.aborted) {
      if (attempts > 0) {
        const delay = this.backoff.delayFor(this.failures);
        this.log.info({ delay, attempt: this.failures + 1 }, 'uplink_reconnect_scheduled');
        await this.sleep(delay, signal);
        if (signal.aborted) break;
      }
      attempts += 1;

      const socket = await this.open();
      if (!socket) {
        this.failures += 1;
        continue;
      }
      this.failures = 0;
      await this.serve(socket, handlers);
    }

    this.setState('disconnected');
    this.log.info('uplink_monitor_stopped');
  }

  private setState(next: UplinkState): void {
    if (this.currentState === next) return;
    const previous = this.currentState;
    this.currentState = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.error({ err }, 'state_listener_failed');
      }
    }
  }

  private async open(): Promise<WebSocket | null> {
    this.setState('connecting');
    this.log.info({ url: this.url }, 'uplink_connecting');
    try {
      return await connectSocket(this.url, {
        tlsVerify: this.options.tlsVerify,
        handshakeTimeoutMs: this.options.handshakeTimeoutMs,
        signal: this.stopController.signal,
      });
    } catch (err) {
      this.log.debug({ err }, 'uplink_connect_failed');
      this.setState('disconnected');
      return null;
    }
  }

  private serve(socket: WebSocket, handlers: UplinkHandlers): Promise<void> {
    this.socket = socket;
    this.setState('connected');
    this.log.info({ url: this.url }, 'uplink_connected');

    const stopHeartbeat = startHeartbeat(socket, this.options.heartbeat, () => {
      this.log.warn('uplink_heartbeat_timeout');
    });

    return new Promise((resolve) => {
      socket.on('error', (err) => {
        this.log.error({ err }, 'uplink_socket_error');
      });

      socket.on('message', (raw) => {
        try {
          handlers.onFrame(rawToString(raw), this);
        } catch (err) {
          this.log.error({ err }, 'uplink_frame_handler_failed');
        }
      });

      socket.once('close', (code, reason) => {
        stopHeartbeat();
        this.socket = null;
        this.setState('disconnected');
        this.log.info({ code, reason: reason.toString() }, 'uplink_disconnected');
        try {
          handlers.onDisconnect(this);
        } catch (err) {
          this.log.error({ err }, 'uplink_disconnect_handler_failed');
        }
        resolve();
      });
    });
  }
}
