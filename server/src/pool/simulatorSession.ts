import type { Logger } from '../lib/logger.js';
import type { Sleep } from '../lib/sleep.js';
import type { FrameChannel, PoolEvent } from '../types.js';
import { chunkDelayMs, chunkSize, charsPerSecond, splitChunks } from './pacing.js';
import type { Disposable, TerminalProcess } from './terminal.js';

/** Attention byte (Ctrl-]); makes the simulator's telnet front end drop the line. */
export const ATTENTION = '\x1d';

/** The connection that asked for a session and receives its output. */
export interface SessionOwner extends FrameChannel<PoolEvent> {
  readonly connected: boolean;
}

export type RelayEndReason = 'exited' | 'closed' | 'owner_lost';

export interface SimulatorSessionOptions {
  id: string;
  slot: number;
  owner: SessionOwner;
  terminal: TerminalProcess;
  baudRate: number;
  sleep: Sleep;
  logger: Logger;
}

export interface TerminateOptions {
  graceMs: number;
  killTimeoutMs: number;
  signalGroup: (pid: number, signal: NodeJS.Signals) => void;
}

export interface SimulatorSessionInfo {
  id: string;
  slot: number;
  pid: number;
  baudRate: number;
  owner: string;
  running: boolean;
  createdAt: string;
}

/**
 * One simulator process on its own pty. Output is queued as it arrives and
 * replayed to the owner by a single relay task at the session's baud rate,
 * which keeps frames in read order. The pty is paused while a backlog exists.
 */
export class SimulatorSession {
  readonly id: string;
  readonly slot: number;
  readonly owner: SessionOwner;
  readonly createdAt = new Date().toISOString();

  private readonly terminal: TerminalProcess;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private readonly queue: string[] = [];
  private readonly abort = new AbortController();
  private readonly subscriptions: Disposable[] = [];
  private readonly exitWaiters: Array<() => void> = [];
  private wake: (() => void) | null = null;
  private relayTask: Promise<void> | null = null;
  private paused = false;
  private exitCode: number | undefined;
  private baud: number;

  constructor(options: SimulatorSessionOptions) {
    this.id = options.id;
    this.slot = options.slot;
    this.owner = options.owner;
    this.terminal = options.terminal;
    this.baud = options.baudRate;
    this.sleep = options.sleep;
    this.log = options.logger.child({ session: options.id, slot: options.slot });

    this.subscriptions.push(
      this.terminal.onData((data) => this.enqueue(data)),
      this.terminal.onExit(({ exitCode, signal }) => {
        this.exitCode = exitCode;
        this.log.info({ exitCode, signal }, 'simulator_exited');
        this.exitWaiters.splice(0).forEach((notify) => notify());
        this.notify();
      }),
    );
    this.abort.signal.addEventListener('abort', () => this.notify(), { once: true });
  }

  /** Starts the relay task. Output read before this call is already queued. */
  start(onEnded: (session: SimulatorSession, reason: RelayEndReason) => void): void {
    if (this.relayTask || this.abort.signal.aborted) return;

    this.relayTask = this.relay()
      .catch((err: unknown) => {
        this.log.error({ err }, 'relay_failed');
        return 'closed' as const;
      })
      .then((reason) => {
        this.log.info({ reason }, 'relay_ended');
        onEnded(this, reason);
      });
  }

  get alive(): boolean {
    return this.exitCode === undefined;
  }

  get baudRate(): number {
    return this.baud;
  }

  set baudRate(rate: number) {
    this.baud = rate;
    const cps = charsPerSecond(rate);
    this.log.info(
      { baudRate: rate, cps, msPerChar: Number((1000 / cps).toFixed(1)) },
      'baud_rate_set',
    );
  }

  write(data: string): void {
    if (!this.alive) return;
    this.terminal.write(data);
  }

  resize(cols: number, rows: number): void {
    if (!this.alive) return;
    this.terminal.resize(cols, rows);
    this.log.info({ cols, rows }, 'terminal_resized');
  }

  get info(): SimulatorSessionInfo {
    return {
      id: this.id,
      slot: this.slot,
      pid: this.terminal.pid,
      baudRate: this.baud,
      owner: this.owner.id,
      running: this.alive,
      createdAt: this.createdAt,
    };
  }

  /**
   * Stops the relay and ends the process: attention byte, then a newline,
   * then SIGTERM and finally SIGKILL to the process group. Each step that
   * fails is logged and the next one still runs.
   */
  async terminate(options: TerminateOptions): Promise<void> {
    this.abort.abort();

    if (this.alive) {
      try {
        this.terminal.write(ATTENTION);
        await this.waitForExit(options.graceMs);
        if (this.alive) {
          this.terminal.write('\n');
          await this.waitForExit(Math.round((options.graceMs * 2) / 3));
        }
      } catch (err) {
        this.log.debug({ err }, 'attention_write_failed');
      }
    }

    if (this.alive) {
      this.signal('SIGTERM', options);
      await this.waitForExit(options.killTimeoutMs);
    }
    if (this.alive) {
      this.signal('SIGKILL', options);
    }

    this.subscriptions.splice(0).forEach((subscription) => subscription.dispose());
    await this.relayTask;
  }

  private signal(signal: NodeJS.Signals, options: TerminateOptions): void {
    try {
      options.signalGroup(this.terminal.pid, signal);
      return;
    } catch (err) {
      this.log.debug({ err, signal }, 'process_group_signal_failed');
    }
    try {
      this.terminal.kill(signal);
    } catch (err) {
      this.log.error({ err, signal, pid: this.terminal.pid }, 'process_kill_failed');
    }
  }

  private waitForExit(ms: number): Promise<void> {
    if (!this.alive) return Promise.resolve();
    const exited = new AbortController();
    this.exitWaiters.push(() => exited.abort());
    return this.sleep(ms, exited.signal);
  }

  private enqueue(data: string): void {
    if (this.abort.signal.aborted) return;
    this.queue.push(data);
    if (!this.paused) {
      this.paused = true;
      this.terminal.pause();
    }
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForData(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private async relay(): Promise<RelayEndReason> {
    const { signal } = this.abort;

    while (!signal.aborted) {
      const data = this.queue.shift();
      if (data === undefined) {
        if (this.paused && this.alive) {
          this.paused = false;
          this.terminal.resume();
        }
        if (!this.alive) return 'exited';
        await this.waitForData();
        continue;
      }

      const size = chunkSize(this.baud);
      for (const chunk of splitChunks(data, size)) {
        if (signal.aborted) return 'closed';
        if (!this.owner.connected) return 'owner_lost';
        this.owner.send({ type: 'output', session: this.id, data: chunk });
        const delay = chunkDelayMs(Array.from(chunk).length, this.baud);
        if (delay > 0) {
          await this.sleep(delay, signal);
        }
      }
    }
    return 'closed';
  }
}
