import { serviceLogger, preview, type Logger } from '../lib/logger.js';
import { sleep as defaultSleep, type Sleep } from '../lib/sleep.js';
import type { PoolCommand } from '../types.js';
import { envelopeSchema, poolCommandSchema, DEFAULT_BAUD_RATE, DEFAULT_COLS, DEFAULT_ROWS } from '../ws/schemas.js';
import { parseJson } from '../ws/utils.js';
import { SlotPool, SLOT_COUNT } from './slotPool.js';
import {
  SimulatorSession,
  type RelayEndReason,
  type SessionOwner,
  type SimulatorSessionInfo,
} from './simulatorSession.js';
import {
  signalProcessGroup,
  spawnPtyTerminal,
  type TerminalProcess,
  type TerminalSpawner,
} from './terminal.js';

export const BUSY_MESSAGE = `All ${SLOT_COUNT} terminals are busy. Please try again later.`;
export const BUSY_EXIT_MESSAGE = 'Connection closed - terminal busy';
export const SPAWN_FAILED_MESSAGE = 'Failed to start simulator';
export const SIMULATOR_EXITED_MESSAGE = 'Simulator exited';
export const DUPLICATE_SESSION_MESSAGE = 'Session id already in use';

export interface PoolManagerOptions {
  script: string;
  spawn?: TerminalSpawner;
  signalGroup?: (pid: number, signal: NodeJS.Signals) => void;
  sleep?: Sleep;
  defaultBaud?: number;
  shutdownGraceMs?: number;
  killTimeoutMs?: number;
  logger?: Logger;
}

interface PendingSpawn {
  owner: SessionOwner;
  spawned: Promise<TerminalProcess>;
}

export interface PoolStats {
  sessions: SimulatorSessionInfo[];
  starting: number;
  closing: number;
  freeSlots: number[];
  capacity: number;
}

/**
 * Owns the simulator processes. Session creation and destruction are the
 * only writers of the slot pool and session map, and each runs its
 * bookkeeping synchronously so no two sessions can claim the same slot.
 */
export class PoolManager {
  private readonly slots = new SlotPool(SLOT_COUNT);
  private readonly sessions = new Map<string, SimulatorSession>();
  private readonly starting = new Map<string, PendingSpawn>();
  private readonly cancelled = new Set<string>();
  private readonly closing = new Map<string, Promise<void>>();
  private readonly spawn: TerminalSpawner;
  private readonly signalGroup: (pid: number, signal: NodeJS.Signals) => void;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(private readonly options: PoolManagerOptions) {
    this.spawn = options.spawn ?? spawnPtyTerminal;
    this.signalGroup = options.signalGroup ?? signalProcessGroup;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? serviceLogger('pool');
  }

  /**
   * Dispatches one frame from a router. Resolves once the frame has been
   * acted on; for `new_session` that includes the spawn, while teardown
   * continues in the background.
   */
  async handleMessage(raw: string, source: SessionOwner): Promise<void> {
    const json = parseJson(raw);
    if (json === undefined) {
      this.log.warn({ raw: preview(raw), uplink: source.id }, 'invalid_json');
      return;
    }
    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      this.log.warn({ raw: preview(raw), uplink: source.id }, 'invalid_frame');
      return;
    }
    if (!envelope.data.session) {
      this.log.error({ type: envelope.data.type, uplink: source.id }, 'message_missing_session');
      return;
    }

    const parsed = poolCommandSchema.safeParse(json);
    if (!parsed.success) {
      const known = poolCommandSchema.options.some(
        (option) => option.shape.type.value === envelope.data.type,
      );
      if (known) {
        this.log.warn(
          { type: envelope.data.type, session: envelope.data.session, issues: parsed.error.issues },
          'invalid_payload',
        );
      } else {
        this.log.warn({ type: envelope.data.type, session: envelope.data.session }, 'unknown_message_type');
      }
      return;
    }

    await this.dispatch(parsed.data, source);
  }

  private async dispatch(command: PoolCommand, source: SessionOwner): Promise<void> {
    if (command.type !== 'new_session' && !this.ownedBy(command.session, source)) {
      this.log.warn({ type: command.type, session: command.session, uplink: source.id }, 'foreign_session');
      return;
    }

    switch (command.type) {
      case 'new_session':
        await this.createSession(command.session, source);
        break;
      case 'close_session':
        this.destroySession(command.session).catch((err: unknown) => {
          this.log.error({ err, session: command.session }, 'destroy_failed');
        });
        break;
      case 'input':
        this.handleInput(command.session, command.data);
        break;
      case 'resize':
        this.handleResize(command.session, command.cols, command.rows);
        break;
      case 'setBaudRate':
        this.handleBaudRate(command.session, command.baudRate);
        break;
    }
  }

  private ownedBy(id: string, source: SessionOwner): boolean {
    const owner = this.sessions.get(id)?.owner ?? this.starting.get(id)?.owner;
    return owner === undefined || owner === source;
  }

  async createSession(id: string, owner: SessionOwner): Promise<void> {
    if (this.sessions.has(id) || this.starting.has(id) || this.closing.has(id)) {
      const current = this.sessions.get(id)?.owner ?? this.starting.get(id)?.owner;
      if (current !== undefined && current !== owner) {
        this.log.warn({ session: id, uplink: owner.id }, 'session_id_collision');
        owner.send({ type: 'error', session: id, data: DUPLICATE_SESSION_MESSAGE });
        owner.send({ type: 'exit', session: id, data: BUSY_EXIT_MESSAGE });
      } else {
        this.log.warn({ session: id }, 'session_already_exists');
      }
      return;
    }

    const slot = this.slots.acquire(id);
    if (slot === undefined) {
      this.log.warn({ session: id, capacity: SLOT_COUNT }, 'session_limit_reached');
      owner.send({ type: 'error', session: id, data: BUSY_MESSAGE });
      owner.send({ type: 'exit', session: id, data: BUSY_EXIT_MESSAGE });
      return;
    }
    this.log.info({ session: id, slot }, 'slot_allocated');

    const spawned = Promise.resolve().then(() =>
      this.spawn({
        script: this.options.script,
        slot,
        cols: DEFAULT_COLS,
        rows: DEFAULT_ROWS,
      }),
    );
    this.starting.set(id, { owner, spawned });

    let terminal: TerminalProcess;
    try {
      terminal = await spawned;
    } catch (err) {
      this.starting.delete(id);
      this.cancelled.delete(id);
      this.slots.release(id);
      this.log.error({ err, session: id, slot }, 'spawn_failed');
      owner.send({ type: 'error', session: id, data: SPAWN_FAILED_MESSAGE });
      return;
    }

    this.starting.delete(id);
    const session = new SimulatorSession({
      id,
      slot,
      owner,
      terminal,
      baudRate: this.options.defaultBaud ?? DEFAULT_BAUD_RATE,
      sleep: this.sleep,
      logger: this.log,
    });
    this.sessions.set(id, session);
    this.log.info(
      { session: id, slot, pid: terminal.pid, active: this.sessions.size, capacity: SLOT_COUNT },
      'session_created',
    );

    if (this.cancelled.delete(id) || !owner.connected) {
      this.destroySession(id).catch((err: unknown) => {
        this.log.error({ err, session: id }, 'destroy_failed');
      });
      return;
    }
    session.start((ended, reason) => this.onRelayEnded(ended, reason));
  }

  private onRelayEnded(session: SimulatorSession, reason: RelayEndReason): void {
    if (reason === 'exited' && session.owner.connected) {
      session.owner.send({ type: 'exit', session: session.id, data: SIMULATOR_EXITED_MESSAGE });
    }
    this.destroySession(session.id).catch((err: unknown) => {
      this.log.error({ err, session: session.id }, 'destroy_failed');
    });
  }

  /**
   * Idempotent. Removes routing state at once, then shuts the process down
   * and only afterwards returns the slot. Concurrent calls share one teardown.
   */
  destroySession(id: string): Promise<void> {
    const inFlight = this.closing.get(id);
    if (inFlight) return inFlight;

    const pending = this.starting.get(id);
    if (pending) {
      this.cancelled.add(id);
      return pending.spawned.then(
        () => this.destroySession(id),
        () => undefined,
      );
    }

    const session = this.sessions.get(id);
    if (!session) return Promise.resolve();
    this.sessions.delete(id);

    const teardown = session
      .terminate({
        graceMs: this.options.shutdownGraceMs ?? 300,
        killTimeoutMs: this.options.killTimeoutMs ?? 2_000,
        signalGroup: this.signalGroup,
      })
      .catch((err: unknown) => {
        this.log.error({ err, session: id }, 'cleanup_abandoned');
      })
      .finally(() => {
        const slot = this.slots.release(id);
        this.closing.delete(id);
        this.log.info(
          { session: id, slot, active: this.sessions.size, capacity: SLOT_COUNT },
          'session_destroyed',
        );
      });

    this.closing.set(id, teardown);
    return teardown;
  }

  handleInput(id: string, data: string): void {
    const session = this.sessions.get(id);
    if (!session) {
      this.log.debug({ session: id }, 'input_for_unknown_session');
      return;
    }
    try {
      session.write(data);
    } catch (err) {
      this.log.error({ err, session: id }, 'pty_write_failed');
    }
  }

  handleResize(id: string, cols: number, rows: number): void {
    const session = this.sessions.get(id);
    if (!session) {
      this.log.debug({ session: id }, 'resize_for_unknown_session');
      return;
    }
    try {
      session.resize(cols, rows);
    } catch (err) {
      this.log.error({ err, session: id }, 'pty_resize_failed');
    }
  }

  handleBaudRate(id: string, rate: number): void {
    const session = this.sessions.get(id);
    if (!session) {
      this.log.debug({ session: id }, 'baud_rate_for_unknown_session');
      return;
    }
    session.baudRate = rate;
  }

  /** Tears down every session created through `owner`. */
  async destroyOwnedBy(owner: SessionOwner): Promise<void> {
    const owned = [
      ...[...this.sessions.values()].filter((session) => session.owner === owner).map((session) => session.id),
      ...[...this.starting.entries()].filter(([, pending]) => pending.owner === owner).map(([id]) => id),
    ];
    if (owned.length > 0) {
      this.log.info({ uplink: owner.id, count: owned.length }, 'cleaning_up_uplink_sessions');
    }
    await Promise.all(owned.map((id) => this.destroySession(id)));
  }

  async shutdown(): Promise<void> {
    await Promise.all([
      ...[...this.starting.keys(), ...this.sessions.keys()].map((id) => this.destroySession(id)),
      ...this.closing.values(),
    ]);
  }

  stats(): PoolStats {
    return {
      sessions: [...this.sessions.values()].map((session) => session.info),
      starting: this.starting.size,
      closing: this.closing.size,
      freeSlots: this.slots.freeSlots(),
      capacity: SLOT_COUNT,
    };
  }
}
