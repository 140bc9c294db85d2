import { serviceLogger, preview, type Logger } from '../lib/logger.js';
import { SessionStore } from '../lib/sessionStore.js';
import type {
  ClientEvent,
  DownstreamSession,
  DownstreamSummary,
  FrameChannel,
  UpstreamFrame,
} from '../types.js';
import { envelopeSchema, poolEventSchema, ROUTER_ONLY_TYPES } from '../ws/schemas.js';
import { parseJson } from '../ws/utils.js';

export const NO_POOL_MESSAGE = 'Simulator server not connected';
export const POOL_LOST_MESSAGE = 'Simulator server disconnected';
export const POOL_LOST_EXIT_MESSAGE = 'Connection closed - simulator server disconnected';

export interface RouterStats {
  sessions: number;
  pending: number;
  poolConnected: boolean;
}

/**
 * The hub. Browsers are tagged with a session id on the way up and have it
 * stripped on the way down; one pool manager link carries every session.
 */
export class SessionRouter {
  readonly store: SessionStore;
  private uplink: FrameChannel<UpstreamFrame> | null = null;
  private readonly log: Logger;

  constructor(options: { store?: SessionStore; logger?: Logger } = {}) {
    this.store = options.store ?? new SessionStore();
    this.log = options.logger ?? serviceLogger('router');
  }

  get poolConnected(): boolean {
    return this.uplink !== null;
  }

  /** Registers a browser connection and announces it upstream when a pool manager is attached. */
  acceptDownstream(channel: FrameChannel<ClientEvent>, remoteAddress?: string): DownstreamSession {
    const session = this.store.create(channel, remoteAddress);
    this.log.info({ session: session.id, ip: remoteAddress }, 'browser_connected');

    if (!this.announce(session)) {
      this.log.warn({ session: session.id }, 'no_pool_for_new_session');
      channel.send({ type: 'error', data: NO_POOL_MESSAGE });
    }
    return session;
  }

  /**
   * Makes `channel` the active pool manager link. A replaced link takes its
   * sessions with it: the pool manager drops them once that socket closes.
   */
  acceptUplink(channel: FrameChannel<UpstreamFrame>): void {
    const previous = this.uplink;
    this.uplink = channel;
    if (previous && previous !== channel) {
      const ended = this.endSessionsOf(previous.id);
      this.log.warn({ previous: previous.id, uplink: channel.id, affected: ended }, 'pool_replaced');
      previous.close(1000, 'Replaced by a newer pool manager connection');
    }
    this.log.info({ uplink: channel.id }, 'pool_connected');

    const pending = this.store.pending();
    for (const session of pending) {
      this.announce(session);
    }
    if (pending.length > 0) {
      this.log.info({ count: pending.length }, 'pending_sessions_announced');
    }
  }

  /** Frame from the pool manager: deliver it, without its session id, to the matching browser. */
  relayDown(raw: string): void {
    const json = parseJson(raw);
    const envelope = envelopeSchema.safeParse(json);
    if (json === undefined || !envelope.success) {
      this.log.warn({ raw: preview(raw) }, 'pool_invalid_message');
      return;
    }
    if (!envelope.data.session) {
      this.log.error({ type: envelope.data.type }, 'pool_message_missing_session');
      return;
    }

    const parsed = poolEventSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ type: envelope.data.type, session: envelope.data.session }, 'pool_unhandled_type');
      return;
    }

    const { session: id, ...event } = parsed.data;
    const session = this.store.get(id);
    if (!session) {
      this.log.debug({ session: id, type: event.type }, 'no_browser_for_session');
      return;
    }
    session.channel.send(event);
  }

  /** Frame from a browser: stamp it with the browser's session id and pass it upstream. */
  relayUp(id: string, raw: string): void {
    const session = this.store.get(id);
    if (!session) {
      this.log.debug({ session: id }, 'frame_from_closed_session');
      return;
    }

    const json = parseJson(raw);
    const envelope = envelopeSchema.safeParse(json);
    if (json === undefined || !envelope.success) {
      this.log.warn({ session: id, raw: preview(raw) }, 'browser_invalid_message');
      return;
    }
    if (ROUTER_ONLY_TYPES.includes(envelope.data.type)) {
      this.log.warn({ session: id, type: envelope.data.type }, 'browser_reserved_type');
      return;
    }
    if (envelope.data.session !== undefined && envelope.data.session !== id) {
      this.log.debug({ session: id, claimed: envelope.data.session }, 'browser_session_overridden');
    }

    if (!this.uplink || session.state !== 'open' || session.uplinkId !== this.uplink.id) {
      this.log.warn({ session: id, type: envelope.data.type }, 'no_pool_for_message');
      session.channel.send({ type: 'error', data: NO_POOL_MESSAGE });
      return;
    }
    this.uplink.send({ ...envelope.data, session: id });
  }

  /** Browser socket went away: tell the pool manager once, then forget the session. */
  downstreamClosed(id: string): void {
    const session = this.store.remove(id);
    if (!session) return;
    if (session.state === 'open' && this.uplink && session.uplinkId === this.uplink.id) {
      this.uplink.send({ type: 'close_session', session: id });
    }
    this.log.info({ session: id, ip: session.remoteAddress }, 'browser_disconnected');
  }

  /**
   * Pool manager link went away. Every announced session is over on the
   * pool side, so each browser is told why and disconnected.
   */
  uplinkClosed(channel: FrameChannel<UpstreamFrame>): void {
    if (this.uplink === channel) {
      this.uplink = null;
    }
    const ended = this.endSessionsOf(channel.id);
    this.log.warn({ uplink: channel.id, affected: ended }, 'pool_disconnected');
  }

  /** Closes one browser connection; its close handler notifies the pool manager. */
  closeSession(id: string): boolean {
    const session = this.store.get(id);
    if (!session) return false;
    session.channel.close(1000, 'Session closed');
    return true;
  }

  summary(id: string): DownstreamSummary | undefined {
    return this.store.summary(id);
  }

  stats(): RouterStats {
    return {
      ...this.store.stats(),
      poolConnected: this.poolConnected,
    };
  }

  private endSessionsOf(uplinkId: string): number {
    const open = this.store.openOn(uplinkId);
    for (const session of open) {
      this.store.remove(session.id);
      session.channel.send({ type: 'error', data: POOL_LOST_MESSAGE });
      session.channel.send({ type: 'exit', data: POOL_LOST_EXIT_MESSAGE });
      session.channel.close(1011, POOL_LOST_MESSAGE);
    }
    return open.length;
  }

  private announce(session: DownstreamSession): boolean {
    if (!this.uplink) return false;
    if (!this.uplink.send({ type: 'new_session', session: session.id })) return false;
    this.store.markOpen(session.id, this.uplink.id);
    this.log.info({ session: session.id }, 'pool_notified_new_session');
    return true;
  }
}
