import type { z } from 'zod';
import type {
  clientEventSchema,
  poolCommandSchema,
  poolEventSchema,
} from './ws/schemas.js';

export type PoolCommand = z.infer<typeof poolCommandSchema>;
export type PoolEvent = z.infer<typeof poolEventSchema>;
export type ClientEvent = z.infer<typeof clientEventSchema>;

/** Anything the router sends to the pool manager: its own commands or stamped browser frames. */
export type UpstreamFrame = { type: string; session: string } & Record<string, unknown>;

export type ChannelKind = 'uplink' | 'downstream';

/**
 * The one thing every connection role shares: frames go out, and the link
 * can be shut. `send` reports whether the frame was handed to an open socket.
 */
export interface FrameChannel<TFrame extends object = object> {
  readonly kind: ChannelKind;
  readonly id: string;
  send(frame: TFrame): boolean;
  close(code?: number, reason?: string): void;
}

export type DownstreamState = 'pending' | 'open';

export interface DownstreamSession {
  id: string;
  channel: FrameChannel<ClientEvent>;
  state: DownstreamState;
  /** Pool manager link the session was announced on. */
  uplinkId?: string;
  remoteAddress?: string;
  createdAt: number;
}

export interface DownstreamSummary {
  id: string;
  state: DownstreamState;
  remoteAddress?: string;
  createdAt: number;
}

export interface HeartbeatOptions {
  intervalMs: number;
  timeoutMs: number;
}
