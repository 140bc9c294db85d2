import type { SessionOwner } from '../../pool/simulatorSession.js';
import type { ChannelKind, FrameChannel, PoolEvent } from '../../types.js';

/** Records what is sent through it instead of writing to a socket. */
export class RecordingChannel<TFrame extends object> implements FrameChannel<TFrame> {
  readonly frames: TFrame[] = [];
  closed: { code?: number; reason?: string } | null = null;

  constructor(
    readonly kind: ChannelKind,
    readonly id: string,
  ) {}

  send(frame: TFrame): boolean {
    if (this.closed) return false;
    this.frames.push(frame);
    return true;
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }
}

export class FakeOwner extends RecordingChannel<PoolEvent> implements SessionOwner {
  connected = true;

  constructor(id = 'uplink-a') {
    super('uplink', id);
  }

  framesFor(session: string): PoolEvent[] {
    return this.frames.filter((frame) => frame.session === session);
  }
}
