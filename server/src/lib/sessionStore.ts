import type { ClientEvent, DownstreamSession, DownstreamSummary, FrameChannel } from '../types.js';

function timestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** The router's session id → browser connection table. */
export class SessionStore {
  private sessions = new Map<string, DownstreamSession>();
  private counter = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** `session_<YYYYMMDDHHMMSS>_<n>`, unique for the life of the process. */
  nextId(): string {
    this.counter += 1;
    return `session_${timestamp(this.now())}_${this.counter}`;
  }

  create(channel: FrameChannel<ClientEvent>, remoteAddress?: string): DownstreamSession {
    if (this.sessions.has(channel.id)) {
      throw new Error('SESSION_EXISTS');
    }
    const record: DownstreamSession = {
      id: channel.id,
      channel,
      state: 'pending',
      remoteAddress,
      createdAt: this.now().getTime(),
    };
    this.sessions.set(record.id, record);
    return record;
  }

  get(id: string): DownstreamSession | undefined {
    return this.sessions.get(id);
  }

  remove(id: string): DownstreamSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    this.sessions.delete(id);
    return session;
  }

  markOpen(id: string, uplinkId: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.state = 'open';
    session.uplinkId = uplinkId;
  }

  pending(): DownstreamSession[] {
    return [...this.sessions.values()].filter((session) => session.state === 'pending');
  }

  /** Sessions announced on the given pool manager link. */
  openOn(uplinkId: string): DownstreamSession[] {
    return [...this.sessions.values()].filter(
      (session) => session.state === 'open' && session.uplinkId === uplinkId,
    );
  }

  summary(id: string): DownstreamSummary | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    return {
      id: session.id,
      state: session.state,
      remoteAddress: session.remoteAddress,
      createdAt: session.createdAt,
    };
  }

  stats(): { sessions: number; pending: number } {
    return {
      sessions: this.sessions.size,
      pending: this.pending().length,
    };
  }
}
