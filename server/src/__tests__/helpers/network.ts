import net from 'node:net';
import type { AddressInfo } from 'node:net';
import WebSocket from 'ws';

export function portOf(address: AddressInfo | string | null): number {
  if (address && typeof address === 'object') return address.port;
  throw new Error('Server is not listening on a TCP port');
}

/** A port that was free a moment ago and has nothing listening on it. */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const port = portOf(server.address());
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/** A WebSocket client that buffers incoming JSON frames for assertions. */
export class TestClient {
  private readonly inbox: unknown[] = [];
  private readonly waiters: Array<(frame: unknown) => void> = [];
  readonly closed: Promise<{ code: number; reason: string }>;

  private constructor(readonly socket: WebSocket) {
    socket.on('message', (raw) => {
      const frame: unknown = JSON.parse(raw.toString());
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(frame);
      } else {
        this.inbox.push(frame);
      }
    });
    this.closed = new Promise((resolve) => {
      socket.once('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  static connect(url: string): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      socket.once('open', () => resolve(new TestClient(socket)));
      socket.once('error', reject);
    });
  }

  static wrap(socket: WebSocket): TestClient {
    return new TestClient(socket);
  }

  next(timeoutMs = 2_000): Promise<unknown> {
    const buffered = this.inbox.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(onFrame);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new Error('Timed out waiting for a frame'));
      }, timeoutMs);
      const onFrame = (frame: unknown) => {
        clearTimeout(timer);
        resolve(frame);
      };
      this.waiters.push(onFrame);
    });
  }

  send(frame: object): void {
    this.socket.send(JSON.stringify(frame));
  }

  close(): Promise<{ code: number; reason: string }> {
    this.socket.close();
    return this.closed;
  }
}
