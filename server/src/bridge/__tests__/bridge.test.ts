import { describe, it, expect, afterEach, vi } from 'vitest';
import net from 'node:net';
import { once } from 'node:events';
import { WebSocket, WebSocketServer } from 'ws';
import { portOf, TestClient, unusedPort } from '../../__tests__/helpers/network.js';
import { TelnetBridge, UNREACHABLE_MESSAGE } from '../bridge.js';
import { DO, IAC, IP, WONT } from '../telnet.js';

const heartbeat = { intervalMs: 60_000, timeoutMs: 120_000 };

/** A raw TCP client that keeps every byte it receives. */
class TelnetClient {
  received = Buffer.alloc(0);
  errors: Error[] = [];
  readonly closed: Promise<void>;

  constructor(readonly socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.received = Buffer.concat([this.received, chunk]);
    });
    socket.on('error', (err) => this.errors.push(err));
    this.closed = new Promise((resolve) => socket.once('close', () => resolve()));
  }

  static async connect(port: number): Promise<TelnetClient> {
    const socket = net.connect(port, '127.0.0.1');
    await once(socket, 'connect');
    return new TelnetClient(socket);
  }

  bytes(): number[] {
    return [...this.received];
  }
}

function inputData(frame: unknown): string {
  if (
    typeof frame === 'object' &&
    frame !== null &&
    'type' in frame &&
    frame.type === 'input' &&
    'data' in frame &&
    typeof frame.data === 'string'
  ) {
    return frame.data;
  }
  throw new Error(`Expected an input frame, got ${JSON.stringify(frame)}`);
}

/** Reads input frames until their data adds up to `length` characters. */
async function readInput(router: TestClient, length: number): Promise<string> {
  let text = '';
  while (text.length < length) {
    text += inputData(await router.next());
  }
  return text;
}

describe('TelnetBridge', () => {
  let bridge: TelnetBridge | null = null;
  let wss: WebSocketServer | null = null;

  afterEach(async () => {
    vi.restoreAllMocks();
    await bridge?.stop();
    bridge = null;
    if (wss) {
      wss.clients.forEach((client) => client.terminate());
      await new Promise<void>((resolve) => wss?.close(() => resolve()));
      wss = null;
    }
  });

  async function setup(): Promise<{ port: number; routerSide: Promise<TestClient> }> {
    const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    wss = server;
    await once(server, 'listening');
    const routerSide = new Promise<TestClient>((resolve) => {
      server.once('connection', (socket: WebSocket) => resolve(TestClient.wrap(socket)));
    });
    const running = new TelnetBridge({
      host: '127.0.0.1',
      port: 0,
      targetUrl: `ws://127.0.0.1:${portOf(server.address())}`,
      heartbeat,
    });
    bridge = running;
    const port = await running.start();
    return { port, routerSide };
  }

  it('turns telnet input into input frames', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;

    client.socket.write(Buffer.from([0x6c, 0x73, IAC, IP, IAC, IAC, 0x0d]));

    await expect(readInput(router, 5)).resolves.toBe('ls\u0003ÿ\r');
    client.socket.destroy();
  });

  it('refuses option negotiation without forwarding it', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;

    client.socket.write(Buffer.from([IAC, DO, 1]));
    await expect.poll(() => client.bytes()).toEqual([IAC, WONT, 1]);

    client.socket.write(Buffer.from('x'));
    await expect(router.next()).resolves.toEqual({ type: 'input', data: 'x' });
    client.socket.destroy();
  });

  it('writes output with IAC escaped', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;

    router.send({ type: 'output', data: 'AÿB' });

    await expect.poll(() => client.bytes()).toEqual([0x41, 0xff, 0xff, 0x42]);
    client.socket.destroy();
  });

  it('stops reading from the router while the telnet socket is backed up', async () => {
    const pause = vi.spyOn(WebSocket.prototype, 'pause');
    const resume = vi.spyOn(WebSocket.prototype, 'resume');
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;
    let total = 0;
    client.socket.on('data', (chunk: Buffer) => {
      total += chunk.length;
    });

    const block = 'a'.repeat(64 * 1024);
    for (let i = 0; i < 4; i += 1) {
      router.send({ type: 'output', data: block });
    }

    await expect.poll(() => total, { timeout: 5_000 }).toBe(4 * block.length);
    expect(pause).toHaveBeenCalled();
    await expect.poll(() => resume.mock.calls.length).toBeGreaterThan(0);
    client.socket.destroy();
  });

  it('shows server errors to the telnet user', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;

    router.send({ type: 'error', data: 'Simulator server not connected' });

    await expect
      .poll(() => client.received.toString('latin1'))
      .toBe('\r\nSimulator server not connected\r\n');
    client.socket.destroy();
  });

  it('hangs up when the server sends exit', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;

    router.send({ type: 'exit', data: 'Simulator exited' });

    await client.closed;
    await router.closed;
    await expect.poll(() => bridge?.activeConnections).toBe(0);
  });

  it('closes the WebSocket when the telnet client leaves', async () => {
    const { port, routerSide } = await setup();
    const client = await TelnetClient.connect(port);
    const router = await routerSide;
    await expect.poll(() => bridge?.activeConnections).toBe(1);

    client.socket.end();

    await expect(router.closed).resolves.toMatchObject({ code: 1000 });
    await expect.poll(() => bridge?.activeConnections).toBe(0);
  });

  it('tells the client when the server cannot be reached', async () => {
    const unreachable = new TelnetBridge({
      host: '127.0.0.1',
      port: 0,
      targetUrl: `ws://127.0.0.1:${await unusedPort()}`,
      heartbeat,
    });
    bridge = unreachable;
    const port = await unreachable.start();
    const client = await TelnetClient.connect(port);

    await client.closed;
    expect(client.received.toString('latin1')).toBe(`\r\n${UNREACHABLE_MESSAGE}\r\n`);
  });
});
