import { describe, it, expect, afterEach } from 'vitest';
import { once } from 'node:events';
import { WebSocketServer, type WebSocket } from 'ws';
import type { Sleep } from '../../lib/sleep.js';
import { portOf, TestClient, unusedPort } from '../../__tests__/helpers/network.js';
import { UplinkConnection, uplinkName, type UplinkHandlers, type UplinkState } from '../uplink.js';

const heartbeat = { intervalMs: 60_000, timeoutMs: 120_000 };

const noopHandlers: UplinkHandlers = {
  onFrame: () => undefined,
  onDisconnect: () => undefined,
};

async function startServer(): Promise<{ wss: WebSocketServer; url: string }> {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await once(wss, 'listening');
  return { wss, url: `ws://127.0.0.1:${portOf(wss.address())}` };
}

describe('uplinkName', () => {
  it('calls loopback routers local', () => {
    expect(uplinkName('ws://localhost:8081')).toBe('local');
    expect(uplinkName('wss://127.0.0.1:8081/')).toBe('local');
  });

  it('uses the hostname of remote routers', () => {
    expect(uplinkName('wss://relay.example.org:8081/pool')).toBe('relay.example.org');
  });

  it('falls back to the raw string for unparseable URLs', () => {
    expect(uplinkName('not a url')).toBe('not a url');
  });
});

describe('UplinkConnection', () => {
  let server: WebSocketServer | null = null;

  afterEach(async () => {
    if (server) {
      server.clients.forEach((client) => client.terminate());
      await new Promise<void>((resolve) => server?.close(() => resolve()));
      server = null;
    }
  });

  it('backs off exponentially while the router is unreachable', async () => {
    const url = `ws://127.0.0.1:${await unusedPort()}`;
    const delays: number[] = [];
    const sleep: Sleep = async (ms) => {
      delays.push(ms);
      if (delays.length === 5) uplink.stop();
    };
    const uplink = new UplinkConnection({ url, heartbeat, sleep });

    await uplink.run(noopHandlers);

    expect(delays).toEqual([2_000, 4_000, 8_000, 16_000, 16_000]);
    expect(uplink.retryCount).toBe(5);
    expect(uplink.state).toBe('disconnected');
  });

  it('waits one second after losing a healthy connection', async () => {
    const started = await startServer();
    server = started.wss;
    let connections = 0;
    server.on('connection', (socket: WebSocket) => {
      connections += 1;
      socket.close(1001, 'going away');
    });

    const delays: number[] = [];
    const sleep: Sleep = async (ms) => {
      delays.push(ms);
      if (delays.length === 2) uplink.stop();
    };
    const uplink = new UplinkConnection({ url: started.url, heartbeat, sleep });
    const states: UplinkState[] = [];
    uplink.onStateChange((state) => states.push(state));
    let disconnects = 0;

    await uplink.run({ onFrame: () => undefined, onDisconnect: () => (disconnects += 1) });

    expect(connections).toBe(2);
    expect(disconnects).toBe(2);
    expect(delays).toEqual([1_000, 1_000]);
    expect(uplink.retryCount).toBe(0);
    expect(states).toEqual([
      'connecting',
      'connected',
      'disconnected',
      'connecting',
      'connected',
      'disconnected',
    ]);
  });

  it('delivers frames both ways and closes on stop', async () => {
    const started = await startServer();
    server = started.wss;
    const routerSide = new Promise<TestClient>((resolve) => {
      server?.once('connection', (socket: WebSocket) => resolve(TestClient.wrap(socket)));
    });

    const uplink = new UplinkConnection({ url: started.url, heartbeat });
    const received: string[] = [];
    const running = uplink.run({
      onFrame: (raw) => received.push(raw),
      onDisconnect: () => undefined,
    });

    const router = await routerSide;
    router.send({ type: 'new_session', session: 'session_1' });
    await expect.poll(() => received).toEqual(['{"type":"new_session","session":"session_1"}']);

    expect(uplink.connected).toBe(true);
    expect(uplink.send({ type: 'output', session: 'session_1', data: 'ready' })).toBe(true);
    await expect(router.next()).resolves.toEqual({ type: 'output', session: 'session_1', data: 'ready' });

    uplink.stop();
    await running;
    await expect(router.closed).resolves.toMatchObject({ code: 1001 });
    expect(uplink.send({ type: 'output', session: 'session_1', data: 'late' })).toBe(false);
  });
});
