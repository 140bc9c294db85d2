import net from 'node:net';
import type WebSocket from 'ws';
import { v4 as uuid } from 'uuid';
import { serviceLogger, preview, type Logger } from '../lib/logger.js';
import type { HeartbeatOptions } from '../types.js';
import { connectSocket } from '../ws/connect.js';
import { startHeartbeat } from '../ws/heartbeat.js';
import { clientEventSchema } from '../ws/schemas.js';
import { parseJson, rawToString, send } from '../ws/utils.js';
import { bytesToText, telnetEscape, textToBytes, TelnetDecoder, type TelnetEvent } from './telnet.js';

export const UNREACHABLE_MESSAGE = 'Unable to reach terminal server';

export interface BridgeOptions {
  host: string;
  port: number;
  targetUrl: string;
  heartbeat: HeartbeatOptions;
  tlsVerify?: boolean;
  logger?: Logger;
}

type RelayEnd = 'tcp_closed' | 'ws_closed' | 'exit';

function crlfLine(text: string): Buffer {
  return textToBytes(`\r\n${text}\r\n`);
}

function logTelnetEvent(log: Logger, event: TelnetEvent): void {
  switch (event.kind) {
    case 'negotiation':
      log.debug({ command: event.command, option: event.option }, 'telnet_option_refused');
      break;
    case 'subnegotiation':
      log.debug({ length: event.length }, 'telnet_subnegotiation_discarded');
      break;
    case 'control':
      log.info({ command: event.command, byte: event.byte }, 'telnet_command_mapped');
      break;
    case 'ignored':
      log.info({ command: event.command }, 'telnet_command_ignored');
      break;
  }
}

/**
 * Lets a plain telnet client join as if it were a browser: every TCP
 * connection gets its own WebSocket to the router, and the two live and
 * die together.
 */
export class TelnetBridge {
  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(private readonly options: BridgeOptions) {
    this.log = options.logger ?? serviceLogger('bridge');
  }

  get activeConnections(): number {
    return this.sockets.size;
  }

  /** Starts listening; resolves with the bound port. */
  start(): Promise<number> {
    const server = net.createServer({ pauseOnConnect: true }, (socket) => {
      const task = this.handleConnection(socket)
        .catch((err: unknown) => {
          this.log.error({ err }, 'bridge_connection_failed');
          socket.destroy();
        })
        .finally(() => {
          this.tasks.delete(task);
        });
      this.tasks.add(task);
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        server.on('error', (err) => this.log.error({ err }, 'bridge_server_error'));
        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : this.options.port;
        this.log.info({ host: this.options.host, port, target: this.options.targetUrl }, 'bridge_listening');
        resolve(port);
      });
    });
  }

  /** Stops accepting, drops every live connection and waits for their cleanup. */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    this.log.info({ active: this.activeConnections }, 'bridge_stopping');

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await Promise.all([...this.tasks]);
    await closed;
    this.log.info('bridge_stopped');
  }

  private async handleConnection(tcp: net.Socket): Promise<void> {
    const log = this.log.child({ conn: uuid(), peer: `${tcp.remoteAddress}:${tcp.remotePort}` });
    this.sockets.add(tcp);
    const tcpClosed = new Promise<void>((resolve) => tcp.once('close', () => resolve()));
    tcp.on('error', (err) => log.error({ err }, 'tcp_socket_error'));
    log.info({ active: this.activeConnections }, 'tcp_connected');

    try {
      let ws: WebSocket;
      try {
        ws = await connectSocket(this.options.targetUrl, { tlsVerify: this.options.tlsVerify });
      } catch (err) {
        log.error({ err, target: this.options.targetUrl }, 'ws_connect_failed');
        tcp.end(crlfLine(UNREACHABLE_MESSAGE), () => tcp.destroy());
        return;
      }
      ws.on('error', (err) => log.error({ err }, 'ws_socket_error'));
      log.info({ target: this.options.targetUrl }, 'ws_connected');
      if (tcp.destroyed) {
        ws.close(1000, 'Telnet client went away');
        return;
      }

      const reason = await this.relay(tcp, ws, log);
      log.info({ reason }, 'relay_finished');

      ws.close(1000, 'Bridge connection closed');
      if (!tcp.destroyed) tcp.end(() => tcp.destroy());
    } finally {
      await tcpClosed;
      this.sockets.delete(tcp);
      log.info({ active: this.activeConnections }, 'tcp_disconnected');
    }
  }

  /** Runs both directions until one of them ends, then detaches both. */
  private async relay(tcp: net.Socket, ws: WebSocket, log: Logger): Promise<RelayEnd> {
    const stopHeartbeat = startHeartbeat(ws, this.options.heartbeat, () => {
      log.warn('ws_heartbeat_timeout');
    });
    const decoder = new TelnetDecoder();

    const onTcpData = (chunk: Buffer) => {
      const { data, replies, events } = decoder.decode(chunk);
      events.forEach((event) => logTelnetEvent(log, event));
      replies.forEach((reply) => tcp.write(reply));
      if (data.length === 0) return;
      send(ws, { type: 'input', data: bytesToText(data) });
    };

    // A full TCP buffer stops reads from the router until the peer catches up.
    const onDrain = () => ws.resume();
    const writeToTcp = (bytes: Buffer) => {
      if (tcp.destroyed) return;
      if (!tcp.write(bytes) && !ws.isPaused) {
        ws.pause();
        tcp.once('drain', onDrain);
      }
    };

    let finishWsToTcp: (end: RelayEnd) => void = () => undefined;
    const onWsMessage = (raw: WebSocket.RawData) => {
      const text = rawToString(raw);
      const parsed = clientEventSchema.safeParse(parseJson(text));
      if (!parsed.success) {
        log.debug({ raw: preview(text) }, 'ws_unhandled_message');
        return;
      }
      const event = parsed.data;
      switch (event.type) {
        case 'output':
          if (event.data.length > 0) {
            writeToTcp(telnetEscape(textToBytes(event.data)));
          }
          break;
        case 'error':
          log.warn({ message: event.data }, 'server_error');
          writeToTcp(crlfLine(event.data));
          break;
        case 'exit':
          log.info({ message: event.data }, 'server_exit');
          finishWsToTcp('exit');
          break;
      }
    };

    const tcpToWs = new Promise<RelayEnd>((resolve) => {
      tcp.on('data', onTcpData);
      tcp.once('end', () => resolve('tcp_closed'));
      tcp.once('close', () => resolve('tcp_closed'));
    });
    const wsToTcp = new Promise<RelayEnd>((resolve) => {
      finishWsToTcp = resolve;
      ws.on('message', onWsMessage);
      ws.once('close', () => resolve('ws_closed'));
    });

    tcp.resume();
    try {
      return await Promise.race([tcpToWs, wsToTcp]);
    } finally {
      stopHeartbeat();
      tcp.off('data', onTcpData);
      tcp.off('drain', onDrain);
      ws.off('message', onWsMessage);
      if (ws.isPaused) ws.resume();
    }
  }
}
