import type { Server } from 'node:http';
import { WebSocketServer } from 'ws';
import { v4 as uuid } from 'uuid';
import type { Logger } from '../lib/logger.js';
import type { SessionRouter } from '../router/sessionRouter.js';
import type { ClientEvent, HeartbeatOptions, UpstreamFrame } from '../types.js';
import { startHeartbeat } from './heartbeat.js';
import { createChannel, rawToString } from './utils.js';

export interface SocketServerOptions {
  router: SessionRouter;
  heartbeat: HeartbeatOptions;
  logger: Logger;
}

function attachUpgrade(httpServer: Server, wss: WebSocketServer): void {
  httpServer.on('upgrade', (request, socket, head) => {
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });
}

/** Browser side: one socket per session, ids issued by the router's store. */
export function registerBrowserServer(
  httpServer: Server,
  { router, heartbeat, logger }: SocketServerOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  attachUpgrade(httpServer, wss);

  wss.on('connection', (socket, request) => {
    const channel = createChannel<ClientEvent>('downstream', router.store.nextId(), socket);
    const session = router.acceptDownstream(channel, request.socket.remoteAddress);
    startHeartbeat(socket, heartbeat, () => {
      logger.warn({ session: session.id }, 'browser_heartbeat_timeout');
    });

    socket.on('message', (raw) => {
      try {
        router.relayUp(session.id, rawToString(raw));
      } catch (err) {
        logger.error({ err, session: session.id }, 'browser_frame_failed');
      }
    });

    socket.on('close', () => {
      router.downstreamClosed(session.id);
    });

    socket.on('error', (err) => {
      logger.error({ err, session: session.id }, 'browser_socket_error');
      socket.close();
    });
  });

  return wss;
}

/** Pool side: the most recent pool manager connection is the active one. */
export function registerPoolServer(
  httpServer: Server,
  { router, heartbeat, logger }: SocketServerOptions,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  attachUpgrade(httpServer, wss);

  wss.on('connection', (socket, request) => {
    const channel = createChannel<UpstreamFrame>('uplink', uuid(), socket);
    logger.info({ uplink: channel.id, ip: request.socket.remoteAddress }, 'pool_socket_opened');
    router.acceptUplink(channel);
    startHeartbeat(socket, heartbeat, () => {
      logger.warn({ uplink: channel.id }, 'pool_heartbeat_timeout');
    });

    socket.on('message', (raw) => {
      try {
        router.relayDown(rawToString(raw));
      } catch (err) {
        logger.error({ err, uplink: channel.id }, 'pool_frame_failed');
      }
    });

    socket.on('close', () => {
      router.uplinkClosed(channel);
    });

    socket.on('error', (err) => {
      logger.error({ err, uplink: channel.id }, 'pool_socket_error');
      socket.close();
    });
  });

  return wss;
}
