import WebSocket from 'ws';
import type { HeartbeatOptions } from '../types.js';

/**
 * Pings `socket` every `intervalMs` and terminates it once nothing (pong,
 * ping or message) has been heard for `timeoutMs`. Returns a stop function;
 * the heartbeat also stops by itself when the socket closes.
 */
export function startHeartbeat(
  socket: WebSocket,
  options: HeartbeatOptions,
  onTimeout?: () => void,
): () => void {
  let lastSeen = Date.now();
  const touch = () => {
    lastSeen = Date.now();
  };

  socket.on('pong', touch);
  socket.on('ping', touch);
  socket.on('message', touch);

  const timer = setInterval(() => {
    if (socket.readyState !== WebSocket.OPEN) return;
    if (Date.now() - lastSeen > options.timeoutMs) {
      onTimeout?.();
      socket.terminate();
      return;
    }
    socket.ping();
  }, options.intervalMs);

  const stop = () => {
    clearInterval(timer);
    socket.off('pong', touch);
    socket.off('ping', touch);
    socket.off('message', touch);
  };
  socket.once('close', stop);
  return stop;
}
