import WebSocket from 'ws';
import type { ChannelKind, FrameChannel } from '../types.js';

export function send(socket: WebSocket, message: object): boolean {
  if (socket.readyState !== WebSocket.OPEN) return false;
  socket.send(JSON.stringify(message));
  return true;
}

export function rawToString(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString('utf-8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf-8');
  return Buffer.from(raw).toString('utf-8');
}

/** Parses a text frame, returning `undefined` for anything that is not JSON. */
export function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }
}

export function createChannel<TFrame extends object>(
  kind: ChannelKind,
  id: string,
  socket: WebSocket,
): FrameChannel<TFrame> {
  return {
    kind,
    id,
    send: (frame) => send(socket, frame),
    close: (code, reason) => {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(code, reason);
      }
    },
  };
}
