import WebSocket from 'ws';

export interface ConnectOptions {
  /** Verify the server certificate on `wss://` links. */
  tlsVerify?: boolean;
  handshakeTimeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Opens a client socket and resolves once it is open. The caller owns the
 * socket from then on, including its `error` listener.
 */
export function connectSocket(url: string, options: ConnectOptions = {}): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(new Error('Connection aborted'));
      return;
    }

    const socket = new WebSocket(url, {
      rejectUnauthorized: options.tlsVerify ?? false,
      handshakeTimeout: options.handshakeTimeoutMs ?? 10_000,
    });

    const cleanup = () => {
      socket.off('open', onOpen);
      socket.off('error', onError);
      signal?.removeEventListener('abort', onAbort);
    };
    const onOpen = () => {
      cleanup();
      resolve(socket);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const onAbort = () => {
      cleanup();
      // terminate() during the handshake emits one last error
      socket.once('error', () => undefined);
      socket.terminate();
      reject(new Error('Connection aborted'));
    };

    socket.once('open', onOpen);
    socket.on('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
