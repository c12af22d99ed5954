/**
 * @fileoverview Node.js `ws` adapter for socket routers.
 *
 * Upgrades are matched before the handshake completes: the HTTP 101 is only
 * written when the route handler calls `session.accept()`, so handlers and
 * middleware can still refuse the connection with a plain HTTP status.
 *
 * @example
 * ```typescript
 * import { createServer } from 'node:http';
 * import { attachSocketRouter } from 'tramline/ws';
 *
 * const server = createServer(nodeHandler);
 * attachSocketRouter(server, sockets);
 * server.listen(3000);
 * ```
 */

import type { IncomingHttpHeaders, IncomingMessage, Server } from 'node:http';
import { STATUS_CODES } from 'node:http';
import type { Duplex } from 'node:stream';
import { type RawData, WebSocket, WebSocketServer } from 'ws';
import {
  ABNORMAL_CLOSURE,
  type AcceptOptions,
  type SocketMessage,
  type SocketTransport,
  type TransportListener,
} from './socket.js';
import { dispatchSocket, type SocketRouter } from './socket-router.js';

/** Socket server configuration. */
export interface SocketServerOptions {
  /** Reports handler failures (default: console.error). */
  log?: (message: string, error: unknown) => void;
  /** Largest accepted frame in bytes (default: the `ws` default of 100 MiB). */
  maxPayload?: number;
}

/** Handle returned by {@link attachSocketRouter}. */
export interface SocketServerHandle {
  readonly wss: WebSocketServer;
  /** Detaches from the HTTP server and closes the socket server. */
  close(): void;
}

/** Accept options of handshakes in flight, read back by the server hooks. */
const pendingAccepts = new WeakMap<IncomingMessage, AcceptOptions>();

/** Converts a `ws` payload into a frame. */
export function toSocketMessage(data: RawData, isBinary: boolean): SocketMessage {
  let buffer: Buffer;
  if (Array.isArray(data)) {
    buffer = Buffer.concat(data);
  } else if (Buffer.isBuffer(data)) {
    buffer = data;
  } else {
    buffer = Buffer.from(data);
  }

  return isBinary
    ? { type: 'binary', data: new Uint8Array(buffer) }
    : { type: 'text', data: buffer.toString('utf8') };
}

/** Converts Node's header record into Fetch `Headers`. */
export function toHeaders(incoming: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }
  return headers;
}

/**
 * Creates a `noServer` socket server whose handshake responses carry the
 * subprotocol and headers given to `accept()`.
 */
export function createSocketServer(options: Pick<SocketServerOptions, 'maxPayload'> = {}): WebSocketServer {
  const wss = new WebSocketServer({
    noServer: true,
    ...(options.maxPayload !== undefined && { maxPayload: options.maxPayload }),
    handleProtocols: (protocols, request) => {
      const chosen = pendingAccepts.get(request)?.subprotocol;
      return chosen !== undefined && protocols.has(chosen) ? chosen : false;
    },
  });

  wss.on('headers', (headers: string[], request: IncomingMessage) => {
    const extra = pendingAccepts.get(request)?.headers ?? {};
    for (const [name, value] of Object.entries(extra)) {
      headers.push(`${name}: ${value}`);
    }
  });

  return wss;
}

/** One upgrade request, adapted to the session's transport interface. */
export class WsTransport implements SocketTransport {
  private listener?: TransportListener;
  private ws?: WebSocket;
  private readonly onSocketError = (error: Error): void => {
    this.listener?.error(error);
  };

  constructor(
    private readonly wss: WebSocketServer,
    private readonly request: IncomingMessage,
    private readonly socket: Duplex,
    private readonly head: Buffer,
  ) {
    // Node's HTTP server drops its own error listener on upgrade; until `ws`
    // takes the socket over, errors are reported to the session here.
    socket.on('error', this.onSocketError);
    socket.once('close', () => {
      if (!this.ws) this.listener?.close(ABNORMAL_CLOSURE, 'Connection lost during handshake');
    });
  }

  listen(listener: TransportListener): void {
    this.listener = listener;
  }

  accept(options: AcceptOptions): Promise<void> {
    if (this.socket.destroyed) {
      return Promise.reject(new Error('Connection lost during handshake'));
    }

    pendingAccepts.set(this.request, options);
    return new Promise<void>((resolve, reject) => {
      const onClose = () => reject(new Error('Connection lost during handshake'));
      this.socket.once('close', onClose);

      this.wss.handleUpgrade(this.request, this.socket, this.head, (ws) => {
        this.socket.off('close', onClose);
        pendingAccepts.delete(this.request);
        this.bind(ws);
        resolve();
      });
    });
  }

  async reject(status: number): Promise<void> {
    if (this.socket.destroyed) return;
    this.socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\n\r\n`);
    this.socket.destroy();
  }

  send(message: SocketMessage): Promise<void> {
    const { ws } = this;
    if (!ws) return Promise.reject(new Error('Handshake not completed'));

    return new Promise<void>((resolve, reject) => {
      ws.send(message.data, { binary: message.type === 'binary' }, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(code: number, reason: string): Promise<void> {
    const { ws } = this;
    if (!ws || ws.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(code, reason);
    });
  }

  private bind(ws: WebSocket): void {
    this.ws = ws;
    this.socket.off('error', this.onSocketError);
    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.listener?.message(toSocketMessage(data, isBinary));
    });
    ws.on('close', (code: number, reason: Buffer) => {
      this.listener?.close(code, reason.toString('utf8'));
    });
    ws.on('error', (error: Error) => {
      this.listener?.error(error);
    });
  }
}

/**
 * Serves a socket router on an HTTP server's `upgrade` event.
 *
 * Paths no socket route matches are refused with 404.
 */
export function attachSocketRouter(
  server: Server,
  router: SocketRouter,
  options: SocketServerOptions = {},
): SocketServerHandle {
  const log = options.log ?? ((message: string, error: unknown) => console.error(message, error));
  const wss = createSocketServer(options);

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const { pathname } = new URL(request.url ?? '/', 'http://localhost');
    const transport = new WsTransport(wss, request, socket, head);

    dispatchSocket(router, transport, { path: pathname, headers: toHeaders(request.headers) }).catch(
      (error: unknown) => log(`Socket handler failed for ${pathname}:`, error),
    );
  };

  server.on('upgrade', onUpgrade);
  return {
    wss,
    close() {
      server.off('upgrade', onUpgrade);
      wss.close();
    },
  };
}
