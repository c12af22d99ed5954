/**
 * @fileoverview In-process socket transport for exercising socket handlers
 * without a network.
 *
 * The transport records what the session does (accept, reject, sends, close)
 * and lets the caller play the peer: deliver frames, close, or fail.
 *
 * @example
 * ```typescript
 * const transport = new MemoryTransport({ inbound: ['hello'], peerClose: { code: 1000, reason: '' } });
 * await dispatchSocket(sockets, transport, { path: '/echo' });
 * transport.sentText(); // ['hello']
 * ```
 */

import type {
  AcceptOptions,
  CloseInfo,
  SocketMessage,
  SocketTransport,
  TransportListener,
} from './socket.js';

export interface MemoryTransportOptions {
  /** Frames the peer sends once the handshake completes; strings are text frames. */
  inbound?: (SocketMessage | string)[];
  /** Close the peer sends after the inbound frames. */
  peerClose?: CloseInfo;
}

/** Handshake and connection status as seen by the peer. */
export type MemoryTransportStatus = 'pending' | 'accepted' | 'rejected' | 'closed';

export class MemoryTransport implements SocketTransport {
  status: MemoryTransportStatus = 'pending';
  /** Options given to `accept()`. */
  accepted?: AcceptOptions;
  /** HTTP status given to `reject()`. */
  rejectedWith?: number;
  /** Close frame sent by the session. */
  closedWith?: CloseInfo;
  /** Frames sent by the session, in order. */
  readonly sent: SocketMessage[] = [];

  private listener?: TransportListener;
  private readonly options: MemoryTransportOptions;

  constructor(options: MemoryTransportOptions = {}) {
    this.options = options;
  }

  listen(listener: TransportListener): void {
    this.listener = listener;
  }

  async accept(options: AcceptOptions): Promise<void> {
    if (this.status !== 'pending') {
      throw new Error(`Cannot accept a ${this.status} connection`);
    }
    this.status = 'accepted';
    this.accepted = options;

    const { inbound = [], peerClose } = this.options;
    if (inbound.length > 0 || peerClose) {
      setImmediate(() => {
        for (const frame of inbound) {
          this.deliver(typeof frame === 'string' ? { type: 'text', data: frame } : frame);
        }
        if (peerClose) this.peerClose(peerClose.code, peerClose.reason);
      });
    }
  }

  async reject(status: number): Promise<void> {
    this.status = 'rejected';
    this.rejectedWith = status;
  }

  async send(message: SocketMessage): Promise<void> {
    if (this.status !== 'accepted') {
      throw new Error(`Cannot send on a ${this.status} connection`);
    }
    this.sent.push(message);
  }

  async close(code: number, reason: string): Promise<void> {
    this.status = 'closed';
    this.closedWith = { code, reason };
  }

  /** Text frames sent so far. */
  sentText(): string[] {
    return this.sent.flatMap((message) => (message.type === 'text' ? [message.data] : []));
  }

  /** Delivers a frame from the peer. */
  deliver(message: SocketMessage): void {
    this.requireListener().message(message);
  }

  deliverText(data: string): void {
    this.deliver({ type: 'text', data });
  }

  deliverBytes(data: Uint8Array): void {
    this.deliver({ type: 'binary', data });
  }

  /** Closes the connection from the peer's side. */
  peerClose(code = 1000, reason = ''): void {
    this.status = 'closed';
    this.requireListener().close(code, reason);
  }

  /** Simulates a transport failure. */
  fail(error: Error): void {
    this.status = 'closed';
    this.requireListener().error(error);
  }

  private requireListener(): TransportListener {
    if (!this.listener) {
      throw new Error('No session is listening on this transport');
    }
    return this.listener;
  }
}
