/**
 * @fileoverview Socket session state machine.
 *
 * A session starts CONNECTING. `accept()` completes the handshake and moves it
 * to OPEN, where messages flow both ways. A close from either side moves it
 * through CLOSING to CLOSED; a transport error jumps straight to CLOSED with
 * code 1006. CLOSED is terminal.
 *
 * The session talks to the network only through a {@link SocketTransport}, so
 * the same handler code runs on the `ws` adapter and on in-memory fakes.
 *
 * @example
 * ```typescript
 * sockets.addRoute('/rooms/{room}', async ({ session, params }) => {
 *   await session.accept();
 *   for await (const text of session.iterText()) {
 *     await session.sendText(`${params.room}: ${text}`);
 *   }
 * });
 * ```
 */

import { MessageTypeError, SessionClosedError, SessionStateError } from './errors.js';

/** One complete frame. */
export type SocketMessage = { type: 'text'; data: string } | { type: 'binary'; data: Uint8Array };

/** Session lifecycle state. */
export type SessionState = 'connecting' | 'open' | 'closing' | 'closed';

/** How a structured payload travels: as a text frame or as UTF-8 bytes. */
export type JsonMode = 'text' | 'binary';

/** Close code and reason of a finished session. */
export interface CloseInfo {
  code: number;
  reason: string;
}

/** Handshake response options. */
export interface AcceptOptions {
  /** Negotiated subprotocol, echoed in `Sec-WebSocket-Protocol`. */
  subprotocol?: string;
  /** Extra handshake response headers. */
  headers?: Record<string, string>;
}

/** Callbacks a transport invokes for inbound events. */
export interface TransportListener {
  message(message: SocketMessage): void;
  close(code: number, reason: string): void;
  error(error: Error): void;
}

/**
 * The network side of a session. Implementations deliver inbound events to
 * the registered listener and perform outbound operations when asked.
 */
export interface SocketTransport {
  listen(listener: TransportListener): void;
  /** Completes the handshake. */
  accept(options: AcceptOptions): Promise<void>;
  /** Refuses the handshake with an HTTP status. */
  reject(status: number): Promise<void>;
  send(message: SocketMessage): Promise<void>;
  /** Starts the close handshake; resolves once the connection is down. */
  close(code: number, reason: string): Promise<void>;
}

/** Close code for a connection that dropped without a close frame. */
export const ABNORMAL_CLOSURE = 1006;

interface Waiter {
  resolve(message: SocketMessage): void;
  reject(error: Error): void;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function noop(): void {}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export class SocketSession {
  /** Settles once the session is CLOSED. Never rejects. */
  readonly closed: Promise<CloseInfo>;

  private readonly transport: SocketTransport;
  private readonly settle: (info: CloseInfo) => void;
  private current: SessionState = 'connecting';
  private accepting = false;
  private negotiated?: string;
  /** Close code and reason, known once closing starts. */
  private ending?: CloseInfo;
  /** Whether the peer started the close (queued messages stay readable). */
  private peerClosed = false;
  private readonly inbox: SocketMessage[] = [];
  private readonly waiters: Waiter[] = [];
  private writes: Promise<void> = Promise.resolve();

  constructor(transport: SocketTransport) {
    const { promise, resolve } = deferred<CloseInfo>();
    this.closed = promise;
    this.settle = resolve;
    this.transport = transport;
    transport.listen({
      message: (message) => this.onMessage(message),
      close: (code, reason) => this.onPeerClose(code, reason),
      error: (error) => this.onError(error),
    });
  }

  get state(): SessionState {
    return this.current;
  }

  /** Subprotocol chosen at `accept()`. */
  get subprotocol(): string | undefined {
    return this.negotiated;
  }

  /** Close code, once CLOSED. */
  get closeCode(): number | undefined {
    return this.is('closed') ? this.ending?.code : undefined;
  }

  /** Close reason, once CLOSED. */
  get closeReason(): string | undefined {
    return this.is('closed') ? this.ending?.reason : undefined;
  }

  /** True only while OPEN. */
  isConnected(): boolean {
    return this.is('open');
  }

  /**
   * Completes the handshake.
   *
   * @throws SessionStateError unless CONNECTING
   * @throws SessionClosedError once CLOSED
   */
  async accept(options: AcceptOptions = {}): Promise<void> {
    this.assertState('connecting', 'accept');
    if (this.accepting) {
      throw new SessionStateError('connecting', 'accept twice');
    }

    this.accepting = true;
    try {
      await this.transport.accept(options);
    } catch (error) {
      this.finish(ABNORMAL_CLOSURE, error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      this.accepting = false;
    }

    // The peer may have gone away while the handshake was in flight.
    if (!this.is('connecting')) {
      throw this.closedError();
    }
    this.negotiated = options.subprotocol;
    this.current = 'open';
  }

  /**
   * Refuses the handshake with an HTTP status (default 403).
   *
   * @throws SessionStateError unless CONNECTING
   */
  async reject(status = 403): Promise<void> {
    this.assertState('connecting', 'reject');
    await this.refuse(status, { code: ABNORMAL_CLOSURE, reason: `Handshake rejected (${status})` });
  }

  /** Sends one frame. Frames reach the peer in call order. */
  send(message: SocketMessage): Promise<void> {
    try {
      this.assertState('open', 'send');
    } catch (error) {
      return Promise.reject(error);
    }

    const result = this.writes.then(() => this.transport.send(message));
    // Failures reach the caller through `result`; the tail only orders writes.
    this.writes = result.then(noop, noop);
    return result;
  }

  sendText(data: string): Promise<void> {
    return this.send({ type: 'text', data });
  }

  sendBytes(data: Uint8Array): Promise<void> {
    return this.send({ type: 'binary', data });
  }

  /** Serializes a value as JSON and sends it as a text frame or as UTF-8 bytes. */
  sendJson(value: unknown, mode: JsonMode = 'text'): Promise<void> {
    const text = JSON.stringify(value);
    return mode === 'text' ? this.sendText(text) : this.sendBytes(encoder.encode(text));
  }

  /**
   * Waits for the next frame.
   *
   * After a peer close, frames that already arrived are still returned in
   * order; once they are drained the session is CLOSED.
   *
   * @throws SessionStateError while CONNECTING
   * @throws SessionClosedError when the session closes before a frame arrives
   */
  async receive(): Promise<SocketMessage> {
    if (this.is('connecting')) {
      throw new SessionStateError('connecting', 'receive');
    }

    const queued = this.inbox.shift();
    if (queued) {
      this.drainPeerClose();
      return queued;
    }
    if (!this.is('open')) {
      throw this.closedError();
    }

    return new Promise<SocketMessage>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** @throws MessageTypeError when the next frame is binary */
  async receiveText(): Promise<string> {
    const message = await this.receive();
    if (message.type !== 'text') {
      throw new MessageTypeError('Expected a text message, received binary');
    }
    return message.data;
  }

  /** @throws MessageTypeError when the next frame is text */
  async receiveBytes(): Promise<Uint8Array> {
    const message = await this.receive();
    if (message.type !== 'binary') {
      throw new MessageTypeError('Expected a binary message, received text');
    }
    return message.data;
  }

  /** @throws MessageTypeError when the frame has the wrong kind or is not valid JSON */
  async receiveJson(mode: JsonMode = 'text'): Promise<unknown> {
    const text = mode === 'text' ? await this.receiveText() : decoder.decode(await this.receiveBytes());
    return parseJson(text);
  }

  /**
   * Yields frames until the session closes. Forward-only: frames taken here
   * are gone for any other reader.
   */
  async *messages(): AsyncGenerator<SocketMessage, void, undefined> {
    while (true) {
      let message: SocketMessage;
      try {
        message = await this.receive();
      } catch (error) {
        if (error instanceof SessionClosedError) return;
        throw error;
      }
      yield message;
    }
  }

  async *iterText(): AsyncGenerator<string, void, undefined> {
    for await (const message of this.messages()) {
      if (message.type !== 'text') {
        throw new MessageTypeError('Expected a text message, received binary');
      }
      yield message.data;
    }
  }

  async *iterBytes(): AsyncGenerator<Uint8Array, void, undefined> {
    for await (const message of this.messages()) {
      if (message.type !== 'binary') {
        throw new MessageTypeError('Expected a binary message, received text');
      }
      yield message.data;
    }
  }

  async *iterJson(mode: JsonMode = 'text'): AsyncGenerator<unknown, void, undefined> {
    if (mode === 'binary') {
      for await (const bytes of this.iterBytes()) yield parseJson(decoder.decode(bytes));
      return;
    }
    for await (const text of this.iterText()) yield parseJson(text);
  }

  /**
   * Closes the session. While CONNECTING this refuses the handshake with 403.
   * While OPEN, pending receivers are released, queued sends are flushed, and
   * the transport close is awaited. While CLOSING after a peer close, frames
   * still queued are dropped and the session finishes with the peer's code.
   * A local close already under way is waited for.
   *
   * @throws SessionClosedError once CLOSED
   */
  async close(code = 1000, reason = ''): Promise<void> {
    if (this.is('connecting')) {
      await this.refuse(403, { code, reason });
      return;
    }
    if (this.is('closed')) {
      throw this.closedError();
    }
    if (this.is('closing')) {
      if (this.peerClosed && this.ending) {
        this.finish(this.ending.code, this.ending.reason);
      }
      await this.closed;
      return;
    }

    this.current = 'closing';
    this.ending = { code, reason };
    this.releaseWaiters();

    try {
      await this.writes;
      await this.transport.close(code, reason);
    } finally {
      this.finish(code, reason);
    }
  }

  private is(state: SessionState): boolean {
    return this.current === state;
  }

  private assertState(expected: SessionState, operation: string): void {
    if (this.is(expected)) return;
    if (this.is('closed')) throw this.closedError();
    throw new SessionStateError(this.current, operation);
  }

  private closedError(): SessionClosedError {
    return new SessionClosedError(this.ending?.code ?? ABNORMAL_CLOSURE, this.ending?.reason ?? '');
  }

  private async refuse(status: number, info: CloseInfo): Promise<void> {
    this.current = 'closing';
    this.ending = info;
    try {
      await this.transport.reject(status);
    } finally {
      this.finish(info.code, info.reason);
    }
  }

  private onMessage(message: SocketMessage): void {
    if (!this.is('open') && !this.is('connecting')) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private onPeerClose(code: number, reason: string): void {
    // A local close finishes on its own once the transport close resolves.
    if (!this.is('open') && !this.is('connecting')) return;

    this.ending = { code, reason };
    // Frames sent before the handshake completed are never readable.
    if (this.is('connecting') || this.inbox.length === 0) {
      this.finish(code, reason);
      return;
    }
    this.current = 'closing';
    this.peerClosed = true;
  }

  private onError(error: Error): void {
    if (this.is('closed')) return;
    this.inbox.length = 0;
    this.finish(ABNORMAL_CLOSURE, error.message);
  }

  /** Finishes a peer close once the last queued frame has been taken. */
  private drainPeerClose(): void {
    if (this.peerClosed && this.inbox.length === 0 && this.ending) {
      this.finish(this.ending.code, this.ending.reason);
    }
  }

  private releaseWaiters(): void {
    const error = this.closedError();
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  private finish(code: number, reason: string): void {
    if (this.is('closed')) return;
    this.ending = { code, reason };
    this.current = 'closed';
    this.inbox.length = 0;
    this.releaseWaiters();
    this.settle({ code, reason });
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new MessageTypeError('Message is not valid JSON');
  }
}
