/**
 * @fileoverview Registry of open sessions for broadcasting.
 *
 * Groups are plain objects owned by the application: create one per room or
 * topic and pass it to the handlers that need it.
 *
 * @example
 * ```typescript
 * const lobby = new SocketGroup();
 * sockets.addRoute('/lobby', async ({ session }) => {
 *   await session.accept();
 *   lobby.add(session);
 *   for await (const text of session.iterText()) await lobby.broadcastText(text);
 * });
 * ```
 */

import type { JsonMode, SocketSession } from './socket.js';

/** Outcome of a broadcast. */
export interface BroadcastReport {
  /** Sessions the message was handed to. */
  delivered: number;
  /** Sessions whose send failed, with the error. */
  failures: { session: SocketSession; error: unknown }[];
}

export class SocketGroup {
  private readonly sessions = new Set<SocketSession>();

  /** Number of sessions in the group. */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Adds a session. It leaves the group by itself when it closes; adding a
   * session that is already closed does nothing.
   */
  add(session: SocketSession): this {
    if (session.state === 'closed' || this.sessions.has(session)) return this;

    this.sessions.add(session);
    void session.closed.then(() => {
      this.sessions.delete(session);
    });
    return this;
  }

  delete(session: SocketSession): boolean {
    return this.sessions.delete(session);
  }

  has(session: SocketSession): boolean {
    return this.sessions.has(session);
  }

  /** Sends a text frame to every open session. */
  broadcastText(data: string): Promise<BroadcastReport> {
    return this.broadcast((session) => session.sendText(data));
  }

  /** Sends a JSON payload to every open session. */
  broadcastJson(value: unknown, mode: JsonMode = 'text'): Promise<BroadcastReport> {
    return this.broadcast((session) => session.sendJson(value, mode));
  }

  private async broadcast(send: (session: SocketSession) => Promise<void>): Promise<BroadcastReport> {
    const targets = [...this.sessions].filter((session) => session.isConnected());
    const results = await Promise.allSettled(targets.map(send));

    const report: BroadcastReport = { delivered: 0, failures: [] };
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        report.delivered++;
      } else {
        report.failures.push({ session: targets[index], error: result.reason });
      }
    });
    return report;
  }
}
