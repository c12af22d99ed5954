/**
 * @fileoverview Tests for the socket session state machine.
 */

import assert from 'node:assert';
import { beforeEach, describe, it } from 'node:test';
import { MessageTypeError, SessionClosedError, SessionStateError } from './errors.js';
import { MemoryTransport } from './memory-transport.js';
import { SocketSession } from './socket.js';

function closedWith(code: number, reason: string) {
  return (error: unknown) =>
    error instanceof SessionClosedError && error.code === code && error.reason === reason;
}

describe('SocketSession', () => {
  let transport: MemoryTransport;
  let session: SocketSession;

  beforeEach(() => {
    transport = new MemoryTransport();
    session = new SocketSession(transport);
  });

  describe('while connecting', () => {
    it('is not connected', () => {
      assert.strictEqual(session.state, 'connecting');
      assert.strictEqual(session.isConnected(), false);
    });

    it('rejects sends and receives with a state error', async () => {
      await assert.rejects(session.sendText('early'), SessionStateError);
      await assert.rejects(session.receive(), SessionStateError);
      await assert.rejects(session.messages().next(), SessionStateError);
    });

    it('closes at once when the peer leaves before the handshake', async () => {
      transport.deliverText('early');
      transport.peerClose(1001, 'gone');

      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1001);
      assert.deepStrictEqual(await session.closed, { code: 1001, reason: 'gone' });
      await assert.rejects(session.accept(), closedWith(1001, 'gone'));
    });

    it('refuses the handshake with 403 on close', async () => {
      await session.close();

      assert.strictEqual(transport.status, 'rejected');
      assert.strictEqual(transport.rejectedWith, 403);
      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1000);
    });

    it('refuses the handshake with a chosen status', async () => {
      await session.reject(404);

      assert.strictEqual(transport.rejectedWith, 404);
      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1006);
      assert.strictEqual(session.closeReason, 'Handshake rejected (404)');
    });

    it('closes abnormally when the transport cannot accept', async () => {
      transport.status = 'closed';

      await assert.rejects(session.accept(), /Cannot accept a closed connection/);
      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1006);
    });
  });

  describe('accept()', () => {
    it('opens the session with the negotiated options', async () => {
      await session.accept({ subprotocol: 'chat.v1', headers: { 'X-Room': 'lobby' } });

      assert.strictEqual(session.state, 'open');
      assert.strictEqual(session.isConnected(), true);
      assert.strictEqual(session.subprotocol, 'chat.v1');
      assert.deepStrictEqual(transport.accepted, {
        subprotocol: 'chat.v1',
        headers: { 'X-Room': 'lobby' },
      });
    });

    it('cannot be called twice', async () => {
      await session.accept();
      await assert.rejects(session.accept(), SessionStateError);
    });
  });

  describe('sending', () => {
    beforeEach(async () => {
      await session.accept();
    });

    it('delivers frames in call order', async () => {
      await Promise.all([
        session.sendText('first'),
        session.sendBytes(new Uint8Array([1, 2, 3])),
        session.sendJson({ n: 1 }),
        session.send({ type: 'text', data: 'last' }),
      ]);

      assert.deepStrictEqual(transport.sent, [
        { type: 'text', data: 'first' },
        { type: 'binary', data: new Uint8Array([1, 2, 3]) },
        { type: 'text', data: '{"n":1}' },
        { type: 'text', data: 'last' },
      ]);
    });

    it('sends JSON as UTF-8 bytes in binary mode', async () => {
      await session.sendJson({ ok: true }, 'binary');
      assert.deepStrictEqual(transport.sent, [
        { type: 'binary', data: new TextEncoder().encode('{"ok":true}') },
      ]);
    });

    it('flushes queued sends before closing', async () => {
      const sending = session.sendText('bye');
      await session.close(1000, 'done');
      await sending;

      assert.deepStrictEqual(transport.sentText(), ['bye']);
      assert.deepStrictEqual(transport.closedWith, { code: 1000, reason: 'done' });
    });
  });

  describe('receiving', () => {
    beforeEach(async () => {
      await session.accept();
    });

    it('returns frames in arrival order', async () => {
      transport.deliverText('one');
      transport.deliverBytes(new Uint8Array([7]));

      assert.deepStrictEqual(await session.receive(), { type: 'text', data: 'one' });
      assert.deepStrictEqual(await session.receiveBytes(), new Uint8Array([7]));
    });

    it('waits for a frame that has not arrived yet', async () => {
      const pending = session.receiveText();
      transport.deliverText('late');
      assert.strictEqual(await pending, 'late');
    });

    it('rejects frames of the wrong kind', async () => {
      transport.deliverBytes(new Uint8Array([1]));
      await assert.rejects(session.receiveText(), MessageTypeError);

      transport.deliverText('text');
      await assert.rejects(session.receiveBytes(), MessageTypeError);
    });

    it('decodes JSON from text and binary frames', async () => {
      transport.deliverText('{"a":1}');
      transport.deliverBytes(new TextEncoder().encode('[1,2]'));

      assert.deepStrictEqual(await session.receiveJson(), { a: 1 });
      assert.deepStrictEqual(await session.receiveJson('binary'), [1, 2]);
    });

    it('rejects invalid JSON', async () => {
      transport.deliverText('{nope');
      await assert.rejects(session.receiveJson(), MessageTypeError);
    });
  });

  describe('closing', () => {
    beforeEach(async () => {
      await session.accept();
    });

    it('fails every operation once closed', async () => {
      await session.close(4000, 'bye');

      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.isConnected(), false);
      assert.strictEqual(session.closeCode, 4000);
      assert.strictEqual(session.closeReason, 'bye');
      assert.deepStrictEqual(transport.closedWith, { code: 4000, reason: 'bye' });

      await assert.rejects(session.sendText('x'), closedWith(4000, 'bye'));
      await assert.rejects(session.receive(), closedWith(4000, 'bye'));
      await assert.rejects(session.accept(), SessionClosedError);
      await assert.rejects(session.close(), closedWith(4000, 'bye'));
      assert.deepStrictEqual(await session.closed, { code: 4000, reason: 'bye' });
    });

    it('releases pending receivers on a local close', async () => {
      const pending = assert.rejects(session.receive(), closedWith(1001, 'going away'));
      await session.close(1001, 'going away');
      await pending;
    });

    it('waits for an earlier close when closed again', async () => {
      await Promise.all([session.close(1000, 'first'), session.close(4000, 'second')]);
      assert.strictEqual(session.closeCode, 1000);
      assert.strictEqual(session.closeReason, 'first');
    });

    it('drains queued frames after the peer closes', async () => {
      transport.deliverText('a');
      transport.deliverText('b');
      transport.peerClose(1000, 'done');

      assert.strictEqual(session.state, 'closing');
      assert.strictEqual(session.isConnected(), false);
      await assert.rejects(session.sendText('reply'), SessionStateError);

      assert.strictEqual(await session.receiveText(), 'a');
      assert.strictEqual(await session.receiveText(), 'b');
      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1000);
      assert.strictEqual(session.closeReason, 'done');
      await assert.rejects(session.receive(), closedWith(1000, 'done'));
    });

    it('drops unread frames when closed after the peer closes', async () => {
      transport.deliverText('a');
      transport.deliverText('b');
      transport.peerClose(1001, 'leaving');
      assert.strictEqual(await session.receiveText(), 'a');

      await session.close();

      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1001);
      assert.strictEqual(session.closeReason, 'leaving');
      assert.strictEqual(transport.closedWith, undefined);
      assert.deepStrictEqual(await session.closed, { code: 1001, reason: 'leaving' });
      await assert.rejects(session.receive(), closedWith(1001, 'leaving'));
    });

    it('releases pending receivers when the peer closes', async () => {
      const pending = assert.rejects(session.receive(), closedWith(4001, 'kicked'));
      transport.peerClose(4001, 'kicked');
      await pending;
      assert.strictEqual(session.state, 'closed');
    });

    it('closes abnormally on a transport error and drops queued frames', async () => {
      transport.deliverText('lost');
      transport.fail(new Error('socket hang up'));

      assert.strictEqual(session.state, 'closed');
      assert.strictEqual(session.closeCode, 1006);
      assert.strictEqual(session.closeReason, 'socket hang up');
      await assert.rejects(session.receive(), SessionClosedError);
    });
  });

  describe('iteration', () => {
    beforeEach(async () => {
      await session.accept();
    });

    it('yields frames until the peer closes', async () => {
      transport.deliverText('1');
      transport.deliverText('2');
      transport.peerClose();

      const seen: string[] = [];
      for await (const text of session.iterText()) seen.push(text);
      assert.deepStrictEqual(seen, ['1', '2']);
    });

    it('ends after a transport error', async () => {
      const seen: unknown[] = [];
      const reading = (async () => {
        for await (const message of session.messages()) seen.push(message);
      })();

      transport.deliverText('only');
      await new Promise((resolve) => setImmediate(resolve));
      transport.fail(new Error('reset'));
      await reading;

      assert.deepStrictEqual(seen, [{ type: 'text', data: 'only' }]);
    });

    it('decodes JSON frames', async () => {
      transport.deliverBytes(new TextEncoder().encode('{"x":1}'));
      transport.deliverBytes(new TextEncoder().encode('{"x":2}'));
      transport.peerClose();

      const seen: unknown[] = [];
      for await (const value of session.iterJson('binary')) seen.push(value);
      assert.deepStrictEqual(seen, [{ x: 1 }, { x: 2 }]);
    });

    it('stops on a frame of the wrong kind', async () => {
      transport.deliverText('text');
      transport.peerClose();

      await assert.rejects(async () => {
        for await (const bytes of session.iterBytes()) assert.fail(`unexpected ${bytes.length}`);
      }, MessageTypeError);
    });
  });
});
