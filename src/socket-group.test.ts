import assert from 'node:assert';
import { describe, it } from 'node:test';
import { MemoryTransport } from './memory-transport.js';
import { SocketSession } from './socket.js';
import { SocketGroup } from './socket-group.js';

async function openSession(): Promise<{ session: SocketSession; transport: MemoryTransport }> {
  const transport = new MemoryTransport();
  const session = new SocketSession(transport);
  await session.accept();
  return { session, transport };
}

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('SocketGroup', () => {
  it('broadcasts text to every open session', async () => {
    const a = await openSession();
    const b = await openSession();
    const group = new SocketGroup().add(a.session).add(b.session);

    const report = await group.broadcastText('hello');

    assert.strictEqual(report.delivered, 2);
    assert.deepStrictEqual(report.failures, []);
    assert.deepStrictEqual(a.transport.sentText(), ['hello']);
    assert.deepStrictEqual(b.transport.sentText(), ['hello']);
  });

  it('broadcasts JSON in either mode', async () => {
    const a = await openSession();
    const group = new SocketGroup().add(a.session);

    await group.broadcastJson({ n: 1 });
    await group.broadcastJson({ n: 2 }, 'binary');

    assert.deepStrictEqual(a.transport.sent, [
      { type: 'text', data: '{"n":1}' },
      { type: 'binary', data: new TextEncoder().encode('{"n":2}') },
    ]);
  });

  it('drops sessions once they close', async () => {
    const a = await openSession();
    const b = await openSession();
    const group = new SocketGroup().add(a.session).add(b.session);

    await a.session.close();
    await tick();

    assert.strictEqual(group.size, 1);
    assert.strictEqual(group.has(a.session), false);
    assert.strictEqual(group.has(b.session), true);
  });

  it('ignores closed sessions and duplicates', async () => {
    const a = await openSession();
    const b = await openSession();
    await b.session.close();

    const group = new SocketGroup().add(a.session).add(a.session).add(b.session);
    assert.strictEqual(group.size, 1);
  });

  it('skips sessions that are not open yet', async () => {
    const a = await openSession();
    const pending = new SocketSession(new MemoryTransport());
    const group = new SocketGroup().add(a.session).add(pending);

    const report = await group.broadcastText('ping');

    assert.strictEqual(group.size, 2);
    assert.strictEqual(report.delivered, 1);
  });

  it('reports failed sends without stopping the broadcast', async () => {
    const healthy = await openSession();
    const broken = await openSession();
    broken.transport.status = 'closed';
    const group = new SocketGroup().add(broken.session).add(healthy.session);

    const report = await group.broadcastText('news');

    assert.strictEqual(report.delivered, 1);
    assert.strictEqual(report.failures.length, 1);
    assert.strictEqual(report.failures[0]?.session, broken.session);
    assert.match(String(report.failures[0]?.error), /Cannot send on a closed connection/);
    assert.deepStrictEqual(healthy.transport.sentText(), ['news']);
  });

  it('removes sessions on request', async () => {
    const a = await openSession();
    const group = new SocketGroup().add(a.session);

    assert.strictEqual(group.delete(a.session), true);
    assert.strictEqual(group.delete(a.session), false);
    assert.strictEqual(group.size, 0);
  });
});
