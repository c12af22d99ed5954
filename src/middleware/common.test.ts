/**
 * @fileoverview Tests for the bundled middleware, run against user routes.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { Middleware, MiddlewareContext } from '../middleware.js';
import { Router } from '../router.js';
import { errorHandler, HttpError, logger, requestId, timeout, type LogInfo } from './common.js';

const quiet = () => undefined;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** `/users/{id:int}` as `users.detail`; id 404 is missing and id 500 fails. */
function usersApi(...middleware: Middleware[]): Router {
  const users = new Router({ prefix: '/users', name: 'users', middleware });
  users.get(
    '/{id:int}',
    async (c) => {
      if (c.params.id === 404) throw new HttpError(`User ${c.params.id} not found`, 404);
      if (c.params.id === 500) throw new Error('database offline');
      return { id: c.params.id, requestId: c.requestId };
    },
    { name: 'detail' },
  );
  return users;
}

const get = (router: Router, path: string, headers?: Record<string, string>) =>
  router.handler()(new Request(`http://localhost${path}`, { headers }));

/** The context the router builds for `GET /users/7`. */
function userContext(path = '/users/7', headers?: Record<string, string>): MiddlewareContext {
  return {
    request: new Request(`http://localhost${path}`, { headers }),
    params: { id: 7 },
    route: { name: 'users.detail', template: '/users/{id:int}', methods: ['GET'], metadata: {} },
    env: {},
  };
}

const respond = (response: Response) => async () => response;

describe('errorHandler()', () => {
  it('hides the message of unexpected errors', async () => {
    const res = await get(usersApi(errorHandler({ log: quiet })), '/users/500');

    assert.strictEqual(res.status, 500);
    assert.deepStrictEqual(await res.json(), { error: 'Internal Server Error' });
  });

  it('uses the status of an HttpError and exposes details when asked', async () => {
    const res = await get(usersApi(errorHandler({ expose: true, log: quiet })), '/users/404');

    assert.strictEqual(res.status, 404);
    const body = await res.json();
    assert.strictEqual(body.error, 'User 404 not found');
    assert.strictEqual(body.name, 'HttpError');
    assert.strictEqual(typeof body.stack, 'string');
  });

  it('hands the matched route and params to the log callback', async () => {
    const seen: string[] = [];
    const api = usersApi(
      errorHandler({
        log: async (error, context) => {
          seen.push(`${context.route.name} ${String(context.params.id)} ${error.message}`);
        },
      }),
    );

    await get(api, '/users/500');

    assert.deepStrictEqual(seen, ['users.detail 500 database offline']);
  });

  it('logs to console.error with the route template by default', async (t) => {
    const consoleError = t.mock.method(console, 'error', () => undefined);

    await get(usersApi(errorHandler()), '/users/500');

    assert.strictEqual(consoleError.mock.callCount(), 1);
    assert.strictEqual(consoleError.mock.calls[0]?.arguments[0], 'Error in GET /users/{id:int}:');
  });

  it('reads statusCode from foreign errors', async () => {
    const response = await errorHandler({ log: quiet })(userContext(), async () => {
      throw Object.assign(new Error('Gone'), { statusCode: 410 });
    });

    assert.strictEqual(response.status, 410);
  });

  it('wraps thrown non-errors', async () => {
    let logged: Error | undefined;
    const middleware = errorHandler({ log: (error) => void (logged = error) });

    const response = await middleware(userContext(), async () => {
      throw 'plain string';
    });

    assert.strictEqual(response.status, 500);
    assert.strictEqual(logged?.message, 'plain string');
  });

  it('lets a formatter build the response from the route', async () => {
    const api = usersApi(
      errorHandler({
        log: quiet,
        formatter: (error, context) =>
          Response.json({ route: context.route.name, message: error.message }, { status: 503 }),
      }),
    );

    const res = await get(api, '/users/500');

    assert.strictEqual(res.status, 503);
    assert.deepStrictEqual(await res.json(), { route: 'users.detail', message: 'database offline' });
  });

  it('returns successful responses untouched', async () => {
    const ok = new Response('fine');
    assert.strictEqual(await errorHandler()(userContext(), respond(ok)), ok);
  });
});

describe('logger()', () => {
  it('logs the path with its query and the matched template', async () => {
    const logs: string[] = [];
    const api = usersApi(logger({ log: (message) => logs.push(message) }));

    await get(api, '/users/7?fields=name');

    assert.strictEqual(logs.length, 2);
    assert.strictEqual(logs[0], '→ GET /users/7?fields=name (/users/{id:int})');
    assert.match(logs[1] ?? '', /^← 200 \(\d+ms\)$/);
  });

  it('does not run for paths no route matches', async () => {
    const logs: string[] = [];
    const api = usersApi(logger({ log: (message) => logs.push(message) }));

    const res = await get(api, '/users/seven');

    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(logs, []);
  });

  it('adds the status text when the response has one', async () => {
    const logs: string[] = [];
    const middleware = logger({ log: (message) => logs.push(message) });

    await middleware(userContext(), respond(new Response(null, { status: 202, statusText: 'Accepted' })));

    assert.match(logs[1] ?? '', /^← 202 Accepted \(\d+ms\)$/);
  });

  it('includes request headers when configured', async () => {
    let loggedInfo: LogInfo | undefined;
    const middleware = logger({
      includeHeaders: true,
      formatter: (info) => {
        loggedInfo = info;
        return JSON.stringify(info);
      },
      log: quiet,
    });

    await middleware(
      userContext('/users/7', { 'User-Agent': 'test-agent', Accept: 'application/json' }),
      respond(new Response('ok')),
    );

    assert.strictEqual(loggedInfo?.headers?.['user-agent'], 'test-agent');
    assert.strictEqual(loggedInfo?.headers?.['accept'], 'application/json');
  });

  it('logs a failing handler and rethrows', async () => {
    const logs: string[] = [];
    const api = usersApi(logger({ log: (message) => logs.push(message) }));

    await assert.rejects(get(api, '/users/500'), /database offline/);

    assert.strictEqual(logs[0], '→ GET /users/500 (/users/{id:int})');
    assert.match(logs[1] ?? '', /^✗ 500 Error: database offline \(\d+ms\)$/);
  });

  it('formats both lines with a custom formatter', async () => {
    const logs: string[] = [];
    const api = usersApi(
      logger({
        log: (message) => logs.push(message),
        formatter: (info) => `${info.method} ${info.route} -> ${info.status}`,
      }),
    );

    await get(api, '/users/7');

    assert.deepStrictEqual(logs, ['GET /users/{id:int} -> 0', 'GET /users/{id:int} -> 200']);
  });
});

describe('requestId()', () => {
  it('generates a UUID and exposes it to the handler', async () => {
    const res = await get(usersApi(requestId()), '/users/7');

    const id = res.headers.get('X-Request-ID');
    assert.match(id ?? '', /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    assert.deepStrictEqual(await res.json(), { id: 7, requestId: id });
  });

  it('reuses the ID sent by the client', async () => {
    const res = await get(usersApi(requestId()), '/users/7', { 'X-Request-ID': 'upstream-42' });

    assert.strictEqual(res.headers.get('X-Request-ID'), 'upstream-42');
    assert.deepStrictEqual(await res.json(), { id: 7, requestId: 'upstream-42' });
  });

  it('uses a custom header and generator', async () => {
    let counter = 0;
    const api = usersApi(requestId({ headerName: 'X-Trace-ID', generator: () => `trace-${++counter}` }));

    assert.strictEqual((await get(api, '/users/1')).headers.get('X-Trace-ID'), 'trace-1');
    assert.strictEqual((await get(api, '/users/2')).headers.get('X-Trace-ID'), 'trace-2');
  });

  it('keeps its defaults when options are passed as undefined', async () => {
    const middleware = requestId({ headerName: undefined, generator: undefined });
    const context = userContext();

    const response = await middleware(context, respond(new Response('ok')));

    assert.strictEqual(typeof context.requestId, 'string');
    assert.strictEqual(response.headers.get('X-Request-ID'), context.requestId);
  });

  it('keeps the status and body of the response', async () => {
    const response = await requestId({ generator: () => 'req-1' })(
      userContext(),
      respond(new Response('created', { status: 201 })),
    );

    assert.strictEqual(response.status, 201);
    assert.strictEqual(await response.text(), 'created');
  });
});

describe('timeout()', () => {
  const slowUsers = (middleware: Middleware, delay: number) => {
    const users = new Router({ prefix: '/users', middleware: [middleware] });
    users.get('/{id:int}/report', async (c) => {
      await sleep(delay);
      return { id: c.params.id };
    });
    return users;
  };

  it('answers 408 when the route takes too long', async () => {
    const res = await get(slowUsers(timeout({ timeout: 20 }), 100), '/users/3/report');

    assert.strictEqual(res.status, 408);
    assert.strictEqual(await res.text(), 'Request timeout');
  });

  it('passes fast responses through', async () => {
    const res = await get(slowUsers(timeout({ timeout: 100 }), 10), '/users/3/report');

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), { id: 3 });
  });

  it('uses a custom message', async () => {
    const res = await get(
      slowUsers(timeout({ timeout: 20, message: 'Report still running' }), 100),
      '/users/3/report',
    );

    assert.strictEqual(await res.text(), 'Report still running');
  });

  it('propagates errors raised before the deadline', async () => {
    await assert.rejects(
      async () =>
        timeout({ timeout: 100 })(userContext(), async () => {
          throw new Error('database offline');
        }),
      /database offline/,
    );
  });

  it('reports failures that arrive after the deadline', async (t) => {
    const consoleError = t.mock.method(console, 'error', () => undefined);

    const response = await timeout({ timeout: 10 })(userContext(), async () => {
      await sleep(40);
      throw new Error('late failure');
    });
    assert.strictEqual(response.status, 408);

    await sleep(80);
    assert.strictEqual(consoleError.mock.callCount(), 1);
    assert.strictEqual(consoleError.mock.calls[0]?.arguments[0], 'Request failed after timeout:');
  });
});
