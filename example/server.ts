/**
 * Example application - a todo API with a live change feed.
 *
 * HTTP routes live on `api`, socket routes on `sockets`. Every change to the
 * store is broadcast to the sessions following `/ws/todos`.
 *
 * Route names are namespaced by the routers they sit in, so the detail route
 * below is reversed as `api.urlFor('todos.detail', { id })`.
 */

import { Router, SocketGroup, SocketRouter } from '../src/index.js';
import { errorHandler, HttpError } from '../src/middleware/index.js';

// Shared types.
export interface Todo {
  id: number;
  title: string;
  completed: boolean;
  createdAt: string;
}

// In-memory store (replace with a database in production).
const todos = new Map<number, Todo>();
let nextId = 1;

/** Sessions following the change feed. */
export const feed = new SocketGroup();

/** Resets the store (used for testing). */
export function resetStore() {
  todos.clear();
  nextId = 1;
}

async function readBody(request: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new HttpError('Body must be JSON', 400);
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new HttpError('Body must be a JSON object', 400);
  }
  return Object.fromEntries(Object.entries(body));
}

function findTodo(id: number): Todo {
  const todo = todos.get(id);
  if (!todo) throw new HttpError('Todo not found', 404);
  return todo;
}

// /api/todos routes
const todoRoutes = new Router({ prefix: '/todos', name: 'todos' });

// GET /api/todos?completed=true
todoRoutes.get(
  '/',
  async (c) => {
    const completed = new URL(c.request.url).searchParams.get('completed');
    let items = Array.from(todos.values());
    if (completed !== null) {
      items = items.filter((t) => t.completed === (completed === 'true'));
    }
    return { todos: items, count: items.length };
  },
  { name: 'list' },
);

// POST /api/todos
todoRoutes.post(
  '/',
  async (c) => {
    const body = await readBody(c.request);
    if (typeof body.title !== 'string' || body.title === '') {
      throw new HttpError('title is required', 400);
    }

    const todo: Todo = {
      id: nextId++,
      title: body.title,
      completed: false,
      createdAt: new Date().toISOString(),
    };
    todos.set(todo.id, todo);
    await feed.broadcastJson({ type: 'created', todo });

    return Response.json(todo, {
      status: 201,
      headers: { Location: api.urlFor('todos.detail', { id: todo.id }) },
    });
  },
  { name: 'create' },
);

// GET /api/todos/:id
todoRoutes.get('/{id:int}', async (c) => findTodo(c.params.id), { name: 'detail' });

// PATCH /api/todos/:id
todoRoutes.patch(
  '/{id:int}',
  async (c) => {
    const todo = findTodo(c.params.id);
    const body = await readBody(c.request);
    if (typeof body.title === 'string') todo.title = body.title;
    if (typeof body.completed === 'boolean') todo.completed = body.completed;
    await feed.broadcastJson({ type: 'updated', todo });
    return todo;
  },
  { name: 'update' },
);

// DELETE /api/todos/:id
todoRoutes.delete(
  '/{id:int}',
  async (c) => {
    findTodo(c.params.id);
    todos.delete(c.params.id);
    await feed.broadcastJson({ type: 'deleted', id: c.params.id });
    return { deleted: true };
  },
  { name: 'delete' },
);

/** The HTTP API. */
export const api = new Router({
  prefix: '/api',
  middleware: [
    errorHandler({
      expose: true,
      log: (error) => {
        if (!(error instanceof HttpError)) console.error(error);
      },
    }),
  ],
});

// GET /api/health
api.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }), {
  name: 'health',
});
api.mount(todoRoutes);

/** Socket routes. */
export const sockets = new SocketRouter({ prefix: '/ws' });

// /ws/todos - sends a snapshot, then every change until the client leaves.
sockets.addRoute(
  '/todos',
  async ({ session }) => {
    await session.accept();
    feed.add(session);
    await session.sendJson({ type: 'snapshot', todos: Array.from(todos.values()) });
    await session.closed;
  },
  { name: 'feed' },
);
