/**
 * Server implementation - endpoints, routes and the dispatcher.
 *
 * Routes:
 * - GET  /upsidedown           reverses the `token` of a JSON body
 * - GET  /api/health
 * - GET  /api/todos?completed=true
 * - POST /api/todos
 * - GET, PATCH, DELETE /api/todos/$id
 * - GET  /api/v1/todos/count and /api/v2/todos/count
 * - POST /api/admin/reset      localhost only
 */

import {
  ApiErrorInfo,
  body,
  Dispatcher,
  Endpoint,
  json,
  query,
  restrictClient,
  Router,
  type DataOf,
  type EndpointClass,
  type Injected,
  type MethodDeclarations,
} from '../src/index.js';
import { logger, requestId } from '../src/middleware/index.js';

// Shared types.
export interface Todo {
  id: string;
  title: string;
  completed: boolean;
  createdAt: string;
}

/** In-memory store (replace with a database in production). */
export class TodoStore {
  private readonly todos = new Map<string, Todo>();
  private nextId = 1;

  list(): Todo[] {
    return Array.from(this.todos.values());
  }

  get(id: string): Todo | undefined {
    return this.todos.get(id);
  }

  create(title: string): Todo {
    const todo: Todo = {
      id: String(this.nextId++),
      title,
      completed: false,
      createdAt: new Date().toISOString(),
    };
    this.todos.set(todo.id, todo);
    return todo;
  }

  update(id: string, changes: Partial<Pick<Todo, 'title' | 'completed'>>): Todo | undefined {
    const todo = this.todos.get(id);
    if (!todo) return undefined;
    const updated = { ...todo, ...changes };
    this.todos.set(id, updated);
    return updated;
  }

  delete(id: string): boolean {
    return this.todos.delete(id);
  }

  clear(): void {
    this.todos.clear();
    this.nextId = 1;
  }
}

function todoNotFound(id: string): ApiErrorInfo {
  return new ApiErrorInfo({
    status: 404,
    code: 'todo_not_found',
    developerMessage: `No todo with id ${id}`,
    userMessage: 'Todo not found',
  });
}

const TokenBody = json({ token: 'string' });
const CreateTodo = json({ title: 'string' });
const UpdateTodo = json({ title: 'string?', completed: 'boolean?' });
const ListTodos = [query('completed', { map: (raw) => raw === 'true' || raw === '1' })] as const;

/** Reverses a token. */
export class Upsidedown extends Endpoint {
  static methods: MethodDeclarations = {
    get: {
      sources: [body(TokenBody)],
      output: json({ result: 'string' }),
      summary: 'Reverse a token',
    },
  };

  get(data: DataOf<typeof TokenBody>) {
    this.sendJson({ result: [...data.token].reverse().join('') });
  }
}

export class Health extends Endpoint {
  get() {
    this.sendJson({ status: 'ok', timestamp: new Date().toISOString() });
  }
}

/** Base for endpoints that need the store. */
abstract class TodoEndpoint extends Endpoint {
  protected store = new TodoStore();

  setup(store: TodoStore) {
    this.store = store;
  }
}

export class Todos extends TodoEndpoint {
  static methods: MethodDeclarations = {
    get: {
      sources: ListTodos,
      summary: 'List todos',
    },
    post: {
      sources: [body(CreateTodo)],
      summary: 'Create a todo',
    },
  };

  get(...[completed]: Injected<typeof ListTodos>) {
    let items = this.store.list();
    if (completed !== undefined) {
      items = items.filter((todo) => todo.completed === completed);
    }
    this.sendJson({ todos: items, count: items.length });
  }

  post(data: DataOf<typeof CreateTodo>) {
    this.addHeader('Location', '/api/todos');
    this.sendJson(this.store.create(data.title), { status: 201 });
  }
}

export class TodoItem extends TodoEndpoint {
  static methods: MethodDeclarations = {
    get: { errors: [todoNotFound('{id}')] },
    patch: { sources: [body(UpdateTodo)], errors: [todoNotFound('{id}')] },
    delete: { errors: [todoNotFound('{id}')] },
  };

  get(id: string) {
    const todo = this.store.get(id);
    if (!todo) throw todoNotFound(id);
    this.sendJson(todo);
  }

  patch(id: string, changes: DataOf<typeof UpdateTodo>) {
    const todo = this.store.update(id, changes);
    if (!todo) throw todoNotFound(id);
    this.sendJson(todo);
  }

  delete(id: string) {
    if (!this.store.delete(id)) throw todoNotFound(id);
    this.sendStatus(204);
  }
}

/** Todo totals. Served under both API versions. */
export class TodoCount extends TodoEndpoint {
  get() {
    const todos = this.store.list();
    this.sendJson({ count: todos.length, completed: todos.filter((todo) => todo.completed).length });
  }
}

/** Empties the store. Served to local clients only. */
export class AdminReset extends TodoEndpoint {
  static methods: MethodDeclarations = {
    post: { sources: [restrictClient([{ ip: 'localhost' }, { ip: '::1' }])] },
  };

  post() {
    this.store.clear();
    this.sendStatus(204);
  }
}

/** Builds the application router around a store. */
export function createRouter(store: TodoStore): Router<EndpointClass> {
  const api = new Router<EndpointClass>()
    .register('/health', Health)
    .register('/todos', Todos, { parcel: [store] })
    .register('/todos/$id', TodoItem, { parcel: [store] })
    .register('/todos/count', TodoCount, { parcel: [store], version: [1, 2] })
    .register('/admin/reset', AdminReset, { parcel: [store] });

  return new Router<EndpointClass>().register('/upsidedown', Upsidedown).graft(api, { onto: '/api' });
}

export const store = new TodoStore();

/** The dispatcher with request IDs and request logging. */
export const dispatcher = new Dispatcher(createRouter(store), {
  middleware: [requestId(), logger()],
});
