import test from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';

import express from 'express';
import type { ErrorRequestHandler } from 'express';
import {
  AccessControl,
  DEFAULT_DENIAL_MESSAGE,
  RecordNotFoundError,
  RolePrivilegeEngine,
  type Finder,
  type Logger,
} from '@actiongate/core';

import { accessFilter, identityMiddleware } from '../../src/index.js';

function listen(app: express.Express) {
  const server = http.createServer(app);
  return new Promise<{ server: http.Server; url: string }>((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      if (!addr || typeof addr === 'string') return reject(new Error('No address'));
      resolve({ server, url: `http://${addr.address}:${addr.port}` });
    });
  });
}

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: (...args: unknown[]) => lines.push(`info ${String(args[0])}`),
    warn: (...args: unknown[]) => lines.push(`warn ${String(args[0])}`),
    error: (...args: unknown[]) => lines.push(`error ${String(args[0])}`),
  };
  return { lines, logger };
}

const finder: Finder = {
  find: async (domainType, id) => {
    if (id === 'missing') throw new RecordNotFoundError(domainType, id);
    return { domainType, id };
  },
};

const onError: ErrorRequestHandler = (err, _req, res, _next) => {
  res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
};

function buildApp(opts: Parameters<typeof accessFilter>[2] = {}) {
  const { lines, logger } = recordingLogger();
  const engine = new RolePrivilegeEngine({
    users: { index: ['*'], edit: ['admin'], audit: ['admin'] },
  });
  const users = new AccessControl({ resource: 'users', engine, finder, logger })
    .filterAccessTo('index')
    .filterAccessTo('edit', { attributeCheck: true });

  const app = express();
  app.use(express.json());
  app.use(
    identityMiddleware((req) => {
      const roles = req.header('x-roles');
      if (!roles) return null;
      return { isAuthenticated: true, subjects: {}, roles: roles.split(','), claims: {} };
    }),
  );
  app.get('/users', accessFilter(users, 'index', opts), (req, res) => {
    res.json({ ok: true, anonymous: req.actor?.isAuthenticated === false });
  });
  app.get('/users/:id', accessFilter(users, 'show', opts), (_req, res) => {
    res.json({ ok: true });
  });
  app.get('/users/:id/edit', accessFilter(users, 'edit', opts), async (req, res) => {
    res.json({
      loaded: req.access?.loaded('user') ?? null,
      canAudit: (await req.access?.permittedTo('audit')) ?? null,
    });
  });
  app.use(onError);
  return { app, lines };
}

async function get(url: string, roles?: string) {
  const res = await fetch(url, roles ? { headers: { 'x-roles': roles } } : {});
  return { status: res.status, body: (await res.json()) as unknown };
}

test('accessFilter: continues the request when the decision allows', async () => {
  const { app, lines } = buildApp();
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users`);
    assert.equal(res.status, 200);
    assert.deepEqual(res.body, { ok: true, anonymous: true });
    assert.deepEqual(lines, []);
  } finally {
    server.close();
  }
});

test('accessFilter: renders the fixed denial and warns when no rule matches', async () => {
  const { app, lines } = buildApp();
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/1`, 'admin');
    assert.equal(res.status, 403);
    assert.deepEqual(res.body, {
      success: false,
      code: 403,
      errors: { root: 'Forbidden' },
      message: DEFAULT_DENIAL_MESSAGE,
    });
    assert.deepEqual(lines, ['warn [actiongate] Permission denied: No matching filter access rule found for users.show']);
  } finally {
    server.close();
  }
});

test('accessFilter: logs the cause of an evaluated denial at info', async () => {
  const { app, lines } = buildApp();
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/5/edit`, 'member');
    assert.equal(res.status, 403);
    assert.deepEqual(lines, ['info [actiongate] Permission denied: No permission for users.edit']);
  } finally {
    server.close();
  }
});

test('accessFilter: exposes the loaded object and permittedTo to the handler', async () => {
  const { app } = buildApp();
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/5/edit`, 'admin');
    assert.equal(res.status, 200);
    assert.deepEqual(res.body, { loaded: { domainType: 'user', id: '5' }, canAudit: true });
  } finally {
    server.close();
  }
});

test('accessFilter: loader failures deny without leaking the cause', async () => {
  const { app, lines } = buildApp();
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/missing/edit`, 'admin');
    assert.equal(res.status, 403);
    assert.deepEqual(res.body, {
      success: false,
      code: 403,
      errors: { root: 'Forbidden' },
      message: DEFAULT_DENIAL_MESSAGE,
    });
    assert.deepEqual(lines, ['warn [actiongate] Permission denied: users.edit failed to evaluate']);
  } finally {
    server.close();
  }
});

test('accessFilter: onDenied replaces the default rendering', async () => {
  const reasons: string[] = [];
  const { app } = buildApp({
    onDenied: (_req, res, decision) => {
      reasons.push(decision.reason.type);
      res.status(401).json({ login: '/session/new' });
    },
  });
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/1`);
    assert.equal(res.status, 401);
    assert.deepEqual(res.body, { login: '/session/new' });
    assert.deepEqual(reasons, ['no-matching-rule']);
  } finally {
    server.close();
  }
});

test('accessFilter: configured 404 denial hides the resource', async () => {
  const { app } = buildApp({ denial: { status: 404, message: 'Not found' } });
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/1`);
    assert.equal(res.status, 404);
    assert.deepEqual(res.body, { success: false, code: 404, errors: { root: 'NotFound' }, message: 'Not found' });
  } finally {
    server.close();
  }
});

test('accessFilter: failures of onDenied reach the error handler', async () => {
  const { app } = buildApp({
    onDenied: async () => {
      throw new Error('renderer broke');
    },
  });
  const { server, url } = await listen(app);
  try {
    const res = await get(`${url}/users/1`);
    assert.equal(res.status, 500);
    assert.deepEqual(res.body, { error: 'renderer broke' });
  } finally {
    server.close();
  }
});
