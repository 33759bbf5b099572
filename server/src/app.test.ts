import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { MemoryStore } from './db/memoryStore';
import { createLogger } from './logger';

const config = {
  origins: ['http://localhost:5173'],
  jwtSecret: 'test-secret',
  accessTokenTtl: 900,
  refreshTokenTtl: 3600,
  bcryptRounds: 4
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({ store: new MemoryStore(), config, logger: createLogger('', 'silent') });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  async function call(method: string, path: string, options: { token?: string; body?: unknown; raw?: string } = {}) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (options.token) headers.Authorization = `Bearer ${options.token}`;
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.raw ?? (options.body === undefined ? undefined : JSON.stringify(options.body))
    });
    const text = await res.text();
    return { status: res.status, body: text ? JSON.parse(text) : null };
  }

  function register(username: string, role: 'scrum_master' | 'employee') {
    return call('POST', '/auth/register/', {
      body: {
        username,
        email: `${username}@example.com`,
        first_name: username,
        last_name: 'Tester',
        password: 'password123',
        password_confirm: 'password123',
        role
      }
    });
  }

  let masterToken: string;
  let devToken: string;
  let devRefresh: string;
  let devId: string;
  let orbitId: string;
  let hiddenId: string;
  const orbitTaskIds: string[] = [];

  it('reports health', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { ok: true } });
  });

  it('registers users and returns a token pair', async () => {
    const master = await register('sm', 'scrum_master');
    expect(master.status).toBe(201);
    expect(master.body.user).toMatchObject({ username: 'sm', role: 'scrum_master', first_name: 'sm' });
    masterToken = master.body.tokens.access;

    const dev = await register('dev', 'employee');
    devToken = dev.body.tokens.access;
    devRefresh = dev.body.tokens.refresh;
    devId = dev.body.user.id;
  });

  it('rejects a duplicate username', async () => {
    const res = await register('dev', 'employee');
    expect(res.status).toBe(400);
    expect(res.body.fields).toEqual({ username: ['A user with that username already exists.'] });
  });

  it('rejects mismatched passwords', async () => {
    const res = await call('POST', '/auth/register/', {
      body: {
        username: 'other',
        email: 'other@example.com',
        first_name: 'O',
        last_name: 'T',
        password: 'password123',
        password_confirm: 'password124'
      }
    });
    expect(res.status).toBe(400);
    expect(res.body.fields).toEqual({ password_confirm: ["Passwords don't match"] });
  });

  it('logs in with valid credentials only', async () => {
    const ok = await call('POST', '/auth/login/', { body: { username: 'dev', password: 'password123' } });
    expect(ok.status).toBe(200);
    expect(ok.body.user.username).toBe('dev');

    const bad = await call('POST', '/auth/login/', { body: { username: 'dev', password: 'wrong-password' } });
    expect(bad).toEqual({ status: 401, body: { error: 'Invalid credentials' } });
  });

  it('requires an access token', async () => {
    expect(await call('GET', '/tasks/')).toEqual({ status: 401, body: { error: 'Unauthorized' } });
    expect(await call('GET', '/tasks/', { token: devRefresh })).toEqual({ status: 401, body: { error: 'Invalid token' } });
  });

  it('exchanges a refresh token for a new access token', async () => {
    const refreshed = await call('POST', '/auth/refresh/', { body: { refresh: devRefresh } });
    expect(refreshed.status).toBe(200);
    const profile = await call('GET', '/auth/profile/', { token: refreshed.body.access });
    expect(profile.body.username).toBe('dev');

    const invalid = await call('POST', '/auth/refresh/', { body: { refresh: devToken } });
    expect(invalid.status).toBe(401);
  });

  it('updates the profile', async () => {
    const res = await call('PATCH', '/auth/profile/', { token: devToken, body: { first_name: 'Devon' } });
    expect(res.status).toBe(200);
    expect(res.body.first_name).toBe('Devon');
  });

  it('lets only a scrum master create projects', async () => {
    const denied = await call('POST', '/projects/', { token: devToken, body: { name: 'Nope' } });
    expect(denied).toEqual({ status: 403, body: { error: 'Only a Scrum Master can manage projects' } });

    const orbit = await call('POST', '/projects/', {
      token: masterToken,
      body: { name: 'Orbit', description: 'Station work', member_ids: [devId] }
    });
    expect(orbit.status).toBe(201);
    expect(orbit.body.members.map((m: { username: string }) => m.username)).toEqual(['dev']);
    orbitId = orbit.body.id;

    const hidden = await call('POST', '/projects/', { token: masterToken, body: { name: 'Hidden' } });
    hiddenId = hidden.body.id;
  });

  it('creates tasks with sequential codes', async () => {
    const codes: string[] = [];
    for (const title of ['Dock', 'Refuel', 'Launch', 'Land']) {
      const res = await call('POST', '/tasks/', { token: masterToken, body: { title, project: orbitId } });
      expect(res.status).toBe(201);
      codes.push(res.body.task_id);
      orbitTaskIds.push(res.body.id);
    }
    expect(codes).toEqual(['ORB-1', 'ORB-2', 'ORB-3', 'ORB-4']);
    await call('POST', '/tasks/', { token: masterToken, body: { title: 'Secret', project: hiddenId } });
  });

  it('scopes task listings by role', async () => {
    const mine = await call('GET', '/tasks/', { token: devToken });
    expect(mine.body).toHaveLength(4);
    const all = await call('GET', '/tasks/', { token: masterToken });
    expect(all.body).toHaveLength(5);
    const projects = await call('GET', '/projects/', { token: devToken });
    expect(projects.body.map((p: { name: string }) => p.name)).toEqual(['Orbit']);
  });

  it('moves a task and records the transition', async () => {
    const res = await call('PATCH', '/tasks/status-update/', {
      token: devToken,
      body: { task_id: orbitTaskIds[0], status: 'done' }
    });
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('done');
    expect(res.body.task_id).toBe('ORB-1');

    const detail = await call('GET', `/tasks/${orbitTaskIds[0]}/`, { token: devToken });
    expect(detail.body.activity_logs[0]).toMatchObject({
      action: 'status_changed',
      description: 'Status changed from todo to done',
      old_value: 'todo',
      new_value: 'done'
    });
  });

  it('validates status updates', async () => {
    const invalid = await call('PATCH', '/tasks/status-update/', {
      token: devToken,
      body: { task_id: orbitTaskIds[1], status: 'archived' }
    });
    expect(invalid).toEqual({
      status: 400,
      body: { error: 'Invalid input', fields: { status: ['"archived" is not a valid choice.'] } }
    });

    const missing = await call('PATCH', '/tasks/status-update/', {
      token: devToken,
      body: { task_id: 'missing-task', status: 'done' }
    });
    expect(missing).toEqual({ status: 404, body: { error: 'Task not found' } });
  });

  it('serves the kanban board', async () => {
    const board = await call('GET', `/kanban/${orbitId}/`, { token: devToken });
    expect(board.status).toBe(200);
    expect(board.body.todo).toMatchObject({ name: 'To Do', count: 3 });
    expect(board.body.done).toMatchObject({ name: 'Done', count: 1 });

    expect((await call('GET', `/kanban/${hiddenId}/`, { token: devToken })).status).toBe(403);
    expect((await call('GET', '/kanban/missing-project/', { token: devToken })).status).toBe(404);
  });

  it('searches visible tasks', async () => {
    const res = await call('GET', '/tasks/search/?q=secret', { token: devToken });
    expect(res.body).toEqual({ tasks: [] });
    const found = await call('GET', '/tasks/search/?q=REFUEL', { token: devToken });
    expect(found.body.tasks.map((t: { task_id: string }) => t.task_id)).toEqual(['ORB-2']);
  });

  it('adds comments', async () => {
    const res = await call('POST', `/tasks/${orbitTaskIds[1]}/comments/`, {
      token: devToken,
      body: { content: 'Fuel lines checked' }
    });
    expect(res.status).toBe(201);
    expect(res.body.author.username).toBe('dev');
    const list = await call('GET', `/tasks/${orbitTaskIds[1]}/comments/`, { token: devToken });
    expect(list.body.map((c: { content: string }) => c.content)).toEqual(['Fuel lines checked']);
  });

  it('computes the dashboard over visible tasks', async () => {
    const res = await call('GET', '/analytics/dashboard/', { token: devToken });
    expect(res.status).toBe(200);
    expect(res.body.overview).toMatchObject({ total_tasks: 4, completed_tasks: 1, completion_rate: 25 });
  });

  it('records behavior events', async () => {
    const res = await call('POST', '/analytics/behavior/', {
      token: devToken,
      body: { action_type: 'task_status_update', task: orbitTaskIds[0], metadata: { old_status: 'todo', new_status: 'done' } }
    });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ action_type: 'task_status_update', task: orbitTaskIds[0] });

    const unknown = await call('POST', '/analytics/behavior/', {
      token: devToken,
      body: { action_type: 'task_view', task: 'missing-task' }
    });
    expect(unknown.status).toBe(400);
  });

  it('rejects malformed JSON', async () => {
    const res = await call('POST', '/auth/login/', { raw: '{"username":' });
    expect(res).toEqual({ status: 400, body: { error: 'Malformed JSON body' } });
  });

  it('answers unknown routes with 404', async () => {
    expect(await call('GET', '/nowhere')).toEqual({ status: 404, body: { error: 'Not found' } });
  });
});
