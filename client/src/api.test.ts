import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ApiError, createApiClient, normalizeBaseUrl } from './api';
import { Session } from './session';
import { MemoryStorage, makeUser } from './testSupport';

type Handler = (url: string, init: RequestInit) => Response;

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function authHeader(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get('Authorization');
}

describe('normalizeBaseUrl', () => {
  it('falls back to the local API', () => {
    expect(normalizeBaseUrl('')).toBe('http://localhost:4000');
    expect(normalizeBaseUrl(undefined)).toBe('http://localhost:4000');
  });

  it('adds a scheme and drops a trailing slash', () => {
    expect(normalizeBaseUrl('api.example.com/')).toBe('https://api.example.com');
    expect(normalizeBaseUrl('http://localhost:4000')).toBe('http://localhost:4000');
  });
});

describe('createApiClient', () => {
  let session: Session;
  let onAuthFailure: Mock<() => void>;

  beforeEach(() => {
    session = new Session(new MemoryStorage());
    session.start(makeUser('alex'), { access: 'old-access', refresh: 'test-refresh' });
    onAuthFailure = vi.fn<() => void>();
  });

  function client(handler: Handler) {
    const fetchMock = vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => handler(String(input), init ?? {}));
    const api = createApiClient({ baseUrl: 'http://api.test', session, fetch: fetchMock, onAuthFailure });
    return { api, fetchMock };
  }

  it('sends the access token as a bearer header', async () => {
    const { api, fetchMock } = client(() => json(200, []));
    await api.listProjects();

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://api.test/projects/');
    expect(authHeader(init)).toBe('Bearer old-access');
  });

  it('refreshes an expired access token and replays the request once', async () => {
    const { api, fetchMock } = client((url, init) => {
      if (url.endsWith('/auth/refresh/')) return json(200, { access: 'new-access' });
      return authHeader(init) === 'Bearer new-access' ? json(200, []) : json(401, { error: 'Token expired' });
    });

    expect(await api.listProjects()).toEqual([]);
    expect(session.current.access).toBe('new-access');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(authHeader(fetchMock.mock.calls[2][1])).toBe('Bearer new-access');
    expect(onAuthFailure).not.toHaveBeenCalled();
  });

  it('shares one refresh between concurrent requests', async () => {
    const { api, fetchMock } = client((url, init) => {
      if (url.endsWith('/auth/refresh/')) return json(200, { access: 'new-access' });
      return authHeader(init) === 'Bearer new-access' ? json(200, []) : json(401, { error: 'Token expired' });
    });

    await Promise.all([api.listProjects(), api.listUsers()]);
    expect(fetchMock.mock.calls.filter(([url]) => String(url).endsWith('/auth/refresh/'))).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(5);
  });

  it('clears the session and reports when the refresh fails', async () => {
    const { api } = client(url =>
      url.endsWith('/auth/refresh/') ? json(401, { error: 'Invalid token' }) : json(401, { error: 'Token expired' })
    );

    const error = await api.listProjects().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError && error.status).toBe(401);
    expect(session.current).toEqual({ user: null, access: null, refresh: null });
    expect(onAuthFailure).toHaveBeenCalledTimes(1);
  });

  it('does not refresh for an unauthenticated request', async () => {
    const { api, fetchMock } = client(() => json(401, { error: 'Invalid credentials' }));

    await expect(api.login('alex', 'wrong-password')).rejects.toThrow('HTTP 401: Invalid credentials');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(onAuthFailure).not.toHaveBeenCalled();
  });

  it('exposes field errors from a validation response', async () => {
    const { api } = client(() => json(400, { error: 'Validation failed', fields: { email: ['Enter a valid email address.'] } }));

    const error = await api
      .register({
        username: 'alex',
        email: 'nope',
        first_name: 'Alex',
        last_name: 'Doe',
        password: 'password123',
        password_confirm: 'password123',
        role: 'employee'
      })
      .catch((e: unknown) => e);

    expect(error instanceof ApiError && error.fields).toEqual({ email: ['Enter a valid email address.'] });
  });

  it('starts the session on login', async () => {
    session.clear();
    const user = makeUser('jordan');
    const { api } = client(() => json(200, { user, tokens: { access: 'test-access', refresh: 'test-refresh' } }));

    expect(await api.login('jordan', 'password123')).toEqual(user);
    expect(session.current).toEqual({ user, access: 'test-access', refresh: 'test-refresh' });
  });

  it('sends the primary id and status for a status update', async () => {
    const { api, fetchMock } = client(() => json(200, {}));
    await api.updateTaskStatus('task-1', 'done');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://api.test/tasks/status-update/');
    expect(init?.method).toBe('PATCH');
    expect(typeof init?.body === 'string' && JSON.parse(init.body)).toEqual({ task_id: 'task-1', status: 'done' });
  });
});
