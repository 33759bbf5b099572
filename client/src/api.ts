import type { Session } from './session';
import type {
  BehaviorEvent,
  Board,
  Comment,
  Dashboard,
  Label,
  Project,
  Role,
  Task,
  TaskDetail,
  TaskPriority,
  TaskStatus,
  TokenPair,
  User
} from './types';

export function normalizeBaseUrl(raw?: string): string {
  let base = (raw ?? '').trim();
  if (!base) return 'http://localhost:4000';
  if (base.endsWith('/')) base = base.slice(0, -1);
  if (!/^https?:\/\//i.test(base)) {
    base = `https://${base}`;
  }
  return base;
}

/** A non-2xx response; `body` is the parsed JSON error when there was one. */
export class ApiError extends Error {
  constructor(readonly status: number, readonly body: unknown) {
    super(`HTTP ${status}: ${ApiError.describe(body)}`);
    this.name = 'ApiError';
  }

  private static describe(body: unknown): string {
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
    return typeof body === 'string' ? body : 'Request failed';
  }

  get fields(): Record<string, string[]> {
    if (typeof this.body !== 'object' || this.body === null || !('fields' in this.body)) return {};
    const { fields } = this.body;
    if (typeof fields !== 'object' || fields === null) return {};
    const out: Record<string, string[]> = {};
    for (const [key, value] of Object.entries(fields)) {
      if (Array.isArray(value)) out[key] = value.filter((v): v is string => typeof v === 'string');
    }
    return out;
  }
}

export interface ApiClientOptions {
  baseUrl: string;
  session: Session;
  fetch?: typeof fetch;
  /** Called after a failed token refresh has cleared the session. */
  onAuthFailure?: () => void;
}

export type AuthResult = { user: User; tokens: TokenPair };

export type RegisterInput = {
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  password: string;
  password_confirm: string;
  role: Role;
};

export type ProjectInput = {
  name: string;
  description?: string;
  member_ids?: string[];
  is_active?: boolean;
};

export type TaskInput = {
  title: string;
  project: string;
  description?: string;
  assigned_to_id?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  label_ids?: string[];
  due_date?: string | null;
  estimated_hours?: number | null;
};

export type TaskUpdate = Partial<Omit<TaskInput, 'project'>> & { actual_hours?: number };

type Method = 'GET' | 'POST' | 'PATCH' | 'DELETE';

function query(params: Record<string, string | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value) search.set(key, value);
  }
  const text = search.toString();
  return text ? `?${text}` : '';
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function createApiClient({ baseUrl, session, fetch: fetchImpl, onAuthFailure }: ApiClientOptions) {
  const base = normalizeBaseUrl(baseUrl);
  const doFetch = fetchImpl ?? globalThis.fetch.bind(globalThis);
  let refreshing: Promise<boolean> | null = null;

  function send(method: Method, path: string, body: unknown, auth: boolean): Promise<Response> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    const token = session.current.access;
    if (auth && token) headers['Authorization'] = `Bearer ${token}`;
    return doFetch(`${base}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body)
    });
  }

  async function refreshAccess(): Promise<boolean> {
    const refresh = session.current.refresh;
    if (!refresh) return false;
    const res = await send('POST', '/auth/refresh/', { refresh }, false);
    if (!res.ok) return false;
    const data = (await res.json()) as { access: string };
    session.setAccess(data.access);
    return true;
  }

  // Concurrent 401s share one refresh call.
  function refreshOnce(): Promise<boolean> {
    refreshing ??= refreshAccess().finally(() => {
      refreshing = null;
    });
    return refreshing;
  }

  async function call(method: Method, path: string, body?: unknown, auth = true): Promise<Response> {
    const res = await send(method, path, body, auth);
    if (res.status !== 401 || !auth || !session.current.access) return res;

    if (await refreshOnce()) return send(method, path, body, auth);
    session.clear();
    onAuthFailure?.();
    return res;
  }

  async function http<T>(method: Method, path: string, body?: unknown, auth = true): Promise<T> {
    const res = await call(method, path, body, auth);
    if (!res.ok) throw new ApiError(res.status, await readBody(res));
    return (await res.json()) as T;
  }

  async function httpVoid(method: Method, path: string, body?: unknown): Promise<void> {
    const res = await call(method, path, body);
    if (!res.ok) throw new ApiError(res.status, await readBody(res));
  }

  return {
    register: async (input: RegisterInput) => {
      const result = await http<AuthResult>('POST', '/auth/register/', input, false);
      session.start(result.user, result.tokens);
      return result.user;
    },
    login: async (username: string, password: string) => {
      const result = await http<AuthResult>('POST', '/auth/login/', { username, password }, false);
      session.start(result.user, result.tokens);
      return result.user;
    },
    logout: () => session.clear(),
    profile: () => http<User>('GET', '/auth/profile/'),
    updateProfile: async (data: Partial<Pick<User, 'email' | 'first_name' | 'last_name'>>) => {
      const user = await http<User>('PATCH', '/auth/profile/', data);
      session.setUser(user);
      return user;
    },
    listUsers: () => http<User[]>('GET', '/users/'),

    listProjects: () => http<Project[]>('GET', '/projects/'),
    getProject: (id: string) => http<Project>('GET', `/projects/${id}/`),
    createProject: (data: ProjectInput) => http<Project>('POST', '/projects/', data),
    updateProject: (id: string, data: Partial<ProjectInput>) => http<Project>('PATCH', `/projects/${id}/`, data),
    deleteProject: (id: string) => httpVoid('DELETE', `/projects/${id}/`),
    listLabels: (projectId: string) => http<Label[]>('GET', `/projects/${projectId}/labels/`),
    createLabel: (projectId: string, data: { name: string; color?: string }) =>
      http<Label>('POST', `/projects/${projectId}/labels/`, data),

    listTasks: (filter: { project?: string; status?: TaskStatus } = {}) =>
      http<Task[]>('GET', `/tasks/${query(filter)}`),
    searchTasks: async (q: string, project?: string) =>
      (await http<{ tasks: Task[] }>('GET', `/tasks/search/${query({ q, project })}`)).tasks,
    getTask: (id: string) => http<TaskDetail>('GET', `/tasks/${id}/`),
    createTask: (data: TaskInput) => http<TaskDetail>('POST', '/tasks/', data),
    updateTask: (id: string, data: TaskUpdate) => http<TaskDetail>('PATCH', `/tasks/${id}/`, data),
    deleteTask: (id: string) => httpVoid('DELETE', `/tasks/${id}/`),
    updateTaskStatus: (taskId: string, status: TaskStatus) =>
      http<TaskDetail>('PATCH', '/tasks/status-update/', { task_id: taskId, status }),
    listComments: (taskId: string) => http<Comment[]>('GET', `/tasks/${taskId}/comments/`),
    addComment: (taskId: string, content: string) => http<Comment>('POST', `/tasks/${taskId}/comments/`, { content }),

    board: (projectId: string) => http<Board>('GET', `/kanban/${projectId}/`),
    dashboard: (projectId?: string) => http<Dashboard>('GET', `/analytics/dashboard/${query({ project: projectId })}`),
    trackBehavior: (event: BehaviorEvent) => httpVoid('POST', '/analytics/behavior/', event)
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;
