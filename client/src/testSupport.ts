import type { SessionStorage } from './session';
import type { Task, TaskStatus, User } from './types';

export class MemoryStorage implements SessionStorage {
  readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

export function makeUser(username: string, overrides: Partial<User> = {}): User {
  return {
    id: `user-${username}`,
    username,
    email: `${username}@example.com`,
    first_name: '',
    last_name: '',
    role: 'employee',
    date_joined: '2024-01-01T00:00:00.000Z',
    ...overrides
  };
}

export function makeTask(id: string, status: TaskStatus, overrides: Partial<Task> = {}): Task {
  return {
    id,
    task_id: `ORB-${id}`,
    title: `Task ${id}`,
    description: '',
    project: 'project-1',
    assigned_to: null,
    created_by: null,
    status,
    priority: 'medium',
    labels: [],
    due_date: null,
    estimated_hours: null,
    actual_hours: 0,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    ...overrides
  };
}
