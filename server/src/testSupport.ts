import type { Store } from './db/store';
import type { TaskInput } from './services/tasks';
import type { Role, User } from './types';

export async function addUser(store: Store, username: string, role: Role = 'employee'): Promise<User> {
  return store.createUser({
    username,
    email: `${username}@example.com`,
    firstName: username,
    lastName: 'Tester',
    role,
    passwordHash: 'not-a-real-hash'
  });
}

export function taskInput(projectId: string, title: string, overrides: Partial<TaskInput> = {}): TaskInput {
  return {
    title,
    description: '',
    projectId,
    assignedTo: null,
    status: 'todo',
    priority: 'medium',
    labelIds: [],
    dueDate: null,
    estimatedHours: null,
    ...overrides
  };
}
