import type { PasswordHasher } from '../auth';
import type { Store } from '../db/store';
import type { Logger } from '../logger';
import type { LabelJson } from '../serializers';
import type { Role, TaskPriority, TaskStatus, User } from '../types';
import { ProjectService } from './projects';
import { TaskService } from './tasks';

export const DEMO_PASSWORD = 'password123';
export const DEMO_PROJECT = 'Teams in Space';

const DEMO_USERS: { username: string; firstName: string; lastName: string; role: Role }[] = [
  { username: 'scrum_master', firstName: 'Sam', lastName: 'Rivera', role: 'scrum_master' },
  { username: 'dev_alex', firstName: 'Alex', lastName: 'Chen', role: 'employee' },
  { username: 'dev_jordan', firstName: 'Jordan', lastName: 'Patel', role: 'employee' }
];

const DEMO_LABELS = [
  { name: 'frontend', color: '#0052cc' },
  { name: 'backend', color: '#36b37e' },
  { name: 'bug', color: '#ff5630' }
];

const DEMO_TASKS: { title: string; status: TaskStatus; priority: TaskPriority; assignee: number; label: number }[] = [
  { title: 'Design mission control dashboard', status: 'todo', priority: 'high', assignee: 1, label: 0 },
  { title: 'Implement launch sequence API', status: 'in_progress', priority: 'urgent', assignee: 2, label: 1 },
  { title: 'Fix oxygen level rounding', status: 'code_review', priority: 'medium', assignee: 1, label: 2 },
  { title: 'Write crew onboarding guide', status: 'done', priority: 'low', assignee: 2, label: 0 },
  { title: 'Add telemetry export', status: 'todo', priority: 'medium', assignee: 1, label: 1 }
];

export interface SeedResult {
  created: boolean;
  users: User[];
  projectId: string | null;
}

/** Creates the demo users, project, labels and tasks unless they already exist. */
export async function seedDemo(store: Store, passwords: PasswordHasher, log: Logger): Promise<SeedResult> {
  if (await store.findUserByUsername(DEMO_USERS[0].username)) {
    log.info('Demo data already present, skipping');
    return { created: false, users: [], projectId: null };
  }

  const passwordHash = await passwords.hash(DEMO_PASSWORD);
  const users: User[] = [];
  for (const demo of DEMO_USERS) {
    users.push(await store.createUser({ ...demo, email: `${demo.username}@example.com`, passwordHash }));
  }
  const [master] = users;

  const projects = new ProjectService(store);
  const project = await projects.create(master, {
    name: DEMO_PROJECT,
    description: 'Sample project for trying out the board',
    memberIds: users.map(u => u.id),
    isActive: true
  });
  const labels: LabelJson[] = [];
  for (const label of DEMO_LABELS) {
    labels.push(await projects.createLabel(master, project.id, label));
  }

  const tasks = new TaskService(store);
  for (const demo of DEMO_TASKS) {
    const task = await tasks.create(master, {
      title: demo.title,
      description: '',
      projectId: project.id,
      assignedTo: users[demo.assignee].id,
      status: demo.status,
      priority: demo.priority,
      labelIds: [labels[demo.label].id],
      dueDate: null,
      estimatedHours: null
    });
    log.info(`Created ${task.task_id}: ${task.title}`);
  }

  log.info(`Seeded ${users.length} users and project "${DEMO_PROJECT}" (password: ${DEMO_PASSWORD})`);
  return { created: true, users, projectId: project.id };
}
