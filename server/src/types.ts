export const ROLES = ['scrum_master', 'employee'] as const;
export type Role = (typeof ROLES)[number];

export const TASK_STATUSES = ['todo', 'in_progress', 'code_review', 'done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const STATUS_NAMES: Record<TaskStatus, string> = {
  todo: 'To Do',
  in_progress: 'In Progress',
  code_review: 'Code Review',
  done: 'Done'
};

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const ACTIVITY_ACTIONS = ['created', 'updated', 'status_changed', 'assigned', 'commented', 'completed'] as const;
export type ActivityAction = (typeof ACTIVITY_ACTIONS)[number];

export interface User {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  passwordHash: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Project {
  id: string;
  name: string;
  description: string;
  createdBy: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Label {
  id: string;
  projectId: string;
  name: string;
  color: string;
  createdAt: Date;
}

export interface Task {
  id: string;
  /** Human-readable code such as `TEA-12`, assigned once at creation. */
  code: string;
  projectId: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  assignedTo: string | null;
  createdBy: string;
  dueDate: Date | null;
  estimatedHours: number | null;
  actualHours: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface Comment {
  id: string;
  taskId: string;
  authorId: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ActivityLog {
  id: string;
  taskId: string;
  userId: string;
  action: ActivityAction;
  description: string;
  oldValue: string | null;
  newValue: string | null;
  timestamp: Date;
}

export type BehaviorMetadata = Record<string, unknown>;

export interface UserBehavior {
  id: string;
  userId: string;
  actionType: string;
  taskId: string | null;
  durationSeconds: number | null;
  metadata: BehaviorMetadata;
  timestamp: Date;
}

export function isRole(value: unknown): value is Role {
  return ROLES.some(v => v === value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some(v => v === value);
}

export function isTaskPriority(value: unknown): value is TaskPriority {
  return TASK_PRIORITIES.some(v => v === value);
}

export function isActivityAction(value: unknown): value is ActivityAction {
  return ACTIVITY_ACTIONS.some(v => v === value);
}
