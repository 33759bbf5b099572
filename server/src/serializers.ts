import type {
  ActivityAction,
  ActivityLog,
  BehaviorMetadata,
  Comment,
  Label,
  Project,
  Role,
  Task,
  TaskPriority,
  TaskStatus,
  User,
  UserBehavior
} from './types';

export interface UserJson {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: Role;
  date_joined: string;
}

export interface LabelJson {
  id: string;
  name: string;
  color: string;
  created_at: string;
}

export interface CommentJson {
  id: string;
  content: string;
  author: UserJson | null;
  created_at: string;
  updated_at: string;
}

export interface ActivityLogJson {
  id: string;
  action: ActivityAction;
  description: string;
  user: UserJson | null;
  old_value: string | null;
  new_value: string | null;
  timestamp: string;
}

export interface TaskJson {
  id: string;
  task_id: string;
  title: string;
  description: string;
  project: string;
  assigned_to: UserJson | null;
  created_by: UserJson | null;
  status: TaskStatus;
  priority: TaskPriority;
  labels: LabelJson[];
  due_date: string | null;
  estimated_hours: number | null;
  actual_hours: number;
  created_at: string;
  updated_at: string;
}

export interface TaskDetailJson extends TaskJson {
  comments: CommentJson[];
  activity_logs: ActivityLogJson[];
}

export interface ProjectJson {
  id: string;
  name: string;
  description: string;
  created_by: string;
  members: UserJson[];
  labels: LabelJson[];
  task_count: number;
  created_at: string;
  updated_at: string;
  is_active: boolean;
}

export interface BehaviorJson {
  id: string;
  action_type: string;
  task: string | null;
  duration_seconds: number | null;
  metadata: BehaviorMetadata;
  timestamp: string;
}

export function serializeUser(u: User): UserJson {
  return {
    id: u.id,
    username: u.username,
    email: u.email,
    first_name: u.firstName,
    last_name: u.lastName,
    role: u.role,
    date_joined: u.createdAt.toISOString()
  };
}

function userOrNull(users: Map<string, User>, id: string | null): UserJson | null {
  const user = id ? users.get(id) : undefined;
  return user ? serializeUser(user) : null;
}

export function serializeLabel(l: Label): LabelJson {
  return { id: l.id, name: l.name, color: l.color, created_at: l.createdAt.toISOString() };
}

export function serializeComment(c: Comment, users: Map<string, User>): CommentJson {
  return {
    id: c.id,
    content: c.content,
    author: userOrNull(users, c.authorId),
    created_at: c.createdAt.toISOString(),
    updated_at: c.updatedAt.toISOString()
  };
}

export function serializeActivity(a: ActivityLog, users: Map<string, User>): ActivityLogJson {
  return {
    id: a.id,
    action: a.action,
    description: a.description,
    user: userOrNull(users, a.userId),
    old_value: a.oldValue,
    new_value: a.newValue,
    timestamp: a.timestamp.toISOString()
  };
}

export function serializeTask(t: Task, users: Map<string, User>, labels: Label[]): TaskJson {
  return {
    id: t.id,
    task_id: t.code,
    title: t.title,
    description: t.description,
    project: t.projectId,
    assigned_to: userOrNull(users, t.assignedTo),
    created_by: userOrNull(users, t.createdBy),
    status: t.status,
    priority: t.priority,
    labels: labels.map(serializeLabel),
    due_date: t.dueDate ? t.dueDate.toISOString() : null,
    estimated_hours: t.estimatedHours,
    actual_hours: t.actualHours,
    created_at: t.createdAt.toISOString(),
    updated_at: t.updatedAt.toISOString()
  };
}

export function serializeProject(p: Project, members: User[], labels: Label[], taskCount: number): ProjectJson {
  return {
    id: p.id,
    name: p.name,
    description: p.description,
    created_by: p.createdBy,
    members: members.map(serializeUser),
    labels: labels.map(serializeLabel),
    task_count: taskCount,
    created_at: p.createdAt.toISOString(),
    updated_at: p.updatedAt.toISOString(),
    is_active: p.isActive
  };
}

export function serializeBehavior(b: UserBehavior): BehaviorJson {
  return {
    id: b.id,
    action_type: b.actionType,
    task: b.taskId,
    duration_seconds: b.durationSeconds,
    metadata: b.metadata,
    timestamp: b.timestamp.toISOString()
  };
}
