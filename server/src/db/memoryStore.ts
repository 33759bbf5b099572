import { randomUUID } from 'crypto';
import type { ActivityLog, Comment, Label, Project, Task, User, UserBehavior } from '../types';
import type {
  NewActivity,
  NewBehavior,
  NewComment,
  NewLabel,
  NewProject,
  NewTask,
  NewUser,
  ProjectFilter,
  ProjectPatch,
  Store,
  TaskFilter,
  TaskPatch,
  UserPatch
} from './store';

interface Tables {
  users: User[];
  projects: Project[];
  members: { projectId: string; userId: string }[];
  taskSeq: Record<string, number>;
  labels: Label[];
  tasks: Task[];
  taskLabels: { taskId: string; labelId: string }[];
  comments: Comment[];
  activity: ActivityLog[];
  behaviors: UserBehavior[];
}

function emptyTables(): Tables {
  return {
    users: [],
    projects: [],
    members: [],
    taskSeq: {},
    labels: [],
    tasks: [],
    taskLabels: [],
    comments: [],
    activity: [],
    behaviors: []
  };
}

/** Stable newest-first ordering; rows inserted later win ties. */
function newestFirst<T>(rows: T[], at: (row: T) => Date): T[] {
  return rows
    .map((row, index) => ({ row, index }))
    .sort((a, b) => at(b.row).getTime() - at(a.row).getTime() || b.index - a.index)
    .map(entry => entry.row);
}

/**
 * Store kept in process memory, with the same cascade rules as the SQL schema.
 * Transactions snapshot the tables and restore them when `fn` throws.
 */
export class MemoryStore implements Store {
  private tables: Tables = emptyTables();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async ping(): Promise<void> {}

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.tables);
    try {
      return await fn(this);
    } catch (e) {
      this.tables = snapshot;
      throw e;
    }
  }

  async createUser(input: NewUser): Promise<User> {
    if (this.tables.users.some(u => u.username === input.username)) {
      throw new Error(`Duplicate entry '${input.username}' for key 'users.username'`);
    }
    const at = this.now();
    const user: User = { ...input, id: randomUUID(), createdAt: at, updatedAt: at };
    this.tables.users.push(user);
    return { ...user };
  }

  async findUserById(id: string): Promise<User | null> {
    const user = this.tables.users.find(u => u.id === id);
    return user ? { ...user } : null;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const user = this.tables.users.find(u => u.username === username);
    return user ? { ...user } : null;
  }

  async findUsersByIds(ids: string[]): Promise<User[]> {
    return this.tables.users.filter(u => ids.includes(u.id)).map(u => ({ ...u }));
  }

  async listUsers(): Promise<User[]> {
    return [...this.tables.users].sort((a, b) => a.username.localeCompare(b.username)).map(u => ({ ...u }));
  }

  async updateUser(id: string, patch: UserPatch): Promise<User | null> {
    const user = this.tables.users.find(u => u.id === id);
    if (!user) return null;
    Object.assign(user, stripUndefined(patch), { updatedAt: this.now() });
    return { ...user };
  }

  async createProject(input: NewProject): Promise<Project> {
    const at = this.now();
    const project: Project = {
      id: randomUUID(),
      name: input.name,
      description: input.description,
      createdBy: input.createdBy,
      isActive: input.isActive,
      createdAt: at,
      updatedAt: at
    };
    this.tables.projects.push(project);
    this.tables.taskSeq[project.id] = 0;
    await this.setProjectMembers(project.id, input.memberIds);
    return { ...project };
  }

  async findProject(id: string): Promise<Project | null> {
    const project = this.tables.projects.find(p => p.id === id);
    return project ? { ...project } : null;
  }

  async listProjects(filter: ProjectFilter = {}): Promise<Project[]> {
    const { memberId } = filter;
    const visible = memberId
      ? this.tables.projects.filter(p => this.memberOf(p.id, memberId))
      : this.tables.projects;
    return newestFirst(visible, p => p.createdAt).map(p => ({ ...p }));
  }

  async updateProject(id: string, patch: ProjectPatch): Promise<Project | null> {
    const project = this.tables.projects.find(p => p.id === id);
    if (!project) return null;
    Object.assign(project, stripUndefined(patch), { updatedAt: this.now() });
    return { ...project };
  }

  async deleteProject(id: string): Promise<boolean> {
    const before = this.tables.projects.length;
    this.tables.projects = this.tables.projects.filter(p => p.id !== id);
    if (this.tables.projects.length === before) return false;
    this.tables.members = this.tables.members.filter(m => m.projectId !== id);
    delete this.tables.taskSeq[id];
    const labelIds = new Set(this.tables.labels.filter(l => l.projectId === id).map(l => l.id));
    this.tables.labels = this.tables.labels.filter(l => l.projectId !== id);
    this.tables.taskLabels = this.tables.taskLabels.filter(tl => !labelIds.has(tl.labelId));
    for (const task of this.tables.tasks.filter(t => t.projectId === id)) {
      await this.deleteTask(task.id);
    }
    return true;
  }

  async listProjectMembers(projectId: string): Promise<User[]> {
    const ids = this.tables.members.filter(m => m.projectId === projectId).map(m => m.userId);
    return (await this.listUsers()).filter(u => ids.includes(u.id));
  }

  async setProjectMembers(projectId: string, userIds: string[]): Promise<void> {
    this.tables.members = this.tables.members.filter(m => m.projectId !== projectId);
    for (const userId of new Set(userIds)) {
      if (!this.tables.users.some(u => u.id === userId)) {
        throw new Error(`Cannot add or update a child row: unknown user ${userId}`);
      }
      this.tables.members.push({ projectId, userId });
    }
  }

  async isProjectMember(projectId: string, userId: string): Promise<boolean> {
    return this.memberOf(projectId, userId);
  }

  async countProjectTasks(projectId: string): Promise<number> {
    return this.tables.tasks.filter(t => t.projectId === projectId).length;
  }

  async nextTaskNumber(projectId: string): Promise<number> {
    const current = this.tables.taskSeq[projectId];
    if (current === undefined) throw new Error(`Project ${projectId} does not exist`);
    this.tables.taskSeq[projectId] = current + 1;
    return current + 1;
  }

  async createLabel(input: NewLabel): Promise<Label> {
    const label: Label = { ...input, id: randomUUID(), createdAt: this.now() };
    this.tables.labels.push(label);
    return { ...label };
  }

  async listLabels(projectId: string): Promise<Label[]> {
    return this.tables.labels
      .filter(l => l.projectId === projectId)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(l => ({ ...l }));
  }

  async findLabelsByIds(ids: string[]): Promise<Label[]> {
    return this.tables.labels.filter(l => ids.includes(l.id)).map(l => ({ ...l }));
  }

  async createTask(input: NewTask): Promise<Task> {
    if (this.tables.tasks.some(t => t.code === input.code)) {
      throw new Error(`Duplicate entry '${input.code}' for key 'tasks.code'`);
    }
    const at = this.now();
    const task: Task = { ...input, id: randomUUID(), createdAt: at, updatedAt: at };
    this.tables.tasks.push(task);
    return { ...task };
  }

  async findTask(id: string): Promise<Task | null> {
    const task = this.tables.tasks.find(t => t.id === id);
    return task ? { ...task } : null;
  }

  async findTaskForUpdate(id: string): Promise<Task | null> {
    return this.findTask(id);
  }

  async findTaskByCode(code: string): Promise<Task | null> {
    const task = this.tables.tasks.find(t => t.code === code);
    return task ? { ...task } : null;
  }

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    const search = filter.search?.toLowerCase();
    const { memberId } = filter;
    const matched = this.tables.tasks.filter(
      t =>
        (!filter.projectId || t.projectId === filter.projectId) &&
        (!filter.status || t.status === filter.status) &&
        (!filter.assignedTo || t.assignedTo === filter.assignedTo) &&
        (!memberId || this.memberOf(t.projectId, memberId)) &&
        (!search || t.title.toLowerCase().includes(search) || t.description.toLowerCase().includes(search))
    );
    const ordered = newestFirst(matched, t => t.createdAt).map(t => ({ ...t }));
    return filter.limit === undefined ? ordered : ordered.slice(0, filter.limit);
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task | null> {
    const task = this.tables.tasks.find(t => t.id === id);
    if (!task) return null;
    const changes = stripUndefined(patch);
    if (Object.keys(changes).length) Object.assign(task, changes, { updatedAt: this.now() });
    return { ...task };
  }

  async deleteTask(id: string): Promise<boolean> {
    const before = this.tables.tasks.length;
    this.tables.tasks = this.tables.tasks.filter(t => t.id !== id);
    if (this.tables.tasks.length === before) return false;
    this.tables.taskLabels = this.tables.taskLabels.filter(tl => tl.taskId !== id);
    this.tables.comments = this.tables.comments.filter(c => c.taskId !== id);
    this.tables.activity = this.tables.activity.filter(a => a.taskId !== id);
    for (const behavior of this.tables.behaviors) {
      if (behavior.taskId === id) behavior.taskId = null;
    }
    return true;
  }

  async setTaskLabels(taskId: string, labelIds: string[]): Promise<void> {
    this.tables.taskLabels = this.tables.taskLabels.filter(tl => tl.taskId !== taskId);
    for (const labelId of new Set(labelIds)) {
      this.tables.taskLabels.push({ taskId, labelId });
    }
  }

  async listTaskLabels(taskIds: string[]): Promise<Map<string, Label[]>> {
    const byTask = new Map<string, Label[]>();
    for (const { taskId, labelId } of this.tables.taskLabels) {
      if (!taskIds.includes(taskId)) continue;
      const label = this.tables.labels.find(l => l.id === labelId);
      if (!label) continue;
      const list = byTask.get(taskId) ?? [];
      list.push({ ...label });
      byTask.set(taskId, list);
    }
    for (const list of byTask.values()) list.sort((a, b) => a.name.localeCompare(b.name));
    return byTask;
  }

  async createComment(input: NewComment): Promise<Comment> {
    const at = this.now();
    const comment: Comment = { ...input, id: randomUUID(), createdAt: at, updatedAt: at };
    this.tables.comments.push(comment);
    return { ...comment };
  }

  async listComments(taskId: string): Promise<Comment[]> {
    return this.tables.comments.filter(c => c.taskId === taskId).map(c => ({ ...c }));
  }

  async appendActivity(input: NewActivity): Promise<ActivityLog> {
    const entry: ActivityLog = { ...input, id: randomUUID(), timestamp: this.now() };
    this.tables.activity.push(entry);
    return { ...entry };
  }

  async listActivity(taskId: string, limit?: number): Promise<ActivityLog[]> {
    const ordered = newestFirst(
      this.tables.activity.filter(a => a.taskId === taskId),
      a => a.timestamp
    ).map(a => ({ ...a }));
    return limit === undefined ? ordered : ordered.slice(0, limit);
  }

  async appendBehavior(input: NewBehavior): Promise<UserBehavior> {
    const entry: UserBehavior = { ...input, metadata: { ...input.metadata }, id: randomUUID(), timestamp: this.now() };
    this.tables.behaviors.push(entry);
    return { ...entry, metadata: { ...entry.metadata } };
  }

  async countBehaviors(userId: string, since?: Date): Promise<number> {
    return this.tables.behaviors.filter(
      b => b.userId === userId && (!since || b.timestamp.getTime() >= since.getTime())
    ).length;
  }

  private memberOf(projectId: string, userId: string): boolean {
    return this.tables.members.some(m => m.projectId === projectId && m.userId === userId);
  }
}

function stripUndefined<T extends object>(patch: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) out[key] = patch[key];
  }
  return out;
}
