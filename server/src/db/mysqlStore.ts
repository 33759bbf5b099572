import mysql, { type Pool, type PoolConnection, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
import { randomUUID } from 'crypto';
import type {
  ActivityLog,
  BehaviorMetadata,
  Comment,
  Label,
  Project,
  Task,
  User,
  UserBehavior
} from '../types';
import { isActivityAction, isRole, isTaskPriority, isTaskStatus } from '../types';
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

type Runner = <T extends RowDataPacket[] | ResultSetHeader>(sql: string, values?: unknown[]) => Promise<T>;

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

interface ProjectRow extends RowDataPacket {
  id: string;
  name: string;
  description: string;
  created_by: string;
  is_active: number;
  created_at: Date;
  updated_at: Date;
}

interface LabelRow extends RowDataPacket {
  id: string;
  project_id: string;
  name: string;
  color: string;
  created_at: Date;
}

interface TaskLabelRow extends LabelRow {
  task_id: string;
}

interface TaskRow extends RowDataPacket {
  id: string;
  code: string;
  project_id: string;
  title: string;
  description: string;
  status: string;
  priority: string;
  assigned_to: string | null;
  created_by: string;
  due_date: Date | null;
  estimated_hours: number | null;
  actual_hours: number;
  created_at: Date;
  updated_at: Date;
}

interface CommentRow extends RowDataPacket {
  id: string;
  task_id: string;
  author_id: string;
  content: string;
  created_at: Date;
  updated_at: Date;
}

interface ActivityRow extends RowDataPacket {
  id: string;
  task_id: string;
  user_id: string;
  action: string;
  description: string;
  old_value: string | null;
  new_value: string | null;
  timestamp: Date;
}

interface BehaviorRow extends RowDataPacket {
  id: string;
  user_id: string;
  action_type: string;
  task_id: string | null;
  duration_seconds: number | null;
  metadata: unknown;
  timestamp: Date;
}

interface CountRow extends RowDataPacket {
  total: number;
}

export function createPoolFromUrl(urlString: string, options: { multipleStatements?: boolean } = {}): Pool {
  const url = new URL(urlString);
  if (url.protocol !== 'mysql:') {
    throw new Error(`Unsupported DB protocol: ${url.protocol}. Expected mysql://`);
  }
  const sslMode = url.searchParams.get('sslmode') || url.searchParams.get('ssl') || '';
  const ssl =
    sslMode === 'require' || sslMode === 'true'
      ? { rejectUnauthorized: false }
      : undefined;
  return mysql.createPool({
    host: url.hostname,
    port: Number(url.port || 3306),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.replace(/^\//, ''),
    waitForConnections: true,
    connectionLimit: 10,
    multipleStatements: options.multipleStatements ?? false,
    ssl
  });
}

function poolRunner(pool: Pool): Runner {
  return async <T extends RowDataPacket[] | ResultSetHeader>(sql: string, values: unknown[] = []) => {
    const [rows] = await pool.query<T>(sql, values);
    return rows;
  };
}

function connectionRunner(conn: PoolConnection): Runner {
  return async <T extends RowDataPacket[] | ResultSetHeader>(sql: string, values: unknown[] = []) => {
    const [rows] = await conn.query<T>(sql, values);
    return rows;
  };
}

function mapUserRow(u: UserRow): User {
  if (!isRole(u.role)) throw new Error(`Unknown role in users.${u.id}: ${u.role}`);
  return {
    id: u.id,
    username: u.username,
    email: u.email,
    firstName: u.first_name,
    lastName: u.last_name,
    role: u.role,
    passwordHash: u.password_hash,
    createdAt: u.created_at,
    updatedAt: u.updated_at
  };
}

function mapProjectRow(p: ProjectRow): Project {
  return {
    id: p.id,
    name: p.name,
    description: p.description,
    createdBy: p.created_by,
    isActive: Boolean(p.is_active),
    createdAt: p.created_at,
    updatedAt: p.updated_at
  };
}

function mapLabelRow(l: LabelRow): Label {
  return { id: l.id, projectId: l.project_id, name: l.name, color: l.color, createdAt: l.created_at };
}

function mapTaskRow(t: TaskRow): Task {
  if (!isTaskStatus(t.status)) throw new Error(`Unknown status in tasks.${t.id}: ${t.status}`);
  if (!isTaskPriority(t.priority)) throw new Error(`Unknown priority in tasks.${t.id}: ${t.priority}`);
  return {
    id: t.id,
    code: t.code,
    projectId: t.project_id,
    title: t.title,
    description: t.description,
    status: t.status,
    priority: t.priority,
    assignedTo: t.assigned_to ?? null,
    createdBy: t.created_by,
    dueDate: t.due_date ?? null,
    estimatedHours: t.estimated_hours ?? null,
    actualHours: Number(t.actual_hours),
    createdAt: t.created_at,
    updatedAt: t.updated_at
  };
}

function mapCommentRow(c: CommentRow): Comment {
  return {
    id: c.id,
    taskId: c.task_id,
    authorId: c.author_id,
    content: c.content,
    createdAt: c.created_at,
    updatedAt: c.updated_at
  };
}

function mapActivityRow(a: ActivityRow): ActivityLog {
  if (!isActivityAction(a.action)) throw new Error(`Unknown action in activity_logs.${a.id}: ${a.action}`);
  return {
    id: a.id,
    taskId: a.task_id,
    userId: a.user_id,
    action: a.action,
    description: a.description,
    oldValue: a.old_value,
    newValue: a.new_value,
    timestamp: a.timestamp
  };
}

function parseMetadata(raw: unknown): BehaviorMetadata {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return {};
    }
  }
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return {};
  return { ...value };
}

function mapBehaviorRow(b: BehaviorRow): UserBehavior {
  return {
    id: b.id,
    userId: b.user_id,
    actionType: b.action_type,
    taskId: b.task_id,
    durationSeconds: b.duration_seconds,
    metadata: parseMetadata(b.metadata),
    timestamp: b.timestamp
  };
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, ch => `\\${ch}`);
}

const TASK_PATCH_COLUMNS: readonly [keyof TaskPatch, string][] = [
  ['title', 'title'],
  ['description', 'description'],
  ['status', 'status'],
  ['priority', 'priority'],
  ['assignedTo', 'assigned_to'],
  ['dueDate', 'due_date'],
  ['estimatedHours', 'estimated_hours'],
  ['actualHours', 'actual_hours']
];

/** `SET` assignments for the fields present in `patch`, in column order. */
export function taskPatchAssignments(patch: TaskPatch): { sets: string[]; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of TASK_PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) continue;
    sets.push(`${column} = ?`);
    values.push(value);
  }
  return { sets, values };
}

export class MysqlStore implements Store {
  private readonly run: Runner;

  private readonly pool: Pool | null;

  /** A store bound to a connection runs inside that connection's transaction. */
  constructor(source: Pool | { connection: PoolConnection }) {
    if ('connection' in source) {
      this.pool = null;
      this.run = connectionRunner(source.connection);
    } else {
      this.pool = source;
      this.run = poolRunner(source);
    }
  }

  async ping(): Promise<void> {
    await this.run<RowDataPacket[]>('SELECT 1');
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (!this.pool) return fn(this);
    const conn = await this.pool.getConnection();
    try {
      await conn.beginTransaction();
      const result = await fn(new MysqlStore({ connection: conn }));
      await conn.commit();
      return result;
    } catch (e) {
      await conn.rollback();
      throw e;
    } finally {
      conn.release();
    }
  }

  async createUser(input: NewUser): Promise<User> {
    const id = randomUUID();
    await this.run<ResultSetHeader>(
      'INSERT INTO users (id, username, email, first_name, last_name, role, password_hash) VALUES (?, ?, ?, ?, ?, ?, ?)',
      [id, input.username, input.email, input.firstName, input.lastName, input.role, input.passwordHash]
    );
    return this.requireRow(await this.findUserById(id), 'users', id);
  }

  async findUserById(id: string): Promise<User | null> {
    const rows = await this.run<UserRow[]>('SELECT * FROM users WHERE id = ?', [id]);
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const rows = await this.run<UserRow[]>('SELECT * FROM users WHERE username = ?', [username]);
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findUsersByIds(ids: string[]): Promise<User[]> {
    if (!ids.length) return [];
    const rows = await this.run<UserRow[]>('SELECT * FROM users WHERE id IN (?)', [ids]);
    return rows.map(mapUserRow);
  }

  async listUsers(): Promise<User[]> {
    const rows = await this.run<UserRow[]>('SELECT * FROM users ORDER BY username ASC');
    return rows.map(mapUserRow);
  }

  async updateUser(id: string, patch: UserPatch): Promise<User | null> {
    const sets: string[] = [];
    const vals: unknown[] = [];
    if (patch.email !== undefined) {
      sets.push('email = ?');
      vals.push(patch.email);
    }
    if (patch.firstName !== undefined) {
      sets.push('first_name = ?');
      vals.push(patch.firstName);
    }
    if (patch.lastName !== undefined) {
      sets.push('last_name = ?');
      vals.push(patch.lastName);
    }
    if (sets.length) {
      vals.push(id);
      await this.run<ResultSetHeader>(`UPDATE users SET ${sets.join(', ')} WHERE id = ?`, vals);
    }
    return this.findUserById(id);
  }

  async createProject(input: NewProject): Promise<Project> {
    const id = randomUUID();
    await this.run<ResultSetHeader>(
      'INSERT INTO projects (id, name, description, created_by, is_active, task_seq) VALUES (?, ?, ?, ?, ?, 0)',
      [id, input.name, input.description, input.createdBy, input.isActive ? 1 : 0]
    );
    await this.setProjectMembers(id, input.memberIds);
    return this.requireRow(await this.findProject(id), 'projects', id);
  }

  async findProject(id: string): Promise<Project | null> {
    const rows = await this.run<ProjectRow[]>('SELECT * FROM projects WHERE id = ?', [id]);
    return rows[0] ? mapProjectRow(rows[0]) : null;
  }

  async listProjects(filter: ProjectFilter = {}): Promise<Project[]> {
    if (filter.memberId) {
      const rows = await this.run<ProjectRow[]>(
        `SELECT p.* FROM projects p
         JOIN project_members pm ON pm.project_id = p.id
         WHERE pm.user_id = ?
         ORDER BY p.created_at DESC`,
        [filter.memberId]
      );
      return rows.map(mapProjectRow);
    }
    const rows = await this.run<ProjectRow[]>('SELECT * FROM projects ORDER BY created_at DESC');
    return rows.map(mapProjectRow);
  }

  async updateProject(id: string, patch: ProjectPatch): Promise<Project | null> {
    const sets: string[] = [];
    const vals: unknown[] = [];
    if (patch.name !== undefined) {
      sets.push('name = ?');
      vals.push(patch.name);
    }
    if (patch.description !== undefined) {
      sets.push('description = ?');
      vals.push(patch.description);
    }
    if (patch.isActive !== undefined) {
      sets.push('is_active = ?');
      vals.push(patch.isActive ? 1 : 0);
    }
    if (sets.length) {
      vals.push(id);
      await this.run<ResultSetHeader>(`UPDATE projects SET ${sets.join(', ')} WHERE id = ?`, vals);
    }
    return this.findProject(id);
  }

  async deleteProject(id: string): Promise<boolean> {
    const result = await this.run<ResultSetHeader>('DELETE FROM projects WHERE id = ?', [id]);
    return result.affectedRows > 0;
  }

  async listProjectMembers(projectId: string): Promise<User[]> {
    const rows = await this.run<UserRow[]>(
      `SELECT u.* FROM users u
       JOIN project_members pm ON pm.user_id = u.id
       WHERE pm.project_id = ?
       ORDER BY u.username ASC`,
      [projectId]
    );
    return rows.map(mapUserRow);
  }

  async setProjectMembers(projectId: string, userIds: string[]): Promise<void> {
    await this.run<ResultSetHeader>('DELETE FROM project_members WHERE project_id = ?', [projectId]);
    const unique = [...new Set(userIds)];
    if (!unique.length) return;
    await this.run<ResultSetHeader>('INSERT INTO project_members (project_id, user_id) VALUES ?', [
      unique.map(userId => [projectId, userId])
    ]);
  }

  async isProjectMember(projectId: string, userId: string): Promise<boolean> {
    const rows = await this.run<RowDataPacket[]>(
      'SELECT 1 FROM project_members WHERE project_id = ? AND user_id = ?',
      [projectId, userId]
    );
    return rows.length > 0;
  }

  async countProjectTasks(projectId: string): Promise<number> {
    const rows = await this.run<CountRow[]>('SELECT COUNT(*) AS total FROM tasks WHERE project_id = ?', [projectId]);
    return Number(rows[0]?.total ?? 0);
  }

  async nextTaskNumber(projectId: string): Promise<number> {
    // LAST_INSERT_ID(expr) makes the incremented value come back as insertId
    // from the same statement that wrote it.
    const result = await this.run<ResultSetHeader>(
      'UPDATE projects SET task_seq = LAST_INSERT_ID(task_seq + 1) WHERE id = ?',
      [projectId]
    );
    if (result.affectedRows === 0) throw new Error(`Project ${projectId} does not exist`);
    return Number(result.insertId);
  }

  async createLabel(input: NewLabel): Promise<Label> {
    const id = randomUUID();
    await this.run<ResultSetHeader>('INSERT INTO labels (id, project_id, name, color) VALUES (?, ?, ?, ?)', [
      id,
      input.projectId,
      input.name,
      input.color
    ]);
    const rows = await this.run<LabelRow[]>('SELECT * FROM labels WHERE id = ?', [id]);
    return mapLabelRow(this.requireRow(rows[0] ?? null, 'labels', id));
  }

  async listLabels(projectId: string): Promise<Label[]> {
    const rows = await this.run<LabelRow[]>('SELECT * FROM labels WHERE project_id = ? ORDER BY name ASC', [projectId]);
    return rows.map(mapLabelRow);
  }

  async findLabelsByIds(ids: string[]): Promise<Label[]> {
    if (!ids.length) return [];
    const rows = await this.run<LabelRow[]>('SELECT * FROM labels WHERE id IN (?)', [ids]);
    return rows.map(mapLabelRow);
  }

  async createTask(input: NewTask): Promise<Task> {
    const id = randomUUID();
    await this.run<ResultSetHeader>(
      `INSERT INTO tasks (id, code, project_id, title, description, status, priority, assigned_to, created_by,
         due_date, estimated_hours, actual_hours)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        id,
        input.code,
        input.projectId,
        input.title,
        input.description,
        input.status,
        input.priority,
        input.assignedTo,
        input.createdBy,
        input.dueDate,
        input.estimatedHours,
        input.actualHours
      ]
    );
    return this.requireRow(await this.findTask(id), 'tasks', id);
  }

  async findTask(id: string): Promise<Task | null> {
    const rows = await this.run<TaskRow[]>('SELECT * FROM tasks WHERE id = ?', [id]);
    return rows[0] ? mapTaskRow(rows[0]) : null;
  }

  async findTaskForUpdate(id: string): Promise<Task | null> {
    const rows = await this.run<TaskRow[]>('SELECT * FROM tasks WHERE id = ? FOR UPDATE', [id]);
    return rows[0] ? mapTaskRow(rows[0]) : null;
  }

  async findTaskByCode(code: string): Promise<Task | null> {
    const rows = await this.run<TaskRow[]>('SELECT * FROM tasks WHERE code = ?', [code]);
    return rows[0] ? mapTaskRow(rows[0]) : null;
  }

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    const where: string[] = [];
    const vals: unknown[] = [];
    if (filter.projectId) {
      where.push('t.project_id = ?');
      vals.push(filter.projectId);
    }
    if (filter.status) {
      where.push('t.status = ?');
      vals.push(filter.status);
    }
    if (filter.assignedTo) {
      where.push('t.assigned_to = ?');
      vals.push(filter.assignedTo);
    }
    if (filter.memberId) {
      where.push('EXISTS (SELECT 1 FROM project_members pm WHERE pm.project_id = t.project_id AND pm.user_id = ?)');
      vals.push(filter.memberId);
    }
    if (filter.search) {
      const pattern = `%${escapeLike(filter.search)}%`;
      where.push('(t.title LIKE ? OR t.description LIKE ?)');
      vals.push(pattern, pattern);
    }
    let sql = 'SELECT t.* FROM tasks t';
    if (where.length) sql += ` WHERE ${where.join(' AND ')}`;
    sql += ' ORDER BY t.created_at DESC';
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      vals.push(filter.limit);
    }
    const rows = await this.run<TaskRow[]>(sql, vals);
    return rows.map(mapTaskRow);
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task | null> {
    const { sets, values: vals } = taskPatchAssignments(patch);
    if (sets.length) {
      sets.push('updated_at = CURRENT_TIMESTAMP(3)');
      vals.push(id);
      await this.run<ResultSetHeader>(`UPDATE tasks SET ${sets.join(', ')} WHERE id = ?`, vals);
    }
    return this.findTask(id);
  }

  async deleteTask(id: string): Promise<boolean> {
    const result = await this.run<ResultSetHeader>('DELETE FROM tasks WHERE id = ?', [id]);
    return result.affectedRows > 0;
  }

  async setTaskLabels(taskId: string, labelIds: string[]): Promise<void> {
    await this.run<ResultSetHeader>('DELETE FROM task_labels WHERE task_id = ?', [taskId]);
    const unique = [...new Set(labelIds)];
    if (!unique.length) return;
    await this.run<ResultSetHeader>('INSERT INTO task_labels (task_id, label_id) VALUES ?', [
      unique.map(labelId => [taskId, labelId])
    ]);
  }

  async listTaskLabels(taskIds: string[]): Promise<Map<string, Label[]>> {
    const byTask = new Map<string, Label[]>();
    if (!taskIds.length) return byTask;
    const rows = await this.run<TaskLabelRow[]>(
      `SELECT tl.task_id, l.* FROM task_labels tl
       JOIN labels l ON l.id = tl.label_id
       WHERE tl.task_id IN (?)
       ORDER BY l.name ASC`,
      [taskIds]
    );
    for (const row of rows) {
      const list = byTask.get(row.task_id) ?? [];
      list.push(mapLabelRow(row));
      byTask.set(row.task_id, list);
    }
    return byTask;
  }

  async createComment(input: NewComment): Promise<Comment> {
    const id = randomUUID();
    await this.run<ResultSetHeader>('INSERT INTO comments (id, task_id, author_id, content) VALUES (?, ?, ?, ?)', [
      id,
      input.taskId,
      input.authorId,
      input.content
    ]);
    const rows = await this.run<CommentRow[]>('SELECT * FROM comments WHERE id = ?', [id]);
    return mapCommentRow(this.requireRow(rows[0] ?? null, 'comments', id));
  }

  async listComments(taskId: string): Promise<Comment[]> {
    const rows = await this.run<CommentRow[]>('SELECT * FROM comments WHERE task_id = ? ORDER BY created_at ASC', [
      taskId
    ]);
    return rows.map(mapCommentRow);
  }

  async appendActivity(input: NewActivity): Promise<ActivityLog> {
    const id = randomUUID();
    await this.run<ResultSetHeader>(
      `INSERT INTO activity_logs (id, task_id, user_id, action, description, old_value, new_value)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [id, input.taskId, input.userId, input.action, input.description, input.oldValue, input.newValue]
    );
    const rows = await this.run<ActivityRow[]>('SELECT * FROM activity_logs WHERE id = ?', [id]);
    return mapActivityRow(this.requireRow(rows[0] ?? null, 'activity_logs', id));
  }

  async listActivity(taskId: string, limit?: number): Promise<ActivityLog[]> {
    const vals: unknown[] = [taskId];
    let sql = 'SELECT * FROM activity_logs WHERE task_id = ? ORDER BY timestamp DESC';
    if (limit !== undefined) {
      sql += ' LIMIT ?';
      vals.push(limit);
    }
    const rows = await this.run<ActivityRow[]>(sql, vals);
    return rows.map(mapActivityRow);
  }

  async appendBehavior(input: NewBehavior): Promise<UserBehavior> {
    const id = randomUUID();
    await this.run<ResultSetHeader>(
      `INSERT INTO user_behaviors (id, user_id, action_type, task_id, duration_seconds, metadata)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [id, input.userId, input.actionType, input.taskId, input.durationSeconds, JSON.stringify(input.metadata)]
    );
    const rows = await this.run<BehaviorRow[]>('SELECT * FROM user_behaviors WHERE id = ?', [id]);
    return mapBehaviorRow(this.requireRow(rows[0] ?? null, 'user_behaviors', id));
  }

  async countBehaviors(userId: string, since?: Date): Promise<number> {
    const rows = since
      ? await this.run<CountRow[]>(
          'SELECT COUNT(*) AS total FROM user_behaviors WHERE user_id = ? AND timestamp >= ?',
          [userId, since]
        )
      : await this.run<CountRow[]>('SELECT COUNT(*) AS total FROM user_behaviors WHERE user_id = ?', [userId]);
    return Number(rows[0]?.total ?? 0);
  }

  private requireRow<T>(row: T | null, table: string, id: string): T {
    if (row === null) throw new Error(`Row ${table}.${id} vanished after insert`);
    return row;
  }
}
