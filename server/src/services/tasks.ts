import type { Store, TaskPatch } from '../db/store';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../errors';
import { canSeeProject, visibilityFilter } from '../permissions';
import {
  serializeActivity,
  serializeComment,
  serializeTask,
  type CommentJson,
  type TaskDetailJson,
  type TaskJson
} from '../serializers';
import { STATUS_NAMES, type Task, type TaskPriority, type TaskStatus, type User } from '../types';
import { formatTaskCode } from './taskCode';

export interface TaskInput {
  title: string;
  description: string;
  projectId: string;
  assignedTo: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  labelIds: string[];
  dueDate: Date | null;
  estimatedHours: number | null;
}

export type TaskUpdate = TaskPatch & { labelIds?: string[] };

export interface TaskQuery {
  projectId?: string;
  status?: TaskStatus;
}

export interface BoardColumn {
  name: string;
  count: number;
  tasks: TaskJson[];
}

export type BoardJson = Record<TaskStatus, BoardColumn>;

export const SEARCH_LIMIT = 20;
export const RECENT_ACTIVITY_LIMIT = 10;

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

export class TaskService {
  constructor(private readonly store: Store) {}

  async list(user: User, query: TaskQuery = {}): Promise<TaskJson[]> {
    const tasks = await this.store.listTasks({ ...query, ...visibilityFilter(user) });
    return this.present(tasks);
  }

  async search(user: User, term: string, projectId?: string): Promise<TaskJson[]> {
    if (!term.trim()) return [];
    const tasks = await this.store.listTasks({
      search: term.trim(),
      projectId,
      limit: SEARCH_LIMIT,
      ...visibilityFilter(user)
    });
    return this.present(tasks);
  }

  async get(user: User, id: string): Promise<TaskDetailJson> {
    return this.presentDetail(await this.findVisible(user, id));
  }

  async create(user: User, input: TaskInput): Promise<TaskDetailJson> {
    const project = await this.store.findProject(input.projectId);
    if (!project) {
      throw ValidationError.field('project', `Invalid pk "${input.projectId}" - object does not exist.`);
    }
    if (!(await canSeeProject(this.store, user, project))) {
      throw new PermissionDeniedError('You are not a member of this project');
    }
    await this.assertAssignee(input.assignedTo);
    await this.assertLabels(project.id, input.labelIds);

    const task = await this.store.transaction(async tx => {
      // Projects sharing a name prefix share the code space; skip numbers already taken.
      let code = formatTaskCode(project.name, await tx.nextTaskNumber(project.id));
      while (await tx.findTaskByCode(code)) {
        code = formatTaskCode(project.name, await tx.nextTaskNumber(project.id));
      }
      const created = await tx.createTask({
        code,
        projectId: project.id,
        title: input.title,
        description: input.description,
        status: input.status,
        priority: input.priority,
        assignedTo: input.assignedTo,
        createdBy: user.id,
        dueDate: input.dueDate,
        estimatedHours: input.estimatedHours,
        actualHours: 0
      });
      if (input.labelIds.length) await tx.setTaskLabels(created.id, input.labelIds);
      await tx.appendActivity({
        taskId: created.id,
        userId: user.id,
        action: 'created',
        description: `Task created: ${created.title}`,
        oldValue: null,
        newValue: null
      });
      return created;
    });
    return this.presentDetail(task);
  }

  async update(user: User, id: string, patch: TaskUpdate): Promise<TaskDetailJson> {
    const before = await this.findVisible(user, id);
    const { labelIds, ...fields } = patch;
    if (fields.assignedTo !== undefined) await this.assertAssignee(fields.assignedTo);
    if (labelIds) await this.assertLabels(before.projectId, labelIds);

    const task = await this.store.transaction(async tx => {
      const updated = await tx.updateTask(id, fields);
      if (!updated) throw new NotFoundError('Task');
      if (labelIds) await tx.setTaskLabels(id, labelIds);
      if (fields.status !== undefined && fields.status !== before.status) {
        await this.logStatusChange(tx, user, id, before.status, fields.status);
      }
      if (fields.assignedTo !== undefined && fields.assignedTo !== before.assignedTo) {
        const assignee = fields.assignedTo ? await tx.findUserById(fields.assignedTo) : null;
        await tx.appendActivity({
          taskId: id,
          userId: user.id,
          action: 'assigned',
          description: assignee ? `Assigned to ${assignee.username}` : 'Unassigned',
          oldValue: before.assignedTo,
          newValue: fields.assignedTo
        });
      }
      return updated;
    });
    return this.presentDetail(task);
  }

  async remove(user: User, id: string): Promise<void> {
    await this.findVisible(user, id);
    await this.store.deleteTask(id);
  }

  /**
   * Moves a task to `status`. Any transition is allowed, including one to the
   * current status; each call appends exactly one `status_changed` entry.
   */
  async changeStatus(user: User, taskId: string, status: TaskStatus): Promise<TaskDetailJson> {
    const task = await this.store.transaction(async tx => {
      const current = await tx.findTaskForUpdate(taskId);
      if (!current || !(await canSeeProject(tx, user, { id: current.projectId }))) {
        throw new NotFoundError('Task');
      }
      const updated = await tx.updateTask(taskId, { status });
      if (!updated) throw new NotFoundError('Task');
      await this.logStatusChange(tx, user, taskId, current.status, status);
      return updated;
    });
    return this.presentDetail(task);
  }

  async listComments(user: User, taskId: string): Promise<CommentJson[]> {
    await this.findVisible(user, taskId);
    const comments = await this.store.listComments(taskId);
    const users = await this.usersById(comments.map(c => c.authorId));
    return comments.map(c => serializeComment(c, users));
  }

  async addComment(user: User, taskId: string, content: string): Promise<CommentJson> {
    await this.findVisible(user, taskId);
    const comment = await this.store.transaction(async tx => {
      const created = await tx.createComment({ taskId, authorId: user.id, content });
      await tx.appendActivity({
        taskId,
        userId: user.id,
        action: 'commented',
        description: `Added comment: ${content.slice(0, 50)}...`,
        oldValue: null,
        newValue: null
      });
      return created;
    });
    return serializeComment(comment, new Map([[user.id, user]]));
  }

  /** Tasks of a project grouped into one column per status. */
  async board(user: User, projectId: string): Promise<BoardJson> {
    const project = await this.store.findProject(projectId);
    if (!project) throw new NotFoundError('Project');
    if (!(await canSeeProject(this.store, user, project))) {
      throw new PermissionDeniedError('Access denied');
    }
    const tasks = await this.present(await this.store.listTasks({ projectId }));
    const column = (status: TaskStatus): BoardColumn => {
      const inColumn = tasks.filter(t => t.status === status);
      return { name: STATUS_NAMES[status], count: inColumn.length, tasks: inColumn };
    };
    return {
      todo: column('todo'),
      in_progress: column('in_progress'),
      code_review: column('code_review'),
      done: column('done')
    };
  }

  private async findVisible(user: User, id: string): Promise<Task> {
    const task = await this.store.findTask(id);
    if (!task || !(await canSeeProject(this.store, user, { id: task.projectId }))) {
      throw new NotFoundError('Task');
    }
    return task;
  }

  private async logStatusChange(tx: Store, user: User, taskId: string, from: TaskStatus, to: TaskStatus): Promise<void> {
    await tx.appendActivity({
      taskId,
      userId: user.id,
      action: 'status_changed',
      description: `Status changed from ${from} to ${to}`,
      oldValue: from,
      newValue: to
    });
  }

  private async assertAssignee(userId: string | null): Promise<void> {
    if (userId && !(await this.store.findUserById(userId))) {
      throw ValidationError.field('assigned_to_id', `Invalid pk "${userId}" - object does not exist.`);
    }
  }

  private async assertLabels(projectId: string, labelIds: string[]): Promise<void> {
    if (!labelIds.length) return;
    const labels = await this.store.findLabelsByIds([...new Set(labelIds)]);
    const invalid = labelIds.filter(id => !labels.some(l => l.id === id && l.projectId === projectId));
    if (invalid.length) {
      throw new ValidationError('Invalid input', {
        label_ids: invalid.map(id => `Invalid pk "${id}" - label does not belong to this project.`)
      });
    }
  }

  private async usersById(ids: (string | null)[]): Promise<Map<string, User>> {
    const unique = [...new Set(ids.filter(isPresent))];
    const users = await this.store.findUsersByIds(unique);
    return new Map(users.map(u => [u.id, u]));
  }

  private async present(tasks: Task[]): Promise<TaskJson[]> {
    const [users, labels] = await Promise.all([
      this.usersById(tasks.flatMap(t => [t.assignedTo, t.createdBy])),
      this.store.listTaskLabels(tasks.map(t => t.id))
    ]);
    return tasks.map(t => serializeTask(t, users, labels.get(t.id) ?? []));
  }

  private async presentDetail(task: Task): Promise<TaskDetailJson> {
    const [comments, activity, labels] = await Promise.all([
      this.store.listComments(task.id),
      this.store.listActivity(task.id, RECENT_ACTIVITY_LIMIT),
      this.store.listTaskLabels([task.id])
    ]);
    const users = await this.usersById([
      task.assignedTo,
      task.createdBy,
      ...comments.map(c => c.authorId),
      ...activity.map(a => a.userId)
    ]);
    return {
      ...serializeTask(task, users, labels.get(task.id) ?? []),
      comments: comments.map(c => serializeComment(c, users)),
      activity_logs: activity.map(a => serializeActivity(a, users))
    };
  }
}
