import type { Store } from '../db/store';
import { ValidationError } from '../errors';
import { visibilityFilter } from '../permissions';
import { serializeBehavior, type BehaviorJson } from '../serializers';
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  type BehaviorMetadata,
  type Task,
  type TaskPriority,
  type TaskStatus,
  type User
} from '../types';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export interface DashboardJson {
  overview: {
    total_tasks: number;
    completed_tasks: number;
    in_progress_tasks: number;
    todo_tasks: number;
    code_review_tasks: number;
    completion_rate: number;
  };
  user_metrics: {
    assigned_tasks: number;
    completed_tasks: number;
    in_progress_tasks: number;
    productivity_score: number;
  };
  recent_activity: {
    tasks_completed_this_week: number;
    user_actions_this_week: number;
    total_user_actions: number;
  };
  distributions: {
    priority: { priority: TaskPriority; count: number }[];
    status: { status: TaskStatus; count: number }[];
  };
}

export interface BehaviorInput {
  actionType: string;
  taskId: string | null;
  durationSeconds: number | null;
  metadata: BehaviorMetadata;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function completionRate(completed: number, total: number): number {
  return total > 0 ? round2((completed / total) * 100) : 0;
}

/** Completion rate plus two points per action this week, capped at 100. */
export function productivityScore(total: number, rate: number, actionsThisWeek: number): number {
  return total > 0 ? round2(Math.min(100, rate + 2 * actionsThisWeek)) : 0;
}

function countBy<K extends string>(tasks: Task[], keys: readonly K[], pick: (t: Task) => K): { key: K; count: number }[] {
  return keys
    .map(key => ({ key, count: tasks.filter(t => pick(t) === key).length }))
    .filter(entry => entry.count > 0);
}

export class AnalyticsService {
  private readonly now: () => Date;

  constructor(
    private readonly store: Store,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async dashboard(user: User, projectId?: string): Promise<DashboardJson> {
    const weekAgo = new Date(this.now().getTime() - WEEK_MS);
    const [tasks, actionsThisWeek, totalActions] = await Promise.all([
      this.store.listTasks({ projectId, ...visibilityFilter(user) }),
      this.store.countBehaviors(user.id, weekAgo),
      this.store.countBehaviors(user.id)
    ]);

    const withStatus = (list: Task[], status: TaskStatus) => list.filter(t => t.status === status).length;
    const total = tasks.length;
    const completed = withStatus(tasks, 'done');
    const rate = completionRate(completed, total);
    const assigned = tasks.filter(t => t.assignedTo === user.id);

    return {
      overview: {
        total_tasks: total,
        completed_tasks: completed,
        in_progress_tasks: withStatus(tasks, 'in_progress'),
        todo_tasks: withStatus(tasks, 'todo'),
        code_review_tasks: withStatus(tasks, 'code_review'),
        completion_rate: rate
      },
      user_metrics: {
        assigned_tasks: assigned.length,
        completed_tasks: withStatus(assigned, 'done'),
        in_progress_tasks: withStatus(assigned, 'in_progress'),
        productivity_score: productivityScore(total, rate, actionsThisWeek)
      },
      recent_activity: {
        tasks_completed_this_week: tasks.filter(
          t => t.status === 'done' && t.updatedAt.getTime() >= weekAgo.getTime()
        ).length,
        user_actions_this_week: actionsThisWeek,
        total_user_actions: totalActions
      },
      distributions: {
        priority: countBy(tasks, TASK_PRIORITIES, t => t.priority).map(({ key, count }) => ({ priority: key, count })),
        status: countBy(tasks, TASK_STATUSES, t => t.status).map(({ key, count }) => ({ status: key, count }))
      }
    };
  }

  async track(user: User, input: BehaviorInput): Promise<BehaviorJson> {
    if (input.taskId && !(await this.store.findTask(input.taskId))) {
      throw ValidationError.field('task', `Invalid pk "${input.taskId}" - object does not exist.`);
    }
    const behavior = await this.store.appendBehavior({
      userId: user.id,
      actionType: input.actionType,
      taskId: input.taskId,
      durationSeconds: input.durationSeconds,
      metadata: input.metadata
    });
    return serializeBehavior(behavior);
  }
}
