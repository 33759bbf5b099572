import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryStore } from '../db/memoryStore';
import { ValidationError } from '../errors';
import { addUser, taskInput } from '../testSupport';
import type { User } from '../types';
import { AnalyticsService, completionRate, productivityScore } from './analytics';
import { ProjectService } from './projects';
import { TaskService } from './tasks';

describe('completionRate', () => {
  it('is zero without tasks', () => {
    expect(completionRate(0, 0)).toBe(0);
  });

  it('rounds to two decimals', () => {
    expect(completionRate(1, 3)).toBe(33.33);
    expect(completionRate(2, 3)).toBe(66.67);
  });
});

describe('productivityScore', () => {
  it('adds two points per recent action and caps at 100', () => {
    expect(productivityScore(4, 50, 3)).toBe(56);
    expect(productivityScore(4, 95, 10)).toBe(100);
  });

  it('is zero without tasks regardless of activity', () => {
    expect(productivityScore(0, 0, 12)).toBe(0);
  });
});

describe('AnalyticsService', () => {
  let clock: Date;
  let store: MemoryStore;
  let analytics: AnalyticsService;
  let tasks: TaskService;
  let master: User;
  let dev: User;

  beforeEach(async () => {
    clock = new Date('2026-03-10T12:00:00Z');
    store = new MemoryStore({ now: () => clock });
    analytics = new AnalyticsService(store, { now: () => clock });
    tasks = new TaskService(store);
    master = await addUser(store, 'sm', 'scrum_master');
    dev = await addUser(store, 'dev');
  });

  async function behavior(user: User, at: Date) {
    clock = at;
    await analytics.track(user, { actionType: 'task_view', taskId: null, durationSeconds: null, metadata: {} });
    clock = new Date('2026-03-10T12:00:00Z');
  }

  it('reports zeros for an empty workspace', async () => {
    const dashboard = await analytics.dashboard(dev);
    expect(dashboard.overview).toEqual({
      total_tasks: 0,
      completed_tasks: 0,
      in_progress_tasks: 0,
      todo_tasks: 0,
      code_review_tasks: 0,
      completion_rate: 0
    });
    expect(dashboard.user_metrics.productivity_score).toBe(0);
    expect(dashboard.distributions).toEqual({ priority: [], status: [] });
  });

  it('summarises the tasks visible to the requester', async () => {
    const space = await new ProjectService(store).create(master, {
      name: 'Teams in Space',
      description: '',
      memberIds: [dev.id],
      isActive: true
    });
    const first = await tasks.create(master, taskInput(space.id, 'one', { assignedTo: dev.id, priority: 'high' }));
    await tasks.create(master, taskInput(space.id, 'two', { assignedTo: dev.id }));
    await tasks.create(master, taskInput(space.id, 'three'));
    await tasks.changeStatus(dev, first.id, 'done');

    await behavior(dev, new Date('2026-02-20T12:00:00Z'));
    await behavior(dev, new Date('2026-03-09T12:00:00Z'));
    await behavior(dev, new Date('2026-03-10T08:00:00Z'));

    const dashboard = await analytics.dashboard(dev);

    expect(dashboard.overview).toEqual({
      total_tasks: 3,
      completed_tasks: 1,
      in_progress_tasks: 0,
      todo_tasks: 2,
      code_review_tasks: 0,
      completion_rate: 33.33
    });
    expect(dashboard.user_metrics).toEqual({
      assigned_tasks: 2,
      completed_tasks: 1,
      in_progress_tasks: 0,
      productivity_score: 37.33
    });
    expect(dashboard.recent_activity).toEqual({
      tasks_completed_this_week: 1,
      user_actions_this_week: 2,
      total_user_actions: 3
    });
    expect(dashboard.distributions).toEqual({
      priority: [
        { priority: 'medium', count: 2 },
        { priority: 'high', count: 1 }
      ],
      status: [
        { status: 'todo', count: 2 },
        { status: 'done', count: 1 }
      ]
    });
  });

  it('excludes projects the employee is not a member of', async () => {
    const hidden = await new ProjectService(store).create(master, {
      name: 'Hidden',
      description: '',
      memberIds: [],
      isActive: true
    });
    await tasks.create(master, taskInput(hidden.id, 'secret'));

    expect((await analytics.dashboard(dev)).overview.total_tasks).toBe(0);
    expect((await analytics.dashboard(master)).overview.total_tasks).toBe(1);
  });

  it('rejects a behavior event for an unknown task', async () => {
    const attempt = analytics.track(dev, { actionType: 'task_view', taskId: 'missing', durationSeconds: 5, metadata: {} });
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
  });

  it('stores a behavior event', async () => {
    const event = await analytics.track(dev, {
      actionType: 'task_status_update',
      taskId: null,
      durationSeconds: 3,
      metadata: { old_status: 'todo', new_status: 'done' }
    });
    expect(event).toMatchObject({
      action_type: 'task_status_update',
      task: null,
      duration_seconds: 3,
      metadata: { old_status: 'todo', new_status: 'done' },
      timestamp: '2026-03-10T12:00:00.000Z'
    });
  });
});
