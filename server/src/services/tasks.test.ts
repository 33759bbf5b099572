import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryStore } from '../db/memoryStore';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../errors';
import { addUser, taskInput } from '../testSupport';
import type { User } from '../types';
import { ProjectService } from './projects';
import { TaskService } from './tasks';

describe('TaskService', () => {
  let store: MemoryStore;
  let projects: ProjectService;
  let tasks: TaskService;
  let master: User;
  let dev: User;

  beforeEach(async () => {
    store = new MemoryStore();
    projects = new ProjectService(store);
    tasks = new TaskService(store);
    master = await addUser(store, 'sm', 'scrum_master');
    dev = await addUser(store, 'dev');
  });

  async function project(name: string, memberIds: string[] = []) {
    return projects.create(master, { name, description: '', memberIds, isActive: true });
  }

  describe('task codes', () => {
    it('numbers tasks per project from the project name', async () => {
      const orbit = await project('Orbit');
      const codes: string[] = [];
      for (const title of ['one', 'two', 'three', 'four']) {
        codes.push((await tasks.create(master, taskInput(orbit.id, title))).task_id);
      }
      expect(codes).toEqual(['ORB-1', 'ORB-2', 'ORB-3', 'ORB-4']);
    });

    it('does not reuse a number after a deletion', async () => {
      const orbit = await project('Orbit');
      await tasks.create(master, taskInput(orbit.id, 'one'));
      const second = await tasks.create(master, taskInput(orbit.id, 'two'));
      await tasks.remove(master, second.id);

      const third = await tasks.create(master, taskInput(orbit.id, 'three'));
      expect(third.task_id).toBe('ORB-3');
    });

    it('skips codes already taken by a project with the same prefix', async () => {
      const orbit = await project('Orbit');
      const orbital = await project('Orbital');

      const first = await tasks.create(master, taskInput(orbit.id, 'one'));
      const other = await tasks.create(master, taskInput(orbital.id, 'first in orbital'));
      const second = await tasks.create(master, taskInput(orbit.id, 'two'));

      expect([first.task_id, other.task_id, second.task_id]).toEqual(['ORB-1', 'ORB-2', 'ORB-3']);
    });

    it('keeps the code when a task is updated', async () => {
      const orbit = await project('Orbit');
      const task = await tasks.create(master, taskInput(orbit.id, 'one'));
      const updated = await tasks.update(master, task.id, { title: 'renamed', status: 'done' });
      expect(updated.task_id).toBe('ORB-1');
      expect(updated.title).toBe('renamed');
    });

    it('logs a created entry', async () => {
      const orbit = await project('Orbit');
      const task = await tasks.create(master, taskInput(orbit.id, 'Launch'));
      expect(task.activity_logs).toHaveLength(1);
      expect(task.activity_logs[0]).toMatchObject({ action: 'created', description: 'Task created: Launch' });
    });
  });

  describe('changeStatus', () => {
    it('updates the status and appends one status_changed entry', async () => {
      const space = await project('Teams in Space', [dev.id]);
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));

      const moved = await tasks.changeStatus(dev, task.id, 'done');

      expect(moved.status).toBe('done');
      expect(moved.activity_logs.map(a => a.action)).toEqual(['status_changed', 'created']);
      expect(moved.activity_logs[0]).toMatchObject({
        description: 'Status changed from todo to done',
        old_value: 'todo',
        new_value: 'done',
        user: { username: 'dev' }
      });
    });

    it('logs a move to the same status', async () => {
      const space = await project('Teams in Space');
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));

      await tasks.changeStatus(master, task.id, 'todo');

      const logs = await store.listActivity(task.id);
      expect(logs.filter(l => l.action === 'status_changed')).toHaveLength(1);
      expect(logs[0].description).toBe('Status changed from todo to todo');
    });

    it('reads the task with a row lock', async () => {
      const space = await project('Teams in Space');
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));
      const lock = vi.spyOn(store, 'findTaskForUpdate');

      await tasks.changeStatus(master, task.id, 'in_progress');

      expect(lock).toHaveBeenCalledWith(task.id);
    });

    it('hides tasks of projects the employee is not a member of', async () => {
      const hidden = await project('Hidden');
      const task = await tasks.create(master, taskInput(hidden.id, 'Secret'));

      await expect(tasks.changeStatus(dev, task.id, 'done')).rejects.toBeInstanceOf(NotFoundError);
      expect((await store.findTask(task.id))?.status).toBe('todo');
      expect(await store.listActivity(task.id)).toHaveLength(1);
    });

    it('rejects a missing task without writing anything', async () => {
      const space = await project('Teams in Space');
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));

      await expect(tasks.changeStatus(master, 'missing-task', 'done')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.listActivity(task.id)).toHaveLength(1);
      expect((await store.findTask(task.id))?.status).toBe('todo');
    });
  });

  describe('update', () => {
    it('logs status and assignee changes', async () => {
      const space = await project('Teams in Space', [dev.id]);
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));

      const updated = await tasks.update(master, task.id, { status: 'in_progress', assignedTo: dev.id });

      expect(updated.assigned_to?.username).toBe('dev');
      expect(updated.activity_logs.map(a => a.description)).toEqual([
        'Assigned to dev',
        'Status changed from todo to in_progress',
        'Task created: Dock'
      ]);
    });

    it('does not log an unchanged status', async () => {
      const space = await project('Teams in Space');
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));
      const updated = await tasks.update(master, task.id, { status: 'todo', title: 'Dock again' });
      expect(updated.activity_logs).toHaveLength(1);
    });

    it('rejects labels of another project', async () => {
      const space = await project('Teams in Space');
      const other = await project('Other');
      const label = await projects.createLabel(master, other.id, { name: 'bug', color: '#ff0000' });
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));

      const attempt = tasks.update(master, task.id, { labelIds: [label.id] });
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    });

    it('attaches labels of the same project', async () => {
      const space = await project('Teams in Space');
      const label = await projects.createLabel(master, space.id, { name: 'backend', color: '#00ff00' });
      const task = await tasks.create(master, taskInput(space.id, 'Dock', { labelIds: [label.id] }));
      expect(task.labels.map(l => l.name)).toEqual(['backend']);
    });
  });

  describe('visibility', () => {
    it('limits an employee to tasks of member projects', async () => {
      const mine = await project('Mine', [dev.id]);
      const hidden = await project('Hidden');
      await tasks.create(master, taskInput(mine.id, 'visible'));
      await tasks.create(master, taskInput(hidden.id, 'secret'));

      expect((await tasks.list(dev)).map(t => t.title)).toEqual(['visible']);
      expect((await tasks.list(master)).map(t => t.title).sort()).toEqual(['secret', 'visible']);
    });

    it('hides tasks of other projects behind a not found', async () => {
      const hidden = await project('Hidden');
      const task = await tasks.create(master, taskInput(hidden.id, 'secret'));
      await expect(tasks.get(dev, task.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('refuses task creation outside membership', async () => {
      const hidden = await project('Hidden');
      await expect(tasks.create(dev, taskInput(hidden.id, 'sneaky'))).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('refuses the board of a non-member project', async () => {
      const hidden = await project('Hidden');
      await expect(tasks.board(dev, hidden.id)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(tasks.board(dev, 'missing-project')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reports an unknown project as a field error', async () => {
      const attempt = tasks.create(master, taskInput('missing-project', 'lost'));
      await expect(attempt).rejects.toMatchObject({ status: 400, fields: { project: expect.any(Array) } });
    });
  });

  describe('board', () => {
    it('groups tasks into named columns', async () => {
      const space = await project('Teams in Space', [dev.id]);
      await tasks.create(master, taskInput(space.id, 'a'));
      await tasks.create(master, taskInput(space.id, 'b', { status: 'code_review' }));

      const board = await tasks.board(dev, space.id);

      expect(board.todo).toMatchObject({ name: 'To Do', count: 1 });
      expect(board.in_progress).toMatchObject({ name: 'In Progress', count: 0, tasks: [] });
      expect(board.code_review.tasks.map(t => t.title)).toEqual(['b']);
      expect(board.done.name).toBe('Done');
    });
  });

  describe('search', () => {
    it('matches title or description case-insensitively', async () => {
      const space = await project('Teams in Space');
      await tasks.create(master, taskInput(space.id, 'Fix Login'));
      await tasks.create(master, taskInput(space.id, 'Other', { description: 'login banner' }));
      await tasks.create(master, taskInput(space.id, 'Unrelated'));

      const found = await tasks.search(master, 'LOGIN');
      expect(found.map(t => t.title).sort()).toEqual(['Fix Login', 'Other']);
    });

    it('returns nothing for a blank term', async () => {
      const space = await project('Teams in Space');
      await tasks.create(master, taskInput(space.id, 'Fix Login'));
      expect(await tasks.search(master, '   ')).toEqual([]);
    });

    it('caps results at twenty', async () => {
      const space = await project('Teams in Space');
      for (let i = 0; i < 25; i++) {
        await tasks.create(master, taskInput(space.id, `Item ${i}`));
      }
      expect(await tasks.search(master, 'item')).toHaveLength(20);
    });
  });

  describe('comments', () => {
    it('stores the comment and logs a truncated description', async () => {
      const space = await project('Teams in Space', [dev.id]);
      const task = await tasks.create(master, taskInput(space.id, 'Dock'));
      const content = 'x'.repeat(60);

      const comment = await tasks.addComment(dev, task.id, content);

      expect(comment.author?.username).toBe('dev');
      const [latest] = await store.listActivity(task.id);
      expect(latest).toMatchObject({ action: 'commented', description: `Added comment: ${'x'.repeat(50)}...` });
      expect((await tasks.listComments(dev, task.id)).map(c => c.content)).toEqual([content]);
    });
  });
});
