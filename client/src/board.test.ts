import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  addTask,
  applyServerTask,
  emptyBoard,
  groupByStatus,
  locate,
  moveTask,
  revertMove,
  syncMove,
  type BoardHandle,
  type MoveApi
} from './board';
import { makeTask } from './testSupport';
import type { Board, Task } from './types';

function ids(board: Board) {
  return {
    todo: board.todo.tasks.map(t => t.id),
    in_progress: board.in_progress.tasks.map(t => t.id),
    code_review: board.code_review.tasks.map(t => t.id),
    done: board.done.tasks.map(t => t.id)
  };
}

function initialBoard(): Board {
  return groupByStatus([makeTask('a', 'todo'), makeTask('b', 'todo'), makeTask('c', 'in_progress')]);
}

describe('board helpers', () => {
  it('groups tasks into the four columns in list order', () => {
    const board = initialBoard();
    expect(ids(board)).toEqual({ todo: ['a', 'b'], in_progress: ['c'], code_review: [], done: [] });
    expect(board.todo.count).toBe(2);
    expect(board.code_review.name).toBe('Code Review');
  });

  it('moves a card to the top of another column and updates counts', () => {
    const result = moveTask(initialBoard(), 'a', 'in_progress');
    expect(result).not.toBeNull();
    if (!result) return;
    expect(ids(result.board)).toEqual({ todo: ['b'], in_progress: ['a', 'c'], code_review: [], done: [] });
    expect(result.board.in_progress.tasks[0].status).toBe('in_progress');
    expect(result.board.todo.count).toBe(1);
    expect(result.undo).toMatchObject({ from: 'todo', index: 0 });
  });

  it('inserts at the requested index, clamped to the column length', () => {
    const result = moveTask(initialBoard(), 'a', 'in_progress', 5);
    expect(result && ids(result.board).in_progress).toEqual(['c', 'a']);
  });

  it('returns null for a card that is not on the board', () => {
    expect(moveTask(initialBoard(), 'zzz', 'done')).toBeNull();
    expect(locate(emptyBoard(), 'a')).toBeNull();
  });

  it('reverts only the moved card', () => {
    const result = moveTask(initialBoard(), 'b', 'done');
    if (!result) throw new Error('expected a move');
    const withNewCard = addTask(result.board, makeTask('d', 'code_review'));
    const reverted = revertMove(withNewCard, result.undo);
    expect(ids(reverted)).toEqual({ todo: ['a', 'b'], in_progress: ['c'], code_review: ['d'], done: [] });
    expect(reverted.todo.tasks[1].status).toBe('todo');
  });

  it('replaces a card with the server copy in place', () => {
    const server = makeTask('b', 'todo', { title: 'Renamed' });
    const board = applyServerTask(initialBoard(), server);
    expect(ids(board).todo).toEqual(['a', 'b']);
    expect(board.todo.tasks[1].title).toBe('Renamed');
  });

  it('moves a card when the server copy has another status', () => {
    const board = applyServerTask(initialBoard(), makeTask('c', 'done'));
    expect(ids(board)).toEqual({ todo: ['a', 'b'], in_progress: [], code_review: [], done: ['c'] });
  });
});

describe('syncMove', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function memoryHandle(board: Board): BoardHandle & { board: Board } {
    const handle: BoardHandle & { board: Board } = {
      board,
      read: () => handle.board,
      update: fn => {
        handle.board = fn(handle.board);
      }
    };
    return handle;
  }

  function fakeApi(updateTaskStatus: MoveApi['updateTaskStatus']) {
    return {
      updateTaskStatus: vi.fn(updateTaskStatus),
      trackBehavior: vi.fn(async () => {})
    };
  }

  it('moves the card before the request settles', async () => {
    let resolve: (task: Task) => void = () => {};
    const api = fakeApi(() => new Promise<Task>(r => (resolve = r)));
    const handle = memoryHandle(initialBoard());

    const pending = syncMove(handle, api, 'a', 'done');
    expect(ids(handle.board).done).toEqual(['a']);
    expect(api.updateTaskStatus).toHaveBeenCalledWith('a', 'done');

    resolve(makeTask('a', 'done', { updated_at: '2024-02-01T00:00:00.000Z' }));
    const saved = await pending;
    expect(saved?.updated_at).toBe('2024-02-01T00:00:00.000Z');
    expect(handle.board.done.tasks[0].updated_at).toBe('2024-02-01T00:00:00.000Z');
  });

  it('records one behavior event after a successful move', async () => {
    const api = fakeApi(async () => makeTask('a', 'code_review'));
    const handle = memoryHandle(initialBoard());

    await syncMove(handle, api, 'a', 'code_review');

    expect(api.trackBehavior).toHaveBeenCalledTimes(1);
    expect(api.trackBehavior).toHaveBeenCalledWith({
      action_type: 'task_status_update',
      task: 'a',
      metadata: { old_status: 'todo', new_status: 'code_review' }
    });
  });

  it('puts the card back and logs when the request fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    let reject: (error: Error) => void = () => {};
    const api = fakeApi(() => new Promise<Task>((_r, rj) => (reject = rj)));
    const handle = memoryHandle(initialBoard());

    const pending = syncMove(handle, api, 'b', 'done');
    // Another card lands while the request is in flight.
    handle.update(board => addTask(board, makeTask('d', 'in_progress')));
    const failure = new Error('HTTP 500: Internal server error');
    reject(failure);

    expect(await pending).toBeNull();
    expect(ids(handle.board)).toEqual({ todo: ['a', 'b'], in_progress: ['d', 'c'], code_review: [], done: [] });
    expect(errorSpy).toHaveBeenCalledWith('Failed to update task status:', failure);
    expect(api.trackBehavior).not.toHaveBeenCalled();
  });

  it('logs a failed behavior event without undoing the move', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('offline');
    const api = {
      updateTaskStatus: vi.fn(async () => makeTask('a', 'done')),
      trackBehavior: vi.fn(async () => {
        throw failure;
      })
    };
    const handle = memoryHandle(initialBoard());

    await syncMove(handle, api, 'a', 'done');

    await vi.waitFor(() => expect(errorSpy).toHaveBeenCalledWith('Failed to record behavior event:', failure));
    expect(ids(handle.board).done).toEqual(['a']);
  });

  it('does nothing for a card that is not on the board', async () => {
    const api = fakeApi(async () => makeTask('x', 'done'));
    const handle = memoryHandle(initialBoard());

    expect(await syncMove(handle, api, 'x', 'done')).toBeNull();
    expect(api.updateTaskStatus).not.toHaveBeenCalled();
  });
});
