import {
  STATUS_NAMES,
  TASK_STATUSES,
  type BehaviorEvent,
  type Board,
  type BoardColumn,
  type Task,
  type TaskStatus
} from './types';

/** Where a card was before an optimistic move, so the move can be undone. */
export interface MoveUndo {
  task: Task;
  from: TaskStatus;
  index: number;
}

export interface Located {
  status: TaskStatus;
  index: number;
  task: Task;
}

function column(status: TaskStatus, tasks: Task[]): BoardColumn {
  return { name: STATUS_NAMES[status], count: tasks.length, tasks };
}

function mapColumns(board: Board, fn: (status: TaskStatus, tasks: Task[]) => Task[]): Board {
  return {
    todo: column('todo', fn('todo', board.todo.tasks)),
    in_progress: column('in_progress', fn('in_progress', board.in_progress.tasks)),
    code_review: column('code_review', fn('code_review', board.code_review.tasks)),
    done: column('done', fn('done', board.done.tasks))
  };
}

function insertAt<T>(list: T[], index: number, item: T): T[] {
  const at = Math.max(0, Math.min(index, list.length));
  return [...list.slice(0, at), item, ...list.slice(at)];
}

export function emptyBoard(): Board {
  return {
    todo: column('todo', []),
    in_progress: column('in_progress', []),
    code_review: column('code_review', []),
    done: column('done', [])
  };
}

/** Builds a board from a flat task list, keeping list order within columns. */
export function groupByStatus(tasks: Task[]): Board {
  return mapColumns(emptyBoard(), status => tasks.filter(t => t.status === status));
}

export function locate(board: Board, taskId: string): Located | null {
  for (const status of TASK_STATUSES) {
    const index = board[status].tasks.findIndex(t => t.id === taskId);
    if (index >= 0) return { status, index, task: board[status].tasks[index] };
  }
  return null;
}

export function removeTask(board: Board, taskId: string): Board {
  return mapColumns(board, (_status, tasks) => tasks.filter(t => t.id !== taskId));
}

export function addTask(board: Board, task: Task, index = 0): Board {
  return mapColumns(board, (status, tasks) => (status === task.status ? insertAt(tasks, index, task) : tasks));
}

/**
 * Moves a card to `to` at `toIndex` (top by default). Returns null when the
 * card is not on the board.
 */
export function moveTask(board: Board, taskId: string, to: TaskStatus, toIndex = 0): { board: Board; undo: MoveUndo } | null {
  const found = locate(board, taskId);
  if (!found) return null;
  const moved: Task = { ...found.task, status: to };
  const next = addTask(removeTask(board, taskId), moved, toIndex);
  return { board: next, undo: { task: found.task, from: found.status, index: found.index } };
}

/** Puts only the moved card back where it was; other cards are left alone. */
export function revertMove(board: Board, undo: MoveUndo): Board {
  return addTask(removeTask(board, undo.task.id), undo.task, undo.index);
}

/** Replaces a card with the server's copy, moving it if its status differs. */
export function applyServerTask(board: Board, task: Task): Board {
  const found = locate(board, task.id);
  if (!found) return addTask(board, task);
  if (found.status === task.status) {
    return mapColumns(board, (_status, tasks) => tasks.map(t => (t.id === task.id ? task : t)));
  }
  return addTask(removeTask(board, task.id), task);
}

/** Read/write access to one project's board in whatever holds the state. */
export interface BoardHandle {
  read(): Board;
  update(fn: (board: Board) => Board): void;
}

export interface MoveApi {
  updateTaskStatus(taskId: string, status: TaskStatus): Promise<Task>;
  trackBehavior(event: BehaviorEvent): Promise<void>;
}

/**
 * Moves a card optimistically, then persists the new status. On failure only
 * the moved card goes back; on success the server's copy replaces it and a
 * `task_status_update` behavior event is sent without waiting for it.
 */
export async function syncMove(
  handle: BoardHandle,
  api: MoveApi,
  taskId: string,
  to: TaskStatus,
  toIndex = 0
): Promise<Task | null> {
  const planned = moveTask(handle.read(), taskId, to, toIndex);
  if (!planned) return null;
  const { undo } = planned;
  handle.update(board => moveTask(board, taskId, to, toIndex)?.board ?? board);

  let saved: Task;
  try {
    saved = await api.updateTaskStatus(taskId, to);
  } catch (error) {
    console.error('Failed to update task status:', error);
    handle.update(board => revertMove(board, undo));
    return null;
  }

  handle.update(board => applyServerTask(board, saved));
  api
    .trackBehavior({
      action_type: 'task_status_update',
      task: taskId,
      metadata: { old_status: undo.from, new_status: to }
    })
    .catch(error => console.error('Failed to record behavior event:', error));
  return saved;
}
