import React, { createContext, useContext, useMemo, useRef, useState } from 'react';
import type { ApiClient, ProjectInput, TaskInput } from './api';
import { addTask, emptyBoard, removeTask, syncMove, type BoardHandle } from './board';
import type { Board, Comment, Dashboard, Label, Project, Task, TaskDetail, TaskStatus, User } from './types';

export interface AppState {
  projects: Project[];
  users: User[];
  boards: Record<string, Board>;
  dashboard: Dashboard | null;
}

type Methods = {
  reload: () => Promise<void>;
  createProject: (data: ProjectInput) => Promise<Project>;
  deleteProject: (projectId: string) => Promise<void>;
  createLabel: (projectId: string, name: string, color?: string) => Promise<Label>;
  loadBoard: (projectId: string) => Promise<void>;
  moveTask: (projectId: string, taskId: string, to: TaskStatus, toIndex?: number) => Promise<Task | null>;
  createTask: (data: TaskInput) => Promise<Task>;
  deleteTask: (projectId: string, taskId: string) => Promise<void>;
  getTask: (taskId: string) => Promise<TaskDetail>;
  addComment: (taskId: string, content: string) => Promise<Comment>;
  searchTasks: (q: string, projectId?: string) => Promise<Task[]>;
  loadDashboard: (projectId?: string) => Promise<void>;
};

type Ctx = { state: AppState; methods: Methods; loading: boolean; initialLoad: boolean; error?: string };

const AppStateContext = createContext<Ctx | null>(null);

const EMPTY_STATE: AppState = { projects: [], users: [], boards: {}, dashboard: null };

export function AppStateProvider({ api, children }: { api: ApiClient; children: React.ReactNode }) {
  const [state, setState] = useState<AppState>(EMPTY_STATE);
  const [loading, setLoading] = useState(false);
  const [initialLoad, setInitialLoad] = useState(false);
  const [error, setError] = useState<string | undefined>(undefined);
  const inFlight = useRef(0);
  // Boards mirrored in a ref so optimistic moves read the latest value.
  const boards = useRef<Record<string, Board>>({});

  const methods = useMemo<Methods>(() => {
    const begin = () => {
      inFlight.current += 1;
      setLoading(true);
    };
    const end = () => {
      inFlight.current = Math.max(0, inFlight.current - 1);
      if (inFlight.current === 0) setLoading(false);
    };

    async function tracked<T>(work: () => Promise<T>): Promise<T> {
      begin();
      try {
        return await work();
      } finally {
        end();
      }
    }

    function boardHandle(projectId: string): BoardHandle {
      return {
        read: () => boards.current[projectId] ?? emptyBoard(),
        update: fn => {
          boards.current = { ...boards.current, [projectId]: fn(boards.current[projectId] ?? emptyBoard()) };
          const next = boards.current;
          setState(prev => ({ ...prev, boards: next }));
        }
      };
    }

    async function loadAll() {
      begin();
      setError(undefined);
      try {
        const [projects, users] = await Promise.all([api.listProjects(), api.listUsers()]);
        setState(prev => ({ ...prev, projects, users }));
      } catch (e) {
        console.error('Failed to load data:', e);
        setError(e instanceof Error ? e.message : 'Failed to load. Check your API connection.');
        setState(EMPTY_STATE);
      } finally {
        setInitialLoad(true);
        end();
      }
    }

    return {
      reload: loadAll,
      createProject: data =>
        tracked(async () => {
          const project = await api.createProject(data);
          setState(prev => ({ ...prev, projects: [project, ...prev.projects] }));
          return project;
        }),
      deleteProject: projectId =>
        tracked(async () => {
          await api.deleteProject(projectId);
          setState(prev => ({ ...prev, projects: prev.projects.filter(p => p.id !== projectId) }));
        }),
      createLabel: (projectId, name, color) =>
        tracked(async () => {
          const label = await api.createLabel(projectId, { name, color });
          setState(prev => ({
            ...prev,
            projects: prev.projects.map(p => (p.id === projectId ? { ...p, labels: [...p.labels, label] } : p))
          }));
          return label;
        }),
      loadBoard: projectId =>
        tracked(async () => {
          const board = await api.board(projectId);
          boardHandle(projectId).update(() => board);
        }),
      moveTask: (projectId, taskId, to, toIndex) => syncMove(boardHandle(projectId), api, taskId, to, toIndex),
      createTask: data =>
        tracked(async () => {
          const task = await api.createTask(data);
          boardHandle(data.project).update(board => addTask(board, task));
          return task;
        }),
      deleteTask: (projectId, taskId) =>
        tracked(async () => {
          await api.deleteTask(taskId);
          boardHandle(projectId).update(board => removeTask(board, taskId));
        }),
      getTask: taskId => api.getTask(taskId),
      addComment: (taskId, content) => api.addComment(taskId, content),
      searchTasks: (q, projectId) => api.searchTasks(q, projectId),
      loadDashboard: projectId =>
        tracked(async () => {
          const dashboard = await api.dashboard(projectId);
          setState(prev => ({ ...prev, dashboard }));
        })
    };
  }, [api]);

  const value: Ctx = useMemo(
    () => ({ state, methods, loading, initialLoad, error }),
    [state, methods, loading, initialLoad, error]
  );

  return <AppStateContext.Provider value={value}>{children}</AppStateContext.Provider>;
}

export function useAppState(): Ctx {
  const ctx = useContext(AppStateContext);
  if (!ctx) throw new Error('useAppState must be used within AppStateProvider');
  return ctx;
}

export function displayName(user: Pick<User, 'username' | 'first_name' | 'last_name'>): string {
  const full = `${user.first_name} ${user.last_name}`.trim();
  return full || user.username;
}
