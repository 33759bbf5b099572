import type {
  ActivityLog,
  Comment,
  Label,
  Project,
  Task,
  TaskStatus,
  User,
  UserBehavior
} from '../types';

export type NewUser = Pick<User, 'username' | 'email' | 'firstName' | 'lastName' | 'role' | 'passwordHash'>;
export type UserPatch = Partial<Pick<User, 'email' | 'firstName' | 'lastName'>>;

export type NewProject = Pick<Project, 'name' | 'description' | 'createdBy' | 'isActive'> & { memberIds: string[] };
export type ProjectPatch = Partial<Pick<Project, 'name' | 'description' | 'isActive'>>;

export type NewLabel = Pick<Label, 'projectId' | 'name' | 'color'>;

export type NewTask = Omit<Task, 'id' | 'createdAt' | 'updatedAt'>;
export type TaskPatch = Partial<
  Pick<Task, 'title' | 'description' | 'status' | 'priority' | 'assignedTo' | 'dueDate' | 'estimatedHours' | 'actualHours'>
>;

export type NewComment = Pick<Comment, 'taskId' | 'authorId' | 'content'>;
export type NewActivity = Omit<ActivityLog, 'id' | 'timestamp'>;
export type NewBehavior = Omit<UserBehavior, 'id' | 'timestamp'>;

export interface ProjectFilter {
  /** Only projects this user is a member of. */
  memberId?: string;
}

export interface TaskFilter {
  projectId?: string;
  status?: TaskStatus;
  assignedTo?: string;
  /** Only tasks of projects this user is a member of. */
  memberId?: string;
  /** Case-insensitive substring of title or description. */
  search?: string;
  limit?: number;
}

/**
 * Repository over the relational tables. Lists come back newest first, except
 * comments which are chronological.
 */
export interface Store {
  ping(): Promise<void>;
  /** Runs `fn` against a store whose writes commit or roll back together. */
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;

  createUser(input: NewUser): Promise<User>;
  findUserById(id: string): Promise<User | null>;
  findUserByUsername(username: string): Promise<User | null>;
  findUsersByIds(ids: string[]): Promise<User[]>;
  listUsers(): Promise<User[]>;
  updateUser(id: string, patch: UserPatch): Promise<User | null>;

  createProject(input: NewProject): Promise<Project>;
  findProject(id: string): Promise<Project | null>;
  listProjects(filter?: ProjectFilter): Promise<Project[]>;
  updateProject(id: string, patch: ProjectPatch): Promise<Project | null>;
  deleteProject(id: string): Promise<boolean>;
  listProjectMembers(projectId: string): Promise<User[]>;
  setProjectMembers(projectId: string, userIds: string[]): Promise<void>;
  isProjectMember(projectId: string, userId: string): Promise<boolean>;
  countProjectTasks(projectId: string): Promise<number>;
  /** Atomically advances the project's task counter and returns the new value. */
  nextTaskNumber(projectId: string): Promise<number>;

  createLabel(input: NewLabel): Promise<Label>;
  listLabels(projectId: string): Promise<Label[]>;
  findLabelsByIds(ids: string[]): Promise<Label[]>;

  createTask(input: NewTask): Promise<Task>;
  findTask(id: string): Promise<Task | null>;
  /** Like `findTask`, but locks the row until the surrounding transaction ends. */
  findTaskForUpdate(id: string): Promise<Task | null>;
  findTaskByCode(code: string): Promise<Task | null>;
  listTasks(filter?: TaskFilter): Promise<Task[]>;
  updateTask(id: string, patch: TaskPatch): Promise<Task | null>;
  deleteTask(id: string): Promise<boolean>;
  setTaskLabels(taskId: string, labelIds: string[]): Promise<void>;
  listTaskLabels(taskIds: string[]): Promise<Map<string, Label[]>>;

  createComment(input: NewComment): Promise<Comment>;
  listComments(taskId: string): Promise<Comment[]>;

  appendActivity(input: NewActivity): Promise<ActivityLog>;
  listActivity(taskId: string, limit?: number): Promise<ActivityLog[]>;

  appendBehavior(input: NewBehavior): Promise<UserBehavior>;
  countBehaviors(userId: string, since?: Date): Promise<number>;
}
