export type Role = 'scrum_master' | 'employee';

export const TASK_STATUSES = ['todo', 'in_progress', 'code_review', 'done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const STATUS_NAMES: Record<TaskStatus, string> = {
  todo: 'To Do',
  in_progress: 'In Progress',
  code_review: 'Code Review',
  done: 'Done'
};

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface User {
  id: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  role: Role;
  date_joined: string;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface Label {
  id: string;
  name: string;
  color: string;
  created_at: string;
}

export interface Comment {
  id: string;
  content: string;
  author: User | null;
  created_at: string;
  updated_at: string;
}

export interface ActivityLog {
  id: string;
  action: 'created' | 'updated' | 'status_changed' | 'assigned' | 'commented';
  description: string;
  user: User | null;
  old_value: string | null;
  new_value: string | null;
  timestamp: string;
}

export interface Task {
  id: string;
  /** Human-readable code such as `TEA-12`. */
  task_id: string;
  title: string;
  description: string;
  project: string;
  assigned_to: User | null;
  created_by: User | null;
  status: TaskStatus;
  priority: TaskPriority;
  labels: Label[];
  due_date: string | null;
  estimated_hours: number | null;
  actual_hours: number;
  created_at: string;
  updated_at: string;
}

export interface TaskDetail extends Task {
  comments: Comment[];
  activity_logs: ActivityLog[];
}

export interface Project {
  id: string;
  name: string;
  description: string;
  created_by: string;
  members: User[];
  labels: Label[];
  task_count: number;
  created_at: string;
  updated_at: string;
  is_active: boolean;
}

export interface BoardColumn {
  name: string;
  count: number;
  tasks: Task[];
}

export type Board = Record<TaskStatus, BoardColumn>;

export interface Dashboard {
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

export interface BehaviorEvent {
  action_type: string;
  task?: string | null;
  duration_seconds?: number | null;
  metadata?: Record<string, unknown>;
}
