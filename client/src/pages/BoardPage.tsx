import { useEffect, useState, type DragEvent } from 'react';
import { Link, useParams } from 'react-router-dom';
import { TaskCard, TASK_DRAG_TYPE } from '../components/TaskCard';
import { TaskPanel } from '../components/TaskPanel';
import { useAuth } from '../contexts/AuthContext';
import { emptyBoard } from '../board';
import { displayName, useAppState } from '../store';
import { TASK_PRIORITIES, TASK_STATUSES, type Task, type TaskPriority, type TaskStatus } from '../types';

interface TaskForm {
  title: string;
  priority: TaskPriority;
  assigneeId: string;
  labelIds: string[];
}

const EMPTY_TASK_FORM: TaskForm = { title: '', priority: 'medium', assigneeId: '', labelIds: [] };

function isPriority(value: string): value is TaskPriority {
  return TASK_PRIORITIES.some(p => p === value);
}

export function BoardPage() {
  const { projectId = '' } = useParams();
  const { state, methods, loading } = useAppState();
  const { user } = useAuth();
  const [taskForm, setTaskForm] = useState(EMPTY_TASK_FORM);
  const [labelName, setLabelName] = useState('');
  const [labelColor, setLabelColor] = useState('#007bff');
  const [searchQuery, setSearchQuery] = useState('');
  const [searchResults, setSearchResults] = useState<Task[] | null>(null);
  const [dragOver, setDragOver] = useState<TaskStatus | null>(null);
  const [openTaskId, setOpenTaskId] = useState<string | null>(null);

  const project = state.projects.find(p => p.id === projectId);
  const board = state.boards[projectId] ?? emptyBoard();
  const isScrumMaster = user?.role === 'scrum_master';

  useEffect(() => {
    if (!projectId) return;
    methods.loadBoard(projectId).catch(err => console.error('Failed to load board:', err));
  }, [projectId, methods]);

  function handleDragOver(e: DragEvent<HTMLDivElement>, status: TaskStatus) {
    e.preventDefault();
    e.dataTransfer.dropEffect = 'move';
    if (dragOver !== status) setDragOver(status);
  }

  function handleDrop(e: DragEvent<HTMLDivElement>, status: TaskStatus) {
    e.preventDefault();
    setDragOver(null);
    const taskId = e.dataTransfer.getData(TASK_DRAG_TYPE);
    if (!taskId) return;
    void methods.moveTask(projectId, taskId, status);
  }

  async function handleCreateTask(e: React.FormEvent) {
    e.preventDefault();
    const title = taskForm.title.trim();
    if (!title) return;
    try {
      await methods.createTask({
        title,
        project: projectId,
        priority: taskForm.priority,
        assigned_to_id: taskForm.assigneeId || null,
        label_ids: taskForm.labelIds
      });
      setTaskForm(EMPTY_TASK_FORM);
    } catch (err) {
      console.error('Failed to create task:', err);
      alert('Failed to create task. Please try again.');
    }
  }

  async function handleDeleteTask(taskId: string) {
    if (!confirm('Delete this task?')) return;
    try {
      await methods.deleteTask(projectId, taskId);
      if (openTaskId === taskId) setOpenTaskId(null);
    } catch (err) {
      console.error('Failed to delete task:', err);
    }
  }

  async function handleCreateLabel(e: React.FormEvent) {
    e.preventDefault();
    const name = labelName.trim();
    if (!name) return;
    try {
      await methods.createLabel(projectId, name, labelColor);
      setLabelName('');
    } catch (err) {
      console.error('Failed to create label:', err);
      alert(err instanceof Error ? err.message : 'Failed to create label');
    }
  }

  async function handleSearch(e: React.FormEvent) {
    e.preventDefault();
    if (!searchQuery.trim()) {
      setSearchResults(null);
      return;
    }
    try {
      setSearchResults(await methods.searchTasks(searchQuery, projectId));
    } catch (err) {
      console.error('Search failed:', err);
    }
  }

  function toggleLabel(id: string) {
    setTaskForm(prev => ({
      ...prev,
      labelIds: prev.labelIds.includes(id) ? prev.labelIds.filter(l => l !== id) : [...prev.labelIds, id]
    }));
  }

  if (!project) {
    return (
      <div className="container">
        <div className="card">
          <div className="muted">{loading ? 'Loading project...' : 'Project not found.'}</div>
          <Link to="/">Back to projects</Link>
        </div>
      </div>
    );
  }

  return (
    <div className="container" style={{ display: 'grid', gap: 16 }}>
      <div className="space-between">
        <div>
          <div className="title">{project.name}</div>
          {project.description && <div className="muted">{project.description}</div>}
        </div>
        <form onSubmit={handleSearch} className="row" style={{ gap: 8 }}>
          <input
            className="input"
            placeholder="Search tasks..."
            value={searchQuery}
            onChange={e => setSearchQuery(e.target.value)}
          />
          <button className="btn" type="submit">
            Search
          </button>
        </form>
      </div>

      {searchResults && (
        <div className="card" style={{ display: 'grid', gap: 8 }}>
          <div className="space-between">
            <div style={{ fontWeight: 600 }}>{searchResults.length} results</div>
            <button className="btn" onClick={() => setSearchResults(null)}>
              Clear
            </button>
          </div>
          {searchResults.map(task => (
            <div key={task.id} className="row" style={{ gap: 8, cursor: 'pointer' }} onClick={() => setOpenTaskId(task.id)}>
              <span className="muted">{task.task_id}</span>
              <span>{task.title}</span>
            </div>
          ))}
        </div>
      )}

      <form onSubmit={handleCreateTask} className="card" style={{ display: 'grid', gap: 8 }}>
        <div className="row" style={{ gap: 8 }}>
          <input
            className="input"
            placeholder="New task title"
            value={taskForm.title}
            onChange={e => setTaskForm(prev => ({ ...prev, title: e.target.value }))}
          />
          <select
            className="select"
            value={taskForm.priority}
            onChange={e => {
              const priority = e.target.value;
              if (isPriority(priority)) setTaskForm(prev => ({ ...prev, priority }));
            }}
          >
            {TASK_PRIORITIES.map(p => (
              <option key={p} value={p}>
                {p}
              </option>
            ))}
          </select>
          <select
            className="select"
            value={taskForm.assigneeId}
            onChange={e => setTaskForm(prev => ({ ...prev, assigneeId: e.target.value }))}
          >
            <option value="">Unassigned</option>
            {state.users.map(u => (
              <option key={u.id} value={u.id}>
                {displayName(u)}
              </option>
            ))}
          </select>
          <button className="btn primary" type="submit" disabled={!taskForm.title.trim()}>
            Add task
          </button>
        </div>
        {project.labels.length > 0 && (
          <div className="row" style={{ gap: 12, flexWrap: 'wrap' }}>
            {project.labels.map(label => (
              <label key={label.id} className="row" style={{ gap: 4, fontSize: 13 }}>
                <input
                  type="checkbox"
                  checked={taskForm.labelIds.includes(label.id)}
                  onChange={() => toggleLabel(label.id)}
                />
                <span className="tag-badge-small" style={{ background: label.color, color: '#fff' }}>
                  {label.name}
                </span>
              </label>
            ))}
          </div>
        )}
      </form>

      {isScrumMaster && (
        <form onSubmit={handleCreateLabel} className="row" style={{ gap: 8 }}>
          <input
            className="input"
            placeholder="New label"
            value={labelName}
            onChange={e => setLabelName(e.target.value)}
          />
          <input type="color" value={labelColor} onChange={e => setLabelColor(e.target.value)} />
          <button className="btn" type="submit" disabled={!labelName.trim()}>
            Add label
          </button>
        </form>
      )}

      <div className="board-layout">
        <div className="grid grid-4 board">
          {TASK_STATUSES.map(status => (
            <div
              key={status}
              className={`board-column${dragOver === status ? ' drag-over' : ''}`}
              onDragOver={e => handleDragOver(e, status)}
              onDragLeave={() => setDragOver(null)}
              onDrop={e => handleDrop(e, status)}
            >
              <div className="space-between" style={{ marginBottom: 8 }}>
                <span style={{ fontWeight: 700 }}>{board[status].name}</span>
                <span className="muted">{board[status].count}</span>
              </div>
              <div style={{ display: 'grid', gap: 8 }}>
                {board[status].tasks.map(task => (
                  <TaskCard
                    key={task.id}
                    task={task}
                    onOpen={() => setOpenTaskId(task.id)}
                    onDelete={() => void handleDeleteTask(task.id)}
                  />
                ))}
              </div>
            </div>
          ))}
        </div>
        {openTaskId && <TaskPanel key={openTaskId} taskId={openTaskId} onClose={() => setOpenTaskId(null)} />}
      </div>
    </div>
  );
}
