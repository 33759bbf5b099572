import { useEffect, useState } from 'react';
import { displayName, useAppState } from '../store';
import { STATUS_NAMES, type TaskDetail } from '../types';

/** Side panel with a task's details, its comments and its recent activity. */
export function TaskPanel({ taskId, onClose }: { taskId: string; onClose: () => void }) {
  const { methods } = useAppState();
  const [task, setTask] = useState<TaskDetail | null>(null);
  const [comment, setComment] = useState('');

  useEffect(() => {
    let cancelled = false;
    methods
      .getTask(taskId)
      .then(detail => {
        if (!cancelled) setTask(detail);
      })
      .catch(err => console.error('Failed to load task:', err));
    return () => {
      cancelled = true;
    };
  }, [taskId, methods]);

  async function handleComment(e: React.FormEvent) {
    e.preventDefault();
    const content = comment.trim();
    if (!content) return;
    try {
      await methods.addComment(taskId, content);
      setComment('');
      setTask(await methods.getTask(taskId));
    } catch (err) {
      console.error('Failed to add comment:', err);
    }
  }

  if (!task) {
    return (
      <aside className="card task-panel">
        <div className="muted">Loading...</div>
      </aside>
    );
  }

  return (
    <aside className="card task-panel" style={{ display: 'grid', gap: 12, alignContent: 'start' }}>
      <div className="space-between">
        <span className="muted" style={{ fontWeight: 600 }}>
          {task.task_id}
        </span>
        <button className="btn" onClick={onClose}>
          Close
        </button>
      </div>
      <div className="title">{task.title}</div>
      {task.description && <div style={{ whiteSpace: 'pre-wrap' }}>{task.description}</div>}
      <div className="muted" style={{ fontSize: 13, display: 'grid', gap: 4 }}>
        <span>Status: {STATUS_NAMES[task.status]}</span>
        <span>Priority: {task.priority}</span>
        <span>Assignee: {task.assigned_to ? displayName(task.assigned_to) : 'Unassigned'}</span>
        {task.estimated_hours !== null && <span>Estimate: {task.estimated_hours}h</span>}
      </div>

      <div style={{ fontWeight: 600 }}>Comments</div>
      {task.comments.length === 0 && <div className="muted">No comments yet.</div>}
      {task.comments.map(c => (
        <div key={c.id} style={{ fontSize: 13 }}>
          <strong>{c.author ? displayName(c.author) : 'Unknown'}</strong>{' '}
          <span className="muted">{new Date(c.created_at).toLocaleString()}</span>
          <div>{c.content}</div>
        </div>
      ))}
      <form onSubmit={handleComment} className="row" style={{ gap: 8 }}>
        <input
          className="input"
          placeholder="Add a comment"
          value={comment}
          onChange={e => setComment(e.target.value)}
        />
        <button className="btn primary" type="submit" disabled={!comment.trim()}>
          Post
        </button>
      </form>

      <div style={{ fontWeight: 600 }}>Activity</div>
      {task.activity_logs.map(log => (
        <div key={log.id} className="muted" style={{ fontSize: 12 }}>
          {new Date(log.timestamp).toLocaleString()} · {log.user ? displayName(log.user) : 'Unknown'}: {log.description}
        </div>
      ))}
    </aside>
  );
}
