import type { DragEvent } from 'react';
import { displayName } from '../store';
import type { Task } from '../types';

export const TASK_DRAG_TYPE = 'application/x-taskflow-task';

const PRIORITY_COLORS = {
  low: '#94a3b8',
  medium: '#3b82f6',
  high: '#f59e0b',
  urgent: '#ef4444'
} as const;

export function TaskCard({ task, onOpen, onDelete }: { task: Task; onOpen?: () => void; onDelete?: () => void }) {
  function handleDragStart(e: DragEvent<HTMLDivElement>) {
    e.dataTransfer.setData(TASK_DRAG_TYPE, task.id);
    e.dataTransfer.effectAllowed = 'move';
  }

  return (
    <div
      className="card task-card"
      draggable
      onDragStart={handleDragStart}
      onClick={onOpen}
      style={{ display: 'grid', gap: 6, padding: 10, cursor: 'grab', borderLeft: `4px solid ${PRIORITY_COLORS[task.priority]}` }}
    >
      <div className="space-between">
        <span className="muted" style={{ fontSize: 11, fontWeight: 600 }}>
          {task.task_id}
        </span>
        <span className={`priority-badge priority-${task.priority}`}>{task.priority}</span>
      </div>
      <div style={{ fontWeight: 600 }}>{task.title}</div>
      {task.labels.length > 0 && (
        <div className="row" style={{ gap: 4, flexWrap: 'wrap' }}>
          {task.labels.map(label => (
            <span key={label.id} className="tag-badge-small" style={{ background: label.color, color: '#fff' }}>
              {label.name}
            </span>
          ))}
        </div>
      )}
      <div className="space-between muted" style={{ fontSize: 11 }}>
        <span>{task.assigned_to ? displayName(task.assigned_to) : 'Unassigned'}</span>
        {task.due_date && <span>Due {new Date(task.due_date).toLocaleDateString()}</span>}
        {onDelete && (
          <button
            className="btn danger"
            style={{ fontSize: 11, padding: '2px 6px' }}
            onClick={e => {
              e.stopPropagation();
              onDelete();
            }}
          >
            Delete
          </button>
        )}
      </div>
    </div>
  );
}
