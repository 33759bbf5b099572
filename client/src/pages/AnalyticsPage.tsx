import { useEffect, useState } from 'react';
import { ProgressBar } from '../components/ProgressBar';
import { useAppState } from '../store';
import { STATUS_NAMES, type TaskPriority, type TaskStatus } from '../types';

type ChartDatum = { label: string; value: number; color: string };

const PRIORITY_COLORS: Record<TaskPriority, string> = {
  low: '#94a3b8',
  medium: '#3b82f6',
  high: '#f59e0b',
  urgent: '#ef4444'
};

const STATUS_COLORS: Record<TaskStatus, string> = {
  todo: '#94a3b8',
  in_progress: '#3b82f6',
  code_review: '#a855f7',
  done: '#22c55e'
};

function BarChart({ data, height = 150 }: { data: ChartDatum[]; height?: number }) {
  if (data.length === 0) return <div className="muted">No data</div>;
  const maxValue = Math.max(...data.map(d => d.value));
  const labelHeight = 30;
  const topPadding = 20;
  const maxBarHeight = height - labelHeight - topPadding;
  const barWidthPercent = Math.max(15, Math.min(22, 90 / data.length));
  const spacingPercent = (100 - barWidthPercent * data.length) / (data.length + 1);

  return (
    <svg width="100%" height={height} style={{ display: 'block', overflow: 'visible' }}>
      {data.map((item, i) => {
        const barHeight = maxValue > 0 ? (item.value / maxValue) * maxBarHeight : 0;
        const xPercent = spacingPercent + i * (barWidthPercent + spacingPercent);
        const barY = topPadding + (maxBarHeight - barHeight);
        return (
          <g key={item.label}>
            <rect x={`${xPercent}%`} y={barY} width={`${barWidthPercent}%`} height={barHeight} fill={item.color} rx={4} />
            <text
              x={`${xPercent + barWidthPercent / 2}%`}
              y={height - 8}
              textAnchor="middle"
              fontSize="10"
              fill="#64748b"
              dominantBaseline="middle"
            >
              {item.label}
            </text>
            <text
              x={`${xPercent + barWidthPercent / 2}%`}
              y={barY - 6}
              textAnchor="middle"
              fontSize="11"
              fontWeight="600"
              fill="#0f172a"
              dominantBaseline="middle"
            >
              {item.value}
            </text>
          </g>
        );
      })}
    </svg>
  );
}

function PieChart({ data, size = 140 }: { data: ChartDatum[]; size?: number }) {
  const total = data.reduce((sum, d) => sum + d.value, 0);
  if (total === 0) {
    return (
      <div style={{ width: size, height: size, display: 'flex', alignItems: 'center', justifyContent: 'center', color: '#64748b' }}>
        No data
      </div>
    );
  }

  const center = size / 2;
  const radius = size / 2 - 10;
  let currentAngle = -90;

  const slices = data.map(item => {
    const angle = (item.value / total) * 360;
    // A full circle has identical arc endpoints, so SVG would draw nothing.
    if (angle >= 360) {
      return <circle key={item.label} cx={center} cy={center} r={radius} fill={item.color} />;
    }
    const start = (currentAngle * Math.PI) / 180;
    const end = ((currentAngle + angle) * Math.PI) / 180;
    currentAngle += angle;
    const x1 = center + radius * Math.cos(start);
    const y1 = center + radius * Math.sin(start);
    const x2 = center + radius * Math.cos(end);
    const y2 = center + radius * Math.sin(end);
    const largeArc = angle > 180 ? 1 : 0;
    return (
      <path
        key={item.label}
        d={`M ${center} ${center} L ${x1} ${y1} A ${radius} ${radius} 0 ${largeArc} 1 ${x2} ${y2} Z`}
        fill={item.color}
        stroke="#ffffff"
        strokeWidth="2"
      />
    );
  });

  return (
    <div style={{ display: 'flex', flexDirection: 'column', alignItems: 'center', gap: 12 }}>
      <svg width={size} height={size}>
        {slices}
        <circle cx={center} cy={center} r={radius * 0.6} fill="#ffffff" />
        <text x={center} y={center + 5} textAnchor="middle" fontSize="16" fontWeight="600" fill="#0f172a">
          {total}
        </text>
      </svg>
      <div style={{ display: 'grid', gap: 6, fontSize: 11 }}>
        {data.map(item => (
          <div key={item.label} style={{ display: 'flex', alignItems: 'center', gap: 6 }}>
            <div style={{ width: 12, height: 12, borderRadius: 2, background: item.color }} />
            <span style={{ color: '#64748b' }}>
              {item.label}: {item.value}
            </span>
          </div>
        ))}
      </div>
    </div>
  );
}

export function AnalyticsPage() {
  const { state, methods } = useAppState();
  const [projectId, setProjectId] = useState('');

  useEffect(() => {
    methods.loadDashboard(projectId || undefined).catch(err => console.error('Failed to load analytics:', err));
  }, [projectId, methods]);

  const dashboard = state.dashboard;
  if (!dashboard) {
    return (
      <div className="container">
        <div className="card muted">Loading analytics...</div>
      </div>
    );
  }

  const { overview, user_metrics, recent_activity, distributions } = dashboard;
  const priorityData = distributions.priority.map(d => ({
    label: d.priority,
    value: d.count,
    color: PRIORITY_COLORS[d.priority]
  }));
  const statusData = distributions.status.map(d => ({
    label: STATUS_NAMES[d.status],
    value: d.count,
    color: STATUS_COLORS[d.status]
  }));

  return (
    <div className="container" style={{ display: 'grid', gap: 16 }}>
      <div className="space-between">
        <div className="title">Analytics</div>
        <select className="select" value={projectId} onChange={e => setProjectId(e.target.value)}>
          <option value="">All projects</option>
          {state.projects.map(p => (
            <option key={p.id} value={p.id}>
              {p.name}
            </option>
          ))}
        </select>
      </div>

      <div className="grid grid-4">
        <div className="stat-card">
          <div className="stat-value">{overview.total_tasks}</div>
          <div className="stat-label">Total tasks</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{overview.todo_tasks}</div>
          <div className="stat-label">To do</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{overview.in_progress_tasks + overview.code_review_tasks}</div>
          <div className="stat-label">In flight</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{overview.completed_tasks}</div>
          <div className="stat-label">Completed</div>
        </div>
      </div>

      <div className="grid grid-3">
        <div className="card" style={{ display: 'grid', gap: 12 }}>
          <div style={{ fontWeight: 600 }}>Progress</div>
          <ProgressBar percent={overview.completion_rate} label="Completion rate" />
          <ProgressBar percent={user_metrics.productivity_score} label="Your productivity" />
          <div className="muted" style={{ fontSize: 13 }}>
            {user_metrics.assigned_tasks} assigned · {user_metrics.completed_tasks} done ·{' '}
            {user_metrics.in_progress_tasks} in progress
          </div>
        </div>
        <div className="card" style={{ display: 'grid', gap: 8 }}>
          <div style={{ fontWeight: 600 }}>By priority</div>
          <BarChart data={priorityData} />
        </div>
        <div className="card" style={{ display: 'grid', gap: 8 }}>
          <div style={{ fontWeight: 600 }}>By status</div>
          <PieChart data={statusData} />
        </div>
      </div>

      <div className="grid grid-3">
        <div className="stat-card">
          <div className="stat-value">{recent_activity.tasks_completed_this_week}</div>
          <div className="stat-label">Completed this week</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{recent_activity.user_actions_this_week}</div>
          <div className="stat-label">Your actions this week</div>
        </div>
        <div className="stat-card">
          <div className="stat-value">{recent_activity.total_user_actions}</div>
          <div className="stat-label">Your actions overall</div>
        </div>
      </div>
    </div>
  );
}
