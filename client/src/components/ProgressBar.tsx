/** Horizontal bar for a 0-100 value; fractional percentages are kept for the label. */
export function ProgressBar({ percent, label }: { percent: number; label?: string }) {
  const clamped = Math.max(0, Math.min(100, percent));
  return (
    <div style={{ display: 'grid', gap: 4 }}>
      {label && (
        <div className="space-between muted" style={{ fontSize: 12 }}>
          <span>{label}</span>
          <span>{clamped}%</span>
        </div>
      )}
      <div className="progress" aria-valuemin={0} aria-valuemax={100} aria-valuenow={clamped}>
        <span style={{ width: `${clamped}%` }} />
      </div>
    </div>
  );
}
