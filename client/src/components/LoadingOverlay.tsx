export function LoadingOverlay({ show, label = 'Loading' }: { show: boolean; label?: string }) {
  if (!show) return null;
  return (
    <div className="overlay" role="status">
      <div className="spinner" aria-label={label} />
    </div>
  );
}
