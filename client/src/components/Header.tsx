import { NavLink } from 'react-router-dom';
import { useAuth } from '../contexts/AuthContext';
import { displayName } from '../store';

const ROLE_LABELS = { scrum_master: 'Scrum Master', employee: 'Employee' } as const;

export function Header() {
  const { user, logout } = useAuth();

  return (
    <header className="header">
      <div className="container space-between" style={{ paddingTop: 12, paddingBottom: 12 }}>
        <div className="row">
          <div style={{ fontWeight: 800, fontSize: 18 }}>TaskFlow</div>
        </div>
        <div className="row" style={{ gap: 16, alignItems: 'center' }}>
          <nav className="nav">
            <NavLink to="/" end className={({ isActive }) => (isActive ? 'active' : '')}>
              Projects
            </NavLink>
            <NavLink to="/analytics" className={({ isActive }) => (isActive ? 'active' : '')}>
              Analytics
            </NavLink>
          </nav>
          {user && (
            <div className="row" style={{ gap: 8, alignItems: 'center' }}>
              <span className="muted" style={{ fontSize: 14 }}>
                {displayName(user)} · {ROLE_LABELS[user.role]}
              </span>
              <button className="btn" onClick={logout} style={{ fontSize: 12 }}>
                Logout
              </button>
            </div>
          )}
        </div>
      </div>
    </header>
  );
}
