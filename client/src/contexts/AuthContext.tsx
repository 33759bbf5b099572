import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';
import type { ApiClient, RegisterInput } from '../api';
import type { Session } from '../session';
import type { User } from '../types';

interface AuthContextType {
  user: User | null;
  login: (username: string, password: string) => Promise<void>;
  register: (input: RegisterInput) => Promise<void>;
  logout: () => void;
  loading: boolean;
}

const AuthContext = createContext<AuthContextType | null>(null);

export function AuthProvider({ api, session, children }: { api: ApiClient; session: Session; children: ReactNode }) {
  const [user, setUser] = useState<User | null>(null);
  const [loading, setLoading] = useState(true);

  useEffect(() => {
    const unsubscribe = session.subscribe(state => setUser(state.user));
    const restored = session.load();
    if (!restored.user) {
      setLoading(false);
      return unsubscribe;
    }
    // Confirms the stored tokens still work; a dead refresh token clears the session.
    void api
      .profile()
      .then(profile => session.setUser(profile))
      .catch(error => console.error('Failed to restore session:', error))
      .finally(() => setLoading(false));
    return unsubscribe;
  }, [api, session]);

  async function login(username: string, password: string) {
    await api.login(username, password);
  }

  async function register(input: RegisterInput) {
    await api.register(input);
  }

  function logout() {
    api.logout();
  }

  return (
    <AuthContext.Provider value={{ user, login, register, logout, loading }}>
      {children}
    </AuthContext.Provider>
  );
}

export function useAuth() {
  const context = useContext(AuthContext);
  if (!context) throw new Error('useAuth must be used within AuthProvider');
  return context;
}
