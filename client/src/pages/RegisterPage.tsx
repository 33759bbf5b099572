import { useState } from 'react';
import { useNavigate, Link } from 'react-router-dom';
import { ApiError, type RegisterInput } from '../api';
import { useAuth } from '../contexts/AuthContext';

const MIN_PASSWORD_LENGTH = 8;

const EMPTY_FORM: RegisterInput = {
  username: '',
  email: '',
  first_name: '',
  last_name: '',
  password: '',
  password_confirm: '',
  role: 'employee'
};

export function RegisterPage() {
  const [form, setForm] = useState<RegisterInput>(EMPTY_FORM);
  const [errors, setErrors] = useState<string[]>([]);
  const [loading, setLoading] = useState(false);
  const { register } = useAuth();
  const navigate = useNavigate();

  function field<K extends keyof RegisterInput>(key: K, value: RegisterInput[K]) {
    setForm(prev => ({ ...prev, [key]: value }));
  }

  async function handleSubmit(e: React.FormEvent) {
    e.preventDefault();
    setErrors([]);

    if (form.password.length < MIN_PASSWORD_LENGTH) {
      setErrors([`Password must be at least ${MIN_PASSWORD_LENGTH} characters`]);
      return;
    }
    if (form.password !== form.password_confirm) {
      setErrors(["Passwords don't match"]);
      return;
    }

    setLoading(true);
    try {
      await register(form);
      navigate('/');
    } catch (err) {
      console.error('Registration failed:', err);
      if (err instanceof ApiError && Object.keys(err.fields).length) {
        setErrors(Object.entries(err.fields).flatMap(([name, messages]) => messages.map(m => `${name}: ${m}`)));
      } else {
        setErrors(['Registration failed']);
      }
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="container" style={{ maxWidth: 440, margin: '80px auto' }}>
      <div className="card" style={{ display: 'grid', gap: 16 }}>
        <div className="title">Create an account</div>
        {errors.map(message => (
          <div key={message} style={{ color: '#ef4444', fontSize: 14 }}>
            {message}
          </div>
        ))}
        <form onSubmit={handleSubmit} style={{ display: 'grid', gap: 12 }}>
          <input
            className="input"
            placeholder="Username"
            value={form.username}
            onChange={e => field('username', e.target.value)}
            required
            disabled={loading}
          />
          <input
            className="input"
            type="email"
            placeholder="Email"
            value={form.email}
            onChange={e => field('email', e.target.value)}
            required
            disabled={loading}
          />
          <div className="row" style={{ gap: 8 }}>
            <input
              className="input"
              placeholder="First name"
              value={form.first_name}
              onChange={e => field('first_name', e.target.value)}
              required
              disabled={loading}
            />
            <input
              className="input"
              placeholder="Last name"
              value={form.last_name}
              onChange={e => field('last_name', e.target.value)}
              required
              disabled={loading}
            />
          </div>
          <select
            className="select"
            value={form.role}
            onChange={e => field('role', e.target.value === 'scrum_master' ? 'scrum_master' : 'employee')}
            disabled={loading}
          >
            <option value="employee">Employee</option>
            <option value="scrum_master">Scrum Master</option>
          </select>
          <input
            className="input"
            type="password"
            placeholder={`Password (min ${MIN_PASSWORD_LENGTH} characters)`}
            value={form.password}
            onChange={e => field('password', e.target.value)}
            required
            disabled={loading}
          />
          <input
            className="input"
            type="password"
            placeholder="Confirm password"
            value={form.password_confirm}
            onChange={e => field('password_confirm', e.target.value)}
            required
            disabled={loading}
          />
          <button className="btn primary" type="submit" disabled={loading}>
            {loading ? 'Registering...' : 'Register'}
          </button>
        </form>
        <div className="row" style={{ justifyContent: 'center', gap: 8 }}>
          <span className="muted">Already have an account?</span>
          <Link to="/login" style={{ color: '#3b82f6', textDecoration: 'none' }}>
            Login
          </Link>
        </div>
      </div>
    </div>
  );
}
