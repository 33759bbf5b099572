import type { TokenPair, User } from './types';

/** The subset of `localStorage` the session needs. */
export interface SessionStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export interface SessionState {
  user: User | null;
  access: string | null;
  refresh: string | null;
}

type Listener = (state: SessionState) => void;

const KEYS = { access: 'access_token', refresh: 'refresh_token', user: 'user' } as const;

function parseUser(raw: string | null): User | null {
  if (!raw) return null;
  try {
    const value: unknown = JSON.parse(raw);
    return isUser(value) ? value : null;
  } catch {
    return null;
  }
}

function isUser(value: unknown): value is User {
  if (typeof value !== 'object' || value === null) return false;
  return 'id' in value && typeof value.id === 'string' && 'username' in value && typeof value.username === 'string';
}

/**
 * Authenticated session persisted in storage. Created once at startup;
 * `load()` restores it and `clear()` tears it down.
 */
export class Session {
  private state: SessionState = { user: null, access: null, refresh: null };
  private readonly listeners = new Set<Listener>();

  constructor(private readonly storage: SessionStorage) {}

  load(): SessionState {
    const user = parseUser(this.storage.getItem(KEYS.user));
    const access = this.storage.getItem(KEYS.access);
    const refresh = this.storage.getItem(KEYS.refresh);
    this.state = user && access ? { user, access, refresh } : { user: null, access: null, refresh: null };
    this.emit();
    return this.state;
  }

  get current(): SessionState {
    return this.state;
  }

  start(user: User, tokens: TokenPair): void {
    this.storage.setItem(KEYS.user, JSON.stringify(user));
    this.storage.setItem(KEYS.access, tokens.access);
    this.storage.setItem(KEYS.refresh, tokens.refresh);
    this.state = { user, access: tokens.access, refresh: tokens.refresh };
    this.emit();
  }

  setAccess(access: string): void {
    this.storage.setItem(KEYS.access, access);
    this.state = { ...this.state, access };
    this.emit();
  }

  setUser(user: User): void {
    this.storage.setItem(KEYS.user, JSON.stringify(user));
    this.state = { ...this.state, user };
    this.emit();
  }

  clear(): void {
    for (const key of Object.values(KEYS)) this.storage.removeItem(key);
    this.state = { user: null, access: null, refresh: null };
    this.emit();
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
