import type { LogLevel } from './logger';

export interface AppConfig {
  port: number;
  origins: string[];
  databaseUrl: string;
  jwtSecret: string;
  /** Lifetimes in seconds. */
  accessTokenTtl: number;
  refreshTokenTtl: number;
  bcryptRounds: number;
  logLevel: LogLevel;
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw);
  return level ?? 'info';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Parses `900`, `15m`, `12h` or `7d` into seconds. */
export function parseDuration(raw: string | undefined, fallback: number): number {
  const match = /^(\d+)\s*([smhd]?)$/.exec((raw ?? '').trim());
  if (!match) return fallback;
  const seconds = Number(match[1]) * (DURATION_UNITS[match[2] || 's'] ?? 1);
  return seconds > 0 ? seconds : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is not set. Please set it to your MySQL connection string.');
  }

  const origins = ['http://localhost:5173'];
  if (env.ORIGIN) origins.unshift(env.ORIGIN);

  return {
    port: parsePositiveInt(env.PORT, 4000),
    origins,
    databaseUrl,
    jwtSecret: env.JWT_SECRET || 'my-secret',
    accessTokenTtl: parseDuration(env.ACCESS_TOKEN_TTL, 15 * 60),
    refreshTokenTtl: parseDuration(env.REFRESH_TOKEN_TTL, 7 * 86400),
    bcryptRounds: parsePositiveInt(env.BCRYPT_ROUNDS, 10),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
