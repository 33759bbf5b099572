import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt from 'jsonwebtoken';
import bcrypt from 'bcrypt';
import type { AppConfig } from './config';
import type { Store } from './db/store';
import { AuthenticationError } from './errors';
import type { User } from './types';

export type TokenType = 'access' | 'refresh';

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface AuthRequest extends Request {
  user?: User;
}

type TokenConfig = Pick<AppConfig, 'jwtSecret' | 'accessTokenTtl' | 'refreshTokenTtl'>;

export class TokenService {
  constructor(private readonly config: TokenConfig) {}

  issue(userId: string): TokenPair {
    return { access: this.sign(userId, 'access'), refresh: this.sign(userId, 'refresh') };
  }

  sign(userId: string, type: TokenType): string {
    const expiresIn = type === 'access' ? this.config.accessTokenTtl : this.config.refreshTokenTtl;
    return jwt.sign({ type }, this.config.jwtSecret, { subject: userId, expiresIn });
  }

  /** Returns the user id carried by a valid token of the given type. */
  verify(token: string, type: TokenType): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.jwtSecret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) throw new AuthenticationError('Token expired');
      throw new AuthenticationError('Invalid token');
    }
    if (typeof payload === 'string' || payload.type !== type || typeof payload.sub !== 'string') {
      throw new AuthenticationError('Invalid token');
    }
    return payload.sub;
  }
}

export class PasswordHasher {
  constructor(private readonly rounds: number) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }
}

export function authMiddleware(store: Store, tokens: TokenService): RequestHandler {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new AuthenticationError());
      return;
    }

    const token = authHeader.substring(7);
    let userId: string;
    try {
      userId = tokens.verify(token, 'access');
    } catch (error) {
      next(error);
      return;
    }
    store
      .findUserById(userId)
      .then(user => {
        if (!user) throw new AuthenticationError('User not found');
        req.user = user;
        next();
      })
      .catch(next);
  };
}

export function requireUser(req: AuthRequest): User {
  if (!req.user) throw new AuthenticationError();
  return req.user;
}
