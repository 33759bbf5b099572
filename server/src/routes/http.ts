import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AuthRequest } from '../auth';
import { ValidationError } from '../errors';
import { isTaskStatus, type TaskStatus } from '../types';

export type AsyncHandler = (req: AuthRequest, res: Response) => Promise<void>;

/** Forwards a rejected handler to the error middleware. */
export function route(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function statusParam(req: Request): TaskStatus | undefined {
  const value = queryParam(req, 'status');
  if (value === undefined) return undefined;
  if (!isTaskStatus(value)) throw ValidationError.field('status', `"${value}" is not a valid choice.`);
  return value;
}
