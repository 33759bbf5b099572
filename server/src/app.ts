import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import { authMiddleware, PasswordHasher, TokenService } from './auth';
import type { AppConfig } from './config';
import type { Store } from './db/store';
import { HttpError } from './errors';
import type { Logger } from './logger';
import { analyticsRoutes, kanbanRoutes } from './routes/analytics';
import { authRoutes, userRoutes } from './routes/auth';
import { projectRoutes } from './routes/projects';
import { taskRoutes } from './routes/tasks';
import { route } from './routes/http';
import { AnalyticsService } from './services/analytics';
import { ProjectService } from './services/projects';
import { TaskService } from './services/tasks';
import { UserService } from './services/users';

export type AppOptions = {
  store: Store;
  config: Pick<AppConfig, 'origins' | 'jwtSecret' | 'accessTokenTtl' | 'refreshTokenTtl' | 'bcryptRounds'>;
  logger: Logger;
  now?: () => Date;
};

export function createApp({ store, config, logger, now }: AppOptions): Express {
  const app = express();

  const tokens = new TokenService(config);
  const users = new UserService(store, tokens, new PasswordHasher(config.bcryptRounds));
  const projects = new ProjectService(store);
  const tasks = new TaskService(store);
  const analytics = new AnalyticsService(store, { now });
  const requireAuth = authMiddleware(store, tokens);

  app.use(cors({ origin: config.origins }));
  app.use(compression());
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.originalUrl}`);
    next();
  });

  app.get(
    '/health',
    route(async (_req, res) => {
      await store.ping();
      res.json({ ok: true });
    })
  );

  app.use('/auth', authRoutes(users, requireAuth));
  app.use('/users', requireAuth, userRoutes(users));
  app.use('/projects', requireAuth, projectRoutes(projects));
  app.use('/tasks', requireAuth, taskRoutes(tasks));
  app.use('/analytics', requireAuth, analyticsRoutes(analytics));
  app.use('/kanban', requireAuth, kanbanRoutes(tasks));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json(err.toJSON());
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error(`${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
