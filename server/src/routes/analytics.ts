import { Router } from 'express';
import { requireUser } from '../auth';
import type { AnalyticsService } from '../services/analytics';
import type { TaskService } from '../services/tasks';
import { BodyReader } from '../validation';
import { queryParam, route } from './http';

export function analyticsRoutes(analytics: AnalyticsService): Router {
  const router = Router();

  router.get(
    '/dashboard/',
    route(async (req, res) => {
      res.json(await analytics.dashboard(requireUser(req), queryParam(req, 'project')));
    })
  );

  router.post(
    '/behavior/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const input = {
        actionType: body.string('action_type', { required: true, maxLength: 50 }),
        taskId: body.id('task', { nullable: true }) ?? null,
        durationSeconds: body.count('duration_seconds', { nullable: true }) ?? null,
        metadata: body.object('metadata') ?? {}
      };
      body.done();
      res.status(201).json(await analytics.track(requireUser(req), input));
    })
  );

  return router;
}

export function kanbanRoutes(tasks: TaskService): Router {
  const router = Router();
  router.get(
    '/:projectId/',
    route(async (req, res) => {
      res.json(await tasks.board(requireUser(req), req.params.projectId));
    })
  );
  return router;
}
