import { Router } from 'express';
import { requireUser } from '../auth';
import type { TaskService } from '../services/tasks';
import { TASK_PRIORITIES, TASK_STATUSES } from '../types';
import { BodyReader } from '../validation';
import { queryParam, route, statusParam } from './http';

export function taskRoutes(tasks: TaskService): Router {
  const router = Router();

  // Fixed paths first so they are not taken for a task id.
  router.patch(
    '/status-update/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const taskId = body.id('task_id', { required: true });
      const status = body.choice('status', TASK_STATUSES, { required: true });
      body.done();
      res.json(await tasks.changeStatus(requireUser(req), taskId, status));
    })
  );

  router.get(
    '/search/',
    route(async (req, res) => {
      const found = await tasks.search(requireUser(req), queryParam(req, 'q') ?? '', queryParam(req, 'project'));
      res.json({ tasks: found });
    })
  );

  router.get(
    '/',
    route(async (req, res) => {
      const query = { projectId: queryParam(req, 'project'), status: statusParam(req) };
      res.json(await tasks.list(requireUser(req), query));
    })
  );

  router.post(
    '/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const input = {
        title: body.string('title', { required: true, maxLength: 200 }),
        description: body.string('description', { allowBlank: true }) ?? '',
        projectId: body.id('project', { required: true }),
        assignedTo: body.id('assigned_to_id', { nullable: true }) ?? null,
        status: body.choice('status', TASK_STATUSES) ?? 'todo',
        priority: body.choice('priority', TASK_PRIORITIES) ?? 'medium',
        labelIds: body.idList('label_ids') ?? [],
        dueDate: body.date('due_date') ?? null,
        estimatedHours: body.count('estimated_hours', { nullable: true }) ?? null
      };
      body.done();
      res.status(201).json(await tasks.create(requireUser(req), input));
    })
  );

  router.get(
    '/:id/',
    route(async (req, res) => {
      res.json(await tasks.get(requireUser(req), req.params.id));
    })
  );

  router.patch(
    '/:id/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const patch = {
        title: body.string('title', { maxLength: 200 }),
        description: body.string('description', { allowBlank: true }),
        status: body.choice('status', TASK_STATUSES),
        priority: body.choice('priority', TASK_PRIORITIES),
        assignedTo: body.id('assigned_to_id', { nullable: true }),
        labelIds: body.idList('label_ids'),
        dueDate: body.date('due_date'),
        estimatedHours: body.count('estimated_hours', { nullable: true }),
        actualHours: body.count('actual_hours') ?? undefined
      };
      body.done();
      res.json(await tasks.update(requireUser(req), req.params.id, patch));
    })
  );

  router.delete(
    '/:id/',
    route(async (req, res) => {
      await tasks.remove(requireUser(req), req.params.id);
      res.status(204).end();
    })
  );

  router.get(
    '/:id/comments/',
    route(async (req, res) => {
      res.json(await tasks.listComments(requireUser(req), req.params.id));
    })
  );

  router.post(
    '/:id/comments/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const content = body.string('content', { required: true });
      body.done();
      res.status(201).json(await tasks.addComment(requireUser(req), req.params.id, content));
    })
  );

  return router;
}
