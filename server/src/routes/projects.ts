import { Router } from 'express';
import { requireUser } from '../auth';
import { DEFAULT_LABEL_COLOR, type ProjectService } from '../services/projects';
import { BodyReader } from '../validation';
import { route } from './http';

const COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

export function projectRoutes(projects: ProjectService): Router {
  const router = Router();

  router.get(
    '/',
    route(async (req, res) => {
      res.json(await projects.list(requireUser(req)));
    })
  );

  router.post(
    '/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const input = {
        name: body.string('name', { required: true, maxLength: 200 }),
        description: body.string('description', { allowBlank: true }) ?? '',
        memberIds: body.idList('member_ids') ?? [],
        isActive: body.boolean('is_active') ?? true
      };
      body.done();
      res.status(201).json(await projects.create(requireUser(req), input));
    })
  );

  router.get(
    '/:id/',
    route(async (req, res) => {
      res.json(await projects.get(requireUser(req), req.params.id));
    })
  );

  router.patch(
    '/:id/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const patch = {
        name: body.string('name', { maxLength: 200 }),
        description: body.string('description', { allowBlank: true }),
        memberIds: body.idList('member_ids'),
        isActive: body.boolean('is_active')
      };
      body.done();
      res.json(await projects.update(requireUser(req), req.params.id, patch));
    })
  );

  router.delete(
    '/:id/',
    route(async (req, res) => {
      await projects.remove(requireUser(req), req.params.id);
      res.status(204).end();
    })
  );

  router.get(
    '/:id/labels/',
    route(async (req, res) => {
      res.json(await projects.listLabels(requireUser(req), req.params.id));
    })
  );

  router.post(
    '/:id/labels/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const name = body.string('name', { required: true, maxLength: 50 });
      const color = body.string('color') ?? DEFAULT_LABEL_COLOR;
      if (!COLOR_PATTERN.test(color)) body.fail('color', 'Enter a color as #rrggbb.');
      body.done();
      res.status(201).json(await projects.createLabel(requireUser(req), req.params.id, { name, color }));
    })
  );

  return router;
}
