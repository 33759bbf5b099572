import { Router, type RequestHandler } from 'express';
import { requireUser } from '../auth';
import { serializeUser } from '../serializers';
import type { UserService } from '../services/users';
import { ROLES } from '../types';
import { BodyReader } from '../validation';
import { route } from './http';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function readEmail(body: BodyReader, required: boolean): string | undefined {
  const email = required ? body.string('email', { required: true }) : body.string('email');
  if (email && !EMAIL_PATTERN.test(email)) body.fail('email', 'Enter a valid email address.');
  return email;
}

export function authRoutes(users: UserService, requireAuth: RequestHandler): Router {
  const router = Router();

  router.post(
    '/register/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const input = {
        username: body.string('username', { required: true, maxLength: 150 }),
        email: readEmail(body, true) ?? '',
        firstName: body.string('first_name', { required: true, maxLength: 150 }),
        lastName: body.string('last_name', { required: true, maxLength: 150 }),
        password: body.string('password', { required: true }),
        passwordConfirm: body.string('password_confirm', { required: true }),
        role: body.choice('role', ROLES) ?? 'employee'
      };
      body.done();

      const session = await users.register(input);
      res.status(201).json({ user: serializeUser(session.user), tokens: session.tokens });
    })
  );

  router.post(
    '/login/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const username = body.string('username', { required: true });
      const password = body.string('password', { required: true });
      body.done();

      const session = await users.login(username, password, req.ip ?? null);
      res.json({ user: serializeUser(session.user), tokens: session.tokens });
    })
  );

  router.post(
    '/refresh/',
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const refresh = body.string('refresh', { required: true });
      body.done();
      res.json(await users.refresh(refresh));
    })
  );

  router.get(
    '/profile/',
    requireAuth,
    route(async (req, res) => {
      res.json(serializeUser(requireUser(req)));
    })
  );

  router.patch(
    '/profile/',
    requireAuth,
    route(async (req, res) => {
      const body = BodyReader.from(req.body);
      const patch = {
        email: readEmail(body, false),
        firstName: body.string('first_name', { maxLength: 150 }),
        lastName: body.string('last_name', { maxLength: 150 })
      };
      body.done();
      const user = await users.updateProfile(requireUser(req), patch);
      res.json(serializeUser(user));
    })
  );

  return router;
}

export function userRoutes(users: UserService): Router {
  const router = Router();
  router.get(
    '/',
    route(async (_req, res) => {
      const list = await users.list();
      res.json(list.map(serializeUser));
    })
  );
  return router;
}
