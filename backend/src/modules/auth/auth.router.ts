import { Router } from 'express';
import { sendError } from '../../shared/http/sendError.js';
import { getRequestSession, readBearerToken, requireSession } from './auth.middleware.js';
import type { AuthService } from './auth.service.js';

export const createAuthRouter = (authService: AuthService) => {
  const router = Router();

  router.post('/register', async (req, res) => {
    try {
      const user = await authService.register(req.body);
      res.status(201).json({ username: user.username, role: user.role });
    } catch (error) {
      sendError(res, error, 'Registering a user');
    }
  });

  router.post('/login', async (req, res) => {
    try {
      res.json(await authService.login(req.body));
    } catch (error) {
      sendError(res, error, 'Logging in');
    }
  });

  router.post('/logout', requireSession, (req, res) => {
    const token = readBearerToken(req);
    if (token) {
      authService.logout(token);
    }
    res.json({ status: 'ok' });
  });

  router.get('/me', requireSession, (req, res) => {
    const session = getRequestSession(req);
    res.json(session ? { username: session.username, role: session.role, expiresAt: session.expiresAt.toISOString() } : null);
  });

  return router;
};
