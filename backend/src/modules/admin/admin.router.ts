import { Router } from 'express';
import { sendError } from '../../shared/http/sendError.js';
import { requireAdmin } from '../auth/auth.middleware.js';
import type { AdminService } from './admin.service.js';

export const createAdminRouter = (service: AdminService) => {
  const router = Router();

  router.use(requireAdmin);

  router.get('/overview', async (_req, res) => {
    try {
      res.json(await service.getOverview());
    } catch (error) {
      sendError(res, error, 'Loading the admin overview');
    }
  });

  return router;
};
