import type { Application } from 'express';
import { healthRouter } from '../shared/health.router.js';
import { createAdminRouter } from '../modules/admin/admin.router.js';
import { createAnalysesRouter, createAnalyzeRouter } from '../modules/analyses/analyses.router.js';
import { createAuthRouter } from '../modules/auth/auth.router.js';
import { createJobsRouter } from '../modules/jobs/jobs.router.js';
import { createResumeImportRouter, createResumesRouter } from '../modules/resumes/resumes.router.js';
import type { AppContext } from './appContext.js';

export const registerAppRoutes = (app: Application, context: AppContext) => {
  app.use('/health', healthRouter);
  app.use('/auth', createAuthRouter(context.authService));
  app.use('/admin', createAdminRouter(context.adminService));
  app.use('/api/resumes', createResumesRouter(context.resumesService));
  app.use('/api/import', createResumeImportRouter(context.resumesService));
  app.use('/api/jobs', createJobsRouter(context.jobsService));
  app.use('/api/analyze', createAnalyzeRouter(context.analysesService));
  app.use('/api/analyses', createAnalysesRouter(context.analysesService));
};
