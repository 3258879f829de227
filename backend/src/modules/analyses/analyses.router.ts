import { Router } from 'express';
import { sendError } from '../../shared/http/sendError.js';
import { isPlainObject } from '../../shared/storage/recordMetadata.js';
import { readOptionalString } from '../../shared/utils/readers.js';
import type { AnalysesService } from './analyses.service.js';

export const createAnalyzeRouter = (service: AnalysesService) => {
  const router = Router();

  router.post('/', async (req, res) => {
    const body: unknown = req.body;
    const payload = isPlainObject(body) ? body : {};
    try {
      const analysis = await service.analyze({ resumeId: payload.resumeId, jobId: payload.jobId });
      res.status(201).json(analysis);
    } catch (error) {
      sendError(res, error, 'Running an analysis');
    }
  });

  return router;
};

export const createAnalysesRouter = (service: AnalysesService) => {
  const router = Router();

  router.get('/', async (req, res) => {
    try {
      const analyses = await service.listAnalyses({
        resumeId: readOptionalString(req.query.resumeId),
        jobId: readOptionalString(req.query.jobId)
      });
      res.json(analyses);
    } catch (error) {
      sendError(res, error, 'Listing analyses');
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json(await service.getAnalysis(req.params.id));
    } catch (error) {
      sendError(res, error, 'Loading an analysis');
    }
  });

  return router;
};
