import { Router } from 'express';
import { sendError } from '../../shared/http/sendError.js';
import { readOptionalString } from '../../shared/utils/readers.js';
import type { JobsService } from './jobs.service.js';

export const createJobsRouter = (service: JobsService) => {
  const router = Router();

  router.get('/', async (req, res) => {
    try {
      res.json(await service.listJobs({ title: readOptionalString(req.query.title) }));
    } catch (error) {
      sendError(res, error, 'Listing job postings');
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json(await service.getJob(req.params.id));
    } catch (error) {
      sendError(res, error, 'Loading a job posting');
    }
  });

  router.post('/', async (req, res) => {
    try {
      const job = await service.createJob(req.body);
      res.status(201).json(job);
    } catch (error) {
      sendError(res, error, 'Creating a job posting');
    }
  });

  router.patch('/:id', async (req, res) => {
    try {
      res.json(await service.updateJob(req.params.id, req.body));
    } catch (error) {
      sendError(res, error, 'Updating a job posting');
    }
  });

  router.delete('/:id', async (req, res) => {
    try {
      const id = await service.deleteJob(req.params.id);
      res.json({ id });
    } catch (error) {
      sendError(res, error, 'Deleting a job posting');
    }
  });

  return router;
};
