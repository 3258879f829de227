import { Router } from 'express';
import { sendError } from '../../shared/http/sendError.js';
import { readOptionalString } from '../../shared/utils/readers.js';
import type { ResumesService } from './resumes.service.js';

export const createResumesRouter = (service: ResumesService) => {
  const router = Router();

  router.get('/', async (req, res) => {
    try {
      const resumes = await service.listResumes({
        name: readOptionalString(req.query.name),
        position: readOptionalString(req.query.position)
      });
      res.json(resumes);
    } catch (error) {
      sendError(res, error, 'Listing résumés');
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      res.json(await service.getResume(req.params.id));
    } catch (error) {
      sendError(res, error, 'Loading a résumé');
    }
  });

  router.post('/', async (req, res) => {
    try {
      const resume = await service.createResume(req.body);
      res.status(201).json(resume);
    } catch (error) {
      sendError(res, error, 'Creating a résumé');
    }
  });

  router.patch('/:id', async (req, res) => {
    try {
      res.json(await service.updateResume(req.params.id, req.body));
    } catch (error) {
      sendError(res, error, 'Updating a résumé');
    }
  });

  router.delete('/:id', async (req, res) => {
    try {
      const id = await service.deleteResume(req.params.id);
      res.json({ id });
    } catch (error) {
      sendError(res, error, 'Deleting a résumé');
    }
  });

  return router;
};

export const createResumeImportRouter = (service: ResumesService) => {
  const router = Router();

  router.post('/hh', async (req, res) => {
    try {
      const resume = await service.importHhResume(req.body);
      res.status(201).json(resume);
    } catch (error) {
      sendError(res, error, 'Importing an hh.ru résumé');
    }
  });

  return router;
};
