import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import { sendError } from '../shared/http/sendError.js';
import { ValidationError } from '../shared/errors.js';
import { createSessionMiddleware } from '../modules/auth/auth.middleware.js';
import { createRequestLogMiddleware } from '../modules/requestLogs/requestLogs.middleware.js';
import type { AppContext } from './appContext.js';
import { registerAppRoutes } from './setupRoutes.js';

// Malformed JSON bodies are rejected by express.json before any router runs
const handleBodyErrors: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (error instanceof SyntaxError) {
    sendError(res, new ValidationError('body', 'invalid', 'Request body is not valid JSON.'), 'Parsing the body');
    return;
  }
  next(error);
};

export const createApp = (context: AppContext) => {
  const app = express();
  app.use(cors());
  app.use(createRequestLogMiddleware(context.requestLogs, { persist: context.config.requestLogEnabled }));
  app.use(express.json({ limit: context.config.jsonBodyLimit }));
  app.use(handleBodyErrors);
  app.use(createSessionMiddleware(context.authService));

  registerAppRoutes(app, context);

  return app;
};
