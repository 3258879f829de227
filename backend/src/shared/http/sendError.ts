import type { Response } from 'express';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  StorageError,
  UnauthorizedError,
  ValidationError
} from '../errors.js';

export type ErrorCode =
  | 'missing-field'
  | 'invalid-field'
  | 'not-found'
  | 'unauthorized'
  | 'forbidden'
  | 'conflict'
  | 'internal-error';

export interface ErrorBody {
  code: ErrorCode;
  message: string;
}

export const resolveErrorResponse = (error: unknown): { status: number; body: ErrorBody } => {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { code: error.reason === 'missing' ? 'missing-field' : 'invalid-field', message: error.message }
    };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { code: 'not-found', message: error.message } };
  }
  if (error instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'unauthorized', message: error.message } };
  }
  if (error instanceof ForbiddenError) {
    return { status: 403, body: { code: 'forbidden', message: error.message } };
  }
  if (error instanceof ConflictError) {
    return { status: 409, body: { code: 'conflict', message: error.message } };
  }
  if (error instanceof StorageError) {
    return { status: 500, body: { code: 'internal-error', message: 'Failed to access the data store.' } };
  }
  return { status: 500, body: { code: 'internal-error', message: 'Failed to process the request.' } };
};

export const sendError = (res: Response, error: unknown, context: string) => {
  const { status, body } = resolveErrorResponse(error);
  if (status >= 500) {
    console.error(`[http] ${context} failed:`, error);
  }
  res.status(status).json(body);
};
