import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ForbiddenError, UnauthorizedError } from '../../shared/errors.js';
import { sendError } from '../../shared/http/sendError.js';
import type { AuthService } from './auth.service.js';
import type { Session } from './auth.types.js';

const requestSessions = new WeakMap<Request, Session>();

export const readBearerToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (typeof header !== 'string' || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice('Bearer '.length).trim();
  return token || null;
};

export const getRequestSession = (req: Request): Session | null => requestSessions.get(req) ?? null;

/** Resolves the bearer token, when present, to a session. Never rejects a request. */
export const createSessionMiddleware =
  (authService: AuthService): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction) => {
    const token = readBearerToken(req);
    const session = token ? authService.resolveSession(token) : null;
    if (session) {
      requestSessions.set(req, session);
    }
    next();
  };

export const requireSession: RequestHandler = (req, res, next) => {
  if (!getRequestSession(req)) {
    sendError(res, new UnauthorizedError(), 'Session check');
    return;
  }
  next();
};

export const requireAdmin: RequestHandler = (req, res, next) => {
  const session = getRequestSession(req);
  if (!session) {
    sendError(res, new UnauthorizedError(), 'Admin check');
    return;
  }
  if (session.role !== 'admin') {
    sendError(res, new ForbiddenError('Administrator role required.'), 'Admin check');
    return;
  }
  next();
};
