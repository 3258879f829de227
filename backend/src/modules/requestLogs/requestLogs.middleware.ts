import type { RequestHandler } from 'express';
import { getRequestSession } from '../auth/auth.middleware.js';
import type { RequestLogsRepository } from './requestLogs.repository.js';
import type { RequestLogEntry } from './requestLogs.types.js';

type RequestLogOptions = {
  persist: boolean;
  now?: () => number;
};

/**
 * Writes one console line per finished request and, when `persist` is set, appends the
 * entry to the logs collection. A failed append is reported and does not affect the response.
 */
export const createRequestLogMiddleware = (
  repository: RequestLogsRepository,
  { persist, now = Date.now }: RequestLogOptions
): RequestHandler => {
  return (req, res, next) => {
    const startedAt = now();

    res.on('finish', () => {
      const entry: RequestLogEntry = {
        ts: new Date(startedAt).toISOString(),
        method: req.method,
        path: req.originalUrl.split('?')[0],
        status: res.statusCode,
        user: getRequestSession(req)?.username ?? null,
        ip: req.ip ?? null,
        durationMs: Math.max(0, now() - startedAt)
      };

      console.info(`[http] ${entry.method} ${entry.path} ${entry.status} ${entry.durationMs}ms`);

      if (persist) {
        repository.append(entry).catch((error: unknown) => {
          console.error('[http] Failed to persist the request log entry:', error);
        });
      }
    });

    next();
  };
};
