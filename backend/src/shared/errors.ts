export type ValidationReason = 'missing' | 'invalid';

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly reason: ValidationReason,
    message?: string
  ) {
    super(message ?? (reason === 'missing' ? `Field "${field}" is required.` : `Field "${field}" is invalid.`));
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    message?: string
  ) {
    super(message ?? `${entity} not found.`);
    this.name = 'NotFoundError';
  }
}

// Чтение или запись коллекции не удались; исходная ошибка сохраняется в cause
export class StorageError extends Error {
  constructor(
    public readonly collection: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Authentication is required.') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends Error {
  constructor(message = 'Access denied.') {
    super(message);
    this.name = 'ForbiddenError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
