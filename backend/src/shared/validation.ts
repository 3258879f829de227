import { ValidationError } from './errors.js';
import { isPlainObject } from './storage/recordMetadata.js';
import { hasOwn, readNonNegativeInteger, readOptionalString, readStringList } from './utils/readers.js';

export type Payload = Record<string, unknown>;

export const requirePayload = (payload: unknown, message: string): Payload => {
  if (!isPlainObject(payload)) {
    throw new ValidationError('body', 'missing', message);
  }
  return payload;
};

const isPresent = (source: Payload, key: string) => hasOwn(source, key) && source[key] !== undefined && source[key] !== null;

export const requireText = (source: Payload, key: string): string => {
  if (!isPresent(source, key)) {
    throw new ValidationError(key, 'missing');
  }
  const value = readOptionalString(source[key]);
  if (value === undefined) {
    throw new ValidationError(key, typeof source[key] === 'string' ? 'missing' : 'invalid');
  }
  return value;
};

export const optionalText = (source: Payload, key: string): string | undefined => {
  if (!isPresent(source, key)) {
    return undefined;
  }
  const value = source[key];
  if (typeof value !== 'string') {
    throw new ValidationError(key, 'invalid');
  }
  return value.trim();
};

export const requireNonNegativeInteger = (source: Payload, key: string): number => {
  if (!isPresent(source, key)) {
    throw new ValidationError(key, 'missing');
  }
  const value = readNonNegativeInteger(source[key]);
  if (value === undefined) {
    throw new ValidationError(key, 'invalid', `Field "${key}" must be a non-negative integer.`);
  }
  return value;
};

export const optionalStringList = (source: Payload, key: string): string[] | undefined => {
  if (!isPresent(source, key)) {
    return undefined;
  }
  const value = source[key];
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== 'string')) {
    throw new ValidationError(key, 'invalid', `Field "${key}" must be a list of strings.`);
  }
  // Entries are kept exactly as sent; skill matching compares them verbatim
  return readStringList(value);
};

export const readRecordId = (value: unknown, field = 'id'): string => {
  const id = readOptionalString(value);
  if (!id) {
    throw new ValidationError(field, 'missing');
  }
  return id;
};

export const hasField = isPresent;
