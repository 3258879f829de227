import { randomBytes, scrypt, timingSafeEqual } from 'crypto';

// Salted scrypt hash stored as "salt:hash". Demo-grade: no pepper, no parameter versioning.
const KEY_LENGTH = 32;

const deriveKey = (password: string, salt: string) =>
  new Promise<Buffer>((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });

export const hashPassword = async (password: string): Promise<string> => {
  const salt = randomBytes(16).toString('hex');
  const key = await deriveKey(password, salt);
  return `${salt}:${key.toString('hex')}`;
};

export const verifyPassword = async (password: string, stored: string): Promise<boolean> => {
  const separator = stored.indexOf(':');
  if (separator <= 0) {
    return false;
  }
  const salt = stored.slice(0, separator);
  const expected = Buffer.from(stored.slice(separator + 1), 'hex');
  if (expected.length !== KEY_LENGTH) {
    return false;
  }
  const actual = await deriveKey(password, salt);
  return timingSafeEqual(actual, expected);
};
