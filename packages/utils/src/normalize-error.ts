import { isPlainObject } from 'remeda';
import { type ErrorObject, serializeError } from 'serialize-error';

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'symbol' || typeof error === 'function') {
    return new Error(error.toString());
  }

  if (isPlainObject(error) || Array.isArray(error)) {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      return new Error(Object.prototype.toString.call(error));
    }
  }

  return new Error(String(error));
}

/**
 * Turns anything thrown into a plain object that can be handed to a structured
 * logger.
 */
export function sanitizeError(error: unknown): ErrorObject {
  return serializeError(normalizeError(error));
}
