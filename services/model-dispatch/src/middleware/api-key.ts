import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { ServiceUnavailableError, UnauthorizedError } from '../errors.js';

/**
 * Guards administrative routes with the `x-api-key` header.
 * No configured key means the routes are switched off (503).
 */
export function requireApiKey(expectedKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      next(new ServiceUnavailableError('Administrative API is disabled: ADMIN_API_KEY is not set'));
      return;
    }

    const provided = req.get('x-api-key');
    if (!provided || !keysMatch(provided, expectedKey)) {
      next(new UnauthorizedError());
      return;
    }

    next();
  };
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
