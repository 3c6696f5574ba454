/**
 * Shared-secret authentication via the X-API-Key header.
 */

import crypto from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { HttpError } from './errors';

function tokensMatch(provided: string, expected: Buffer): boolean {
  const candidate = Buffer.from(provided);
  if (candidate.length !== expected.length) {
    return false;
  }
  return crypto.timingSafeEqual(candidate, expected);
}

/**
 * Reject requests whose X-API-Key does not equal the configured token.
 * With no token configured every request is rejected.
 */
export function requireApiKey(expectedToken: string) {
  const expected = Buffer.from(expectedToken);

  return (req: Request, _res: Response, next: NextFunction): void => {
    const provided = req.get('X-API-Key');

    if (expectedToken.length === 0 || !provided || !tokensMatch(provided, expected)) {
      next(new HttpError(401, 'unauthorized', 'Invalid or missing API key'));
      return;
    }

    next();
  };
}
