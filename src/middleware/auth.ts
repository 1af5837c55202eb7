import { timingSafeEqual } from 'node:crypto';

import { AuthConfig, HttpStatus } from '../config';

import type { NextFunction, Request, Response } from 'express';

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  if (!token.startsWith(AuthConfig.tokenPrefix)) return 'invalid_format';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);
  if (providedBuf.length !== expectedBuf.length) {
    return false;
  }
  return timingSafeEqual(providedBuf, expectedBuf);
}

/**
 * Authentication middleware for the /api routes.
 */
export const requireApiAuth = (req: Request, res: Response, next: NextFunction) => {
  const token = req.get(AuthConfig.headerName);
  const expected = process.env[AuthConfig.tokenEnvVar] ?? '';

  if (
    !token ||
    !token.startsWith(AuthConfig.tokenPrefix) ||
    expected.length === 0 ||
    !isValidToken(token, expected)
  ) {
    req.log.warn('Authentication failed', {
      path: req.path,
      reason: getAuthFailureReason(token),
    });
    res.status(HttpStatus.UNAUTHORIZED).json({
      error: 'Unauthorized',
      message: 'Invalid API token',
    });
    return;
  }

  req.log.debug('Authentication successful');
  next();
};
