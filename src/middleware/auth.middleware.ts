/**
 * Auth Middleware
 * API key header or HTTP Basic credentials
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

export interface AuthConfig {
  apiKey?: string;
  basicUser?: string;
  basicPass?: string;
}

const API_KEY_HEADER = 'x-api-key';

/**
 * Constant-time comparison of two strings of any length
 */
export function safeEqual(a: string, b: string): boolean {
  const digestA = createHash('sha256').update(a).digest();
  const digestB = createHash('sha256').update(b).digest();
  return timingSafeEqual(digestA, digestB);
}

function parseBasic(header: string | undefined): { username: string; password: string } | null {
  if (!header || !header.startsWith('Basic ')) {
    return null;
  }
  const decoded = Buffer.from(header.slice('Basic '.length), 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return null;
  }
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

export function isAuthorized(req: Request, config: AuthConfig): boolean {
  const apiKey = req.header(API_KEY_HEADER);
  if (config.apiKey && apiKey && safeEqual(apiKey, config.apiKey)) {
    return true;
  }

  const credentials = parseBasic(req.header('authorization'));
  return Boolean(
    credentials &&
      config.basicUser &&
      config.basicPass &&
      safeEqual(credentials.username, config.basicUser) &&
      safeEqual(credentials.password, config.basicPass)
  );
}

/**
 * Reject requests without valid credentials. With no credentials configured
 * every request is rejected.
 */
export function authMiddleware(config: AuthConfig): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (isAuthorized(req, config)) {
      next();
      return;
    }
    res.setHeader('WWW-Authenticate', 'Basic');
    res.status(401).json({ success: false, error: 'Unauthorized' });
  };
}
