import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ForbiddenError, UnauthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Guards catalog curation routes with a shared bearer token.
 * Without a configured token the routes are disabled.
 */
export function createRequireAdmin(adminToken: string | undefined): RequestHandler {
  const expected = adminToken ? digest(adminToken) : null;

  return (req: Request, _res: Response, next: NextFunction) => {
    if (!expected) {
      next(new ForbiddenError('Catalog administration is disabled', 'ADMIN_DISABLED'));
      return;
    }

    const header = req.headers.authorization ?? '';
    const token = header.startsWith('Bearer ') ? header.slice('Bearer '.length) : '';
    const accessGranted = token.length > 0 && timingSafeEqual(digest(token), expected);

    const audit = { ip: req.ip, endpoint: req.path, method: req.method, accessGranted };
    if (!accessGranted) {
      logger.warn(audit, 'Admin access denied');
      next(new UnauthorizedError('Admin token required', 'UNAUTHORIZED'));
      return;
    }

    logger.info(audit, 'Admin access granted');
    next();
  };
}
