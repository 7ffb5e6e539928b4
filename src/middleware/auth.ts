import { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from 'jet-logger';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { describeError } from '@src/common/util/failures';
import { RouteError } from '@src/common/util/route-errors';
import type { UserRecord } from '@src/models/User';
import type { UserRepo } from '@src/repos/UserRepo';
import type { AuthService } from '@src/services/authService';

function unauthorized(res: Response, detail: string): void {
  res
    .status(HttpStatusCodes.UNAUTHORIZED)
    .set('WWW-Authenticate', 'Bearer')
    .json({ detail });
}

/**
 * Resolve the bearer token to an active user and attach it to the request.
 */
export const authenticate = (auth: AuthService, users: UserRepo): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const header = req.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';

    if (!token) {
      unauthorized(res, 'Not authenticated');
      return;
    }

    let user: UserRecord | null;
    try {
      const payload = auth.verifyAccessToken(token);
      user = await users.findById(payload.sub);
    } catch (error) {
      logger.warn(`Authentication error: ${describeError(error)}`);
      unauthorized(res, 'Could not validate credentials');
      return;
    }

    if (!user) {
      unauthorized(res, 'Could not validate credentials');
      return;
    }

    if (!user.is_active) {
      res.status(HttpStatusCodes.FORBIDDEN).json({ detail: 'Inactive user' });
      return;
    }

    req.currentUser = user;
    next();
  };
};

/** The user `authenticate` attached; throws if the route was not guarded. */
export function currentUser(req: Request): UserRecord {
  if (!req.currentUser) {
    throw new RouteError(HttpStatusCodes.UNAUTHORIZED, 'Not authenticated');
  }
  return req.currentUser;
}
