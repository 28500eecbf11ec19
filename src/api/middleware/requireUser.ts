import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import type { AppConfig } from '../../config';
import type { AuthenticatedUser } from '../../types';
import { UnauthenticatedError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

export function currentUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthenticatedError('Authentication required');
  }
  return req.user;
}

/**
 * Bearer-token authentication for buyer routes. Tokens are HS256 JWTs issued
 * by the account service; `sub` is the user id.
 */
export function requireUser(auth: AppConfig['auth']): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      logger.debug('auth.token_missing', { path: req.path });
      return next(new UnauthenticatedError('Authentication required'));
    }

    try {
      const decoded = jwt.verify(authHeader.substring('Bearer '.length), auth.jwtSecret, {
        algorithms: ['HS256'],
        issuer: auth.issuer,
      });

      if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !decoded.sub) {
        return next(new UnauthenticatedError('Invalid token'));
      }

      req.user = {
        id: decoded.sub,
        ...(typeof decoded.email === 'string' && { email: decoded.email }),
      };
      next();
    } catch (error) {
      logger.warn('auth.token_invalid', { path: req.path, error: errorMessage(error) });
      next(new UnauthenticatedError('Invalid token'));
    }
  };
}
