import { Request, Response, NextFunction, RequestHandler } from 'express';
import { verifyToken, TokenType } from '../services/tokens';
import { HttpError } from '../utils/errors';
import type { AuthUser, Role } from '../types';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

function bearer(req: Request): string | undefined {
  const auth = req.headers.authorization;
  if (!auth || !auth.startsWith('Bearer ')) return undefined;
  return auth.slice(7);
}

function tokenGate(type: TokenType, secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearer(req);
    if (!token) return next(new HttpError(401, 'Missing token'));
    const user = verifyToken(token, type, secret);
    if (!user) return next(new HttpError(401, 'Invalid token'));
    req.user = user;
    next();
  };
}

export function authRequired(secret: string): RequestHandler {
  return tokenGate('access', secret);
}

export function refreshRequired(secret: string): RequestHandler {
  return tokenGate('refresh', secret);
}

export function requireRole(...roles: Role[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) return next(new HttpError(401, 'Unauthorized'));
    if (!roles.includes(req.user.role)) {
      return next(new HttpError(403, `Permission denied. Required roles: ${roles.join(', ')}`));
    }
    next();
  };
}

/** The authenticated caller; only valid behind `authRequired`. */
export function currentUser(req: Request): AuthUser {
  if (!req.user) throw new HttpError(401, 'Unauthorized');
  return req.user;
}
