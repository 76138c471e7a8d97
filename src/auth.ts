import type { RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import type { Secret } from 'jsonwebtoken';

export interface AuthenticatedUser {
  id: string;
  role: string | null;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Verifies a bearer token issued by the user service. Returns null for tokens
 * without a subject; invalid or expired tokens throw.
 */
export function verifyToken(token: string, secret: Secret): AuthenticatedUser | null {
  const decoded = jwt.verify(token, secret);
  if (typeof decoded === 'string' || !decoded.sub) {
    return null;
  }
  const role = typeof decoded.role === 'string' ? decoded.role : null;
  return { id: decoded.sub, role };
}

export function createAuthMiddleware(secret: Secret): RequestHandler {
  return (req, res, next) => {
    const authorizationHeader = req.headers.authorization;
    if (!authorizationHeader || !authorizationHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required.' });
      return;
    }

    const token = authorizationHeader.slice('Bearer '.length).trim();

    let user: AuthenticatedUser | null;
    try {
      user = verifyToken(token, secret);
    } catch (error) {
      req.log.warn({ err: error }, 'Failed to authenticate request');
      res.status(401).json({ error: 'Authentication failed.' });
      return;
    }

    if (!user) {
      res.status(401).json({ error: 'Invalid authentication token.' });
      return;
    }

    req.user = user;
    next();
  };
}
