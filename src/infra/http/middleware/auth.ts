import type { Request, Response, NextFunction } from 'express';
import type { TokenIssuer } from '../../../application/auth/ports.js';

export interface AuthRequest extends Request {
  userId?: string;
  userEmail?: string;
}

/**
 * Require a valid, unexpired bearer access token.
 */
export function authMiddleware(tokenIssuer: TokenIssuer) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
      return;
    }

    const claims = tokenIssuer.verifyAccessToken(authHeader.substring(7));
    if (!claims) {
      res.status(401).json({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
      return;
    }

    req.userId = claims.userId;
    req.userEmail = claims.email;
    next();
  };
}
