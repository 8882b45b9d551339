import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../../utils/errors';
import { NodeClaims, TokenClaims, TokenIssuer, UserClaims } from '../../services/auth/tokens';

export interface AuthRequest extends Request {
  auth?: TokenClaims;
}

export interface AuthMiddleware {
  authenticateUser: RequestHandler;
  authenticateNode: RequestHandler;
}

function bearerToken(req: Request): string {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new UnauthorizedError('Missing or invalid authorization header');
  }
  return authHeader.substring(7);
}

export function createAuthMiddleware(tokens: TokenIssuer): AuthMiddleware {
  const authenticate =
    (type: TokenClaims['type']): RequestHandler =>
    (req: AuthRequest, _res: Response, next: NextFunction): void => {
      try {
        const claims = tokens.verify(bearerToken(req));
        if (claims.type !== type) {
          throw new UnauthorizedError(`${type === 'node' ? 'Node' : 'User'} authentication required`);
        }
        req.auth = claims;
        next();
      } catch (error) {
        next(error);
      }
    };

  return {
    authenticateUser: authenticate('user'),
    authenticateNode: authenticate('node'),
  };
}

export function userClaims(req: AuthRequest): UserClaims {
  if (req.auth?.type !== 'user') {
    throw new UnauthorizedError('User authentication required');
  }
  return req.auth;
}

export function nodeClaims(req: AuthRequest): NodeClaims {
  if (req.auth?.type !== 'node') {
    throw new UnauthorizedError('Node authentication required');
  }
  return req.auth;
}
