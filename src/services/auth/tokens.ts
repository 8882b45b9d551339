import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../../utils/errors';

const claimsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user'), sub: z.string(), username: z.string() }),
  z.object({ type: z.literal('node'), sub: z.string(), nodeId: z.string() }),
]);

export type TokenClaims = z.infer<typeof claimsSchema>;
export type UserClaims = Extract<TokenClaims, { type: 'user' }>;
export type NodeClaims = Extract<TokenClaims, { type: 'node' }>;

export interface TokenSettings {
  secret: string;
  expiresInSeconds: number;
  nodeTokenExpiresInSeconds: number;
}

export class TokenIssuer {
  constructor(private readonly settings: TokenSettings) {}

  signUserToken(userId: string, username: string): string {
    return jwt.sign({ type: 'user', username }, this.settings.secret, {
      subject: userId,
      expiresIn: this.settings.expiresInSeconds,
    });
  }

  /** Node agents authenticate heartbeats and traffic reports with this token. */
  signNodeToken(nodeId: string, ownerId: string): string {
    return jwt.sign({ type: 'node', nodeId }, this.settings.secret, {
      subject: ownerId,
      expiresIn: this.settings.nodeTokenExpiresInSeconds,
    });
  }

  verify(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.settings.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Token expired');
      }
      throw new UnauthorizedError('Invalid token');
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new UnauthorizedError('Invalid token claims');
    }
    return claims.data;
  }
}
