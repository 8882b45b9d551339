import jwt from 'jsonwebtoken';
import { TokenIssuer } from '../../../../src/services/auth/tokens';
import { UnauthorizedError } from '../../../../src/utils/errors';

describe('TokenIssuer', () => {
  const issuer = new TokenIssuer({ secret: 'test-secret', expiresInSeconds: 3600, nodeTokenExpiresInSeconds: 86400 });

  it('round-trips user claims', () => {
    const token = issuer.signUserToken('user-1', 'alice');

    expect(issuer.verify(token)).toEqual({ type: 'user', sub: 'user-1', username: 'alice' });
  });

  it('round-trips node claims with the owner as subject', () => {
    const token = issuer.signNodeToken('node-1', 'owner-1');

    expect(issuer.verify(token)).toEqual({ type: 'node', sub: 'owner-1', nodeId: 'node-1' });
  });

  it('rejects tokens signed with another secret', () => {
    const foreign = new TokenIssuer({ secret: 'other-secret', expiresInSeconds: 60, nodeTokenExpiresInSeconds: 60 });
    const token = foreign.signUserToken('user-1', 'alice');

    expect(() => issuer.verify(token)).toThrow(new UnauthorizedError('Invalid token'));
  });

  it('reports expired tokens', () => {
    const token = jwt.sign(
      { type: 'user', username: 'alice', exp: Math.floor(Date.now() / 1000) - 10 },
      'test-secret',
      { subject: 'user-1' }
    );

    expect(() => issuer.verify(token)).toThrow('Token expired');
  });

  it('rejects tokens with unknown claim shapes', () => {
    const token = jwt.sign({ type: 'admin' }, 'test-secret', { subject: 'user-1' });

    expect(() => issuer.verify(token)).toThrow('Invalid token claims');
  });
});
