import jwt from 'jsonwebtoken';
import { issueTokens, verifyToken } from '../src/services/tokens';

const settings = { jwtSecret: 'test-secret', accessTokenTtlSeconds: 60, refreshTokenTtlSeconds: 120 };
const user = { id: 'u1', email: 'someone@corestack.test', role: 'manager' as const };

describe('tokens', () => {
  it('round-trips the identity for the matching token type', () => {
    const { accessToken, refreshToken } = issueTokens(user, settings);
    expect(verifyToken(accessToken, 'access', 'test-secret')).toEqual(user);
    expect(verifyToken(refreshToken, 'refresh', 'test-secret')).toEqual(user);
  });

  it('rejects a token of the wrong type', () => {
    const { refreshToken } = issueTokens(user, settings);
    expect(verifyToken(refreshToken, 'access', 'test-secret')).toBeNull();
  });

  it('rejects a bad signature and garbage', () => {
    const { accessToken } = issueTokens(user, settings);
    expect(verifyToken(accessToken, 'access', 'other-secret')).toBeNull();
    expect(verifyToken('not-a-token', 'access', 'test-secret')).toBeNull();
  });

  it('rejects unknown roles', () => {
    const forged = jwt.sign({ id: 'u1', email: 'x@corestack.test', role: 'owner', type: 'access' }, 'test-secret');
    expect(verifyToken(forged, 'access', 'test-secret')).toBeNull();
  });

  it('rejects expired tokens', () => {
    const expired = jwt.sign({ ...user, type: 'access' }, 'test-secret', { expiresIn: -10 });
    expect(verifyToken(expired, 'access', 'test-secret')).toBeNull();
  });
});
