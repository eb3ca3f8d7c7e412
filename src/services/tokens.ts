import jwt from 'jsonwebtoken';
import { ROLES, AuthUser, Role } from '../types';

export type TokenType = 'access' | 'refresh';

export type TokenSettings = {
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
};

type TokenClaims = AuthUser & { type: TokenType };

export function signToken(user: AuthUser, type: TokenType, settings: TokenSettings): string {
  const claims: TokenClaims = { id: user.id, email: user.email, role: user.role, type };
  const expiresIn = type === 'access' ? settings.accessTokenTtlSeconds : settings.refreshTokenTtlSeconds;
  return jwt.sign(claims, settings.jwtSecret, { expiresIn });
}

export function issueTokens(user: AuthUser, settings: TokenSettings) {
  return {
    accessToken: signToken(user, 'access', settings),
    refreshToken: signToken(user, 'refresh', settings),
  };
}

function isRole(value: unknown): value is Role {
  return ROLES.some(r => r === value);
}

/** Verifies signature, expiry and token type; returns null on any mismatch. */
export function verifyToken(token: string, expected: TokenType, secret: string): AuthUser | null {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret);
  } catch {
    return null;
  }
  if (typeof payload === 'string') return null;
  const { id, email, role, type } = payload;
  if (type !== expected || typeof id !== 'string' || typeof email !== 'string' || !isRole(role)) return null;
  return { id, email, role };
}
