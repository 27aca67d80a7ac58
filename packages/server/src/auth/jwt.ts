// @module: server-auth-jwt
// @tags: auth, jwt, tokens

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { ServerConfig } from '../config.js';
import type { JoinClaims, VerifiedJoinToken } from './types.js';

type TokenConfig = Pick<
  ServerConfig,
  'JWT_SECRET' | 'JWT_ISSUER' | 'JWT_AUDIENCE' | 'TOKEN_TTL_SECONDS'
>;

export interface TokenClaims extends jwt.JwtPayload {
  sub: string;
  name: string;
  roomId: string;
  jti: string;
  exp: number;
}

function assertValidClaims(
  claims: jwt.JwtPayload,
): asserts claims is TokenClaims {
  if (typeof claims.sub !== 'string' || claims.sub.length === 0) {
    throw new Error('Token is missing required subject claim');
  }

  if (typeof claims.name !== 'string' || claims.name.length === 0) {
    throw new Error('Token is missing name claim');
  }

  if (typeof claims.roomId !== 'string' || claims.roomId.length === 0) {
    throw new Error('Token is missing roomId claim');
  }

  if (typeof claims.jti !== 'string' || claims.jti.length === 0) {
    throw new Error('Token is missing jti claim');
  }

  if (typeof claims.exp !== 'number') {
    throw new Error('Token is missing exp claim');
  }
}

export const signJoinToken = (claims: JoinClaims, config: TokenConfig): string => {
  const payload: jwt.JwtPayload = {
    sub: claims.userId,
    name: claims.name,
    roomId: claims.roomId,
  };

  return jwt.sign(payload, config.JWT_SECRET, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
    expiresIn: config.TOKEN_TTL_SECONDS,
    jwtid: randomUUID(),
  });
};

export const decodeJoinToken = (token: string, config: TokenConfig): VerifiedJoinToken => {
  const decoded = jwt.verify(token, config.JWT_SECRET, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
  });

  if (typeof decoded === 'string') {
    throw new Error('Unexpected token payload type');
  }

  assertValidClaims(decoded);

  return {
    userId: decoded.sub,
    name: decoded.name,
    roomId: decoded.roomId,
    tokenId: decoded.jti,
    expiresAt: decoded.exp,
  };
};
