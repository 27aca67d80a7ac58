// @module: server-auth-http
// @tags: auth, http

import { createHash, timingSafeEqual } from 'node:crypto';

export const extractBearerToken = (authorization?: string): string | null => {
  if (!authorization) {
    return null;
  }

  const [scheme, token] = authorization.split(' ');
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) {
    return null;
  }

  return token.trim();
};

const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

export const matchesApiKey = (candidate: string, expected: string): boolean =>
  timingSafeEqual(digest(candidate), digest(expected));
