import {createHash, timingSafeEqual} from 'node:crypto';

import type {AdminAuthConfig} from './config';

export type AdminAuthRequest = {
  method: string;
  pathname: string;
  apiKey: string | undefined;
};

/**
 * Decides whether a request may reach the route handlers. `OPTIONS` requests never
 * reach a gate; the authentication interceptor lets them through beforehand.
 */
export type AdminAuthGate = {
  mode: AdminAuthConfig['mode'] | 'custom';
  isAuthorized: (request: AdminAuthRequest) => boolean;
};

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest();

// Both sides are hashed to a fixed length before timingSafeEqual.
export const apiKeysMatch = (expected: string, provided: string | undefined) => {
  if (provided === undefined) {
    return false;
  }

  return timingSafeEqual(digest(expected), digest(provided));
};

export const isUnprotectedPath = ({pathname, unprotectedPaths}: {pathname: string; unprotectedPaths: readonly string[]}) =>
  unprotectedPaths.some(entry => (entry.endsWith('/') ? pathname.startsWith(entry) : pathname === entry));

export const createApiKeyAuthGate = ({
  apiKey,
  unprotectedPaths
}: {
  apiKey: string;
  unprotectedPaths: readonly string[];
}): AdminAuthGate => ({
  mode: 'api_key',
  isAuthorized: request =>
    isUnprotectedPath({pathname: request.pathname, unprotectedPaths}) || apiKeysMatch(apiKey, request.apiKey)
});

export const createInsecureAuthGate = (): AdminAuthGate => ({
  mode: 'insecure',
  isAuthorized: () => true
});

export const createAuthGateFromConfig = (config: AdminAuthConfig): AdminAuthGate =>
  config.mode === 'api_key'
    ? createApiKeyAuthGate({apiKey: config.apiKey, unprotectedPaths: config.unprotectedPaths})
    : createInsecureAuthGate();
