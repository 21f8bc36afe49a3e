/**
 * Authorization hook called by every surface before a request is built
 */

import * as crypto from 'crypto';
import { ForbiddenError } from '../errors';

export type Surface = 'rest' | 'query' | 'stream';

export interface AuthContext {
  surface: Surface;
  action: string;
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

export interface AuthDecision {
  allowed: boolean;
  reason?: string;
}

export interface Authorizer {
  authorize(context: AuthContext): Promise<AuthDecision> | AuthDecision;
}

export class AllowAllAuthorizer implements Authorizer {
  public authorize(): AuthDecision {
    return { allowed: true };
  }
}

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const safeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
};

/**
 * Accepts a key from `x-api-key` or `Authorization: Bearer <key>`
 */
export class ApiKeyAuthorizer implements Authorizer {
  constructor(private keys: string[]) {}

  public authorize(context: AuthContext): AuthDecision {
    const key = ApiKeyAuthorizer.extractKey(context.headers);
    if (!key) {
      return { allowed: false, reason: 'API key required' };
    }
    if (!this.keys.some(candidate => safeEqual(candidate, key))) {
      return { allowed: false, reason: 'Invalid API key' };
    }
    return { allowed: true };
  }

  public static extractKey(headers: AuthContext['headers']): string | undefined {
    const apiKey = headerValue(headers['x-api-key']);
    if (apiKey) return apiKey;

    const authorization = headerValue(headers.authorization);
    const match = authorization?.match(/^Bearer\s+(.+)$/i);
    return match ? match[1].trim() : undefined;
  }
}

export function createAuthorizer(apiKeys: string[]): Authorizer {
  return apiKeys.length > 0 ? new ApiKeyAuthorizer(apiKeys) : new AllowAllAuthorizer();
}

/**
 * Throws ForbiddenError when the authorizer denies the call
 */
export async function authorizeOrThrow(authorizer: Authorizer, context: AuthContext): Promise<void> {
  const decision = await authorizer.authorize(context);
  if (!decision.allowed) {
    throw new ForbiddenError(decision.reason ?? 'Access denied');
  }
}
