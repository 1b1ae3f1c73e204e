import { createHash, timingSafeEqual } from 'crypto';
import { componentLogger } from './logger';
import type { Logger } from './logger';

export interface AuthConfig {
  webhookPassword?: string;
  allowedSourceIps: string[];
}

export interface Authenticator {
  /** True only when the password matches and, if a source address is given, it is allow-listed. */
  authenticate(body: unknown, sourceAddress?: string): boolean;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

// Both sides are hashed first so the comparison runs on equal-length buffers.
export function constantTimeEquals(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  return trimmed.toLowerCase().startsWith('::ffff:') ? trimmed.slice(7) : trimmed;
}

function passwordOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, 'password');
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createAuthenticator(cfg: AuthConfig, logger: Logger = componentLogger('auth')): Authenticator {
  const allowed = new Set(cfg.allowedSourceIps.map(normalizeAddress));
  return {
    authenticate(body, sourceAddress) {
      if (!cfg.webhookPassword) {
        logger.error('webhook password is not configured; rejecting request');
        return false;
      }
      if (sourceAddress !== undefined && !allowed.has(normalizeAddress(sourceAddress))) {
        logger.warn({ sourceAddress }, 'request from address outside the allow-list');
        return false;
      }
      const received = passwordOf(body);
      if (received === undefined) {
        logger.warn('no password in webhook payload');
        return false;
      }
      if (!constantTimeEquals(cfg.webhookPassword, received)) {
        logger.warn('invalid webhook password');
        return false;
      }
      return true;
    },
  };
}
