/**
 * Authentication Module
 *
 * Password checking against the single configured password, plus the
 * `session_token` cookie that carries a session between requests.
 *
 * @module vipervault/auth
 */

import * as crypto from 'crypto';
import type * as http from 'http';
import { TLSSocket } from 'tls';

// ============================================================================
// Configuration
// ============================================================================

export const SESSION_COOKIE = 'session_token';

export interface CookieOptions {
  /** Seconds. */
  maxAge: number;
  secure: boolean;
}

// ============================================================================
// Password Hashing (SHA256 with salt)
// ============================================================================

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16).toString('hex');
  const hash = crypto.createHash('sha256').update(password + salt).digest('hex');
  return `sha256:${salt}:${hash}`;
}

function sha256(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

/**
 * Check a login attempt against the configured password, which is either
 * plain text or a `sha256:<salt>:<hash>` string from {@link hashPassword}.
 */
export function verifyPassword(attempt: string, configured: string): boolean {
  if (configured.startsWith('sha256:')) {
    const [, salt, hash] = configured.split(':');
    if (salt === undefined || hash === undefined) {
      return false;
    }
    const expected = Buffer.from(hash, 'hex');
    const actual = crypto.createHash('sha256').update(attempt + salt).digest();
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }
  return crypto.timingSafeEqual(sha256(attempt), sha256(configured));
}

// ============================================================================
// Cookies
// ============================================================================

/**
 * Parse a `Cookie` header. Pairs without `=` are skipped; the first
 * occurrence of a name wins.
 */
export function parseCookies(header: string | undefined): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) {
    return cookies;
  }

  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;

    const name = part.slice(0, eq).trim();
    let value = part.slice(eq + 1).trim();
    if (!name || cookies.has(name)) continue;

    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    try {
      cookies.set(name, decodeURIComponent(value));
    } catch {
      cookies.set(name, value);
    }
  }

  return cookies;
}

export function getSessionToken(req: http.IncomingMessage): string | null {
  const token = parseCookies(req.headers.cookie).get(SESSION_COOKIE);
  return token ? token : null;
}

function cookieAttributes(maxAge: number, secure: boolean): string {
  const attrs = ['Path=/', `Max-Age=${Math.floor(maxAge)}`, 'HttpOnly', 'SameSite=Lax'];
  if (secure) {
    attrs.push('Secure');
  }
  return attrs.join('; ');
}

export function buildSessionCookie(token: string, options: CookieOptions): string {
  return `${SESSION_COOKIE}=${encodeURIComponent(token)}; ${cookieAttributes(options.maxAge, options.secure)}`;
}

export function buildClearedSessionCookie(options: Pick<CookieOptions, 'secure'>): string {
  return `${SESSION_COOKIE}=; ${cookieAttributes(0, options.secure)}`;
}

/**
 * True when the request arrived over TLS, directly or through a proxy that
 * sets `X-Forwarded-Proto`.
 */
export function isSecureRequest(req: http.IncomingMessage): boolean {
  if (req.socket instanceof TLSSocket) {
    return true;
  }
  const forwarded = req.headers['x-forwarded-proto'];
  const proto = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  return proto?.split(',')[0].trim().toLowerCase() === 'https';
}
