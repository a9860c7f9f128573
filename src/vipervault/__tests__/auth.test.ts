import { describe, it, expect } from 'vitest';
import * as http from 'http';
import * as net from 'net';
import {
  buildClearedSessionCookie,
  buildSessionCookie,
  getSessionToken,
  hashPassword,
  isSecureRequest,
  parseCookies,
  verifyPassword
} from '../auth';

function requestWith(headers: http.IncomingHttpHeaders): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  req.headers = headers;
  return req;
}

describe('passwords', () => {
  it('accepts the plain-text password', () => {
    expect(verifyPassword('test-secret', 'test-secret')).toBe(true);
    expect(verifyPassword('test-secret ', 'test-secret')).toBe(false);
    expect(verifyPassword('', 'test-secret')).toBe(false);
  });

  it('accepts the password a hash was made from', () => {
    const hashed = hashPassword('test-secret');

    expect(hashed).toMatch(/^sha256:[0-9a-f]{32}:[0-9a-f]{64}$/);
    expect(verifyPassword('test-secret', hashed)).toBe(true);
    expect(verifyPassword('other-secret', hashed)).toBe(false);
  });

  it('salts every hash differently', () => {
    expect(hashPassword('test-secret')).not.toBe(hashPassword('test-secret'));
  });

  it('rejects malformed hashes', () => {
    expect(verifyPassword('test-secret', 'sha256:onlysalt')).toBe(false);
    expect(verifyPassword('test-secret', 'sha256:abcd:zz')).toBe(false);
  });
});

describe('parseCookies', () => {
  it('returns an empty map without a header', () => {
    expect(parseCookies(undefined).size).toBe(0);
  });

  it('parses pairs, strips quotes and keeps the first duplicate', () => {
    const cookies = parseCookies('a=1; b="two"; a=3; junk; c=hello%20world');

    expect(Array.from(cookies.entries())).toEqual([
      ['a', '1'],
      ['b', 'two'],
      ['c', 'hello world']
    ]);
  });

  it('keeps a value that does not decode', () => {
    expect(parseCookies('c=%E0%A4%A').get('c')).toBe('%E0%A4%A');
  });
});

describe('getSessionToken', () => {
  it('reads the session cookie', () => {
    expect(getSessionToken(requestWith({ cookie: 'theme=dark; session_token=abc123' }))).toBe('abc123');
  });

  it('returns null for a missing or empty cookie', () => {
    expect(getSessionToken(requestWith({}))).toBeNull();
    expect(getSessionToken(requestWith({ cookie: 'session_token=' }))).toBeNull();
  });
});

describe('session cookies', () => {
  it('builds the login cookie', () => {
    expect(buildSessionCookie('tok', { maxAge: 86400.7, secure: false })).toBe(
      'session_token=tok; Path=/; Max-Age=86400; HttpOnly; SameSite=Lax'
    );
  });

  it('marks the cookie Secure over TLS', () => {
    expect(buildSessionCookie('tok', { maxAge: 60, secure: true })).toBe(
      'session_token=tok; Path=/; Max-Age=60; HttpOnly; SameSite=Lax; Secure'
    );
  });

  it('builds the cookie that clears the session', () => {
    expect(buildClearedSessionCookie({ secure: false })).toBe(
      'session_token=; Path=/; Max-Age=0; HttpOnly; SameSite=Lax'
    );
  });
});

describe('isSecureRequest', () => {
  it('is false for plain HTTP', () => {
    expect(isSecureRequest(requestWith({}))).toBe(false);
  });

  it('trusts the first X-Forwarded-Proto value', () => {
    expect(isSecureRequest(requestWith({ 'x-forwarded-proto': 'HTTPS, http' }))).toBe(true);
    expect(isSecureRequest(requestWith({ 'x-forwarded-proto': 'http, https' }))).toBe(false);
  });
});
