#!/usr/bin/env node
/**
 * ViperVault HTTP Server
 *
 * Serves the password-protected viewer for the commands configured under
 * `log_views`. Every action is served at `/` and picked by `?action=`.
 *
 * Usage:
 *   vipervault
 *   vipervault --port 8080 --config /etc/vipervault.json
 *   vipervault --cert cert.pem --key key.pem  # HTTPS mode
 *
 * Endpoints:
 *   GET  /                              - HTML interface
 *   POST /?action=login                 - Login (password)
 *   POST /?action=logout                - Logout
 *   GET  /?action=check_session         - Session status
 *   GET  /?action=get_log&view=<name>   - Rendered output of a view
 *   GET  /health                        - Health check
 *   WS   /stream                        - Output pushed on the view's refresh interval
 *
 * @module vipervault/http-server
 */

import * as http from 'http';
import * as https from 'https';
import * as fs from 'fs';
import type * as net from 'net';
import type { WebSocketServer } from 'ws';
import {
  ConfigError,
  DEFAULT_PASSWORD,
  loadConfig,
  resolveConfigPath,
  type VaultConfig
} from './config';
import {
  buildClearedSessionCookie,
  buildSessionCookie,
  getSessionToken,
  isSecureRequest,
  verifyPassword
} from './auth';
import { initSessionStore, policyFromConfig, type SessionStore } from './session-store';
import { contentSecurityPolicy, createNonce, renderPage } from './html-interface';
import { createContext, type VaultContext } from './context';
import { attachStreamServer, INVALID_VIEW_MESSAGE, STREAM_PATH, UNAUTHORIZED_MESSAGE } from './stream';

// ============================================================================
// Configuration
// ============================================================================

const DEFAULT_PORT = 3001;
const DEFAULT_HOST = '0.0.0.0';
const MAX_BODY_SIZE = 1024 * 1024; // 1MB
const SESSION_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

// ============================================================================
// Types
// ============================================================================

interface APIResponse {
  success: boolean;
  data?: unknown;
  error?: string;
}

type FormFields = Map<string, string>;

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

export class BodyTooLargeError extends Error {
  constructor() {
    super('Request body too large');
    this.name = 'BodyTooLargeError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let failed = false;

    req.on('data', (chunk: Buffer) => {
      if (failed) return;
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        failed = true;
        reject(new BodyTooLargeError());
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (!failed) resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

/**
 * Form fields from the query string and, for requests with a body, from an
 * urlencoded or JSON body. A query value wins over a body value.
 */
async function readForm(req: http.IncomingMessage, url: URL): Promise<FormFields> {
  const fields: FormFields = new Map();
  for (const [key, value] of url.searchParams) {
    if (!fields.has(key)) fields.set(key, value);
  }

  if (req.method === 'GET' || req.method === 'HEAD') {
    return fields;
  }

  const body = await parseBody(req);
  if (!body) {
    return fields;
  }

  const contentType = (req.headers['content-type'] ?? '').toLowerCase();
  if (contentType.startsWith('application/json')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return fields;
    }
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string' && !fields.has(key)) fields.set(key, value);
      }
    }
    return fields;
  }

  for (const [key, value] of new URLSearchParams(body)) {
    if (!fields.has(key)) fields.set(key, value);
  }
  return fields;
}

const COMMON_HEADERS = {
  'Cache-Control': 'no-store',
  'X-Content-Type-Options': 'nosniff'
};

function sendJSON(
  res: http.ServerResponse,
  data: unknown,
  status = 200,
  extraHeaders: Record<string, string> = {}
): void {
  res.writeHead(status, {
    ...COMMON_HEADERS,
    'Content-Type': 'application/json',
    ...extraHeaders
  });
  res.end(JSON.stringify(data));
}

function sendText(res: http.ServerResponse, text: string, status = 200): void {
  res.writeHead(status, {
    ...COMMON_HEADERS,
    'Content-Type': 'text/plain; charset=utf-8'
  });
  res.end(text);
}

function sendHTML(res: http.ServerResponse, html: string, nonce: string): void {
  res.writeHead(200, {
    ...COMMON_HEADERS,
    'Content-Type': 'text/html; charset=utf-8',
    'Content-Security-Policy': contentSecurityPolicy(nonce),
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'no-referrer'
  });
  res.end(html);
}

function sendError(res: http.ServerResponse, message: string, status = 400): void {
  const body: APIResponse = { success: false, error: message };
  sendJSON(res, body, status);
}

function clientAddress(req: http.IncomingMessage): string {
  return req.socket.remoteAddress ?? 'unknown';
}

// ============================================================================
// Action Handlers
// ============================================================================

async function handleLogin(
  ctx: VaultContext,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  form: FormFields
): Promise<void> {
  const attempt = form.get('password') ?? '';

  if (!verifyPassword(attempt, ctx.config.password)) {
    console.warn(`[auth] failed login from ${clientAddress(req)}`);
    return sendJSON(res, { success: false });
  }

  const token = await ctx.store.create();
  console.log(`[auth] login from ${clientAddress(req)}`);
  sendJSON(res, { success: true }, 200, {
    'Set-Cookie': buildSessionCookie(token, {
      maxAge: ctx.config.session_duration,
      secure: isSecureRequest(req)
    })
  });
}

async function handleLogout(ctx: VaultContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const token = getSessionToken(req);
  if (token) {
    await ctx.store.destroy(token);
  }
  sendJSON(res, { success: true }, 200, {
    'Set-Cookie': buildClearedSessionCookie({ secure: isSecureRequest(req) })
  });
}

async function handleCheckSession(ctx: VaultContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const authenticated = await ctx.store.validate(getSessionToken(req));
  sendJSON(res, { authenticated });
}

async function handleGetLog(
  ctx: VaultContext,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  form: FormFields
): Promise<void> {
  if (!(await ctx.store.validate(getSessionToken(req)))) {
    return sendText(res, UNAUTHORIZED_MESSAGE, 401);
  }

  const name = form.get('view');
  const view = name !== undefined ? ctx.config.log_views.get(name) : undefined;
  if (name === undefined || !view) {
    return sendText(res, INVALID_VIEW_MESSAGE, 400);
  }

  try {
    sendText(res, await ctx.renderView(name, view));
  } catch (err) {
    console.error(`[get_log] ${name}:`, err);
    sendText(res, `Error executing command: ${err instanceof Error ? err.message : String(err)}`, 500);
  }
}

function handlePage(ctx: VaultContext, res: http.ServerResponse): void {
  const nonce = createNonce();
  sendHTML(res, renderPage({
    title: ctx.config.title,
    views: ctx.config.log_views,
    defaultRefresh: ctx.config.refresh_interval,
    nonce
  }), nonce);
}

function handleHealth(ctx: VaultContext, res: http.ServerResponse): void {
  sendJSON(res, {
    success: true,
    data: {
      status: 'ok',
      views: ctx.config.log_views.size,
      timestamp: new Date().toISOString()
    }
  });
}

// ============================================================================
// Router
// ============================================================================

export function createRequestHandler(ctx: VaultContext): RequestHandler {
  return async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname;
    const method = req.method ?? 'GET';

    try {
      if (pathname === '/health' && method === 'GET') {
        console.log(`[${new Date().toISOString()}] ${method} ${pathname}`);
        return handleHealth(ctx, res);
      }

      if (pathname !== '/' && pathname !== '/index.html') {
        console.log(`[${new Date().toISOString()}] ${method} ${pathname} 404`);
        return sendError(res, 'Not found', 404);
      }

      const form = await readForm(req, url);
      const action = form.get('action');
      console.log(`[${new Date().toISOString()}] ${method} ${pathname}${action ? ` action=${action}` : ''}`);

      switch (action) {
        case 'login':
          return await handleLogin(ctx, req, res, form);
        case 'logout':
          return await handleLogout(ctx, req, res);
        case 'check_session':
          return await handleCheckSession(ctx, req, res);
        case 'get_log':
          return await handleGetLog(ctx, req, res, form);
        default:
          return handlePage(ctx, res);
      }
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        return sendError(res, err.message, 413);
      }
      console.error('Request error:', err);
      if (!res.headersSent) {
        sendError(res, 'Internal server error', 500);
      } else {
        res.end();
      }
    }
  };
}

// ============================================================================
// Server
// ============================================================================

export interface SSLOptions {
  cert: string;
  key: string;
}

export interface VaultServer {
  server: http.Server | https.Server;
  wss: WebSocketServer;
  protocol: 'http' | 'https';
}

/**
 * Build the HTTP(S) server with the `/stream` endpoint attached. Does not listen.
 */
export function createVaultServer(ctx: VaultContext, ssl?: SSLOptions): VaultServer {
  const handler = createRequestHandler(ctx);
  const listener = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    handler(req, res).catch(err => {
      console.error('Unhandled request error:', err);
    });
  };

  let server: http.Server | https.Server;
  let protocol: 'http' | 'https';

  if (ssl) {
    server = https.createServer({
      cert: fs.readFileSync(ssl.cert),
      key: fs.readFileSync(ssl.key)
    }, listener);
    protocol = 'https';
  } else {
    server = http.createServer(listener);
    protocol = 'http';
  }

  const wss = attachStreamServer(server, ctx);
  return { server, wss, protocol };
}

export interface StartOptions {
  port: number;
  host: string;
  configPath: string;
  ssl?: SSLOptions;
}

function printBanner(config: VaultConfig, options: StartOptions, protocol: string, store: SessionStore): void {
  const hostLabel = options.host === DEFAULT_HOST ? 'localhost' : options.host;
  const serverUrl = `${protocol}://${hostLabel}:${options.port}`;
  const wsUrl = `${protocol === 'https' ? 'wss' : 'ws'}://${hostLabel}:${options.port}${STREAM_PATH}`;
  console.log(`
╔════════════════════════════════════════════════════════════╗
║           ViperVault                                       ║
╠════════════════════════════════════════════════════════════╣
║  Server running at: ${serverUrl.padEnd(39)}║
║  Config file:       ${options.configPath.slice(-38).padEnd(39)}║
║  Views:             ${String(config.log_views.size).padEnd(39)}║
║  Session store:     ${config.session_store.type.padEnd(39)}║
║  SSL/TLS:           ${(protocol === 'https' ? 'ENABLED' : 'disabled').padEnd(39)}║
║  Stream:            ${wsUrl.padEnd(39)}║
╚════════════════════════════════════════════════════════════╝
`);
  if (config.password === DEFAULT_PASSWORD) {
    console.warn('Using the default password. Set "password" in the config file.');
  }
  store.count()
    .then(n => console.log(`${n} stored session(s)`))
    .catch(err => console.error('Failed to count sessions:', err));
}

export async function startServer(options: StartOptions): Promise<VaultServer> {
  const config = loadConfig(options.configPath);
  const store = await initSessionStore(config.session_store, policyFromConfig(config));
  const ctx = createContext(config, store);
  const vault = createVaultServer(ctx, options.ssl);
  const server: net.Server = vault.server;

  const cleanupTimer = setInterval(() => {
    store.cleanup()
      .then(removed => {
        if (removed > 0) console.log(`[sessions] removed ${removed} expired session(s)`);
      })
      .catch(err => console.error('[sessions] cleanup failed:', err));
  }, SESSION_CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    clearInterval(cleanupTimer);
    vault.wss.close();
    server.close();
    store.close()
      .then(() => process.exit(0))
      .catch(err => {
        console.error('Failed to close session store:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`Port ${options.port} is already in use`);
    } else {
      console.error('Server error:', err);
    }
    process.exit(1);
  });

  server.listen(options.port, options.host, () => {
    printBanner(config, options, vault.protocol, store);
  });

  return vault;
}

// ============================================================================
// CLI Entry
// ============================================================================

function printHelp(): void {
  console.log(`
ViperVault HTTP Server

Usage:
  vipervault [options]

Options:
  --port <number>   Port to listen on (default: ${DEFAULT_PORT})
  --host <address>  Address to bind (default: ${DEFAULT_HOST})
  --config <path>   Configuration file (default: ./vipervault.config.json)
  --cert <path>     Path to SSL certificate file (enables HTTPS)
  --key <path>      Path to SSL private key file (enables HTTPS)
  --help, -h        Show this help

Environment:
  PORT               Port to listen on
  HOST               Address to bind
  VIPERVAULT_CONFIG  Configuration file

Examples:
  vipervault --port 8080
  vipervault --cert server.crt --key server.key
`);
}

function argValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    process.exit(0);
  }

  const portArg = argValue(args, '--port') ?? process.env.PORT;
  const port = portArg !== undefined ? parseInt(portArg, 10) : DEFAULT_PORT;
  if (isNaN(port) || port < 0 || port > 65535) {
    console.error('Invalid port number');
    process.exit(1);
  }

  const certPath = argValue(args, '--cert');
  const keyPath = argValue(args, '--key');
  if ((certPath && !keyPath) || (!certPath && keyPath)) {
    console.error('Both --cert and --key are required for HTTPS');
    process.exit(1);
  }

  let configPath: string;
  try {
    configPath = resolveConfigPath(args);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const options: StartOptions = {
    port,
    host: argValue(args, '--host') ?? process.env.HOST ?? DEFAULT_HOST,
    configPath,
    ssl: certPath && keyPath ? { cert: certPath, key: keyPath } : undefined
  };

  startServer(options).catch(err => {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Failed to start server:', err);
    }
    process.exit(1);
  });
}

if (require.main === module) {
  main();
}
