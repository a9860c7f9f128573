/**
 * ViperVault
 *
 * Password-protected web viewer for the output of configured shell commands.
 *
 * @module vipervault
 */

// Configuration
export type {
  ViewConfig,
  RawViewConfig,
  VaultConfig,
  SessionStoreConfig,
  SessionStoreType
} from './config';
export {
  ConfigError,
  loadConfig,
  parseConfig,
  normalizeViews,
  resolveConfigPath,
  viewsToJSON,
  DEFAULT_CONFIG_FILE
} from './config';

// Authentication
export type { CookieOptions } from './auth';
export {
  SESSION_COOKIE,
  hashPassword,
  verifyPassword,
  parseCookies,
  getSessionToken,
  buildSessionCookie,
  buildClearedSessionCookie,
  isSecureRequest
} from './auth';

// Sessions
export type { SessionStore, SessionRecord, SessionPolicy, Clock } from './session-store';
export {
  MemorySessionStore,
  FileSessionStore,
  SqliteSessionStore,
  createSessionStore,
  initSessionStore,
  policyFromConfig,
  generateToken,
  isExpired
} from './session-store';

// Command execution and rendering
export type { RunOptions, CommandResult } from './command-runner';
export { runCommand, formatViewOutput, getViewOutput } from './command-runner';
export { escapeHtml, renderViewOutput, renderView } from './output';
export { renderPage, contentSecurityPolicy, createNonce } from './html-interface';

// Server
export type { VaultContext } from './context';
export { createContext } from './context';
export type { RequestHandler, VaultServer, SSLOptions, StartOptions } from './http-server';
export { createRequestHandler, createVaultServer, startServer } from './http-server';
export type { ClientMessage, ServerMessage } from './stream';
export { attachStreamServer, STREAM_PATH } from './stream';
