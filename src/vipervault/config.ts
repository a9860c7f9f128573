/**
 * Configuration Loader
 *
 * Reads the JSON configuration file, validates it and normalizes every
 * entry of `log_views` into a full {@link ViewConfig}.
 *
 * Example file:
 *
 *   {
 *     "password": "change-me",
 *     "refresh_interval": 30,
 *     "log_views": {
 *       "Syslog": "tail -n 200 /var/log/syslog",
 *       "Disk usage": { "cmd": "df -h", "refresh": 0, "bottom": false }
 *     }
 *   }
 *
 * @module vipervault/config
 */

import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG_FILE = 'vipervault.config.json';
export const DEFAULT_PASSWORD = 'correct horse battery staple';
export const DEFAULT_REFRESH_INTERVAL = 30;
export const DEFAULT_SESSION_DURATION = 86400;
export const DEFAULT_INACTIVITY_TIMEOUT = 3600;
export const DEFAULT_COMMAND_TIMEOUT = 30;
export const DEFAULT_MAX_OUTPUT_BYTES = 5 * 1024 * 1024;
export const DEFAULT_TITLE = 'Log Viewer';
export const DEFAULT_SESSION_DIR = '.sessions';

// ============================================================================
// Types
// ============================================================================

/**
 * A view after normalization. `refresh <= 0` disables auto-refresh.
 */
export interface ViewConfig {
  cmd: string;
  refresh: number;
  safe_output: boolean;
  bottom: boolean;
}

export type SessionStoreType = 'memory' | 'file' | 'sqlite';

export interface SessionStoreConfig {
  type: SessionStoreType;
  path?: string;
}

export interface VaultConfig {
  password: string;
  refresh_interval: number;
  session_duration: number;
  inactivity_timeout: number;
  command_timeout: number;
  max_output_bytes: number;
  title: string;
  session_store: SessionStoreConfig;
  /** Ordered by name, case-insensitively. */
  log_views: ReadonlyMap<string, ViewConfig>;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Schema
// ============================================================================

const RawViewSchema = z.union([
  z.string(),
  z.object({
    cmd: z.string().optional(),
    refresh: z.number().finite().optional(),
    safe_output: z.boolean().optional(),
    bottom: z.boolean().optional()
  })
]);

export type RawViewConfig = z.infer<typeof RawViewSchema>;

const ConfigSchema = z.object({
  password: z.string().min(1).default(DEFAULT_PASSWORD),
  refresh_interval: z.number().finite().default(DEFAULT_REFRESH_INTERVAL),
  session_duration: z.number().positive().default(DEFAULT_SESSION_DURATION),
  inactivity_timeout: z.number().positive().default(DEFAULT_INACTIVITY_TIMEOUT),
  command_timeout: z.number().nonnegative().default(DEFAULT_COMMAND_TIMEOUT),
  max_output_bytes: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_BYTES),
  title: z.string().default(DEFAULT_TITLE),
  session_store: z
    .object({
      type: z.enum(['memory', 'file', 'sqlite']).default('file'),
      path: z.string().min(1).optional()
    })
    .default({ type: 'file' }),
  log_views: z.record(RawViewSchema).default({})
});

// ============================================================================
// Normalization
// ============================================================================

function compareViewNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}

/**
 * Fill in every view's options and order the views by name.
 *
 * A missing `refresh` falls back to `defaultRefresh`; an explicit `0` is kept.
 */
export function normalizeViews(
  rawViews: Record<string, RawViewConfig>,
  defaultRefresh: number
): Map<string, ViewConfig> {
  const names = Object.keys(rawViews).sort(compareViewNames);
  const views = new Map<string, ViewConfig>();

  for (const name of names) {
    const raw = rawViews[name];
    if (typeof raw === 'string') {
      views.set(name, { cmd: raw, refresh: defaultRefresh, safe_output: true, bottom: true });
    } else {
      views.set(name, {
        cmd: raw.cmd ?? '',
        refresh: raw.refresh !== undefined ? raw.refresh : defaultRefresh,
        safe_output: raw.safe_output ?? true,
        bottom: raw.bottom ?? true
      });
    }
  }

  return views;
}

function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${field}: ${issue.message}`;
}

/**
 * Validate an already-parsed configuration object.
 *
 * @param baseDir - directory that a relative `session_store.path` is resolved against
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): VaultConfig {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssue(parsed.error.issues[0])}`);
  }

  const data = parsed.data;
  const storePath = data.session_store.path
    ?? (data.session_store.type === 'file' ? DEFAULT_SESSION_DIR : undefined);

  return {
    password: data.password,
    refresh_interval: data.refresh_interval,
    session_duration: data.session_duration,
    inactivity_timeout: data.inactivity_timeout,
    command_timeout: data.command_timeout,
    max_output_bytes: data.max_output_bytes,
    title: data.title,
    session_store: {
      type: data.session_store.type,
      path: storePath === undefined || storePath === ':memory:'
        ? storePath
        : path.resolve(baseDir, storePath)
    },
    log_views: normalizeViews(data.log_views, data.refresh_interval)
  };
}

/**
 * Load and validate the configuration file at `configPath`.
 */
export function loadConfig(configPath: string): VaultConfig {
  const resolved = path.resolve(configPath);

  if (!existsSync(resolved)) {
    throw new ConfigError(`Configuration file '${configPath}' not found.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in configuration file: ${message}`);
  }

  return parseConfig(raw, path.dirname(resolved));
}

/**
 * Pick the configuration file: `--config <path>`, then `VIPERVAULT_CONFIG`,
 * then `vipervault.config.json` in the working directory. A `--config`
 * without a value is a {@link ConfigError}.
 */
export function resolveConfigPath(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): string {
  const idx = argv.indexOf('--config');
  if (idx !== -1) {
    const value = argv[idx + 1];
    if (!value || value.startsWith('--')) {
      throw new ConfigError('Missing value for --config');
    }
    return value;
  }
  if (env.VIPERVAULT_CONFIG) {
    return env.VIPERVAULT_CONFIG;
  }
  return path.join(process.cwd(), DEFAULT_CONFIG_FILE);
}

/**
 * Plain-object form of the views, as embedded in the page and printed by the CLI.
 */
export function viewsToJSON(views: ReadonlyMap<string, ViewConfig>): Record<string, ViewConfig> {
  return Object.fromEntries(Array.from(views, ([name, view]) => [name, { ...view }]));
}
