/**
 * command-runner.ts - Runs a view's configured command
 *
 * Commands come from the configuration file only, never from a request.
 * They run through `sh -c` so pipes and redirections work.
 *
 * Usage:
 *   import { getViewOutput } from './command-runner';
 *   const text = await getViewOutput('tail -n 100 /var/log/syslog', { timeoutMs: 30000 });
 */

import { spawn } from 'child_process';
import { constants as osConstants } from 'os';

// ============================================================================
// Types
// ============================================================================

export interface RunOptions {
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
  maxOutputBytes?: number;
  cwd?: string;
  env?: Record<string, string>;
  /** View name, for the log line. */
  view?: string;
}

export interface CommandResult {
  success: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
  error?: string;
}

const DEFAULT_MAX_OUTPUT_BYTES = 5 * 1024 * 1024;

// ============================================================================
// Output Capture
// ============================================================================

/**
 * Collects chunks up to a byte limit; the rest is counted but dropped.
 */
class CappedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  toString(): string {
    const data = Buffer.concat(this.chunks);
    return data.subarray(0, this.truncated ? utf8Boundary(data) : data.length).toString('utf-8');
  }
}

/**
 * Length of `data` without a trailing, incomplete UTF-8 sequence.
 */
function utf8Boundary(data: Buffer): number {
  let start = data.length - 1;
  while (start >= 0 && data.length - start < 4 && (data[start] & 0xc0) === 0x80) {
    start--;
  }
  if (start < 0) return data.length;

  const lead = data[start];
  const width = lead < 0x80 ? 1 : lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return start + width > data.length ? start : data.length;
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Run `cmd` through the shell and capture its output. Never rejects: spawn
 * failures are reported in `error`.
 */
export function runCommand(cmd: string, options: RunOptions = {}): Promise<CommandResult> {
  const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

  console.log('[command-runner]', JSON.stringify({
    timestamp: new Date().toISOString(),
    view: options.view ?? null,
    command: cmd
  }));

  if (!cmd.trim()) {
    return Promise.resolve({
      success: false,
      code: null,
      signal: null,
      stdout: '',
      stderr: '',
      timedOut: false,
      truncated: false,
      error: 'No command configured for this view'
    });
  }

  return new Promise(resolve => {
    const stdout = new CappedBuffer(limit);
    const stderr = new CappedBuffer(limit);
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (result: Omit<CommandResult, 'stdout' | 'stderr' | 'truncated' | 'timedOut'>): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        ...result,
        success: result.success && !timedOut,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        truncated: stdout.truncated || stderr.truncated
      });
    };

    // Own process group, so a timeout also reaches the pipeline's children.
    const proc = spawn('sh', ['-c', cmd], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true
    });

    const killGroup = (): void => {
      if (proc.pid === undefined) return;
      try {
        process.kill(-proc.pid, 'SIGKILL');
      } catch (err) {
        // ESRCH: the group already exited
        if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
          console.error('[command-runner] failed to kill process group:', err);
        }
      }
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        killGroup();
      }, options.timeoutMs);
    }

    proc.stdout.on('data', (data: Buffer) => stdout.push(data));
    proc.stderr.on('data', (data: Buffer) => stderr.push(data));

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      finish({ success: code === 0, code, signal });
    });

    proc.on('error', (err: Error) => {
      finish({ success: false, code: null, signal: null, error: err.message });
    });
  });
}

/**
 * Negative signal number for a process killed by a signal, as shells and
 * most process APIs report it.
 */
function returnCode(result: CommandResult): number | string {
  if (result.code !== null) return result.code;
  if (result.signal) {
    const num = osConstants.signals[result.signal];
    return num !== undefined ? -num : result.signal;
  }
  return 'unknown';
}

/**
 * The text shown for a command run: stdout on success, otherwise an error
 * report.
 */
export function formatViewOutput(result: CommandResult, options: Pick<RunOptions, 'timeoutMs' | 'maxOutputBytes'> = {}): string {
  let text: string;

  if (result.error !== undefined) {
    text = `Unexpected error: ${result.error}`;
  } else if (result.timedOut) {
    const seconds = (options.timeoutMs ?? 0) / 1000;
    text = `Error running command: Command timed out after ${seconds}s`;
  } else if (!result.success) {
    text = `Error running command: ${result.stderr}\nReturn code: ${returnCode(result)}`;
  } else {
    text = result.stdout;
  }

  if (result.truncated) {
    text += `\n[output truncated at ${options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES} bytes]`;
  }
  return text;
}

export async function getViewOutput(cmd: string, options: RunOptions = {}): Promise<string> {
  const result = await runCommand(cmd, options);
  return formatViewOutput(result, options);
}
