import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { formatViewOutput, getViewOutput, runCommand, type CommandResult } from '../command-runner';

function result(overrides: Partial<CommandResult>): CommandResult {
  return {
    success: true,
    code: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    truncated: false,
    ...overrides
  };
}

describe('runCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('captures stdout through the shell', async () => {
    const res = await runCommand('echo one; echo two | tr a-z A-Z');

    expect(res.success).toBe(true);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe('one\nTWO\n');
  });

  it('captures stderr and the exit code of a failing command', async () => {
    const res = await runCommand('echo oops >&2; exit 3');

    expect(res.success).toBe(false);
    expect(res.code).toBe(3);
    expect(res.stderr).toBe('oops\n');
  });

  it('logs each run with the view name', async () => {
    await runCommand('true', { view: 'Uptime' });

    expect(console.log).toHaveBeenCalledWith('[command-runner]', expect.stringContaining('"view":"Uptime","command":"true"'));
  });

  it('kills a command that runs past the timeout', async () => {
    const started = Date.now();
    const res = await runCommand('sleep 5; echo done', { timeoutMs: 200 });

    expect(res.timedOut).toBe(true);
    expect(res.success).toBe(false);
    expect(res.stdout).toBe('');
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('truncates output past the byte limit', async () => {
    const res = await runCommand('printf 0123456789', { maxOutputBytes: 4 });

    expect(res.stdout).toBe('0123');
    expect(res.truncated).toBe(true);
  });

  it('does not cut a multi-byte character in half', async () => {
    const cut = await runCommand("printf 'a\\303\\251b'", { maxOutputBytes: 2 });
    const whole = await runCommand("printf 'a\\303\\251b'", { maxOutputBytes: 3 });

    expect(cut.stdout).toBe('a');
    expect(cut.truncated).toBe(true);
    expect(whole.stdout).toBe('a\u00e9');
    expect(whole.truncated).toBe(true);
  });

  it('passes extra environment variables', async () => {
    const res = await runCommand('printf "$VAULT_TEST_VALUE"', { env: { VAULT_TEST_VALUE: 'from-env' } });

    expect(res.stdout).toBe('from-env');
  });

  it('reports an empty command without running anything', async () => {
    const res = await runCommand('   ');

    expect(res.success).toBe(false);
    expect(res.error).toBe('No command configured for this view');
  });
});

describe('formatViewOutput', () => {
  it('returns stdout on success', () => {
    expect(formatViewOutput(result({ stdout: 'all good\n' }))).toBe('all good\n');
  });

  it('reports stderr and the return code on failure', () => {
    expect(formatViewOutput(result({ success: false, code: 2, stderr: 'no such file\n' }))).toBe(
      'Error running command: no such file\n\nReturn code: 2'
    );
  });

  it('reports a signal as a negative return code', () => {
    expect(formatViewOutput(result({ success: false, code: null, signal: 'SIGKILL' }))).toBe(
      'Error running command: \nReturn code: -9'
    );
  });

  it('reports a timeout in seconds', () => {
    expect(formatViewOutput(result({ success: false, timedOut: true }), { timeoutMs: 1500 })).toBe(
      'Error running command: Command timed out after 1.5s'
    );
  });

  it('reports a spawn error', () => {
    expect(formatViewOutput(result({ success: false, code: null, error: 'spawn sh ENOENT' }))).toBe(
      'Unexpected error: spawn sh ENOENT'
    );
  });

  it('notes truncation after the output', () => {
    expect(formatViewOutput(result({ stdout: 'abcd', truncated: true }), { maxOutputBytes: 4 })).toBe(
      'abcd\n[output truncated at 4 bytes]'
    );
  });
});

describe('getViewOutput', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs and formats in one step', async () => {
    expect(await getViewOutput('echo hello')).toBe('hello\n');
    expect(await getViewOutput('exit 1')).toBe('Error running command: \nReturn code: 1');
  });
});
