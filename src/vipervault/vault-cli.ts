#!/usr/bin/env node
/**
 * vault-cli.ts - Admin CLI for the ViperVault configuration
 *
 * Usage:
 *   vault-cli --list
 *   vault-cli --run "Syslog"
 *   vault-cli --hash-password "new password"
 */

import { ConfigError, loadConfig, resolveConfigPath, viewsToJSON, type VaultConfig } from './config';
import { hashPassword } from './auth';
import { renderView } from './output';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

const HELP = `
ViperVault CLI

Usage:
  vault-cli --list                    List configured views
  vault-cli --list-json               List views as JSON
  vault-cli --run <view>              Run a view's command and print its output
  vault-cli --check                   Validate the configuration file
  vault-cli --hash-password <pw>      Print a hashed password for the config file
  vault-cli --help                    Show this help

Options:
  --config <path>   Configuration file (default: ./vipervault.config.json)

Environment Variables:
  VIPERVAULT_CONFIG   Configuration file

Examples:
  vault-cli --list
  vault-cli --config /etc/vipervault.json --run "Disk usage"
`;

function formatRefresh(refresh: number): string {
  return refresh <= 0 ? 'off' : `${refresh}s`;
}

function listViews(config: VaultConfig, io: CliIO): void {
  if (config.log_views.size === 0) {
    io.out('No views configured.');
    return;
  }

  io.out('\nConfigured Views:\n');
  for (const [name, view] of config.log_views) {
    const flags = [
      `refresh=${formatRefresh(view.refresh)}`,
      view.safe_output ? 'escaped' : 'raw',
      view.bottom ? 'bottom' : 'top'
    ].join(', ');
    io.out(`  ${name.padEnd(20)} [${flags}]`);
    io.out(`  ${''.padEnd(20)} $ ${view.cmd}`);
  }
  io.out('');
}

/**
 * Returns the process exit code.
 */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    io.out(HELP);
    return 0;
  }

  if (args[0] === '--hash-password') {
    const password = args[1];
    if (!password) {
      io.err('Usage: vault-cli --hash-password <password>');
      return 1;
    }
    io.out(hashPassword(password));
    return 0;
  }

  let configPath: string;
  let config: VaultConfig;
  try {
    configPath = resolveConfigPath(args);
    config = loadConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (args.includes('--check')) {
    io.out(`OK: ${configPath} (${config.log_views.size} view(s))`);
    return 0;
  }

  if (args.includes('--list')) {
    listViews(config, io);
    return 0;
  }

  if (args.includes('--list-json')) {
    io.out(JSON.stringify(viewsToJSON(config.log_views), null, 2));
    return 0;
  }

  const runIdx = args.indexOf('--run');
  if (runIdx !== -1) {
    const name = args[runIdx + 1];
    const view = name !== undefined ? config.log_views.get(name) : undefined;
    if (name === undefined || !view) {
      io.err(`Unknown view: ${name ?? '(none)'}`);
      io.err(`Available: ${Array.from(config.log_views.keys()).join(', ')}`);
      return 1;
    }
    io.out(await renderView(name, view, config));
    return 0;
  }

  const rest = args.filter((arg, i) => arg !== '--config' && args[i - 1] !== '--config');
  io.err(rest.length > 0 ? `Unknown option: ${rest[0]}` : 'No command given');
  io.err('Run with --help for usage.');
  return 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch(err => {
      console.error('Error:', err);
      process.exit(1);
    });
}
