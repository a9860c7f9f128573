import type * as net from 'net';
import { vi, type Mock } from 'vitest';
import { parseConfig } from '../config';
import { MemorySessionStore, policyFromConfig, type Clock } from '../session-store';
import type { VaultContext } from '../context';
import { createVaultServer, type VaultServer } from '../http-server';

export const PASSWORD = 'test-secret';

export interface TestServer {
  ctx: VaultContext;
  vault: VaultServer;
  baseUrl: string;
  renderView: Mock<VaultContext['renderView']>;
  close(): Promise<void>;
}

/**
 * In-process server on a random local port. Views do not run commands:
 * `renderView` returns "output of <name>", and the view named "Broken" throws.
 */
export async function startTestServer(clock?: Clock): Promise<TestServer> {
  const config = parseConfig({
    password: PASSWORD,
    session_store: { type: 'memory' },
    log_views: {
      Uptime: { cmd: 'uptime', refresh: 0 },
      Ticker: { cmd: 'date', refresh: 0.05 },
      Broken: 'false'
    }
  });
  const store = new MemorySessionStore(policyFromConfig(config), clock);
  const renderView = vi.fn<VaultContext['renderView']>(async name => {
    if (name === 'Broken') {
      throw new Error('boom');
    }
    return `output of ${name}`;
  });
  const ctx: VaultContext = { config, store, renderView };

  const vault = createVaultServer(ctx);
  const server: net.Server = vault.server;
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server has no port');
  }

  return {
    ctx,
    vault,
    baseUrl: `http://127.0.0.1:${address.port}`,
    renderView,
    async close() {
      for (const client of vault.wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        vault.wss.close(err => (err ? reject(err) : resolve()));
      });
      vault.server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
    }
  };
}

/**
 * Log in and return the `name=value` part of the session cookie.
 */
export async function login(baseUrl: string): Promise<string> {
  const res = await fetch(`${baseUrl}/?action=login`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ password: PASSWORD }).toString()
  });
  const cookie = res.headers.get('set-cookie');
  if (!cookie) {
    throw new Error('Login did not set a cookie');
  }
  return cookie.split(';')[0];
}
