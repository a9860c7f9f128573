import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { setTimeout as delay } from 'timers/promises';
import WebSocket from 'ws';
import { parseCookies, SESSION_COOKIE } from '../auth';
import { login, startTestServer, type TestServer } from './test-server';

let srv: TestServer;

beforeAll(async () => {
  srv = await startTestServer();
});

afterAll(async () => {
  await srv.close();
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Queues server messages so none are missed between awaits.
 */
class StreamClient {
  private readonly queue: unknown[] = [];
  private readonly waiters: Array<(msg: unknown) => void> = [];
  readonly closed: Promise<number>;

  constructor(readonly ws: WebSocket) {
    ws.on('message', (data: WebSocket.RawData) => {
      const msg: unknown = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(msg);
      } else {
        this.queue.push(msg);
      }
    });
    this.closed = new Promise(resolve => {
      ws.on('close', (code: number) => resolve(code));
    });
  }

  next(): Promise<unknown> {
    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift());
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  /** Messages received but not yet taken with `next()`. */
  pending(): unknown[] {
    return [...this.queue];
  }

  send(msg: unknown): void {
    this.ws.send(JSON.stringify(msg));
  }

  async close(): Promise<void> {
    this.ws.close();
    await this.closed;
  }
}

async function connect(cookie?: string): Promise<StreamClient> {
  const ws = new WebSocket(`${srv.baseUrl.replace('http', 'ws')}/stream`, {
    headers: cookie ? { Cookie: cookie } : {}
  });
  const client = new StreamClient(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
  return client;
}

function isOutputFor(msg: unknown, view: string): boolean {
  return typeof msg === 'object' && msg !== null && 'type' in msg && msg.type === 'output' &&
    'view' in msg && msg.view === view;
}

function tickerRuns(): number {
  return srv.renderView.mock.calls.filter(([name]) => name === 'Ticker').length;
}

describe('/stream', () => {
  it('closes an unauthenticated connection', async () => {
    const client = await connect();

    expect(await client.next()).toEqual({ type: 'error', data: 'Unauthorized: Invalid or expired session.' });
    expect(await client.closed).toBe(1008);
  });

  it('sends the output of a subscribed view', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Uptime' });

    expect(await client.next()).toEqual({ type: 'output', view: 'Uptime', data: 'output of Uptime', refresh: 0 });
    await client.close();
  });

  it('re-runs the view on its refresh interval', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Ticker' });

    const expected = { type: 'output', view: 'Ticker', data: 'output of Ticker', refresh: 0.05 };
    expect(await client.next()).toEqual(expected);
    expect(await client.next()).toEqual(expected);
    await client.close();
  });

  it('replaces the previous subscription', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Ticker' });
    expect(isOutputFor(await client.next(), 'Ticker')).toBe(true);

    client.send({ type: 'subscribe', view: 'Uptime' });
    // a Ticker run already on the wire may still arrive first
    let msg = await client.next();
    while (isOutputFor(msg, 'Ticker')) {
      msg = await client.next();
    }

    expect(msg).toEqual({ type: 'output', view: 'Uptime', data: 'output of Uptime', refresh: 0 });
    await delay(250);
    expect(client.pending()).toEqual([]);
    await client.close();
  });

  it('stops sending after unsubscribe', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Ticker' });
    expect(isOutputFor(await client.next(), 'Ticker')).toBe(true);
    client.send({ type: 'unsubscribe' });
    await delay(100);

    const runs = tickerRuns();
    const received = client.pending().length;
    await delay(250);

    expect(received).toBeLessThanOrEqual(1);
    expect(tickerRuns()).toBe(runs);
    expect(client.pending()).toHaveLength(received);
    await client.close();
  });

  it('stops running the view once the client disconnects', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Ticker' });
    expect(isOutputFor(await client.next(), 'Ticker')).toBe(true);
    await client.close();
    await delay(100);

    const runs = tickerRuns();
    await delay(250);

    expect(tickerRuns()).toBe(runs);
  });

  it('rejects an unknown view', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Nope' });

    expect(await client.next()).toEqual({ type: 'error', data: 'Invalid or missing log view selection.' });
    await client.close();
  });

  it('rejects a malformed message', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.ws.send('not json');

    expect(await client.next()).toEqual({ type: 'error', data: 'Malformed message' });
    await client.close();
  });

  it('reports a failure to render', async () => {
    const client = await connect(await login(srv.baseUrl));

    client.send({ type: 'subscribe', view: 'Broken' });

    expect(await client.next()).toEqual({ type: 'error', data: 'Error executing command: boom' });
    await client.close();
  });

  it('stops once the session ends', async () => {
    const cookie = await login(srv.baseUrl);
    const client = await connect(cookie);

    client.send({ type: 'subscribe', view: 'Ticker' });
    expect(await client.next()).toMatchObject({ type: 'output', view: 'Ticker' });

    await srv.ctx.store.destroy(parseCookies(cookie).get(SESSION_COOKIE));

    expect(await client.next()).toEqual({ type: 'unauthorized' });
    expect(await client.closed).toBe(1008);
  });
});

