/**
 * WebSocket Output Stream
 *
 * `/stream` pushes a view's rendered output to the browser on the view's
 * refresh interval. The upgrade request must carry a valid session cookie,
 * and the session is re-validated before every run.
 *
 * Client -> server:
 *   { "type": "subscribe", "view": "Syslog" }
 *   { "type": "unsubscribe" }
 *
 * Server -> client:
 *   { "type": "output", "view": "Syslog", "data": "...", "refresh": 30 }
 *   { "type": "error", "data": "..." }
 *   { "type": "unauthorized" }
 *
 * @module vipervault/stream
 */

import type * as http from 'http';
import type * as https from 'https';
import WebSocket, { WebSocketServer } from 'ws';
import { z } from 'zod';
import { getSessionToken } from './auth';
import type { VaultContext } from './context';

export const STREAM_PATH = '/stream';
export const UNAUTHORIZED_MESSAGE = 'Unauthorized: Invalid or expired session.';
export const INVALID_VIEW_MESSAGE = 'Invalid or missing log view selection.';

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), view: z.string() }),
  z.object({ type: z.literal('unsubscribe') })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessage =
  | { type: 'output'; view: string; data: string; refresh: number }
  | { type: 'error'; data: string }
  | { type: 'unauthorized' };

// ============================================================================
// Stream Session
// ============================================================================

class StreamSession {
  private timer: NodeJS.Timeout | null = null;
  /** Bumped on every (un)subscribe so stale runs drop their result. */
  private generation = 0;
  private closed = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly token: string | null,
    private readonly ctx: VaultContext
  ) {}

  send(msg: ServerMessage): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    }
  }

  subscribe(name: string): void {
    this.unsubscribe();
    const view = this.ctx.config.log_views.get(name);
    if (!view) {
      this.send({ type: 'error', data: INVALID_VIEW_MESSAGE });
      return;
    }
    this.run(name, this.generation);
  }

  unsubscribe(): void {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  close(): void {
    this.closed = true;
    this.unsubscribe();
  }

  private run(name: string, generation: number): void {
    this.tick(name, generation).catch(err => {
      console.error('[stream] run failed:', err);
      this.send({ type: 'error', data: `Error executing command: ${err instanceof Error ? err.message : String(err)}` });
    });
  }

  private async tick(name: string, generation: number): Promise<void> {
    this.timer = null;
    if (!(await this.ctx.store.validate(this.token))) {
      this.send({ type: 'unauthorized' });
      this.ws.close(1008, 'Session expired');
      return;
    }

    const view = this.ctx.config.log_views.get(name);
    if (!view) return;

    const data = await this.ctx.renderView(name, view);
    if (this.closed || generation !== this.generation) return;

    this.send({ type: 'output', view: name, data, refresh: view.refresh });

    if (view.refresh > 0) {
      this.timer = setTimeout(() => this.run(name, generation), view.refresh * 1000);
    }
  }
}

// ============================================================================
// Server
// ============================================================================

function parseClientMessage(data: WebSocket.RawData): ClientMessage | null {
  try {
    const parsed = ClientMessageSchema.safeParse(JSON.parse(data.toString()));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function handleConnection(ws: WebSocket, req: http.IncomingMessage, ctx: VaultContext): void {
  const token = getSessionToken(req);
  const session = new StreamSession(ws, token, ctx);
  // Messages that arrive before the check finishes wait for it.
  const authorized = ctx.store.validate(token);

  authorized.then(ok => {
    if (!ok) {
      session.send({ type: 'error', data: UNAUTHORIZED_MESSAGE });
      ws.close(1008, 'Authentication required');
      return;
    }
    console.log(`[stream] client connected from ${req.socket.remoteAddress ?? 'unknown'}`);
  }).catch(err => {
    console.error('[stream] session check failed:', err);
    ws.close(1011, 'Internal error');
  });

  ws.on('message', (data: WebSocket.RawData) => {
    authorized.then(ok => {
      if (!ok) return;

      const msg = parseClientMessage(data);
      if (!msg) {
        session.send({ type: 'error', data: 'Malformed message' });
        return;
      }

      if (msg.type === 'subscribe') {
        session.subscribe(msg.view);
      } else {
        session.unsubscribe();
      }
    }).catch(err => {
      console.error('[stream] message error:', err);
    });
  });

  ws.on('close', () => {
    session.close();
  });
}

/**
 * Attach the `/stream` WebSocket endpoint to an HTTP(S) server.
 */
export function attachStreamServer(server: http.Server | https.Server, ctx: VaultContext): WebSocketServer {
  const wss = new WebSocketServer({ server, path: STREAM_PATH });
  wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => handleConnection(ws, req, ctx));
  wss.on('error', (err: Error) => {
    console.error('[stream] server error:', err);
  });
  return wss;
}
