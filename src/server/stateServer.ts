/**
 * State Server - HTTP + WebSocket server for one reflective instance
 *
 * Exposes the instance through:
 * - REST API for reading state and type info, updating members, calling methods
 * - WebSocket for live state updates and edits
 */

import express, { type ErrorRequestHandler, type Request, type Response, type NextFunction } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import { NotFound, isReflectionError, type JsonValue, type ReflectiveFacade } from '../reflect';
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from '../config';
import { MalformedCommand, StateSession, errorEvent, parseArgs } from './stateSession';
import type { IStateService, ServerEvent, StateDocument, TypeDocument } from './stateService';

/** Status carried by express's own errors, such as a body that is not JSON. */
function httpStatusOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'status' in e && typeof e.status === 'number') {
    return e.status >= 400 && e.status < 500 ? e.status : undefined;
  }
  return undefined;
}

function statusFor(e: unknown): number {
  if (e instanceof NotFound) return 404;
  if (isReflectionError(e) || e instanceof MalformedCommand) return 400;
  return httpStatusOf(e) ?? 500;
}

function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.prototype.hasOwnProperty.call(body, key) ? Reflect.get(body, key) : undefined;
}

export class StateServer implements IStateService {
  readonly session: StateSession;
  private readonly config: ServerConfig;
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private clients = new Set<WebSocket>();
  private refreshTimer: NodeJS.Timeout | undefined;

  constructor(target: ReflectiveFacade, config: Partial<ServerConfig> = {}) {
    this.config = { ...DEFAULT_SERVER_CONFIG, ...config };
    this.session = new StateSession(target);
    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: this.config.wsPath });

    this.setupRoutes();
    this.app.use(this.errorMiddleware);
    this.setupWebSocket();
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.config.port;
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', this.config.corsOrigin);
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  private errorMiddleware: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    this.sendError(res, err);
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    // Minimal live-editing page
    app.use(express.static(this.config.staticDir));

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', clients: this.clients.size });
    });

    app.get('/api/object', (_req, res) => {
      try {
        res.json(this.getState());
      } catch (e) {
        this.sendError(res, e);
      }
    });

    app.get('/api/type', (_req, res) => {
      try {
        res.json(this.getType());
      } catch (e) {
        this.sendError(res, e);
      }
    });

    app.post('/api/object/members/:name', (req, res) => {
      try {
        const body: unknown = req.body;
        const state = this.updateMember(req.params.name, bodyField(body, 'value'));
        res.json(state);
      } catch (e) {
        this.sendError(res, e);
      }
    });

    app.post('/api/object/methods/:name', (req, res) => {
      try {
        const body: unknown = req.body;
        const args = parseArgs(bodyField(body, 'args')) ?? [];
        res.json({ result: this.invokeMethod(req.params.name, args) });
      } catch (e) {
        this.sendError(res, e);
      }
    });
  }

  private sendError(res: Response, e: unknown) {
    const event = errorEvent(e);
    if (event.type === 'error') {
      res.status(statusFor(e)).json({ error: event.message, code: event.code });
    }
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      console.log(`[state-server] client connected (${this.clients.size} total)`);

      ws.send(JSON.stringify(this.stateEvent()));

      ws.on('message', (data) => {
        const { reply, stateChanged } = this.session.handleMessage(data.toString());
        ws.send(JSON.stringify(reply));
        if (stateChanged) {
          this.broadcast(this.stateEvent());
        }
      });

      ws.on('close', () => {
        this.clients.delete(ws);
        console.log(`[state-server] client disconnected (${this.clients.size} total)`);
      });

      ws.on('error', (err) => {
        console.error(`[state-server] socket error: ${err.message}`);
      });
    });
  }

  private stateEvent(): ServerEvent {
    const event = this.session.stateEvent();
    if (event.type === 'error') {
      console.error(`[state-server] cannot read state: ${event.message}`);
    }
    return event;
  }

  private broadcast(event: ServerEvent) {
    const msg = JSON.stringify(event);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  }

  /**
   * Push state to all clients when the instance changed outside the server.
   */
  refresh(): boolean {
    if (this.clients.size === 0 || !this.session.hasChanged()) return false;
    this.broadcast(this.stateEvent());
    return true;
  }

  // ─────────────────────────────────────────────────────────────
  // IStateService IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  getState(): StateDocument {
    return this.session.getState();
  }

  getType(): TypeDocument {
    return this.session.getType();
  }

  updateMember(field: string, value: unknown): StateDocument {
    const state = this.session.updateMember(field, value);
    this.broadcast(this.stateEvent());
    return state;
  }

  invokeMethod(name: string, args: unknown[] = []): JsonValue {
    const result = this.session.invokeMethod(name, args);
    this.broadcast(this.stateEvent());
    return result;
  }

  // ─────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        if (this.config.refreshIntervalMs > 0) {
          this.refreshTimer = setInterval(() => this.refresh(), this.config.refreshIntervalMs);
          this.refreshTimer.unref();
        }
        console.log(`\nReflectKit state server running at http://localhost:${this.port}`);
        console.log(`   WebSocket: ws://localhost:${this.port}${this.config.wsPath}`);
        console.log(`   API: http://localhost:${this.port}/api/object`);
        console.log(`   Health: http://localhost:${this.port}/health\n`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
    return new Promise((resolve) => {
      for (const client of this.clients) {
        client.close(1001, 'Server shutting down');
      }
      this.wss.close();
      this.server.close(() => resolve());
    });
  }
}

