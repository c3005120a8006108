import express, { type Express, type Request, type Response, type ErrorRequestHandler } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { MockParams, MockServerConfig } from '../types/index.js';
import type { MockStore } from '../storage/base.js';
import { createStore } from '../storage/factory.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { ReloadableConfig } from '../config/hot-reload.js';
import { errorMessage, httpStatusFor } from '../errors/index.js';
import { CHARSETS, CONTENT_TYPES, STATUS_CODES } from '../reference/index.js';
import { NAME, VERSION } from '../version.js';
import { MockService, type Mocker } from './mocker.js';
import { ResponseWriter } from './response-writer.js';
import { isAbortError } from './delay.js';

export interface RequestLog {
  method: string;
  path: string;
}

export interface ResponseLog extends RequestLog {
  status: number;
  durationMs: number;
}

export interface MockServerEvents {
  onRequest?: (req: RequestLog) => void;
  onResponse?: (res: ResponseLog) => void;
  onError?: (error: unknown, context: string) => void;
  /** Records evicted by retention after a create */
  onClean?: (removed: number) => void;
  onStart?: (address: AddressInfo) => void;
  onStop?: () => void;
}

export interface MockServerDeps {
  /** Replaces the store-backed MockService, e.g. with a test double */
  mocker?: Mocker;
}

export const ENDPOINTS = [
  'GET /',
  'GET /__health',
  'GET /static/content-types',
  'GET /static/charsets',
  'GET /static/status-codes',
  'GET /v1/list',
  'POST /v1/new',
  'GET /v1/:id',
];

/**
 * Query values as strings; the simple query parser never nests
 */
function toParams(query: Request['query']): MockParams {
  const params: MockParams = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') {
      params[key] = value;
    } else if (Array.isArray(value)) {
      params[key] = value.filter((v): v is string => typeof v === 'string');
    }
  }
  return params;
}

function statusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

export class MockServer {
  private config: MockServerConfig;
  private app: Express;
  private server: Server | null = null;
  private store: MockStore | null;
  private mocker: Mocker;
  private writer: ResponseWriter;
  private events: MockServerEvents;
  private pending: Set<AbortController> = new Set();
  private isRunning = false;
  private stopping = false;

  constructor(config: Partial<MockServerConfig> = {}, events: MockServerEvents = {}, deps: MockServerDeps = {}) {
    this.config = {
      port: config.port ?? DEFAULT_CONFIG.port,
      host: config.host ?? DEFAULT_CONFIG.host,
      storage: config.storage ?? DEFAULT_CONFIG.storage,
      cors: config.cors ?? DEFAULT_CONFIG.cors,
      delay: config.delay ?? DEFAULT_CONFIG.delay,
      retention: config.retention ?? DEFAULT_CONFIG.retention,
      bodyLimit: config.bodyLimit ?? DEFAULT_CONFIG.bodyLimit,
    };

    this.events = events;
    this.app = express();
    this.writer = new ResponseWriter(this.config.delay.max);

    if (deps.mocker) {
      this.store = null;
      this.mocker = deps.mocker;
    } else {
      const store = createStore(this.config.storage);
      this.store = store;
      this.mocker = new MockService(store, {
        onCleanError: (id, error) => this.events.onError?.(error, `clean ${id}`),
      });
    }

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    // Repeated keys become arrays, nothing nests: parameter names are kept verbatim as header names
    this.app.set('query parser', 'simple');
    this.app.disable('x-powered-by');

    if (this.config.cors?.enabled) {
      const corsOptions: cors.CorsOptions = {
        origin: this.config.cors.origins ?? true,
        methods: ['GET', 'POST', 'OPTIONS'],
      };
      this.app.use(cors(corsOptions));
    }

    // Request logging hooks
    this.app.use((req, res, next) => {
      const startedAt = Date.now();
      const log: RequestLog = { method: req.method, path: req.path };
      this.events.onRequest?.(log);
      res.on('finish', () => {
        this.events.onResponse?.({ ...log, status: res.statusCode, durationMs: Date.now() - startedAt });
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ name: NAME, version: VERSION, endpoints: ENDPOINTS });
    });

    this.app.get('/__health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', uptime: process.uptime() });
    });

    this.app.get('/static/content-types', (_req: Request, res: Response) => {
      res.json(CONTENT_TYPES);
    });

    this.app.get('/static/charsets', (_req: Request, res: Response) => {
      res.json(CHARSETS);
    });

    this.app.get('/static/status-codes', (_req: Request, res: Response) => {
      res.json(Object.fromEntries(STATUS_CODES));
    });

    this.app.get('/v1/list', async (_req: Request, res: Response) => {
      try {
        res.json(await this.mocker.list());
      } catch (error) {
        this.sendError(res, error, 'list');
      }
    });

    this.app.post(
      '/v1/new',
      express.raw({ type: () => true, limit: this.config.bodyLimit }),
      async (req: Request, res: Response) => {
        const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

        let id: string;
        try {
          id = await this.mocker.create(toParams(req.query), body);
        } catch (error) {
          this.sendError(res, error, 'new');
          return;
        }

        res.json({ uuid: id });
        await this.enforceRetention();
      }
    );

    this.app.get('/v1/:id', async (req: Request, res: Response) => {
      const controller = new AbortController();
      const abort = (): void => controller.abort();
      // Fires on client disconnect; after a finished response it is a no-op
      res.on('close', abort);
      this.pending.add(controller);

      try {
        const record = await this.mocker.get(req.params.id);
        const delay = typeof req.query.delay === 'string' ? req.query.delay : undefined;
        await this.writer.write(res, record, delay, controller.signal);
      } catch (error) {
        if (!isAbortError(error)) {
          this.sendError(res, error, `get ${req.params.id}`);
        } else if (this.stopping && !res.headersSent) {
          res.set('Connection', 'close').status(503).json({ message: 'server is shutting down' });
        }
      } finally {
        this.pending.delete(controller);
        res.off('close', abort);
      }
    });

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ message: 'not found' });
    });

    const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
      // body-parser failures carry their own status (413, 400)
      const status = statusOf(error);
      if (status !== null && status >= 400 && status < 500) {
        res.status(status).json({ message: errorMessage(error) });
        return;
      }
      this.sendError(res, error, 'request');
    };
    this.app.use(errorHandler);
  }

  /**
   * Answer a failed operation with `{ message }` and the mapped status
   */
  private sendError(res: Response, error: unknown, context: string): void {
    const status = httpStatusFor(error);
    if (status === 500) {
      this.events.onError?.(error, context);
      res.status(500).json({ message: 'internal error' });
      return;
    }
    res.status(status).json({ message: errorMessage(error) });
  }

  /**
   * Evict the oldest mocks beyond the retention limit, if one is set
   */
  private async enforceRetention(): Promise<void> {
    const limit = this.config.retention.maxRecords;
    if (limit < 1) return;

    try {
      const removed = await this.mocker.clean(limit);
      if (removed > 0) {
        this.events.onClean?.(removed);
      }
    } catch (error) {
      this.events.onError?.(error, 'retention');
    }
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    await this.store?.init();
    await this.enforceRetention();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.isRunning = true;
        this.stopping = false;
        const address = this.address();
        if (address) {
          this.events.onStart?.(address);
        }
        resolve();
      });

      server.on('error', (error) => {
        this.isRunning = false;
        reject(error);
      });

      this.server = server;
    });
  }

  /**
   * Stop the server; pending delayed responses are cut short
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.isRunning || !server) {
      return;
    }

    this.stopping = true;
    for (const controller of this.pending) {
      controller.abort();
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    this.isRunning = false;
    this.server = null;
    this.store?.close();
    this.events.onStop?.();
  }

  /**
   * Apply settings that can change while serving
   */
  applyConfig(update: ReloadableConfig): void {
    if (update.delay) {
      this.config.delay = { ...update.delay };
      this.writer.setMaxDelay(update.delay.max);
    }
    if (update.retention) {
      this.config.retention = { ...update.retention };
    }
  }

  /**
   * Bound address, once listening
   */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Replay requests still waiting out their delay
   */
  inFlight(): number {
    return this.pending.size;
  }

  getConfig(): MockServerConfig {
    return { ...this.config };
  }

  getMocker(): Mocker {
    return this.mocker;
  }

  running(): boolean {
    return this.isRunning;
  }

  /**
   * Get the Express app instance (for advanced usage)
   */
  getApp(): Express {
    return this.app;
  }
}
