/**
 * Express REST API Server
 * Provides the auth, blog, contact, plans and diagnostic endpoints
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { statusForError, ValidationError, type ServiceError } from '../errors.js';
import {
  BlogCreatePayloadSchema,
  BlogListQuerySchema,
  ContactPayloadSchema,
  LoginPayloadSchema,
  SignupPayloadSchema,
  parseWith,
} from '../schemas/index.js';
import type { DocumentStore } from '../storage/index.js';
import {
  AuthService,
  BlogService,
  ContactService,
  listPlans,
  runDiagnostics,
} from '../services/index.js';
import type { CreatedResponse, ErrorResponse, LoginResponse } from '../types/index.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  /** Raw DATABASE_URL, reported by the diagnostic endpoint */
  databaseUrl?: string;
  /** Raw DATABASE_NAME, reported by the diagnostic endpoint */
  databaseName?: string;
}

export interface ServerDependencies {
  /** Shared persistence handle; null when no database is configured */
  store: DocumentStore | null;
}

/** Largest accepted JSON request body */
export const JSON_BODY_LIMIT = '1mb';

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'type' in error
    && error.type === 'entity.parse.failed';
}

/**
 * Client errors raised by the body parser (413 too large, 415 unsupported charset)
 * carry their own status and a message that is safe to expose.
 */
function bodyClientError(error: unknown): { status: number; message: string } | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if (!('status' in error) || typeof error.status !== 'number' || error.status < 400 || error.status > 499) {
    return null;
  }
  if (!('message' in error) || typeof error.message !== 'string') {
    return null;
  }
  return { status: error.status, message: error.message };
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private store: DocumentStore | null;
  private auth: AuthService;
  private blog: BlogService;
  private contact: ContactService;

  constructor(deps: ServerDependencies, config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 8000,
      host: '0.0.0.0',
      ...config,
    };

    this.store = deps.store;
    this.auth = new AuthService(deps.store);
    this.blog = new BlogService(deps.store);
    this.contact = new ContactService(deps.store);

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  private sendError(res: Response, error: ServiceError): void {
    const status = statusForError(error);
    if (error.kind === 'backend') {
      console.error('Backend error:', error.message);
    }

    const body: ErrorResponse = { error: error.message };
    if (error instanceof ValidationError) {
      body.details = error.issues;
    }
    res.status(status).json(body);
  }

  private sendCreated(res: Response, id: string): void {
    const body: CreatedResponse = { ok: true, id };
    res.json(body);
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    // Reflect any origin; a literal '*' is not allowed alongside credentials
    this.app.use(cors({
      origin: true,
      credentials: true,
    }));
    this.app.use(express.json({ limit: JSON_BODY_LIMIT }));
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({ message: 'SaaS Backend Running' });
    });

    // Pricing plans
    this.app.get('/api/plans', (_req: Request, res: Response) => {
      res.json(listPlans());
    });

    // ----------------------------------------
    // Auth
    // ----------------------------------------

    this.app.post('/api/auth/signup', (req: Request, res: Response) => {
      const payload = parseWith(SignupPayloadSchema, req.body);
      if (!payload.ok) {
        return this.sendError(res, payload.error);
      }

      const result = this.auth.signup(payload.value);
      if (!result.ok) {
        return this.sendError(res, result.error);
      }
      this.sendCreated(res, result.value);
    });

    this.app.post('/api/auth/login', (req: Request, res: Response) => {
      const payload = parseWith(LoginPayloadSchema, req.body);
      if (!payload.ok) {
        return this.sendError(res, payload.error);
      }

      const result = this.auth.login(payload.value);
      if (!result.ok) {
        return this.sendError(res, result.error);
      }
      const body: LoginResponse = { ok: true, message: 'Logged in' };
      res.json(body);
    });

    // ----------------------------------------
    // Blog
    // ----------------------------------------

    this.app.post('/api/blog', (req: Request, res: Response) => {
      const payload = parseWith(BlogCreatePayloadSchema, req.body);
      if (!payload.ok) {
        return this.sendError(res, payload.error);
      }

      const result = this.blog.create(payload.value);
      if (!result.ok) {
        return this.sendError(res, result.error);
      }
      this.sendCreated(res, result.value);
    });

    this.app.get('/api/blog', (req: Request, res: Response) => {
      const query = parseWith(BlogListQuerySchema, req.query);
      if (!query.ok) {
        return this.sendError(res, query.error);
      }

      const result = this.blog.listPublished(query.value.limit);
      if (!result.ok) {
        return this.sendError(res, result.error);
      }
      res.json(result.value);
    });

    // ----------------------------------------
    // Contact
    // ----------------------------------------

    this.app.post('/api/contact', (req: Request, res: Response) => {
      const payload = parseWith(ContactPayloadSchema, req.body);
      if (!payload.ok) {
        return this.sendError(res, payload.error);
      }

      const result = this.contact.submit(payload.value);
      if (!result.ok) {
        return this.sendError(res, result.error);
      }
      this.sendCreated(res, result.value);
    });

    // Database connectivity diagnostic
    this.app.get('/test', (_req: Request, res: Response) => {
      res.json(runDiagnostics(this.store, {
        databaseUrl: this.config.databaseUrl,
        databaseName: this.config.databaseName,
      }));
    });

    this.app.use((_req: Request, res: Response) => {
      const body: ErrorResponse = { error: 'Not found' };
      res.status(404).json(body);
    });

    // Error handler
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isBodyParseError(err)) {
        const body: ErrorResponse = { error: 'Malformed JSON body' };
        res.status(400).json(body);
        return;
      }
      const clientError = bodyClientError(err);
      if (clientError) {
        const body: ErrorResponse = { error: clientError.message };
        res.status(clientError.status).json(body);
        return;
      }
      console.error('API Error:', err);
      const body: ErrorResponse = { error: 'Internal server error' };
      res.status(500).json(body);
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }
}
