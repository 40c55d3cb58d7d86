/**
 * Admin Server - HTTP interface for the password gate
 *
 * Provides:
 * - Word-list administration (push, pop, list)
 * - Password evaluation endpoint
 * - Health and Prometheus-style metrics
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import pino from 'pino';

import { PasswordEvaluator } from '../evaluator/password-evaluator.js';
import { defaultMessageLookup, describeRejection, type MessageLookup } from '../evaluator/messages.js';
import type { EvaluateOptions, RejectionKind } from '../evaluator/types.js';
import { WordlistRegistry } from '../registry/wordlist-registry.js';
import { DEFAULT_MIN_LENGTH } from '../shared/config.js';

const isProd = process.env['NODE_ENV'] === 'production';
const logger = pino({
  name: 'gate:admin',
  level: process.env['LOG_LEVEL'] || (isProd ? 'info' : 'debug'),
});

// ─── Configuration ───────────────────────────────────────────

export interface AdminServerConfig {
  port: number;
  host: string;
  /** Registry to administer. Default: a fresh registry on the bundled list. */
  registry?: WordlistRegistry;
  /** Default minimum length for /api/evaluate. */
  minLength?: number;
  /** Rejection message lookup. */
  messages?: MessageLookup;
  /** Origins allowed cross-origin access. Default: none (no CORS headers). */
  corsOrigins?: string[];
  /** Enable request logging (default: true) */
  requestLogging?: boolean;
}

export const DEFAULT_ADMIN_CONFIG: AdminServerConfig = {
  port: 3848,
  host: '127.0.0.1',
};

interface EvaluationMetrics {
  total: number;
  accepted: number;
  rejected: Record<RejectionKind, number>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

// ─── Admin Server Class ──────────────────────────────────────

export class AdminServer {
  private app: express.Application;
  private config: AdminServerConfig;
  private registry: WordlistRegistry;
  private evaluator: PasswordEvaluator;
  private messages: MessageLookup;
  private server?: Server;
  private startedAt = 0;
  private requestCount = 0;
  private isShuttingDown = false;
  private metrics: EvaluationMetrics = {
    total: 0,
    accepted: 0,
    rejected: { too_short: 0, weak_password: 0 },
  };

  constructor(config: Partial<AdminServerConfig> = {}) {
    this.config = { ...DEFAULT_ADMIN_CONFIG, ...config };

    this.app = express();
    this.registry = this.config.registry ?? new WordlistRegistry();
    this.registry.initialize();
    this.evaluator = new PasswordEvaluator({
      registry: this.registry,
      minLength: this.config.minLength ?? DEFAULT_MIN_LENGTH,
    });
    this.messages = this.config.messages ?? defaultMessageLookup;

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ─── Middleware ────────────────────────────────────────────

  private setupMiddleware(): void {
    const corsOrigins = this.config.corsOrigins;
    if (corsOrigins && corsOrigins.length > 0) {
      this.app.use(cors({ origin: corsOrigins }));
    }
    this.app.use(express.json());

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.requestCount++;
      if (this.config.requestLogging !== false) {
        logger.debug({ method: req.method, path: req.path }, 'Request');
      }
      next();
    });
  }

  // ─── Routes ────────────────────────────────────────────────

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting_down' });
        return;
      }
      res.json({
        status: 'ok',
        uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/metrics', (_req, res) => {
      const uptimeMs = this.startedAt > 0 ? Date.now() - this.startedAt : 0;
      const health = this.registry.getHealth();

      const metrics = [
        '# HELP password_gate_uptime_seconds Server uptime in seconds',
        '# TYPE password_gate_uptime_seconds gauge',
        `password_gate_uptime_seconds ${Math.floor(uptimeMs / 1000)}`,
        '',
        '# HELP password_gate_http_requests_total Total HTTP requests served',
        '# TYPE password_gate_http_requests_total counter',
        `password_gate_http_requests_total ${this.requestCount}`,
        '',
        '# HELP password_gate_evaluations_total Total passwords evaluated',
        '# TYPE password_gate_evaluations_total counter',
        `password_gate_evaluations_total ${this.metrics.total}`,
        '',
        '# HELP password_gate_accepted_total Passwords accepted',
        '# TYPE password_gate_accepted_total counter',
        `password_gate_accepted_total ${this.metrics.accepted}`,
        '',
        '# HELP password_gate_rejected_total Passwords rejected, by reason',
        '# TYPE password_gate_rejected_total counter',
        `password_gate_rejected_total{reason="too_short"} ${this.metrics.rejected.too_short}`,
        `password_gate_rejected_total{reason="weak_password"} ${this.metrics.rejected.weak_password}`,
        '',
        '# HELP password_gate_wordlists_count Registered word lists',
        '# TYPE password_gate_wordlists_count gauge',
        `password_gate_wordlists_count ${health.listCount}`,
        '',
        '# HELP password_gate_words_count Words across all lists',
        '# TYPE password_gate_words_count gauge',
        `password_gate_words_count ${health.wordCount}`,
      ].join('\n');

      res.set('Content-Type', 'text/plain; version=0.0.4');
      res.send(metrics);
    });

    // ─── Word Lists ──────────────────────────────────────────

    this.app.get('/api/wordlists', (_req, res) => {
      try {
        res.json({ wordlists: this.registry.listWordlists() });
      } catch (error) {
        logger.error({ error }, 'Failed to list wordlists');
        res.status(500).json({ error: 'Failed to list wordlists' });
      }
    });

    this.app.post('/api/wordlists', (req, res) => {
      try {
        const body: unknown = req.body;
        const rawKey = isRecord(body) ? body['key'] : undefined;
        if (typeof rawKey !== 'string' || rawKey.trim() === '') {
          res.status(400).json({ error: 'A non-empty key is required' });
          return;
        }
        const words = isRecord(body) ? body['words'] : undefined;
        if (!isStringArray(words)) {
          res.status(400).json({ error: 'words must be an array of strings' });
          return;
        }

        const key = rawKey.trim();
        if (key === this.registry.getDefaultKey()) {
          res.status(409).json({ error: 'The default wordlist cannot be replaced' });
          return;
        }

        this.registry.add(key, words);
        res.status(201).json({ key, wordCount: this.registry.getWordCount(key) });
      } catch (error) {
        logger.error({ error }, 'Failed to add wordlist');
        res.status(500).json({ error: 'Failed to add wordlist' });
      }
    });

    this.app.delete('/api/wordlists/:key', (req, res) => {
      try {
        const key = req.params.key;
        if (key === this.registry.getDefaultKey()) {
          res.status(409).json({ error: 'The default wordlist cannot be removed' });
          return;
        }
        if (!this.registry.has(key)) {
          res.status(404).json({ error: 'Wordlist not found' });
          return;
        }

        this.registry.remove(key);
        res.json({ removed: true });
      } catch (error) {
        logger.error({ error }, 'Failed to remove wordlist');
        res.status(500).json({ error: 'Failed to remove wordlist' });
      }
    });

    // ─── Evaluation ──────────────────────────────────────────

    this.app.post('/api/evaluate', (req, res) => {
      try {
        const body: unknown = req.body;
        const password = isRecord(body) ? body['password'] : undefined;
        if (typeof password !== 'string') {
          res.status(400).json({ error: 'password is required' });
          return;
        }
        const rawMinLength = isRecord(body) ? body['minLength'] : undefined;
        const options: EvaluateOptions = {};
        if (rawMinLength !== undefined) {
          if (typeof rawMinLength !== 'number' || !Number.isInteger(rawMinLength) || rawMinLength < 1) {
            res.status(400).json({ error: 'minLength must be a positive integer' });
            return;
          }
          options.minLength = rawMinLength;
        }

        const result = this.evaluator.evaluate(password, options);
        this.recordOutcome(result.status === 'accepted' ? null : result.reason.kind);

        res.json({ result, message: describeRejection(result, this.messages) });
      } catch (error) {
        logger.error({ error }, 'Failed to evaluate password');
        res.status(500).json({ error: 'Failed to evaluate password' });
      }
    });
  }

  private recordOutcome(rejection: RejectionKind | null): void {
    this.metrics.total++;
    if (rejection === null) {
      this.metrics.accepted++;
    } else {
      this.metrics.rejected[rejection]++;
    }
    logger.debug({ outcome: rejection ?? 'accepted' }, 'Password evaluated');
  }

  // ─── Lifecycle ─────────────────────────────────────────────

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = this.app.listen(this.config.port, this.config.host, (error?: Error) => {
        if (error) {
          this.server = undefined;
          logger.error({ error }, 'Admin server failed to start');
          reject(error);
          return;
        }
        this.startedAt = Date.now();
        logger.info({ host: this.config.host, port: this.getPort() }, 'Admin server started');
        resolve();
      });
    });
  }

  /**
   * Gracefully stop the server.
   * Sets shutting down flag first, then closes connections.
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      logger.info('Initiating graceful shutdown...');
      this.isShuttingDown = true;

      const forceShutdownTimeout = setTimeout(() => {
        logger.warn('Force closing server after timeout');
        server.closeAllConnections();
        resolve();
      }, 5000);

      server.close((err) => {
        clearTimeout(forceShutdownTimeout);
        this.server = undefined;
        if (err) {
          logger.error({ error: err }, 'Error during shutdown');
          reject(err);
        } else {
          logger.info('Server stopped gracefully');
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== undefined && !this.isShuttingDown;
  }

  /** Bound port once started (resolves port 0), configured port otherwise. */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  getRegistry(): WordlistRegistry {
    return this.registry;
  }
}

export default AdminServer;
