/**
 * Web Server - Express HTTP surface of the session bridge
 *
 * Provides:
 * - Session controls (start/stop/status)
 * - File-backed state queries and the workout id command
 * - cv-frame streaming over Server-Sent Events
 * - Recent session log entries
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { isSessionLogCategory } from '../logging/session-logger';
import { SessionService } from '../session/session-service';
import { createSessionControlsRoutes } from './routes/session-controls';
import { createSessionStateRoutes } from './routes/session-state';
import { createFrameStreamRoutes, FrameStreamOptions } from './routes/frame-stream';

export interface WebServerConfig {
  /** Port number (default: 5680) */
  port?: number;
  /** Host (default: 127.0.0.1) */
  host?: string;
  service: SessionService;
  frameStream?: FrameStreamOptions;
}

export interface WebServerState {
  isRunning: boolean;
  port: number;
  host: string;
}

interface ErrorResponse {
  error: string;
  message: string;
}

/**
 * Create configured Express app
 */
export function createApp(config: WebServerConfig): Express {
  const app = express();
  const { service } = config;

  app.use(express.json());

  // CORS headers for the local front end
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    next();
  });

  app.use('/api/session', createSessionControlsRoutes(service));
  app.use('/api', createSessionStateRoutes(service));
  app.use('/api/frames', createFrameStreamRoutes(service.channel, config.frameStream));

  // ===================
  // GET /api/health
  // ===================
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      session: service.status().state,
    });
  });

  // ===================
  // GET /api/logs/recent
  // ===================
  app.get('/api/logs/recent', (req: Request, res: Response) => {
    const parsedLimit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 50;
    const limit = Number.isNaN(parsedLimit) || parsedLimit <= 0 ? 50 : parsedLimit;
    const { category } = req.query;

    if (category === undefined) {
      const logs = service.logger.getRecent(limit);
      res.json({ count: logs.length, logs });
      return;
    }
    if (typeof category !== 'string' || !isSessionLogCategory(category)) {
      const body: ErrorResponse = { error: 'INVALID_INPUT', message: `Unknown log category: ${String(category)}` };
      res.status(400).json(body);
      return;
    }
    const logs = service.logger.getByCategory(category).slice(-limit);
    res.json({ count: logs.length, logs });
  });

  app.use('/api', (_req: Request, res: Response) => {
    const body: ErrorResponse = { error: 'NOT_FOUND', message: 'Unknown endpoint' };
    res.status(404).json(body);
  });

  // Malformed JSON bodies and anything thrown by a route
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const isParseError = 'type' in err && err.type === 'entity.parse.failed';
    if (!isParseError) {
      service.logger.logError('HTTP request failed', err);
    }
    const body: ErrorResponse = {
      error: isParseError ? 'INVALID_JSON' : 'INTERNAL_ERROR',
      message: err.message,
    };
    res.status(isParseError ? 400 : 500).json(body);
  });

  return app;
}

/**
 * Web Server
 * Manages Express server lifecycle
 */
export class WebServer {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private server: Server | null = null;

  constructor(config: WebServerConfig) {
    this.port = config.port ?? 5680;
    this.host = config.host || '127.0.0.1';
    this.app = createApp(config);
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      // SSE clients hold their connections open
      this.server.closeAllConnections();
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          this.server = null;
          resolve();
        }
      });
    });
  }

  getState(): WebServerState {
    return {
      isRunning: this.server !== null,
      port: this.port,
      host: this.host,
    };
  }

  getApp(): Express {
    return this.app;
  }

  getUrl(): string {
    return 'http://' + this.host + ':' + this.port;
  }
}
