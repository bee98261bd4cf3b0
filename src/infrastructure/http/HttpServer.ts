import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { Logger } from '../../core/logging/index.js';
import type { RecipeSessionService } from '../../application/services/recipe-session-service.js';
import { mountApiRoutes } from './api-routes.js';

/**
 * JSON API over RecipeSessionService.
 *
 * Construct, then `start(port)`; `stop()` closes the listener and waits for
 * in-flight connections, giving up after 5s.
 */
export class HttpServer {
  private readonly app: Application;
  private server: Server | null = null;

  constructor(
    private readonly service: RecipeSessionService,
    private readonly logger: Logger
  ) {
    this.app = express();
    this.setupMiddleware();
    mountApiRoutes(this.app, this.service);
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
    });
  }

  get application(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: '*',
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      })
    );
    this.app.use(express.json({ limit: '256kb' }));

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      res.on('finish', () => {
        this.logger.info(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - start },
          'http request'
        );
      });
      next();
    });
  }

  async start(port: number): Promise<string> {
    if (this.server) throw new Error('HTTP server already started');

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = this.app.listen(port, () => resolve(listening));
      listening.once('error', reject);
    });
    this.server = server;

    const baseUrl = `http://localhost:${port}`;
    this.logger.info({ baseUrl }, 'HTTP server listening');
    return baseUrl;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      const closeTimeout = setTimeout(() => {
        this.logger.warn('HTTP server close timeout after 5s, forcing shutdown');
        resolve();
      }, 5000);

      server.close(() => {
        clearTimeout(closeTimeout);
        this.logger.info('HTTP server stopped');
        resolve();
      });
    });
  }
}
