import compression from 'compression';
import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import type { Logger } from '../lib/logger';
import { createSilentLogger } from '../lib/logger';
import type LeaderboardQueryService from '../services/LeaderboardQueryService';
import { createLeaderboardRouter } from './routes/leaderboards';

interface AppServerOptions {
  port: number;
  queryService: LeaderboardQueryService;
  logger?: Logger;
  now?: () => Date;
}

export default class AppServer {
  private readonly port: number;

  private readonly queryService: LeaderboardQueryService;

  private readonly logger: Logger;

  private readonly now: () => Date;

  private readonly app = express();

  private httpServer: Server | null = null;

  constructor({ port, queryService, logger, now }: AppServerOptions) {
    this.port = port;
    this.queryService = queryService;
    this.logger = logger ?? createSilentLogger();
    this.now = now ?? (() => new Date());

    this.configureMiddleware();
    this.registerRoutes();
  }

  private configureMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use(
      helmet({
        contentSecurityPolicy: false,
        crossOriginEmbedderPolicy: false,
        crossOriginResourcePolicy: { policy: 'cross-origin' },
        referrerPolicy: { policy: 'no-referrer-when-downgrade' },
      }),
    );

    this.app.use(
      compression({
        threshold: 512,
        filter: (req, res) => {
          const header = req.headers['x-no-compression'];
          if (typeof header === 'string' && header.toLowerCase() === 'true') {
            return false;
          }

          return compression.filter(req, res);
        },
      }),
    );

    this.app.use((_req: Request, res: Response, next: NextFunction) => {
      res.setHeader('Access-Control-Allow-Origin', '*');
      next();
    });
  }

  private registerRoutes(): void {
    this.app.get('/health', (_req, res) => {
      res.json({ success: true, status: 'ok', time: this.now().toISOString() });
    });

    this.app.use(
      '/api',
      createLeaderboardRouter({ queryService: this.queryService, logger: this.logger, now: this.now }),
    );

    this.app.use('/api', (_req, res) => {
      res.status(404).json({ success: false, error: 'Not found' });
    });

    this.app.use((_req, res) => {
      res.status(404).type('text/plain; charset=utf-8').send('Not found');
    });
  }

  public start(port: number = this.port): Server {
    if (this.httpServer) {
      return this.httpServer;
    }

    this.httpServer = this.app.listen(port);
    this.httpServer.on('listening', () => {
      this.logger.info('HTTP server listening', { port });
    });
    return this.httpServer;
  }

  public stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return Promise.resolve();
    }
    this.httpServer = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
