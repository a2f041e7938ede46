/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - EXPRESS APPLICATION
 * ============================================================================
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { config } from './config/config';
import logger from './config/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createRoutes, type RouteOptions } from './routes';

const httpLog = logger.child('http');

export class App {
  public readonly app: Application;

  constructor(private readonly options: RouteOptions) {
    this.app = express();
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    this.app.set('trust proxy', 1);
    this.app.disable('x-powered-by');

    this.app.use(helmet());

    this.app.use(
      cors({
        origin: (origin, callback) => {
          const allowedOrigins = config.cors.allowedOrigins;
          if (!origin || allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
            callback(null, true);
            return;
          }

          logger.warn('CORS policy violation', { origin, allowedOrigins });
          callback(new Error(`CORS policy violation: Origin ${origin} not allowed`), false);
        },
        credentials: true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
        allowedHeaders: ['Origin', 'Content-Type', 'Accept', 'Authorization', 'X-Request-ID'],
        exposedHeaders: ['X-Request-ID'],
        maxAge: 86400, // 24 hours
      })
    );

    this.app.use(compression());

    this.app.use(
      rateLimit({
        windowMs: config.rateLimit.windowMs,
        max: config.rateLimit.max,
        standardHeaders: true,
        legacyHeaders: false,
        message: {
          error: 'Too many requests from this IP, please try again later.',
        },
      })
    );

    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true, limit: '1mb' }));

    if (!config.isTest) {
      this.app.use(
        morgan(config.isDevelopment ? 'dev' : 'combined', {
          stream: {
            write: (message: string) => {
              httpLog.info(message.trim());
            },
          },
        })
      );
    }

    this.app.use(requestLogger);
  }

  private initializeRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({
        success: true,
        message: `${config.app.name} API`,
        health: '/api/health',
        timestamp: new Date().toISOString(),
      });
    });

    this.app.use('/api', createRoutes(this.options));
  }

  private initializeErrorHandling(): void {
    this.app.use(notFoundHandler());
    this.app.use(errorHandler());
  }
}

export default App;
