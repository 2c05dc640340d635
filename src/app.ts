import express, { Request, Response, NextFunction, type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config/index.js';
import { getConfigStatus } from './services/ai.js';
import { createSmsRouter } from './routes/sms.js';
import { createAdminRouter } from './routes/admin.js';
import { createGlossaryRouter } from './routes/glossary.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { AppContext } from './context.js';

export type AppDependencies = Pick<AppContext, 'glossary' | 'store' | 'pipeline'>;

/**
 * Build the Express app around already-constructed services
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Trust proxy (ensures correct client IP for rate limiting behind a reverse proxy)
  app.set('trust proxy', 1);

  // Security middleware - set various HTTP headers
  app.use(helmet());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] ${req.method} ${req.path} - ${req.ip}`);
    next();
  });

  app.use(express.json({ limit: '100kb' }));

  // CORS configuration (admin/preview tooling in the browser)
  app.use(cors({
    origin: [...config.corsOrigins],
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type'],
  }));

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      message: 'SMS farm assistant is running',
      pipeline: deps.pipeline.mode,
      ai: getConfigStatus(),
    });
  });

  // Routes
  app.use(createSmsRouter(deps.pipeline));
  app.use(createAdminRouter(deps.store));
  app.use(createGlossaryRouter(deps.glossary));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
