import cors from 'cors';
import express, { type Express, type Request, type Response } from 'express';
import { createApiRouter } from './api/routes/index.js';
import { errorHandler, notFoundHandler } from './api/middlewares/errorHandler.js';
import { config } from './config/index.js';
import type { Services } from './services/index.js';

export function createApp(services: Services): Express {
  const app: Express = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      env: config.env,
    });
  });

  // API routes
  app.use('/v1', createApiRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
