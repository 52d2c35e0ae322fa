/**
 * Express application over an entity store
 */

import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { EntityStore } from './database/EntityStore';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/errorHandler';
import { createConfigRouter } from './routes/config';

export const createApp = (store: EntityStore): express.Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    const database = store.status();
    res.status(database.open ? 200 : 503).json({
      status: database.open ? 'OK' : 'UNAVAILABLE',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database,
    });
  });

  app.use('/api', createConfigRouter(store));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};

export default createApp;
