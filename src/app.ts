import express, { Application } from 'express';
import { FeedStore } from './feed.js';
import { createApiRoutes, ApiOptions } from './routes/api.js';

/**
 * Create and configure the Express application
 */
export function createApp(store: FeedStore, options: ApiOptions = {}): Application {
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(store, options));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      threads: store.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
