import express, { Application } from 'express';
import { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { summarizeCatalogue } from './renderer.js';

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult): Application {
  const app = express();

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    const counts = summarizeCatalogue(data.catalogue);
    res.json({
      status: 'ok',
      sources: data.sources.length,
      markers: counts.tag + counts.ref + counts.file + counts.dir
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
