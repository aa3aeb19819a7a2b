import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from './config.js';
import type { EngineEventBus } from './eventBus.js';
import type { EpicOrchestrator } from './orchestrator.js';
import { createConfigRoutes } from './routes/config.js';
import { createEventsRoutes } from './routes/events.js';
import { createStoriesRoutes } from './routes/stories.js';
import { createUniversesRoutes } from './routes/universes.js';

export type AppDeps = {
  engine: EpicOrchestrator;
  config: AppConfig;
  events: EngineEventBus;
};

export function createApp({ engine, config, events }: AppDeps) {
  const app = new Hono();

  // Middleware
  app.use('*', cors());

  // Mount routes
  app.route('/api/stories', createStoriesRoutes(engine));
  app.route('/api/universes', createUniversesRoutes(engine));
  app.route('/api/config', createConfigRoutes(config));
  app.route('/api/events', createEventsRoutes(events));

  // Health check
  app.get('/api/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  // 404 handler for API routes
  app.all('/api/*', (c) => c.json({ success: false, error: 'Not found' }, 404));

  return app;
}
