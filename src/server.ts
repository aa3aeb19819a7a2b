import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { createEngine } from './bootstrap.js';
import { loadConfig } from './config.js';
import { TIMEOUTS, getTimeoutInSeconds } from './config/timeouts.js';
import { eventBus } from './eventBus.js';
import * as logger from './services/logger.js';

const config = await loadConfig();
const { engine } = createEngine(config);
const app = createApp({ engine, config, events: eventBus });

// ==================== Start Server ====================

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`Epic saga API running at http://localhost:${info.port}`);
  logger.info(`Backend request timeout: ${getTimeoutInSeconds(TIMEOUTS.AI_REQUEST)}s`, {
    provider: config.ai.provider,
    model: config.ai.model,
  });
});
