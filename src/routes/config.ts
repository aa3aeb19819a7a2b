import { Hono } from 'hono';
import { z } from 'zod';
import { maskApiKey, type AppConfig } from '../config.js';
import { createBackend, testConnection } from '../services/aiClient.js';
import { errorResponse, readBody } from './respond.js';

const TestConfigSchema = z.object({
  provider: z.enum(['gemini', 'openai', 'deepseek', 'ollama', 'custom', 'mock']),
  model: z.string().min(1),
  apiKey: z.string().default(''),
  baseUrl: z.string().url().optional(),
});

export function createConfigRoutes(config: AppConfig) {
  const routes = new Hono();

  // Active configuration, API key masked
  routes.get('/', (c) =>
    c.json({
      success: true,
      config: {
        ai: maskApiKey(config.ai),
        generation: config.generation,
        continuity: config.continuity,
        retry: config.retry,
        storage: config.dataDir ? 'file' : 'memory',
      },
    })
  );

  // Test AI connection (config passed in body, not stored on server)
  routes.post('/test', async (c) => {
    try {
      const body = await readBody(c, TestConfigSchema);
      if (!body.apiKey && body.provider !== 'ollama' && body.provider !== 'mock') {
        return c.json({ success: false, message: 'Missing config parameters' }, 400);
      }
      const backend = createBackend(body, config.generation);
      const result = await testConnection(backend);
      return c.json(result);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
