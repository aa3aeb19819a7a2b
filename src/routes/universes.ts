import { Hono } from 'hono';
import type { EpicOrchestrator } from '../orchestrator.js';
import { UniverseSchema } from '../types/universe.js';
import { errorResponse, readBody } from './respond.js';

export function createUniversesRoutes(engine: EpicOrchestrator) {
  const routes = new Hono();

  // Predefined and saved universes
  routes.get('/', async (c) => {
    try {
      const universes = await engine.listUniverses();
      return c.json({ success: true, universes });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.get('/:name', async (c) => {
    try {
      const universe = await engine.getUniverse(c.req.param('name'));
      if (!universe) {
        return c.json({ success: false, error: 'Universe not found' }, 404);
      }
      return c.json({ success: true, universe });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Save a custom universe
  routes.post('/', async (c) => {
    try {
      const body = await readBody(c, UniverseSchema);
      const universe = await engine.saveUniverse(body);
      return c.json({ success: true, universe }, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
