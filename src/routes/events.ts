import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { TIMEOUTS } from '../config/timeouts.js';
import type { EngineEvent, EngineEventBus } from '../eventBus.js';
import * as logger from '../services/logger.js';

/**
 * Server-sent progress and log events, optionally filtered by `?storyId=`
 */
export function createEventsRoutes(events: EngineEventBus) {
  const routes = new Hono();

  routes.get('/', (c) => {
    const storyId = c.req.query('storyId') || undefined;

    return streamSSE(c, async (stream) => {
      let id = 0;
      const send = (event: EngineEvent) => {
        stream
          .writeSSE({ event: event.type, data: JSON.stringify(event), id: String(++id) })
          .catch((error: unknown) => {
            logger.warn('Failed to write SSE event', {
              error: error instanceof Error ? error.message : String(error),
            });
          });
      };

      const unsubscribe = events.subscribe(send, storyId);
      stream.onAbort(() => {
        unsubscribe();
      });

      await stream.writeSSE({ event: 'connected', data: JSON.stringify({ storyId: storyId ?? null }) });
      while (!stream.aborted) {
        await stream.sleep(TIMEOUTS.SSE_KEEPALIVE);
        if (!stream.aborted) {
          await stream.writeSSE({ event: 'ping', data: new Date().toISOString() });
        }
      }
      unsubscribe();
    });
  });

  return routes;
}
