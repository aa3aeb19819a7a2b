import { Hono } from 'hono';
import { z } from 'zod';
import type { EpicOrchestrator } from '../orchestrator.js';
import type { Story } from '../types/story.js';
import { UniverseSchema } from '../types/universe.js';
import { errorResponse, readBody } from './respond.js';

const CreateStorySchema = z.object({
  universe: z.union([z.string().trim().min(1), UniverseSchema]),
  theme: z.string(),
  protagonist: z.string(),
  title: z.string(),
});

const AdvanceSchema = z.object({
  arcIndex: z.number().int(),
  numChapters: z.number().int(),
  startChapter: z.number().int().optional(),
});

const optionalInt = z.coerce.number().int().positive().optional();

function storySummary(story: Story) {
  return {
    id: story.id,
    title: story.title,
    universe: story.universe.name,
    theme: story.theme,
    protagonist: story.protagonist,
    totalChapters: story.totalChapters,
    cursor: story.cursor,
    createdAt: story.createdAt,
    updatedAt: story.updatedAt,
  };
}

export function createStoriesRoutes(engine: EpicOrchestrator) {
  const routes = new Hono();

  // List all stories
  routes.get('/', async (c) => {
    try {
      const stories = await engine.listStories();
      return c.json({ success: true, stories: stories.map(storySummary) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Plan a new epic
  routes.post('/', async (c) => {
    try {
      const body = await readBody(c, CreateStorySchema);
      const storyId = await engine.createEpic(body);
      const story = await engine.getStory(storyId);
      return c.json({ success: true, story }, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Get single story with its arcs
  routes.get('/:id', async (c) => {
    try {
      const story = await engine.getStory(c.req.param('id'));
      return c.json({ success: true, story });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Generate the next chapters of an arc; a closed connection cancels the batch
  routes.post('/:id/advance', async (c) => {
    try {
      const body = await readBody(c, AdvanceSchema);
      const progress = await engine.advance(c.req.param('id'), body.arcIndex, body.numChapters, {
        startChapter: body.startChapter,
        signal: c.req.raw.signal,
      });
      return c.json({ success: true, progress });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Committed chapters, without their text
  routes.get('/:id/chapters', async (c) => {
    try {
      const range = z.object({ from: optionalInt, to: optionalInt }).safeParse(c.req.query());
      const from = range.success ? range.data.from : undefined;
      const to = range.success ? range.data.to : undefined;
      const chapters = await engine.listChapters(c.req.param('id'), from, to);
      return c.json({
        success: true,
        chapters: chapters.map(({ text, recap, ...meta }) => ({ ...meta, summary: recap.summary })),
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Get chapter content
  routes.get('/:id/chapters/:number', async (c) => {
    try {
      const number = Number(c.req.param('number'));
      if (!Number.isInteger(number) || number < 1) {
        return c.json({ success: false, error: 'Chapter number must be a positive integer' }, 400);
      }
      const chapter = await engine.getChapter(c.req.param('id'), number);
      if (!chapter) {
        return c.json({ success: false, error: `Chapter ${number} has not been generated` }, 404);
      }
      return c.json({ success: true, chapter });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.get('/:id/continuity', async (c) => {
    try {
      const continuity = await engine.getContinuity(c.req.param('id'));
      return c.json({ success: true, continuity });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.get('/:id/stats', async (c) => {
    try {
      const stats = await engine.getStats(c.req.param('id'));
      return c.json({ success: true, stats });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  routes.delete('/:id/stats', async (c) => {
    try {
      await engine.resetStats(c.req.param('id'));
      return c.json({ success: true });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // Download all committed chapters as a single text file
  routes.get('/:id/download', async (c) => {
    try {
      const story = await engine.getStory(c.req.param('id'));
      if (story.cursor.chapter === 0) {
        return c.json({ success: false, error: 'No chapters to download' }, 400);
      }
      const content = await engine.exportStory(story.id);
      const filename = `${story.title}.txt`;

      return new Response(content, {
        headers: {
          'Content-Type': 'text/plain; charset=utf-8',
          'Content-Disposition': `attachment; filename*=UTF-8''${encodeURIComponent(filename)}`,
        },
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
