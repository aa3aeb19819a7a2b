import { z } from 'zod';
import { createApp } from '../app.js';
import type { AppConfig } from '../config.js';
import { EngineEventBus } from '../eventBus.js';
import { EpicOrchestrator } from '../orchestrator.js';
import { MemoryStore } from '../storage/memoryStore.js';
import { createScriptedBackend, instantRetry } from './helpers.js';

const config: AppConfig = {
  ai: { provider: 'mock', model: 'mock-storyteller', apiKey: 'test-secret-value' },
  generation: { maxTokens: 2000, temperature: 0.8, topP: 0.9 },
  continuity: { windowSize: 10, maxSummaryChars: 2400 },
  retry: { maxAttempts: 2, baseDelayMs: 0 },
  dataDir: '',
  port: 0,
  logLevel: 'info',
};

function createTestApp() {
  const events = new EngineEventBus();
  const engine = new EpicOrchestrator({
    backend: createScriptedBackend().backend,
    store: new MemoryStore(),
    retryPolicy: instantRetry(2),
    events,
  });
  return createApp({ engine, config, events });
}

function post(body: unknown): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) };
}

async function createStory(app: ReturnType<typeof createTestApp>): Promise<string> {
  const res = await app.request(
    '/api/stories',
    post({ universe: 'Harry Potter', theme: 'Good vs Evil', protagonist: 'Harry Potter', title: 'Second Life' })
  );
  return z.object({ story: z.object({ id: z.string() }) }).parse(await res.json()).story.id;
}

describe('HTTP routes', () => {
  it('answers the health check', async () => {
    const res = await createTestApp().request('/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('creates a story and advances it', async () => {
    const app = createTestApp();
    const storyId = await createStory(app);

    const res = await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 1, numChapters: 2 }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, progress: { chapters: [1, 2] } });

    const chapter = await app.request(`/api/stories/${storyId}/chapters/2`);
    expect(chapter.status).toBe(200);
    expect(await chapter.json()).toMatchObject({ chapter: { number: 2 } });

    const missing = await app.request(`/api/stories/${storyId}/chapters/5`);
    expect(missing.status).toBe(404);
  });

  it('lists chapters without their text', async () => {
    const app = createTestApp();
    const storyId = await createStory(app);
    await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 1, numChapters: 3 }));

    const res = await app.request(`/api/stories/${storyId}/chapters?from=2`);
    const { chapters } = z
      .object({ chapters: z.array(z.object({ number: z.number(), summary: z.string() }).passthrough()) })
      .parse(await res.json());

    expect(chapters.map((c) => c.number)).toEqual([2, 3]);
    expect(chapters[0]).not.toHaveProperty('text');
    expect(chapters[0].summary).toBe(
      'Harry Potter made a small discovery in chapter 2. The road ahead looks different now.'
    );
  });

  it('maps engine errors to status codes with a resume point', async () => {
    const app = createTestApp();
    const storyId = await createStory(app);
    await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 1, numChapters: 2 }));

    const res = await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 2, numChapters: 5 }));

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      success: false,
      code: 'ARC_BOUNDARY',
      retryable: false,
      resume: { lastCommittedChapter: 2, completed: 0, requested: 5 },
    });
  });

  it('rejects invalid batch sizes and bodies', async () => {
    const app = createTestApp();
    const storyId = await createStory(app);

    const tooMany = await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 1, numChapters: 51 }));
    expect(tooMany.status).toBe(400);
    expect(await tooMany.json()).toMatchObject({ code: 'INVALID_BATCH' });

    const malformed = await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 'one' }));
    expect(malformed.status).toBe(400);
  });

  it('returns 404 for unknown stories', async () => {
    const res = await createTestApp().request('/api/stories/missing');
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: 'STORY_NOT_FOUND' });
  });

  it('downloads committed chapters as text', async () => {
    const app = createTestApp();
    const storyId = await createStory(app);

    const empty = await app.request(`/api/stories/${storyId}/download`);
    expect(empty.status).toBe(400);

    await app.request(`/api/stories/${storyId}/advance`, post({ arcIndex: 1, numChapters: 1 }));
    const res = await app.request(`/api/stories/${storyId}/download`);

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('text/plain; charset=utf-8');
    expect(await res.text()).toContain('=== Arc 1: The Awakening: Good vs Evil ===');
  });

  it('serves the universe catalog', async () => {
    const app = createTestApp();

    const list = z.object({ universes: z.array(z.unknown()) }).parse(await (await app.request('/api/universes')).json());
    expect(list.universes).toHaveLength(5);

    const saved = await app.request('/api/universes', post({ name: 'Discworld', genre: 'Comic Fantasy', mainCharacters: ['Rincewind'] }));
    expect(saved.status).toBe(201);

    const one = await app.request('/api/universes/Discworld');
    expect(await one.json()).toMatchObject({ universe: { genre: 'Comic Fantasy' } });
  });

  it('masks the API key in the config route', async () => {
    const res = await createTestApp().request('/api/config');
    expect(await res.json()).toMatchObject({
      config: { ai: { apiKey: '', apiKeyMasked: 'test-sec...alue' }, storage: 'memory' },
    });
  });

  it('tests a backend connection', async () => {
    const res = await createTestApp().request('/api/config/test', post({ provider: 'mock', model: 'mock-storyteller' }));
    expect(await res.json()).toEqual({
      success: true,
      message: 'Connected. Reply: "Hello"',
      backend: 'mock:storyteller',
    });
  });

  it('answers unknown API paths with 404', async () => {
    const res = await createTestApp().request('/api/nothing-here');
    expect(res.status).toBe(404);
  });
});
