import {
  ArcBoundaryError,
  GenerationBackendError,
  InvalidPremiseError,
  StoryBusyError,
  StoryNotFoundError,
  isEpicEngineError,
} from '../errors.js';
import { EngineEventBus } from '../eventBus.js';
import { EpicOrchestrator } from '../orchestrator.js';
import { createMockBackend } from '../services/mockBackend.js';
import { MemoryStore } from '../storage/memoryStore.js';
import type { GenerationBackend } from '../services/aiClient.js';
import { createScriptedBackend, hogwarts, instantRetry } from './helpers.js';

const mock = createMockBackend();

function createEngine(backend: GenerationBackend = createScriptedBackend().backend) {
  const store = new MemoryStore();
  const engine = new EpicOrchestrator({
    backend,
    store,
    retryPolicy: instantRetry(2),
    events: new EngineEventBus(),
  });
  return { engine, store };
}

const premise = {
  universe: 'Harry Potter',
  theme: 'Good vs Evil',
  protagonist: 'Harry Potter',
  title: 'The Boy Who Lived Again',
};

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (error: unknown) => error
  );
}

describe('EpicOrchestrator scenarios', () => {
  it('advances three chapters of the first arc', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);

    const progress = await engine.advance(storyId, 1, 3);

    expect(progress).toEqual({
      storyId,
      arcIndex: 1,
      requested: 3,
      completed: 3,
      startChapter: 1,
      chapters: [1, 2, 3],
      lastCommittedChapter: 3,
      cursor: { arcIndex: 1, chapter: 3 },
    });
    expect(await engine.getChapter(storyId, 10)).toBeNull();
  });

  it('flags only chapter 10 as a cliffhanger in the first 15 chapters', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);

    await engine.advance(storyId, 1, 15);

    const chapters = await engine.listChapters(storyId);
    expect(chapters.filter((c) => c.cliffhanger).map((c) => c.number)).toEqual([10]);
  });

  it('resolves catalog universes by name, case-insensitively', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic({ ...premise, universe: 'harry potter' });

    const story = await engine.getStory(storyId);
    expect(story.universe.name).toBe('Harry Potter');
    expect(story.universe.mainCharacters).toContain('Hermione Granger');
  });

  it('rejects an unknown universe name', async () => {
    const { engine } = createEngine();
    await expect(engine.createEpic({ ...premise, universe: 'Narnia' })).rejects.toBeInstanceOf(InvalidPremiseError);
  });

  it('continues back-to-back advances from the cursor', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic({ ...premise, universe: hogwarts });

    await engine.advance(storyId, 1, 3);
    const second = await engine.advance(storyId, 1, 2, { startChapter: 1 });

    expect(second.startChapter).toBe(4);
    expect(second.chapters).toEqual([4, 5]);
    expect((await engine.listChapters(storyId)).map((c) => c.number)).toEqual([1, 2, 3, 4, 5]);
  });

  it('rejects an arc whose range does not contain the next chapter', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);
    await engine.advance(storyId, 1, 2);

    const error = await rejection(engine.advance(storyId, 2, 5));

    expect(error).toBeInstanceOf(ArcBoundaryError);
    if (!isEpicEngineError(error)) return;
    expect(error.resume).toEqual({
      storyId,
      lastCommittedChapter: 2,
      cursor: { arcIndex: 1, chapter: 2 },
      requested: 5,
      completed: 0,
    });
  });

  it('crosses from the first arc into the second at chapter 200', async () => {
    const { backend, callsFor } = createScriptedBackend();
    const { engine } = createEngine(backend);
    const storyId = await engine.createEpic(premise);

    for (let batch = 0; batch < 4; batch++) {
      await engine.advance(storyId, 1, 50);
    }
    expect((await engine.getStory(storyId)).cursor).toEqual({ arcIndex: 1, chapter: 200 });

    const overrun = await rejection(engine.advance(storyId, 1, 1));
    expect(overrun).toBeInstanceOf(ArcBoundaryError);

    const progress = await engine.advance(storyId, 2, 10);

    expect(progress.chapters[0]).toBe(201);
    expect(progress.cursor).toEqual({ arcIndex: 2, chapter: 210 });
    expect((await engine.getChapter(storyId, 201))?.arcIndex).toBe(2);
    expect((await engine.getChapter(storyId, 200))?.arcIndex).toBe(1);

    const arcTwo = await engine.listChapters(storyId, 201, 210);
    expect(arcTwo.filter((c) => c.cliffhanger).map((c) => c.number)).toEqual([210]);

    const prompts = callsFor('chapter');
    expect(prompts).toHaveLength(210);
    expect(prompts[200].prompt).toContain('- Chapters 201-400, this is chapter 1/200 of the arc');
  });

  it('reports unknown stories with a resume point', async () => {
    const { engine } = createEngine();
    const error = await rejection(engine.advance('missing', 1, 1));

    expect(error).toBeInstanceOf(StoryNotFoundError);
    if (!isEpicEngineError(error)) return;
    expect(error.resume?.lastCommittedChapter).toBe(0);
  });
});

describe('EpicOrchestrator concurrency', () => {
  it('lets only one advance run per story', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);

    const results = await Promise.allSettled([engine.advance(storyId, 1, 2), engine.advance(storyId, 1, 2)]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    const busy = results[1].status === 'rejected' ? results[1].reason : null;
    expect(busy).toBeInstanceOf(StoryBusyError);
    expect(busy?.resume).toEqual({
      storyId,
      lastCommittedChapter: 0,
      cursor: { arcIndex: 1, chapter: 0 },
      requested: 2,
      completed: 0,
    });
    expect((await engine.getStory(storyId)).cursor.chapter).toBe(2);
  });

  it('releases the lock after a failure', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);

    await expect(engine.advance(storyId, 3, 1)).rejects.toBeInstanceOf(ArcBoundaryError);
    await expect(engine.advance(storyId, 1, 1)).resolves.toMatchObject({ completed: 1 });
  });

  it('runs different stories in parallel', async () => {
    const { engine } = createEngine();
    const first = await engine.createEpic(premise);
    const second = await engine.createEpic({ ...premise, title: 'Another Year' });

    const [a, b] = await Promise.all([engine.advance(first, 1, 3), engine.advance(second, 1, 3)]);

    expect(a.chapters).toEqual([1, 2, 3]);
    expect(b.chapters).toEqual([1, 2, 3]);
  });
});

describe('EpicOrchestrator failure recovery', () => {
  it('reports partial progress and resumes without holes', async () => {
    let failing = true;
    const { backend } = createScriptedBackend({
      chapter: (prompt) => {
        if (failing && /^- Chapter number: 3$/m.test(prompt)) throw new Error('backend down');
        return mock.generate(prompt, { purpose: 'chapter' });
      },
    });
    const { engine } = createEngine(backend);
    const storyId = await engine.createEpic(premise);

    const error = await rejection(engine.advance(storyId, 1, 5));

    expect(error).toBeInstanceOf(GenerationBackendError);
    if (!isEpicEngineError(error)) return;
    expect(error.resume).toEqual({
      storyId,
      lastCommittedChapter: 2,
      cursor: { arcIndex: 1, chapter: 2 },
      requested: 5,
      completed: 2,
    });

    failing = false;
    const resumed = await engine.advance(storyId, 1, 3);

    expect(resumed.chapters).toEqual([3, 4, 5]);
    expect((await engine.listChapters(storyId)).map((c) => c.number)).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('EpicOrchestrator read operations', () => {
  it('reports progress and generation stats', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);
    await engine.advance(storyId, 1, 3);

    const stats = await engine.getStats(storyId);

    expect(stats.cursor).toEqual({ arcIndex: 1, chapter: 3 });
    expect(stats.progress).toBe(0.003);
    expect(stats.generation?.successfulChapters).toBe(3);
    expect(stats.recentErrors).toEqual([]);

    await engine.resetStats(storyId);
    expect((await engine.getStats(storyId)).generation).toBeNull();
  });

  it('exposes the continuity state', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);
    await engine.advance(storyId, 1, 7);

    const continuity = await engine.getContinuity(storyId);

    expect(continuity.lastChapter).toBe(7);
    expect(Object.keys(continuity.threads)).toEqual(['mystery-7']);
  });

  it('exports committed chapters as plain text', async () => {
    const { engine } = createEngine();
    const storyId = await engine.createEpic(premise);
    await engine.advance(storyId, 1, 2);

    const text = await engine.exportStory(storyId);

    expect(text.startsWith('The Boy Who Lived Again\n')).toBe(true);
    expect(text).toContain('=== Arc 1: The Awakening: Good vs Evil ===');
    expect(text).toContain('Chapter 2\n\nHarry Potter woke before dawn');
  });

  it('lists predefined universes and lets saved ones replace them', async () => {
    const { engine } = createEngine();

    const builtIn = await engine.listUniverses();
    expect(builtIn.map((u) => u.name)).toEqual([
      'Harry Potter',
      'Lord of the Rings',
      'Game of Thrones',
      'Naruto',
      'Marvel Universe',
    ]);

    await engine.saveUniverse({ name: 'Harry Potter', genre: 'Mystery', mainCharacters: ['Harry Potter'] });
    await engine.saveUniverse({ name: 'Discworld', genre: 'Comic Fantasy', mainCharacters: ['Rincewind'] });

    const merged = await engine.listUniverses();
    expect(merged).toHaveLength(6);
    expect((await engine.getUniverse('harry potter'))?.genre).toBe('Mystery');
    expect((await engine.getUniverse('Discworld'))?.mainCharacters).toEqual(['Rincewind']);
  });

  it('rejects an invalid universe', async () => {
    const { engine } = createEngine();
    await expect(engine.saveUniverse({ name: '', genre: 'Fantasy', mainCharacters: [] })).rejects.toBeInstanceOf(
      InvalidPremiseError
    );
  });
});
