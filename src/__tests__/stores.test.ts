import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { initialState } from '../context/continuityTracker.js';
import { CursorConflictError, StoryNotFoundError } from '../errors.js';
import { FileStore } from '../storage/fileStore.js';
import { MemoryStore } from '../storage/memoryStore.js';
import type { EpicStore } from '../storage/types.js';
import { hogwarts, makeDraft, makeStory } from './helpers.js';

function foldedState(storyId: string, chapter: number) {
  const story = makeStory(storyId);
  return { ...initialState(story), lastChapter: chapter, summary: `Up to chapter ${chapter}` };
}

type StoreFactory = () => Promise<EpicStore>;

function describeStoreContract(name: string, setup: { create: StoreFactory; cleanup: () => Promise<void> }) {
  describe(`${name} contract`, () => {
    let store: EpicStore;

    beforeEach(async () => {
      store = await setup.create();
    });

    afterEach(async () => {
      await setup.cleanup();
    });

    it('creates a story at cursor 0 with its initial state', async () => {
      const story = makeStory('s1');
      await store.createStory(story, initialState(story));

      expect(await store.getStory('s1')).toEqual(story);
      expect(await store.getCursor('s1')).toEqual({ arcIndex: 1, chapter: 0 });
      expect(await store.getContinuity('s1')).toEqual(initialState(story));
    });

    it('commits chapter, state and cursor together', async () => {
      const story = makeStory('s1');
      await store.createStory(story, initialState(story));

      const committed = await store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1));

      expect(committed.version).toBe(1);
      expect(await store.getCursor('s1')).toEqual({ arcIndex: 1, chapter: 1 });
      expect((await store.getContinuity('s1'))?.summary).toBe('Up to chapter 1');
      expect(await store.getChapter('s1', 1)).toEqual(committed);
      expect((await store.getStory('s1'))?.updatedAt).toBe(makeDraft('s1', 1).createdAt);
    });

    it('rejects a commit against a stale cursor', async () => {
      const story = makeStory('s1');
      await store.createStory(story, initialState(story));
      await store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1));

      await expect(store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1))).rejects.toBeInstanceOf(
        CursorConflictError
      );
      await expect(store.commitChapter('s1', 1, makeDraft('s1', 3), foldedState('s1', 3))).rejects.toBeInstanceOf(
        CursorConflictError
      );
      expect(await store.getCursor('s1')).toEqual({ arcIndex: 1, chapter: 1 });
    });

    it('rejects commits for unknown stories', async () => {
      await expect(store.commitChapter('missing', 0, makeDraft('missing', 1), foldedState('missing', 1))).rejects.toBeInstanceOf(
        StoryNotFoundError
      );
      expect(await store.getStory('missing')).toBeNull();
      expect(await store.getCursor('missing')).toBeNull();
    });

    it('lists committed chapters in order within a range', async () => {
      const story = makeStory('s1');
      await store.createStory(story, initialState(story));
      for (let n = 1; n <= 4; n++) {
        await store.commitChapter('s1', n - 1, makeDraft('s1', n), foldedState('s1', n));
      }

      expect((await store.listChapters('s1')).map((c) => c.number)).toEqual([1, 2, 3, 4]);
      expect((await store.listChapters('s1', 2, 3)).map((c) => c.number)).toEqual([2, 3]);
      expect(await store.getChapter('s1', 5)).toBeNull();
    });

    it('lists stories newest first', async () => {
      const older = makeStory('old', '2026-01-01T00:00:00.000Z');
      const newer = makeStory('new', '2026-02-01T00:00:00.000Z');
      await store.createStory(older, initialState(older));
      await store.createStory(newer, initialState(newer));

      expect((await store.listStories()).map((s) => s.id)).toEqual(['new', 'old']);
    });

    it('does not let callers mutate stored records', async () => {
      const story = makeStory('s1');
      await store.createStory(story, initialState(story));

      const read = await store.getStory('s1');
      read?.arcs.pop();
      expect((await store.getStory('s1'))?.arcs).toHaveLength(5);
    });

    it('saves and reads universes', async () => {
      await store.saveUniverse(hogwarts);

      expect(await store.getUniverse('Harry Potter')).toEqual(hogwarts);
      expect(await store.listUniverses()).toEqual([hogwarts]);
      expect(await store.getUniverse('Narnia')).toBeNull();
    });
  });
}

describeStoreContract('MemoryStore', {
  create: async () => new MemoryStore(),
  cleanup: async () => undefined,
});

let tmpDir = '';

describeStoreContract('FileStore', {
  create: async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'epic-store-'));
    return new FileStore(tmpDir);
  },
  cleanup: async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  },
});

describe('FileStore on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'epic-files-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('survives a restart', async () => {
    const story = makeStory('s1');
    const first = new FileStore(dir);
    await first.createStory(story, initialState(story));
    await first.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1));

    const second = new FileStore(dir);
    expect(await second.getCursor('s1')).toEqual({ arcIndex: 1, chapter: 1 });
    expect((await second.getChapter('s1', 1))?.text).toBe('Harry Potter walked on in chapter 1.');
  });

  it('ignores a chapter file written beyond the cursor', async () => {
    const story = makeStory('s1');
    const store = new FileStore(dir);
    await store.createStory(story, initialState(story));
    // A crash between the chapter write and the state rename leaves this behind
    await fs.writeFile(
      path.join(dir, 'stories', 's1', 'chapters', '0001.json'),
      JSON.stringify({ ...makeDraft('s1', 1), text: 'orphaned draft', version: 1 }),
      'utf-8'
    );

    expect(await store.getChapter('s1', 1)).toBeNull();
    expect(await store.listChapters('s1')).toEqual([]);

    await store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1));
    expect((await store.getChapter('s1', 1))?.text).toBe('Harry Potter walked on in chapter 1.');
  });

  it('does not resolve story ids outside its root directory', async () => {
    const victim = makeStory('victim');
    const outside = new FileStore(path.join(dir, 'other'));
    await outside.createStory(victim, initialState(victim));

    const store = new FileStore(path.join(dir, 'root'));
    const escaping = '../../other/stories/victim';

    expect(await store.getStory(escaping)).toBeNull();
    expect(await store.getCursor(escaping)).toBeNull();
    expect(await store.getContinuity(escaping)).toBeNull();
    expect(await store.listChapters(escaping)).toEqual([]);
    await expect(
      store.commitChapter(escaping, 0, makeDraft(escaping, 1), foldedState('victim', 1))
    ).rejects.toBeInstanceOf(StoryNotFoundError);
    await expect(store.createStory({ ...victim, id: escaping }, initialState(victim))).rejects.toThrow(
      'Invalid story id'
    );

    expect(await outside.getCursor('victim')).toEqual({ arcIndex: 1, chapter: 0 });
  });

  it('lets only one of two racing commits through', async () => {
    const story = makeStory('s1');
    const store = new FileStore(dir);
    await store.createStory(story, initialState(story));

    const results = await Promise.allSettled([
      store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1)),
      store.commitChapter('s1', 0, makeDraft('s1', 1), foldedState('s1', 1)),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(CursorConflictError);
  });
});
