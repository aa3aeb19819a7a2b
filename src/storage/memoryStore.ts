import { CursorConflictError, StoryNotFoundError } from '../errors.js';
import type { ContinuityState } from '../types/continuity.js';
import type { Chapter, Story, StoryCursor } from '../types/story.js';
import type { Universe } from '../types/universe.js';
import type { ChapterDraft, EpicStore } from './types.js';

type StoryRecord = {
  story: Story;
  state: ContinuityState;
  chapters: Map<number, Chapter>;
};

/**
 * Process-local store. Records are cloned on the way in and out so callers
 * can never mutate committed data.
 */
export class MemoryStore implements EpicStore {
  private readonly universes = new Map<string, Universe>();
  private readonly stories = new Map<string, StoryRecord>();

  async saveUniverse(universe: Universe): Promise<void> {
    this.universes.set(universe.name, structuredClone(universe));
  }

  async getUniverse(name: string): Promise<Universe | null> {
    const universe = this.universes.get(name);
    return universe ? structuredClone(universe) : null;
  }

  async listUniverses(): Promise<Universe[]> {
    return [...this.universes.values()].map((u) => structuredClone(u));
  }

  async createStory(story: Story, state: ContinuityState): Promise<void> {
    if (this.stories.has(story.id)) {
      throw new Error(`Story already exists: ${story.id}`);
    }
    this.stories.set(story.id, {
      story: structuredClone(story),
      state: structuredClone(state),
      chapters: new Map(),
    });
  }

  async getStory(storyId: string): Promise<Story | null> {
    const record = this.stories.get(storyId);
    return record ? structuredClone(record.story) : null;
  }

  async listStories(): Promise<Story[]> {
    return [...this.stories.values()]
      .map((record) => structuredClone(record.story))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async getCursor(storyId: string): Promise<StoryCursor | null> {
    const record = this.stories.get(storyId);
    return record ? { ...record.story.cursor } : null;
  }

  async getContinuity(storyId: string): Promise<ContinuityState | null> {
    const record = this.stories.get(storyId);
    return record ? structuredClone(record.state) : null;
  }

  async getChapter(storyId: string, number: number): Promise<Chapter | null> {
    const chapter = this.stories.get(storyId)?.chapters.get(number);
    return chapter ? structuredClone(chapter) : null;
  }

  async listChapters(storyId: string, from = 1, to = Number.MAX_SAFE_INTEGER): Promise<Chapter[]> {
    const record = this.stories.get(storyId);
    if (!record) return [];
    const out: Chapter[] = [];
    const last = Math.min(to, record.story.cursor.chapter);
    for (let n = Math.max(1, from); n <= last; n++) {
      const chapter = record.chapters.get(n);
      if (chapter) out.push(structuredClone(chapter));
    }
    return out;
  }

  async commitChapter(
    storyId: string,
    expectedCursor: number,
    chapter: ChapterDraft,
    state: ContinuityState
  ): Promise<Chapter> {
    const record = this.stories.get(storyId);
    if (!record) {
      throw new StoryNotFoundError(storyId);
    }
    const actual = record.story.cursor.chapter;
    if (actual !== expectedCursor || chapter.number !== expectedCursor + 1) {
      throw new CursorConflictError(storyId, expectedCursor, actual);
    }

    // The cursor check guarantees no committed record exists for this number
    const committed: Chapter = { ...structuredClone(chapter), version: 1 };
    record.chapters.set(chapter.number, committed);
    record.state = structuredClone(state);
    record.story = {
      ...record.story,
      cursor: { arcIndex: chapter.arcIndex, chapter: chapter.number },
      updatedAt: chapter.createdAt,
    };
    return structuredClone(committed);
  }
}
