import type { ContinuityState } from '../types/continuity.js';
import type { Chapter, Story, StoryCursor } from '../types/story.js';
import type { Universe } from '../types/universe.js';

/**
 * Chapter as handed to the store. The store assigns `version`: committed
 * chapters are never edited in place, so a first commit is always version 1.
 */
export type ChapterDraft = Omit<Chapter, 'version'>;

/**
 * Record store for universes, stories, chapters and continuity state.
 *
 * `commitChapter` is the only way a story moves forward: the chapter, the
 * folded continuity state and the cursor are written together, and only if
 * the cursor still equals `expectedCursor` (compare-and-set).
 */
export interface EpicStore {
  saveUniverse(universe: Universe): Promise<void>;
  getUniverse(name: string): Promise<Universe | null>;
  listUniverses(): Promise<Universe[]>;

  createStory(story: Story, state: ContinuityState): Promise<void>;
  getStory(storyId: string): Promise<Story | null>;
  listStories(): Promise<Story[]>;
  getCursor(storyId: string): Promise<StoryCursor | null>;

  getContinuity(storyId: string): Promise<ContinuityState | null>;

  /** Committed chapter, null for numbers beyond the cursor */
  getChapter(storyId: string, number: number): Promise<Chapter | null>;
  /** Committed chapters in [from, to], ascending */
  listChapters(storyId: string, from?: number, to?: number): Promise<Chapter[]>;

  commitChapter(
    storyId: string,
    expectedCursor: number,
    chapter: ChapterDraft,
    state: ContinuityState
  ): Promise<Chapter>;
}
