import { ContinuityTracker } from './context/continuityTracker.js';
import { planEpic } from './epicPlanner.js';
import {
  InvalidPremiseError,
  StoryNotFoundError,
  isEpicEngineError,
  type ResumePoint,
} from './errors.js';
import { eventBus as defaultEventBus, type EngineEventBus } from './eventBus.js';
import { ChapterBatchGenerator } from './generateChapter.js';
import type { GenerationBackend } from './services/aiClient.js';
import * as logger from './services/logger.js';
import type { RetryPolicy } from './services/retryPolicy.js';
import type { EpicStore } from './storage/types.js';
import type { ContinuityLimits, ContinuityState } from './types/continuity.js';
import type { AdvanceProgress, Chapter, Story, StoryCursor } from './types/story.js';
import { UniverseSchema, type Universe, type UniverseInput } from './types/universe.js';
import { loadPredefinedUniverses, mergeCatalog } from './universes.js';
import { StoryLocks } from './utils/storyLock.js';

export type EpicOrchestratorDeps = {
  backend: GenerationBackend;
  store: EpicStore;
  retryPolicy: RetryPolicy;
  continuityLimits?: Partial<ContinuityLimits>;
  events?: EngineEventBus;
};

export type CreateEpicParams = {
  /** A universe definition, or the name of a catalog universe */
  universe: UniverseInput | string;
  theme: string;
  protagonist: string;
  title: string;
};

export type AdvanceOptions = {
  signal?: AbortSignal;
  /**
   * Where the caller believes the batch starts. The persisted cursor always
   * wins; a mismatch is only logged.
   */
  startChapter?: number;
};

export type StoryProgressStats = {
  storyId: string;
  title: string;
  cursor: StoryCursor;
  totalChapters: number;
  /** Share of the saga committed so far, 0..1 */
  progress: number;
  generation: logger.StoryStats | null;
  recentErrors: Array<{ chapter: number; error: string; timestamp: string }>;
};

/**
 * Public entry point of the engine: plans epics, advances them batch by
 * batch, and serves read access for presentation layers.
 */
export class EpicOrchestrator {
  readonly tracker: ContinuityTracker;
  private readonly generator: ChapterBatchGenerator;
  private readonly locks = new StoryLocks();
  private readonly events: EngineEventBus;

  constructor(private readonly deps: EpicOrchestratorDeps) {
    this.events = deps.events ?? defaultEventBus;
    this.tracker = new ContinuityTracker(deps.backend, deps.retryPolicy, deps.continuityLimits);
    this.generator = new ChapterBatchGenerator({
      backend: deps.backend,
      store: deps.store,
      tracker: this.tracker,
      retryPolicy: deps.retryPolicy,
      events: this.events,
    });
  }

  async createEpic(params: CreateEpicParams): Promise<string> {
    const universe = typeof params.universe === 'string'
      ? await this.resolveUniverse(params.universe)
      : params.universe;

    const story = await planEpic(
      { backend: this.deps.backend, store: this.deps.store, retryPolicy: this.deps.retryPolicy },
      { universe, theme: params.theme, protagonist: params.protagonist, title: params.title }
    );
    this.events.success(`Planned "${story.title}" (${story.arcs.length} arcs)`, story.id);
    return story.id;
  }

  private async resolveUniverse(name: string): Promise<Universe> {
    const universe = await this.getUniverse(name);
    if (!universe) {
      throw new InvalidPremiseError(`Unknown universe: ${name}`);
    }
    return universe;
  }

  /**
   * Generates the next `numChapters` chapters of `arcIndex`, starting right
   * after the persisted cursor.
   *
   * The story lock is taken before this method returns, so a second call for
   * the same story made in the same tick is already rejected with
   * `StoryBusyError`. Errors carry a `resume` point.
   */
  advance(
    storyId: string,
    arcIndex: number,
    numChapters: number,
    options: AdvanceOptions = {}
  ): Promise<AdvanceProgress> {
    let release: () => void;
    try {
      release = this.locks.acquire(storyId);
    } catch (error) {
      return this.failWithResume(error, storyId, numChapters, 0);
    }
    return this.runAdvance(storyId, arcIndex, numChapters, options).finally(release);
  }

  private async runAdvance(
    storyId: string,
    arcIndex: number,
    numChapters: number,
    options: AdvanceOptions
  ): Promise<AdvanceProgress> {
    const committed: number[] = [];

    try {
      const story = await this.deps.store.getStory(storyId);
      if (!story) {
        throw new StoryNotFoundError(storyId);
      }

      const startChapter = story.cursor.chapter + 1;
      if (options.startChapter !== undefined && options.startChapter !== startChapter) {
        logger.warn(`Ignoring requested start chapter ${options.startChapter}, continuing from the cursor`, {
          storyId,
          startChapter,
        });
      }

      this.events.progress({
        storyId,
        arcIndex,
        current: 0,
        total: numChapters,
        chapter: startChapter,
        status: 'starting',
        message: `Advancing arc ${arcIndex} by ${numChapters} chapters from chapter ${startChapter}`,
      });

      for await (const chapter of this.generator.generateBatch(story, arcIndex, startChapter, numChapters, {
        signal: options.signal,
      })) {
        committed.push(chapter.number);
      }

      const cursor = (await this.deps.store.getCursor(storyId)) ?? story.cursor;
      this.events.progress({
        storyId,
        arcIndex,
        current: committed.length,
        total: numChapters,
        chapter: cursor.chapter,
        status: 'done',
      });
      this.events.success(`Committed ${committed.length} chapters, cursor at ${cursor.chapter}`, storyId);

      return {
        storyId,
        arcIndex,
        requested: numChapters,
        completed: committed.length,
        startChapter,
        chapters: committed,
        lastCommittedChapter: cursor.chapter,
        cursor,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.events.progress({
        storyId,
        arcIndex,
        current: committed.length,
        total: numChapters,
        chapter: (committed[committed.length - 1] ?? 0) + 1,
        status: 'error',
        message,
      });
      this.events.error(`Advance stopped after ${committed.length}/${numChapters} chapters: ${message}`, storyId);
      return this.failWithResume(error, storyId, numChapters, committed.length);
    }
  }

  private async failWithResume(
    error: unknown,
    storyId: string,
    requested: number,
    completed: number
  ): Promise<never> {
    if (isEpicEngineError(error) && !error.resume) {
      error.resume = await this.resumePoint(storyId, requested, completed);
    }
    throw error;
  }

  private async resumePoint(storyId: string, requested: number, completed: number): Promise<ResumePoint> {
    const cursor = (await this.deps.store.getCursor(storyId)) ?? { arcIndex: 1, chapter: 0 };
    return {
      storyId,
      lastCommittedChapter: cursor.chapter,
      cursor,
      requested,
      completed,
    };
  }

  async getStory(storyId: string): Promise<Story> {
    const story = await this.deps.store.getStory(storyId);
    if (!story) {
      throw new StoryNotFoundError(storyId);
    }
    return story;
  }

  /**
   * Null when the chapter has not been committed yet
   */
  async getChapter(storyId: string, number: number): Promise<Chapter | null> {
    await this.getStory(storyId);
    return this.deps.store.getChapter(storyId, number);
  }

  async listChapters(storyId: string, from?: number, to?: number): Promise<Chapter[]> {
    await this.getStory(storyId);
    return this.deps.store.listChapters(storyId, from, to);
  }

  async listStories(): Promise<Story[]> {
    return this.deps.store.listStories();
  }

  async getContinuity(storyId: string): Promise<ContinuityState> {
    const state = await this.deps.store.getContinuity(storyId);
    if (!state) {
      throw new StoryNotFoundError(storyId);
    }
    return state;
  }

  async getStats(storyId: string): Promise<StoryProgressStats> {
    const story = await this.getStory(storyId);
    return {
      storyId,
      title: story.title,
      cursor: story.cursor,
      totalChapters: story.totalChapters,
      progress: story.cursor.chapter / story.totalChapters,
      generation: logger.getStoryStats(storyId),
      recentErrors: logger.getRecentErrors(storyId).map((m) => ({
        chapter: m.chapter,
        error: m.error ?? '',
        timestamp: m.timestamp.toISOString(),
      })),
    };
  }

  /**
   * Drops the in-memory generation metrics of a story
   */
  async resetStats(storyId: string): Promise<void> {
    await this.getStory(storyId);
    logger.clearStoryMetrics(storyId);
  }

  /**
   * Plain-text rendering of every committed chapter
   */
  async exportStory(storyId: string): Promise<string> {
    const story = await this.getStory(storyId);
    const chapters = await this.deps.store.listChapters(storyId);

    const parts = [story.title, '', story.summary, ''];
    for (const arc of story.arcs) {
      const inArc = chapters.filter((c) => c.arcIndex === arc.index);
      if (inArc.length === 0) continue;
      parts.push(`=== Arc ${arc.index}: ${arc.name} ===`, '');
      for (const chapter of inArc) {
        parts.push(chapter.title, '', chapter.text, '');
      }
    }
    return parts.join('\n').trimEnd() + '\n';
  }

  /**
   * Predefined universes plus saved ones; a saved universe replaces a
   * predefined one of the same name.
   */
  async listUniverses(): Promise<Universe[]> {
    return mergeCatalog(await loadPredefinedUniverses(), await this.deps.store.listUniverses());
  }

  async saveUniverse(input: UniverseInput): Promise<Universe> {
    const parsed = UniverseSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidPremiseError(
        `Invalid universe: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }
    await this.deps.store.saveUniverse(parsed.data);
    logger.info(`Saved universe "${parsed.data.name}"`);
    return parsed.data;
  }

  /**
   * Looks a universe up by name, case-insensitively
   */
  async getUniverse(name: string): Promise<Universe | null> {
    const saved = await this.deps.store.getUniverse(name);
    if (saved) return saved;
    const key = name.trim().toLowerCase();
    const catalog = await this.listUniverses();
    return catalog.find((u) => u.name.toLowerCase() === key) ?? null;
  }
}
