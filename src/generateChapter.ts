import { z } from 'zod';
import type { ContinuityTracker } from './context/continuityTracker.js';
import {
  ArcBoundaryError,
  GenerationBackendError,
  GenerationCancelledError,
  InvalidBatchRequestError,
  OutOfOrderError,
  StoryNotFoundError,
} from './errors.js';
import { eventBus as defaultEventBus, type EngineEventBus } from './eventBus.js';
import type { GenerationBackend } from './services/aiClient.js';
import * as logger from './services/logger.js';
import { RetryExhaustedError, type RetryPolicy } from './services/retryPolicy.js';
import type { ChapterDraft, EpicStore } from './storage/types.js';
import type { ContinuityState, PromptContext } from './types/continuity.js';
import {
  MAX_BATCH_SIZE,
  TOTAL_CHAPTERS,
  getArc,
  type Arc,
  type Chapter,
  type ChapterRecap,
  type Story,
} from './types/story.js';
import { formatUniverseForPrompt } from './types/universe.js';
import {
  countWords,
  defaultChapterTitle,
  findFeaturedCharacters,
  splitChapterText,
} from './utils/chapterText.js';
import { RECAP_CLOSE, RECAP_OPEN, extractRecap, heuristicRecap, parseRecapJson } from './utils/recap.js';

const BatchRequestSchema = z.object({
  arcIndex: z.number().int(),
  startChapter: z.number().int().positive(),
  count: z.number().int().min(1).max(MAX_BATCH_SIZE),
});

export type ChapterBatchGeneratorDeps = {
  backend: GenerationBackend;
  store: EpicStore;
  tracker: ContinuityTracker;
  retryPolicy: RetryPolicy;
  events?: EngineEventBus;
};

export type GenerateBatchOptions = {
  signal?: AbortSignal;
};

/**
 * Build the system prompt
 */
function buildSystemPrompt(chapterNumber: number, isFinal: boolean): string {
  return `
You are the writer of a long-running serialized saga. Every chapter must stay
consistent with the story bible, the arc brief and the continuity notes you
are given.

Hard rules:
- Only the final chapter of the saga may wrap up the main plot (final chapter: ${isFinal})
- Every chapter must move the arc's conflict forward
- Start with a heading line "Chapter ${chapterNumber}: <title>"

After the chapter, append a recap block exactly in this form:
${RECAP_OPEN}
{"summary": "2-4 sentences on what changed", "characters": {"Name": "new status"}, "openedThreads": [{"id": "short-id", "description": "..."}], "resolvedThreads": ["short-id"]}
${RECAP_CLOSE}
`.trim();
}

/**
 * Build the user prompt
 */
function buildChapterPrompt(story: Story, arc: Arc, context: PromptContext): string {
  return `
[Universe]
${formatUniverseForPrompt(story.universe)}

[Saga]
- Title: ${story.title}
- Main theme: ${story.theme}
- Protagonist: ${story.protagonist}

[Chapter]
- Chapter number: ${context.chapter}
- Total chapters: ${story.totalChapters}
- Character focus: ${arc.characterFocus.join(', ')}

${context.text}

Write chapter ${context.chapter}:
`.trim();
}

function buildRecapPrompt(body: string, chapterNumber: number, knownCharacters: string[]): string {
  return `
Summarize what changed in chapter ${chapterNumber} as strict JSON, no Markdown fences:
{"summary": "2-4 sentences", "characters": {"Name": "new status"}, "openedThreads": [{"id": "short-id", "description": "..."}], "resolvedThreads": ["short-id"]}

- Known characters: ${knownCharacters.join(', ')}

[Chapter ${chapterNumber}]
${body}
`.trim();
}

/**
 * Generates chapters strictly in order and commits each one together with
 * the folded continuity state before moving on.
 */
export class ChapterBatchGenerator {
  private readonly events: EngineEventBus;

  constructor(private readonly deps: ChapterBatchGeneratorDeps) {
    this.events = deps.events ?? defaultEventBus;
  }

  /**
   * Yields each chapter once it is committed. Stopping early (or failing)
   * leaves every chapter yielded so far persisted, so a later call can
   * continue from the cursor.
   */
  async *generateBatch(
    story: Story,
    arcIndex: number,
    startChapter: number,
    count: number,
    options: GenerateBatchOptions = {}
  ): AsyncGenerator<Chapter, void, undefined> {
    const { signal } = options;
    const arc = await this.validate(story, arcIndex, startChapter, count);

    const state = await this.deps.store.getContinuity(story.id);
    if (!state) {
      throw new StoryNotFoundError(story.id);
    }

    let current = state;
    let lastCommitted = startChapter - 1;

    for (let i = 0; i < count; i++) {
      const chapterNumber = startChapter + i;
      if (signal?.aborted) {
        throw new GenerationCancelledError(chapterNumber);
      }

      this.events.progress({
        storyId: story.id,
        arcIndex,
        current: i,
        total: count,
        chapter: chapterNumber,
        status: 'generating',
        message: `Generating chapter ${chapterNumber}`,
      });

      const { chapter, state: folded } = await this.writeChapter(
        story,
        arc,
        current,
        chapterNumber,
        lastCommitted,
        signal
      );

      current = folded;
      lastCommitted = chapterNumber;

      this.events.progress({
        storyId: story.id,
        arcIndex,
        current: i + 1,
        total: count,
        chapter: chapterNumber,
        chapterTitle: chapter.title,
        status: 'committed',
      });

      yield chapter;
    }
  }

  private async validate(story: Story, arcIndex: number, startChapter: number, count: number): Promise<Arc> {
    const request = BatchRequestSchema.safeParse({ arcIndex, startChapter, count });
    if (!request.success) {
      throw new InvalidBatchRequestError(
        `Invalid batch request: ${request.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }

    const arc = getArc(story, arcIndex);
    if (!arc) {
      throw new ArcBoundaryError(arcIndex, startChapter, count, `story has no arc ${arcIndex}`);
    }
    const endChapter = startChapter + count - 1;
    if (startChapter < arc.startChapter || endChapter > arc.endChapter) {
      throw new ArcBoundaryError(
        arcIndex,
        startChapter,
        count,
        `arc covers chapters ${arc.startChapter}-${arc.endChapter}`
      );
    }

    const cursor = await this.deps.store.getCursor(story.id);
    if (!cursor) {
      throw new StoryNotFoundError(story.id);
    }
    if (startChapter !== cursor.chapter + 1) {
      throw new OutOfOrderError(startChapter, cursor.chapter + 1);
    }
    return arc;
  }

  private async writeChapter(
    story: Story,
    arc: Arc,
    state: ContinuityState,
    chapterNumber: number,
    lastCommitted: number,
    signal: AbortSignal | undefined
  ): Promise<{ chapter: Chapter; state: ContinuityState }> {
    const { backend, store, tracker } = this.deps;
    const timer = logger.createTimer();
    const phaseTimes: logger.GenerationMetrics['phaseTimes'] = {};
    let promptTokens = 0;
    let outputTokens = 0;
    let recapRequested = false;

    try {
      const context = await logger.measureTime(
        'context_build',
        async () => tracker.contextFor(state, arc, chapterNumber),
        phaseTimes
      );
      const system = buildSystemPrompt(chapterNumber, chapterNumber === TOTAL_CHAPTERS);
      const prompt = buildChapterPrompt(story, arc, context);
      promptTokens += logger.estimateTokens(system + prompt);

      if (logger.getLogConfig().logPrompts) {
        logger.debug(`[Chapter ${chapterNumber}] Prompt`, { storyId: story.id, system, prompt });
      }

      const raw = await logger.measureTime(
        'model_call',
        () =>
          this.callBackend(
            () => backend.generate(prompt, { purpose: 'chapter', system, temperature: 0.85, signal }),
            chapterNumber,
            lastCommitted,
            signal
          ),
        phaseTimes
      );
      outputTokens += logger.estimateTokens(raw);

      const { text, recap, requested } = await logger.measureTime(
        'recap_extract',
        async () => {
          const extracted = extractRecap(raw);
          if (extracted.recap) {
            return { text: extracted.body, recap: extracted.recap, requested: false };
          }
          const knownCharacters = Object.keys(state.characters);
          const recapPrompt = buildRecapPrompt(extracted.body, chapterNumber, knownCharacters);
          promptTokens += logger.estimateTokens(recapPrompt);
          const reply = await this.callBackend(
            () => backend.generate(recapPrompt, { purpose: 'recap', temperature: 0.2, signal }),
            chapterNumber,
            lastCommitted,
            signal
          );
          outputTokens += logger.estimateTokens(reply);
          const parsed: ChapterRecap | null = parseRecapJson(reply);
          if (!parsed) {
            logger.warn(`[Chapter ${chapterNumber}] Recap reply unparseable, deriving recap from text`, {
              storyId: story.id,
            });
          }
          return {
            text: extracted.body,
            recap: parsed ?? heuristicRecap(extracted.body, chapterNumber, knownCharacters),
            requested: true,
          };
        },
        phaseTimes
      );
      recapRequested = requested;

      const { title, body } = splitChapterText(text, chapterNumber);

      const folded = await logger.measureTime(
        'continuity_fold',
        () => this.guardCancel(() => tracker.fold(state, chapterNumber, body, recap, signal), chapterNumber, signal),
        phaseTimes
      );

      // Last point where a cancellation discards the chapter
      if (signal?.aborted) {
        throw new GenerationCancelledError(chapterNumber);
      }

      const draft: ChapterDraft = {
        storyId: story.id,
        number: chapterNumber,
        arcIndex: arc.index,
        title: title ?? defaultChapterTitle(chapterNumber, arc.theme),
        text: body,
        recap,
        cliffhanger: context.cliffhanger,
        wordCount: countWords(body),
        charactersFeatured: findFeaturedCharacters(body, [story.protagonist, ...story.universe.mainCharacters]),
        createdAt: new Date().toISOString(),
      };

      const chapter = await logger.measureTime(
        'state_save',
        () => store.commitChapter(story.id, chapterNumber - 1, draft, folded.state),
        phaseTimes
      );

      logger.logGenerationMetrics({
        storyId: story.id,
        chapter: chapterNumber,
        promptTokens,
        outputTokens,
        generationTime: timer.elapsed(),
        phaseTimes,
        recapRequested,
        compressed: folded.compressed,
        timestamp: new Date(),
      });

      return { chapter, state: folded.state };
    } catch (error) {
      logger.logGenerationMetrics({
        storyId: story.id,
        chapter: chapterNumber,
        promptTokens,
        outputTokens,
        generationTime: timer.elapsed(),
        phaseTimes,
        recapRequested,
        compressed: false,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date(),
      });
      throw error;
    }
  }

  /**
   * Runs a backend call under the retry policy and maps its failures to
   * engine errors.
   */
  private async callBackend(
    call: () => Promise<string>,
    chapterNumber: number,
    lastCommitted: number,
    signal: AbortSignal | undefined
  ): Promise<string> {
    return this.guardCancel(async () => {
      try {
        return await this.deps.retryPolicy.execute(call, {
          signal,
          label: `chapter ${chapterNumber}`,
        });
      } catch (error) {
        if (error instanceof RetryExhaustedError) {
          throw new GenerationBackendError(chapterNumber, lastCommitted, error.attempts, {
            cause: error.lastError,
          });
        }
        throw error;
      }
    }, chapterNumber, signal);
  }

  private async guardCancel<T>(
    task: () => Promise<T>,
    chapterNumber: number,
    signal: AbortSignal | undefined
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (signal?.aborted) {
        throw new GenerationCancelledError(chapterNumber);
      }
      throw error;
    }
  }
}
