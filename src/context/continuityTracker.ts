/**
 * Continuity state tracker
 *
 * Keeps a bounded memory of the story so far:
 * 1. the last K chapter recaps verbatim
 * 2. a compressed summary of everything older
 * 3. current status per character and the open plot threads
 *
 * Prompt context size depends on K and the fixed caps, never on how many
 * chapters exist.
 */

import type { GenerationBackend } from '../services/aiClient.js';
import { RetryExhaustedError, type RetryPolicy } from '../services/retryPolicy.js';
import * as logger from '../services/logger.js';
import { ContinuityFoldError } from '../errors.js';
import {
  DEFAULT_CONTINUITY_LIMITS,
  type ContinuityLimits,
  type ContinuityState,
  type PromptContext,
  type WindowEntry,
} from '../types/continuity.js';
import { arcLocalNumber, isCliffhangerChapter, type Arc, type ChapterRecap, type Story } from '../types/story.js';
import { clipText, normalize, truncateBySentences } from '../utils/rollingSummary.js';
import { normalizeThreadId } from '../utils/recap.js';

export type FoldResult = {
  state: ContinuityState;
  /** Whether evicted window entries were compressed into the summary */
  compressed: boolean;
};

export function initialState(story: Pick<Story, 'id' | 'protagonist'>): ContinuityState {
  return {
    storyId: story.id,
    lastChapter: 0,
    summary: '',
    window: [],
    characters: {
      [story.protagonist]: { status: 'at the start of the journey', updatedAt: 0 },
    },
    threads: {},
  };
}

function formatRecap(entry: WindowEntry, maxChars: number): string {
  const { recap } = entry;
  const changes = Object.entries(recap.characters)
    .map(([name, status]) => `${name}: ${status}`)
    .join('; ');
  const opened = recap.openedThreads.map((t) => t.id).join(', ');
  const resolved = recap.resolvedThreads.join(', ');

  let line = `Chapter ${entry.chapter}: ${recap.summary}`;
  if (changes) line += ` [Changes: ${changes}]`;
  if (opened) line += ` [Opened: ${opened}]`;
  if (resolved) line += ` [Resolved: ${resolved}]`;
  return clipText(line, maxChars);
}

/**
 * Renders the prompt context for `nextChapter`.
 */
export function contextFor(
  state: ContinuityState,
  arc: Arc,
  nextChapter: number,
  limits: ContinuityLimits = DEFAULT_CONTINUITY_LIMITS
): PromptContext {
  const cliffhanger = isCliffhangerChapter(arc, nextChapter);
  const local = arcLocalNumber(arc, nextChapter);
  const arcLength = arc.endChapter - arc.startChapter + 1;

  const characters = Object.entries(state.characters)
    .sort((a, b) => b[1].updatedAt - a[1].updatedAt)
    .slice(0, limits.maxCharacters)
    .map(([name, entry]) => `- ${name}: ${clipText(entry.status, 160)}`);

  const threads = Object.entries(state.threads)
    .sort((a, b) => b[1].openedAt - a[1].openedAt)
    .slice(0, limits.maxThreads)
    .map(([id, thread]) => `- ${id}: ${clipText(thread.description, 160)}`);

  // The window is bounded by K on fold; the slice keeps rendering bounded even
  // for a state written under a larger K.
  const recent = state.window
    .slice(-limits.windowSize)
    .map((entry) => formatRecap(entry, limits.maxRecapChars));

  const sections = [
    `[Arc ${arc.index}: ${arc.name}]`,
    `- Chapters ${arc.startChapter}-${arc.endChapter}, this is chapter ${local}/${arcLength} of the arc`,
    `- Entry conflict: ${arc.brief.entryConflict}`,
    `- Expected growth: ${arc.brief.characterGrowth}`,
    `- Exit state: ${arc.brief.exitState}`,
    '',
    '[Story so far]',
    truncateBySentences(state.summary, limits.maxSummaryChars, true) || '(nothing yet)',
    '',
    '[Recent chapters]',
    recent.length ? recent.join('\n') : '(none)',
    '',
    '[Characters]',
    characters.length ? characters.join('\n') : '(none)',
    '',
    '[Open threads]',
    threads.length ? threads.join('\n') : '(none)',
  ];

  if (cliffhanger) {
    sections.push(
      '',
      '[CLIFFHANGER REQUIRED]',
      `Chapter ${nextChapter} is a cliffhanger chapter: end on an unresolved, high-tension moment.`
    );
  }

  return {
    chapter: nextChapter,
    arcIndex: arc.index,
    cliffhanger,
    text: sections.join('\n'),
  };
}

function buildCompressionPrompt(summary: string, evicted: WindowEntry[], maxChars: number): string {
  const recaps = evicted.map((entry) => `Chapter ${entry.chapter}: ${entry.recap.summary}`).join(' ');
  return `
Merge the oldest chapter recaps into the running summary of the story.
Keep causes, consequences and character changes; drop scene detail.
Reply with the new summary only, at most ${maxChars} characters, as plain prose.

- Summary so far: ${normalize(summary).replace(/\n/g, ' ') || '(none)'}
- Oldest recap: ${recaps.replace(/\n/g, ' ')}
`.trim();
}

export class ContinuityTracker {
  readonly limits: ContinuityLimits;

  constructor(
    private readonly backend: GenerationBackend,
    private readonly retryPolicy: RetryPolicy,
    limits: Partial<ContinuityLimits> = {}
  ) {
    this.limits = { ...DEFAULT_CONTINUITY_LIMITS, ...limits };
  }

  initialState(story: Pick<Story, 'id' | 'protagonist'>): ContinuityState {
    return initialState(story);
  }

  contextFor(state: ContinuityState, arc: Arc, nextChapter: number): PromptContext {
    return contextFor(state, arc, nextChapter, this.limits);
  }

  /**
   * Folds a chapter's recap into a new state. The input state is never
   * mutated; on failure nothing changes and `ContinuityFoldError` is thrown.
   */
  async fold(
    state: ContinuityState,
    chapter: number,
    chapterText: string,
    recap: ChapterRecap,
    signal?: AbortSignal
  ): Promise<FoldResult> {
    let window: WindowEntry[] = [...state.window, { chapter, recap }];
    let summary = state.summary;
    let compressed = false;

    // A state written under a larger K can hold several extra entries; they
    // are merged in one call.
    const excess = window.length - this.limits.windowSize;
    if (excess > 0) {
      summary = await this.compress(summary, window.slice(0, excess), chapter, signal);
      window = window.slice(excess);
      compressed = true;
    }

    // Maps keep names such as "constructor" or "__proto__" ordinary keys
    const characters = new Map(Object.entries(state.characters));
    for (const [name, status] of Object.entries(recap.characters)) {
      characters.set(name, { status, updatedAt: chapter });
    }

    const threads = new Map(Object.entries(state.threads));
    for (const thread of recap.openedThreads) {
      if (!threads.has(thread.id)) {
        threads.set(thread.id, { description: thread.description, openedAt: chapter });
      }
    }
    for (const id of recap.resolvedThreads) {
      threads.delete(normalizeThreadId(id));
    }

    logger.debug(`Folded chapter ${chapter}`, {
      storyId: state.storyId,
      window: window.length,
      summaryChars: summary.length,
      textChars: chapterText.length,
    });

    return {
      state: {
        storyId: state.storyId,
        lastChapter: chapter,
        summary,
        window,
        characters: Object.fromEntries(characters),
        threads: Object.fromEntries(threads),
      },
      compressed,
    };
  }

  private async compress(
    summary: string,
    evicted: WindowEntry[],
    chapter: number,
    signal?: AbortSignal
  ): Promise<string> {
    const prompt = buildCompressionPrompt(summary, evicted, this.limits.maxSummaryChars);
    try {
      const reply = await this.retryPolicy.execute(
        () =>
          this.backend.generate(prompt, {
            purpose: 'compress',
            system: 'You are a meticulous story editor who writes compact continuity summaries.',
            temperature: 0.2,
            signal,
          }),
        { signal, label: `summary compression (chapter ${chapter})` }
      );
      return truncateBySentences(reply, this.limits.maxSummaryChars, true);
    } catch (error) {
      if (signal?.aborted || !(error instanceof RetryExhaustedError)) {
        throw error;
      }
      throw new ContinuityFoldError(chapter, { cause: error.lastError });
    }
  }
}
