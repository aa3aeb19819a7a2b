import type { ChapterRecap } from './story.js';

export type WindowEntry = {
  chapter: number;
  recap: ChapterRecap;
};

export type CharacterStatus = {
  status: string;
  /** Chapter that last changed the status, 0 for the seed entry */
  updatedAt: number;
};

export type OpenThread = {
  description: string;
  openedAt: number;
};

/**
 * Bounded rolling memory of one story.
 *
 * `window` holds the last K recaps verbatim; everything older lives only in
 * the compressed `summary`.
 */
export type ContinuityState = {
  storyId: string;
  lastChapter: number;
  summary: string;
  window: WindowEntry[];
  characters: Record<string, CharacterStatus>;
  threads: Record<string, OpenThread>;
};

/**
 * Rendered prompt context for the next chapter.
 */
export type PromptContext = {
  chapter: number;
  arcIndex: number;
  cliffhanger: boolean;
  text: string;
};

export type ContinuityLimits = {
  /** K: verbatim recaps kept in the window */
  windowSize: number;
  /** Cap on the compressed cumulative summary */
  maxSummaryChars: number;
  /** Cap on each rendered recap */
  maxRecapChars: number;
  /** Characters rendered, most recently updated first */
  maxCharacters: number;
  /** Open threads rendered, newest first */
  maxThreads: number;
};

export const DEFAULT_CONTINUITY_LIMITS: ContinuityLimits = {
  windowSize: 10,
  maxSummaryChars: 2400,
  maxRecapChars: 600,
  maxCharacters: 16,
  maxThreads: 12,
};
