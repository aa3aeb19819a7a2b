import type { Universe } from './universe.js';

export const TOTAL_CHAPTERS = 1000;
export const ARC_COUNT = 5;
export const CHAPTERS_PER_ARC = 200;
export const CLIFFHANGER_INTERVAL = 10;
export const MAX_BATCH_SIZE = 50;

/**
 * Frozen thematic contract every chapter of an arc must honor.
 */
export type ArcBrief = {
  /** Conflict the arc opens with */
  entryConflict: string;
  /** How the protagonist and allies are expected to grow */
  characterGrowth: string;
  /** Situation at the end of the arc, handed to the next arc */
  exitState: string;
};

export type Arc = {
  /** 1..5 */
  index: number;
  name: string;
  theme: string;
  /** Inclusive */
  startChapter: number;
  /** Inclusive */
  endChapter: number;
  characterFocus: string[];
  brief: ArcBrief;
};

/**
 * Generation cursor. `chapter` is the last committed chapter, 0 before the first.
 */
export type StoryCursor = {
  arcIndex: number;
  chapter: number;
};

export type Story = {
  id: string;
  title: string;
  /** One-line saga blurb */
  summary: string;
  universe: Readonly<Universe>;
  theme: string;
  protagonist: string;
  totalChapters: number;
  arcs: Arc[];
  cursor: StoryCursor;
  createdAt: string;
  updatedAt: string;
};

export type ThreadRef = {
  id: string;
  description: string;
};

/**
 * Structured narrative delta of one chapter.
 */
export type ChapterRecap = {
  /** 2-4 sentences: what changed */
  summary: string;
  /** Character name -> new status */
  characters: Record<string, string>;
  openedThreads: ThreadRef[];
  /** Ids of threads closed in this chapter */
  resolvedThreads: string[];
};

export type Chapter = {
  storyId: string;
  number: number;
  arcIndex: number;
  title: string;
  text: string;
  recap: ChapterRecap;
  cliffhanger: boolean;
  wordCount: number;
  charactersFeatured: string[];
  /** Assigned by the store; 1 for every committed chapter */
  version: number;
  createdAt: string;
};

/**
 * Outcome of an advance call, also attached to errors as the resume point.
 */
export type AdvanceProgress = {
  storyId: string;
  arcIndex: number;
  requested: number;
  completed: number;
  startChapter: number;
  /** Chapter numbers committed by this call */
  chapters: number[];
  lastCommittedChapter: number;
  cursor: StoryCursor;
};

export function getArc(story: Pick<Story, 'arcs'>, arcIndex: number): Arc | undefined {
  return story.arcs.find((arc) => arc.index === arcIndex);
}

export function findArcForChapter(story: Pick<Story, 'arcs'>, chapter: number): Arc | undefined {
  return story.arcs.find((arc) => chapter >= arc.startChapter && chapter <= arc.endChapter);
}

/** Position of a chapter inside its arc, starting at 1. */
export function arcLocalNumber(arc: Pick<Arc, 'startChapter'>, chapter: number): number {
  return chapter - arc.startChapter + 1;
}

export function isCliffhangerChapter(arc: Pick<Arc, 'startChapter'>, chapter: number): boolean {
  return arcLocalNumber(arc, chapter) % CLIFFHANGER_INTERVAL === 0;
}
