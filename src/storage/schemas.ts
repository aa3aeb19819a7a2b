import { z } from 'zod';
import { UniverseSchema } from '../types/universe.js';

/**
 * Schemas for records read back from disk. They mirror the types in
 * types/story.ts and types/continuity.ts but accept anything the engine
 * itself has written, including short heuristic recaps.
 */

const CursorSchema = z.object({
  arcIndex: z.number().int(),
  chapter: z.number().int().nonnegative(),
});

const ArcSchema = z.object({
  index: z.number().int(),
  name: z.string(),
  theme: z.string(),
  startChapter: z.number().int(),
  endChapter: z.number().int(),
  characterFocus: z.array(z.string()),
  brief: z.object({
    entryConflict: z.string(),
    characterGrowth: z.string(),
    exitState: z.string(),
  }),
});

export const StoredStorySchema = z.object({
  id: z.string(),
  title: z.string(),
  summary: z.string(),
  universe: UniverseSchema,
  theme: z.string(),
  protagonist: z.string(),
  totalChapters: z.number().int(),
  arcs: z.array(ArcSchema),
  cursor: CursorSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
});

const StoredRecapSchema = z.object({
  summary: z.string(),
  characters: z.record(z.string()),
  openedThreads: z.array(z.object({ id: z.string(), description: z.string() })),
  resolvedThreads: z.array(z.string()),
});

export const StoredContinuitySchema = z.object({
  storyId: z.string(),
  lastChapter: z.number().int().nonnegative(),
  summary: z.string(),
  window: z.array(z.object({ chapter: z.number().int(), recap: StoredRecapSchema })),
  characters: z.record(z.object({ status: z.string(), updatedAt: z.number().int() })),
  threads: z.record(z.object({ description: z.string(), openedAt: z.number().int() })),
});

/** state.json: everything that moves on commit */
export const StoredStateSchema = z.object({
  cursor: CursorSchema,
  updatedAt: z.string(),
  continuity: StoredContinuitySchema,
});

export type StoredState = z.infer<typeof StoredStateSchema>;

export const StoredChapterSchema = z.object({
  storyId: z.string(),
  number: z.number().int().positive(),
  arcIndex: z.number().int(),
  title: z.string(),
  text: z.string(),
  recap: StoredRecapSchema,
  cliffhanger: z.boolean(),
  wordCount: z.number().int().nonnegative(),
  charactersFeatured: z.array(z.string()),
  version: z.number().int().positive(),
  createdAt: z.string(),
});
