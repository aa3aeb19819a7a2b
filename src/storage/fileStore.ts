import fs from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import type { z } from 'zod';
import { CursorConflictError, StoryNotFoundError } from '../errors.js';
import type { ContinuityState } from '../types/continuity.js';
import type { Chapter, Story, StoryCursor } from '../types/story.js';
import { UniverseSchema, type Universe } from '../types/universe.js';
import {
  StoredChapterSchema,
  StoredStateSchema,
  StoredStorySchema,
  type StoredState,
} from './schemas.js';
import type { ChapterDraft, EpicStore } from './types.js';

/**
 * JSON-file store.
 *
 * Layout under `rootDir`:
 *   universes/<slug>.json
 *   stories/<id>/story.json          metadata, written once
 *   stories/<id>/state.json          cursor + continuity, replaced on commit
 *   stories/<id>/chapters/0001.json  one file per chapter
 *
 * state.json is the commit point. It is replaced by rename, so a crash
 * leaves either the old or the new cursor; a chapter file written before a
 * crash sits beyond the cursor and is never read.
 */
export class FileStore implements EpicStore {
  private readonly commitQueues = new Map<string, Promise<unknown>>();

  constructor(private readonly rootDir: string) {}

  private universePath(name: string): string {
    return path.join(this.rootDir, 'universes', `${slugify(name)}.json`);
  }

  /**
   * Null for ids outside the nanoid alphabet, so an id can never name a path
   * outside `rootDir`.
   */
  private storyDir(storyId: string): string | null {
    return STORY_ID_PATTERN.test(storyId) ? path.join(this.rootDir, 'stories', storyId) : null;
  }

  async saveUniverse(universe: Universe): Promise<void> {
    await writeJsonAtomic(this.universePath(universe.name), universe);
  }

  async getUniverse(name: string): Promise<Universe | null> {
    return readJson(this.universePath(name), UniverseSchema);
  }

  async listUniverses(): Promise<Universe[]> {
    const dir = path.join(this.rootDir, 'universes');
    const files = await listDir(dir);
    const universes: Universe[] = [];
    for (const file of files.filter((f) => f.endsWith('.json')).sort()) {
      const universe = await readJson(path.join(dir, file), UniverseSchema);
      if (universe) universes.push(universe);
    }
    return universes;
  }

  async createStory(story: Story, state: ContinuityState): Promise<void> {
    const dir = this.storyDir(story.id);
    if (!dir) {
      throw new Error(`Invalid story id: ${story.id}`);
    }
    const storyPath = path.join(dir, 'story.json');
    if (await exists(storyPath)) {
      throw new Error(`Story already exists: ${story.id}`);
    }
    await fs.mkdir(path.join(dir, 'chapters'), { recursive: true });
    await writeJsonAtomic(storyPath, story);
    const stored: StoredState = { cursor: story.cursor, updatedAt: story.updatedAt, continuity: state };
    await writeJsonAtomic(path.join(dir, 'state.json'), stored);
  }

  private async readState(storyId: string): Promise<StoredState | null> {
    const dir = this.storyDir(storyId);
    return dir ? readJson(path.join(dir, 'state.json'), StoredStateSchema) : null;
  }

  async getStory(storyId: string): Promise<Story | null> {
    const dir = this.storyDir(storyId);
    if (!dir) return null;
    const story = await readJson(path.join(dir, 'story.json'), StoredStorySchema);
    if (!story) return null;
    const state = await this.readState(storyId);
    if (!state) return null;
    return { ...story, cursor: state.cursor, updatedAt: state.updatedAt };
  }

  async listStories(): Promise<Story[]> {
    const ids = await listDir(path.join(this.rootDir, 'stories'));
    const stories: Story[] = [];
    for (const id of ids) {
      const story = await this.getStory(id);
      if (story) stories.push(story);
    }
    return stories.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async getCursor(storyId: string): Promise<StoryCursor | null> {
    const state = await this.readState(storyId);
    return state ? state.cursor : null;
  }

  async getContinuity(storyId: string): Promise<ContinuityState | null> {
    const state = await this.readState(storyId);
    return state ? state.continuity : null;
  }

  async getChapter(storyId: string, number: number): Promise<Chapter | null> {
    const dir = this.storyDir(storyId);
    const cursor = await this.getCursor(storyId);
    if (!dir || !cursor || number < 1 || number > cursor.chapter) return null;
    return readJson(chapterPath(dir, number), StoredChapterSchema);
  }

  async listChapters(storyId: string, from = 1, to = Number.MAX_SAFE_INTEGER): Promise<Chapter[]> {
    const dir = this.storyDir(storyId);
    const cursor = await this.getCursor(storyId);
    if (!dir || !cursor) return [];
    const out: Chapter[] = [];
    const last = Math.min(to, cursor.chapter);
    for (let n = Math.max(1, from); n <= last; n++) {
      const chapter = await readJson(chapterPath(dir, n), StoredChapterSchema);
      if (chapter) out.push(chapter);
    }
    return out;
  }

  async commitChapter(
    storyId: string,
    expectedCursor: number,
    chapter: ChapterDraft,
    state: ContinuityState
  ): Promise<Chapter> {
    const dir = this.storyDir(storyId);
    if (!dir) {
      throw new StoryNotFoundError(storyId);
    }
    return this.serialize(storyId, async () => {
      const current = await this.readState(storyId);
      if (!current) {
        throw new StoryNotFoundError(storyId);
      }
      const actual = current.cursor.chapter;
      if (actual !== expectedCursor || chapter.number !== expectedCursor + 1) {
        throw new CursorConflictError(storyId, expectedCursor, actual);
      }

      const committed: Chapter = { ...chapter, version: 1 };
      await writeJsonAtomic(chapterPath(dir, chapter.number), committed);

      const next: StoredState = {
        cursor: { arcIndex: chapter.arcIndex, chapter: chapter.number },
        updatedAt: chapter.createdAt,
        continuity: state,
      };
      await writeJsonAtomic(path.join(dir, 'state.json'), next);
      return committed;
    });
  }

  /**
   * Runs commits of one story one after another within this process
   */
  private async serialize<T>(storyId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.commitQueues.get(storyId) ?? Promise.resolve();
    const run = previous.catch(() => undefined).then(task);
    this.commitQueues.set(storyId, run);
    try {
      return await run;
    } finally {
      if (this.commitQueues.get(storyId) === run) {
        this.commitQueues.delete(storyId);
      }
    }
  }
}

const STORY_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function chapterPath(storyDir: string, number: number): string {
  return path.join(storyDir, 'chapters', `${String(number).padStart(4, '0')}.json`);
}

function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'universe';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

async function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Corrupt record ${file}: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${nanoid(8)}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
  await fs.rename(tmp, file);
}
