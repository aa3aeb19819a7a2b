import { z } from 'zod';
import type { ChapterRecap } from '../types/story.js';

export const RECAP_OPEN = '[RECAP]';
export const RECAP_CLOSE = '[/RECAP]';

const MIN_SUMMARY_SENTENCES = 2;
const MAX_SUMMARY_SENTENCES = 4;

const ThreadSchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().trim().min(1),
});

/**
 * Shape of the trailing recap block and of the standalone recap reply
 */
export const RecapSchema = z.object({
  summary: z
    .string()
    .trim()
    .min(8)
    .refine((summary) => {
      const count = splitSentences(summary).length;
      return count >= MIN_SUMMARY_SENTENCES && count <= MAX_SUMMARY_SENTENCES;
    }, `summary must have ${MIN_SUMMARY_SENTENCES}-${MAX_SUMMARY_SENTENCES} sentences`),
  characters: z.record(z.string().trim().min(1)).default({}),
  openedThreads: z.array(ThreadSchema).default([]),
  resolvedThreads: z.array(z.string().trim().min(1)).default([]),
});

function stripCodeFence(text: string): string {
  return text.replace(/```json\s*|```\s*/gi, '').trim();
}

/**
 * Thread ids are compared loosely: "The Hidden Vault" and "the-hidden-vault"
 * are the same thread.
 */
export function normalizeThreadId(id: string): string {
  return id
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');
}

function normalizeRecap(parsed: z.infer<typeof RecapSchema>): ChapterRecap {
  return {
    summary: parsed.summary.replace(/\s+/g, ' ').trim(),
    characters: parsed.characters,
    openedThreads: parsed.openedThreads
      .map((thread) => ({ id: normalizeThreadId(thread.id), description: thread.description }))
      .filter((thread) => thread.id.length > 0),
    resolvedThreads: parsed.resolvedThreads
      .map(normalizeThreadId)
      .filter((id) => id.length > 0),
  };
}

/**
 * Parses a recap JSON object, tolerating code fences and surrounding prose.
 */
export function parseRecapJson(raw: string): ChapterRecap | null {
  const cleaned = stripCodeFence(raw);
  const candidates = [cleaned];
  const firstBrace = cleaned.indexOf('{');
  const lastBrace = cleaned.lastIndexOf('}');
  if (firstBrace >= 0 && lastBrace > firstBrace) {
    candidates.push(cleaned.slice(firstBrace, lastBrace + 1));
  }

  for (const candidate of candidates) {
    let json: unknown;
    try {
      json = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = RecapSchema.safeParse(json);
    if (result.success) {
      return normalizeRecap(result.data);
    }
  }
  return null;
}

/**
 * Splits generated text into the chapter body and its trailing recap block.
 * `recap` is null when the block is missing or malformed; the block is
 * removed from the body either way.
 */
export function extractRecap(text: string): { body: string; recap: ChapterRecap | null } {
  const start = text.lastIndexOf(RECAP_OPEN);
  if (start < 0) {
    return { body: text.trim(), recap: null };
  }

  const body = text.slice(0, start).trim();
  const end = text.indexOf(RECAP_CLOSE, start);
  const block = text.slice(start + RECAP_OPEN.length, end < 0 ? undefined : end);
  return { body, recap: parseRecapJson(block) };
}

export function formatRecapBlock(recap: ChapterRecap): string {
  return `${RECAP_OPEN}\n${JSON.stringify(recap)}\n${RECAP_CLOSE}`;
}

function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

/**
 * Last-resort recap built from the text alone: the closing sentences as
 * summary and every known character that appears in the chapter.
 */
export function heuristicRecap(body: string, chapter: number, knownCharacters: string[]): ChapterRecap {
  const sentences = splitSentences(body);
  const summary = sentences.slice(-3).join(' ') || `Chapter ${chapter} continues the story.`;
  const lower = body.toLowerCase();
  const characters = new Map<string, string>();
  for (const name of knownCharacters) {
    if (lower.includes(name.toLowerCase())) {
      characters.set(name, `appeared in chapter ${chapter}`);
    }
  }
  return { summary, characters: Object.fromEntries(characters), openedThreads: [], resolvedThreads: [] };
}
