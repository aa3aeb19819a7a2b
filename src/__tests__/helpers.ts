import type { GenerateOptions, GenerationBackend, GenerationPurpose } from '../services/aiClient.js';
import { createMockBackend } from '../services/mockBackend.js';
import { RetryPolicy } from '../services/retryPolicy.js';
import { partitionArcs } from '../epicPlanner.js';
import type { ChapterDraft } from '../storage/types.js';
import type { Story } from '../types/story.js';
import type { Universe } from '../types/universe.js';

export type RecordedCall = {
  prompt: string;
  options: GenerateOptions;
};

type Handler = (prompt: string, callIndex: number) => string | Promise<string>;

/**
 * Mock backend with per-purpose overrides. `callIndex` counts calls of that
 * purpose, starting at 1.
 */
export function createScriptedBackend(script: Partial<Record<GenerationPurpose, Handler>> = {}) {
  const mock = createMockBackend();
  const calls: RecordedCall[] = [];
  const counts = new Map<GenerationPurpose, number>();

  const backend: GenerationBackend = {
    name: 'scripted',
    async generate(prompt, options) {
      calls.push({ prompt, options });
      const count = (counts.get(options.purpose) ?? 0) + 1;
      counts.set(options.purpose, count);
      const handler = script[options.purpose];
      return handler ? handler(prompt, count) : mock.generate(prompt, options);
    },
  };

  return {
    backend,
    calls,
    callsFor: (purpose: GenerationPurpose) => calls.filter((call) => call.options.purpose === purpose),
  };
}

export function instantRetry(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, baseDelayMs: 0, sleep: async () => undefined });
}

export const hogwarts: Universe = {
  name: 'Harry Potter',
  genre: 'Fantasy',
  mainCharacters: ['Harry Potter', 'Hermione Granger', 'Ron Weasley', 'Albus Dumbledore'],
  locations: ['Hogwarts', 'Diagon Alley'],
  themes: ['friendship', 'courage'],
  magicSystem: 'Wand-based spellcasting',
  worldBuildingElements: ['Quidditch'],
};

export function makeStory(id: string, createdAt = '2026-01-01T00:00:00.000Z'): Story {
  return {
    id,
    title: 'The Boy Who Lived Again',
    summary: 'A test saga',
    universe: hogwarts,
    theme: 'Good vs Evil',
    protagonist: 'Harry Potter',
    totalChapters: 1000,
    arcs: partitionArcs(hogwarts, 'Good vs Evil', 'Harry Potter'),
    cursor: { arcIndex: 1, chapter: 0 },
    createdAt,
    updatedAt: createdAt,
  };
}

export function makeDraft(storyId: string, number: number): ChapterDraft {
  return {
    storyId,
    number,
    arcIndex: 1,
    title: `Chapter ${number}`,
    text: `Harry Potter walked on in chapter ${number}.`,
    recap: {
      summary: `Harry Potter walked on in chapter ${number}.`,
      characters: { 'Harry Potter': `walking in chapter ${number}` },
      openedThreads: [],
      resolvedThreads: [],
    },
    cliffhanger: false,
    wordCount: 8,
    charactersFeatured: ['Harry Potter'],
    createdAt: `2026-01-02T00:00:${String(number).padStart(2, '0')}.000Z`,
  };
}
