import type { GenerateOptions, GenerationBackend } from './aiClient.js';
import { formatRecapBlock } from '../utils/recap.js';

/**
 * Deterministic offline backend, used when no API key is configured.
 *
 * It reads the few markers the engine's prompts always carry (chapter number,
 * protagonist) and answers in the expected reply format for each purpose.
 */
export function createMockBackend(): GenerationBackend {
  return {
    name: 'mock:storyteller',
    async generate(prompt: string, options: GenerateOptions): Promise<string> {
      options.signal?.throwIfAborted();

      switch (options.purpose) {
        case 'arc_brief':
          return mockArcBrief(prompt);
        case 'chapter':
          return mockChapter(prompt);
        case 'recap':
          return JSON.stringify({
            summary: 'The chapter moves the story forward. No decisive turn happens yet.',
            characters: {},
            openedThreads: [],
            resolvedThreads: [],
          });
        case 'compress':
          return mockCompression(prompt);
        case 'ping':
          return 'Hello';
      }
    },
  };
}

function readField(prompt: string, label: string, fallback: string): string {
  const match = prompt.match(new RegExp(`^- ${label}: (.+)$`, 'm'));
  return match?.[1]?.trim() || fallback;
}

function mockArcBrief(prompt: string): string {
  const arcName = readField(prompt, 'Arc name', 'the arc');
  const protagonist = readField(prompt, 'Protagonist', 'the hero');
  return JSON.stringify({
    entryConflict: `${protagonist} is pulled into ${arcName.toLowerCase()}.`,
    characterGrowth: `${protagonist} learns to carry the weight of ${arcName.toLowerCase()}.`,
    exitState: `${arcName} ends with a new question left open.`,
  });
}

function mockChapter(prompt: string): string {
  const chapter = Number(readField(prompt, 'Chapter number', '1'));
  const protagonist = readField(prompt, 'Protagonist', 'The hero');
  const cliffhanger = /CLIFFHANGER REQUIRED/.test(prompt);

  const paragraphs = [
    `Chapter ${chapter}`,
    `${protagonist} woke before dawn, the memory of the last chapter still sharp.`,
    `The day brought a small discovery that changed how ${protagonist} saw the road ahead.`,
    cliffhanger
      ? `Then the door burst open, and nothing would be the same again.`
      : `By nightfall the group had rested, and plans were set for the morning.`,
  ];

  const recap = {
    summary: `${protagonist} made a small discovery in chapter ${chapter}. The road ahead looks different now.`,
    characters: { [protagonist]: `carrying the discovery of chapter ${chapter}` },
    openedThreads: chapter % 7 === 0
      ? [{ id: `mystery-${chapter}`, description: `The discovery of chapter ${chapter}` }]
      : [],
    resolvedThreads: chapter % 7 === 3 && chapter > 7 ? [`mystery-${chapter - 3}`] : [],
  };

  return `${paragraphs.join('\n\n')}\n\n${formatRecapBlock(recap)}`;
}

function mockCompression(prompt: string): string {
  const recap = readField(prompt, 'Oldest recap', '');
  const previous = readField(prompt, 'Summary so far', '');
  return [previous === '(none)' ? '' : previous, recap].filter(Boolean).join(' ');
}
