import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { GenerationBackend } from './services/aiClient.js';
import { RetryExhaustedError, type RetryPolicy } from './services/retryPolicy.js';
import * as logger from './services/logger.js';
import type { EpicStore } from './storage/types.js';
import { initialState } from './context/continuityTracker.js';
import { GenerationBackendError, InvalidPremiseError } from './errors.js';
import {
  ARC_COUNT,
  CHAPTERS_PER_ARC,
  TOTAL_CHAPTERS,
  type Arc,
  type ArcBrief,
  type Story,
} from './types/story.js';
import {
  UniverseSchema,
  formatUniverseForPrompt,
  snapshotUniverse,
  type Universe,
  type UniverseInput,
} from './types/universe.js';

/**
 * Fixed arc template: awakening → rising conflict → crucible → convergence → resolution
 */
export const ARC_TEMPLATES = [
  {
    name: 'The Awakening',
    theme: 'Discovery and Introduction',
    conflictType: 'Internal/Setup',
    description: 'the protagonist discovers their destiny, new powers, or a hidden truth',
  },
  {
    name: 'The Rising Storm',
    theme: 'Challenges and Growth',
    conflictType: 'External/Building',
    description: 'first major conflicts, allies and enemies revealed',
  },
  {
    name: 'The Crucible',
    theme: 'Trials and Transformation',
    conflictType: 'Major Crisis',
    description: 'the greatest challenges, character transformation, major losses',
  },
  {
    name: 'The Convergence',
    theme: 'Preparation and Alliance',
    conflictType: 'Building to Climax',
    description: 'gathering forces, final preparations, the ultimate confrontation approaches',
  },
  {
    name: 'The Resolution',
    theme: 'Climax and New Beginning',
    conflictType: 'Final Battle/Resolution',
    description: 'the ultimate confrontation, resolution of all conflicts, a new world order',
  },
] as const;

type ArcTemplate = (typeof ARC_TEMPLATES)[number];

const ArcBriefSchema = z.object({
  entryConflict: z.string().trim().min(4),
  characterGrowth: z.string().trim().min(4),
  exitState: z.string().trim().min(4),
});

export type PlanEpicParams = {
  universe: UniverseInput;
  theme: string;
  protagonist: string;
  title: string;
};

export type EpicPlannerDeps = {
  backend: GenerationBackend;
  store: EpicStore;
  retryPolicy: RetryPolicy;
};

/**
 * Partitions chapters 1..1000 into 5 contiguous 200-chapter arcs. Briefs are
 * left empty; `planEpic` fills them in.
 */
export function partitionArcs(universe: Universe, theme: string, protagonist: string): Arc[] {
  return ARC_TEMPLATES.map((template, i) => {
    const index = i + 1;
    return {
      index,
      name: `${template.name}: ${theme}`,
      theme: template.theme,
      startChapter: i * CHAPTERS_PER_ARC + 1,
      endChapter: index * CHAPTERS_PER_ARC,
      characterFocus: selectArcCharacters(universe, protagonist, index),
      brief: { entryConflict: '', characterGrowth: '', exitState: '' },
    };
  });
}

/**
 * Protagonist first, then one more main character per arc
 */
function selectArcCharacters(universe: Universe, protagonist: string, arcIndex: number): string[] {
  const others = universe.mainCharacters.filter((name) => name !== protagonist);
  return [protagonist, ...others.slice(0, arcIndex)];
}

/**
 * Deterministic brief, used when the backend's reply cannot be parsed
 */
export function templateBrief(template: ArcTemplate, theme: string, arcIndex: number): ArcBrief {
  const conflicts: Record<ArcTemplate['conflictType'], string> = {
    'Internal/Setup': `Discovering the truth about ${theme} and accepting responsibility`,
    'External/Building': `First confrontations with forces opposing ${theme}`,
    'Major Crisis': `The greatest threat to ${theme} emerges, testing all beliefs`,
    'Building to Climax': `Final preparations to resolve the ${theme} crisis`,
    'Final Battle/Resolution': `Ultimate confrontation that determines the fate of ${theme}`,
  };
  const transitions = [
    'New threats emerge from the shadows',
    'Unexpected allies reveal hidden agendas',
    'The true scope of the conflict becomes clear',
    'Final pieces fall into place for the ultimate confrontation',
  ];
  return {
    entryConflict: conflicts[template.conflictType],
    characterGrowth: `Growth through ${template.theme.toLowerCase()}`,
    exitState: `Arc ${arcIndex} concludes with ${template.description}. ${
      transitions[arcIndex - 1] ?? 'Epic conclusion'
    }.`,
  };
}

function buildBriefPrompt(args: {
  universe: Universe;
  theme: string;
  protagonist: string;
  arc: Arc;
  template: ArcTemplate;
  previous: ArcBrief | null;
}): { system: string; prompt: string } {
  const { universe, theme, protagonist, arc, template, previous } = args;

  const system = `
You are the showrunner of a ${TOTAL_CHAPTERS}-chapter saga told in ${ARC_COUNT} arcs.
Each arc brief is a contract every chapter of that arc must honor, so it must
follow logically from the previous arc's exit state.

Reply with strict JSON only, no Markdown fences:
{
  "entryConflict": "the conflict the arc opens with (one sentence)",
  "characterGrowth": "how the protagonist and allies must grow (one sentence)",
  "exitState": "the situation at the end of the arc (one sentence)"
}
`.trim();

  const prompt = `
[Universe]
${formatUniverseForPrompt(universe)}

[Saga]
- Main theme: ${theme}
- Protagonist: ${protagonist}

[Arc]
- Arc name: ${arc.name}
- Position: arc ${arc.index} of ${ARC_COUNT}, chapters ${arc.startChapter}-${arc.endChapter}
- Arc theme: ${template.theme}
- Conflict type: ${template.conflictType}
- Shape: ${template.description}
- Character focus: ${arc.characterFocus.join(', ')}

${previous
    ? `[Previous arc brief]\n- Entry conflict: ${previous.entryConflict}\n- Growth: ${previous.characterGrowth}\n- Exit state: ${previous.exitState}`
    : '[This is the first arc]'}

Write the arc brief:
`.trim();

  return { system, prompt };
}

function parseBrief(raw: string): ArcBrief | null {
  const jsonText = raw.replace(/```json\s*|```\s*/g, '').trim();
  const first = jsonText.indexOf('{');
  const last = jsonText.lastIndexOf('}');
  if (first < 0 || last <= first) return null;

  try {
    const result = ArcBriefSchema.safeParse(JSON.parse(jsonText.slice(first, last + 1)));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

function validatePremise(params: PlanEpicParams): { universe: Universe; theme: string; protagonist: string; title: string } {
  const parsed = UniverseSchema.safeParse(params.universe);
  if (!parsed.success) {
    throw new InvalidPremiseError(`Invalid universe: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const universe = parsed.data;
  const theme = params.theme.trim();
  const protagonist = params.protagonist.trim();
  const title = params.title.trim();

  if (universe.mainCharacters.length === 0) {
    throw new InvalidPremiseError(`Universe "${universe.name}" has no characters`);
  }
  if (!theme) {
    throw new InvalidPremiseError('Theme must not be empty');
  }
  if (!protagonist) {
    throw new InvalidPremiseError('Protagonist must not be empty');
  }
  if (!title) {
    throw new InvalidPremiseError('Title must not be empty');
  }
  return { universe, theme, protagonist, title };
}

/**
 * Plans a 5-arc, 1000-chapter epic and persists it.
 *
 * Arc briefs are requested one by one, each conditioned on the previous
 * brief, and are frozen into the story.
 */
export async function planEpic(deps: EpicPlannerDeps, params: PlanEpicParams): Promise<Story> {
  const { backend, store, retryPolicy } = deps;
  const { universe, theme, protagonist, title } = validatePremise(params);
  const snapshot = snapshotUniverse(universe);

  logger.info(`Planning epic "${title}"`, { universe: universe.name, theme, protagonist });

  const arcs = partitionArcs(universe, theme, protagonist);
  let previous: ArcBrief | null = null;

  for (let i = 0; i < arcs.length; i++) {
    const arc = arcs[i];
    const template = ARC_TEMPLATES[i];
    const { system, prompt } = buildBriefPrompt({ universe, theme, protagonist, arc, template, previous });

    let raw: string;
    try {
      raw = await retryPolicy.execute(
        () => backend.generate(prompt, { purpose: 'arc_brief', system, temperature: 0.7 }),
        { label: `arc ${arc.index} brief` }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new GenerationBackendError(0, 0, error.attempts, { cause: error.lastError });
      }
      throw error;
    }

    const brief = parseBrief(raw);
    if (!brief) {
      logger.warn(`Arc ${arc.index} brief could not be parsed, using the template brief`);
    }
    arc.brief = brief ?? templateBrief(template, theme, arc.index);
    previous = arc.brief;
  }

  const now = new Date().toISOString();
  const story: Story = {
    id: nanoid(12),
    title,
    summary: `An epic ${universe.genre} saga spanning ${TOTAL_CHAPTERS} chapters across ${ARC_COUNT} arcs, following ${protagonist} through ${theme}`,
    universe: snapshot,
    theme,
    protagonist,
    totalChapters: TOTAL_CHAPTERS,
    arcs,
    cursor: { arcIndex: 1, chapter: 0 },
    createdAt: now,
    updatedAt: now,
  };

  await store.createStory(story, initialState(story));
  logger.info(`Created epic "${title}"`, { storyId: story.id, arcs: arcs.length });
  return story;
}
