import { z } from 'zod';

/**
 * A fictional setting a story is written in.
 */
export const UniverseSchema = z.object({
  /** Display name, also the catalog key */
  name: z.string().trim().min(1),
  /** Genre label (fantasy, space opera, ...) */
  genre: z.string().trim().min(1),
  /** Main character names */
  mainCharacters: z.array(z.string().trim().min(1)),
  /** Notable locations */
  locations: z.array(z.string().trim().min(1)).default([]),
  /** Recurring themes */
  themes: z.array(z.string().trim().min(1)).default([]),
  /** Magic or technology system */
  magicSystem: z.string().trim().min(1).optional(),
  /** Time period */
  timePeriod: z.string().trim().min(1).optional(),
  /** Other world-building elements */
  worldBuildingElements: z.array(z.string().trim().min(1)).default([]),
});

export type Universe = z.infer<typeof UniverseSchema>;

/** Input shape accepted before defaults are applied. */
export type UniverseInput = z.input<typeof UniverseSchema>;

/**
 * Deep-copies a universe so a story never observes later edits to the source.
 */
export function snapshotUniverse(universe: Universe): Readonly<Universe> {
  const copy: Universe = {
    ...universe,
    mainCharacters: [...new Set(universe.mainCharacters)],
    locations: [...universe.locations],
    themes: [...universe.themes],
    worldBuildingElements: [...universe.worldBuildingElements],
  };
  Object.freeze(copy.mainCharacters);
  Object.freeze(copy.locations);
  Object.freeze(copy.themes);
  Object.freeze(copy.worldBuildingElements);
  return Object.freeze(copy);
}

/**
 * Renders the universe as the "story bible" block used in prompts.
 */
export function formatUniverseForPrompt(universe: Universe): string {
  const lines = [
    `- Name: ${universe.name}`,
    `- Genre: ${universe.genre}`,
    `- Main characters: ${universe.mainCharacters.join(', ')}`,
  ];
  if (universe.locations.length) lines.push(`- Locations: ${universe.locations.join(', ')}`);
  if (universe.themes.length) lines.push(`- Themes: ${universe.themes.join(', ')}`);
  if (universe.magicSystem) lines.push(`- Magic / technology: ${universe.magicSystem}`);
  if (universe.timePeriod) lines.push(`- Time period: ${universe.timePeriod}`);
  if (universe.worldBuildingElements.length) {
    lines.push(`- World building: ${universe.worldBuildingElements.join(', ')}`);
  }
  return lines.join('\n');
}
