import fs from 'node:fs/promises';
import { z } from 'zod';
import { UniverseSchema, type Universe } from './types/universe.js';

const CATALOG_URL = new URL('../data/universes.json', import.meta.url);

let predefined: Universe[] | null = null;

/**
 * Built-in universes shipped with the engine, read once from data/universes.json
 */
export async function loadPredefinedUniverses(): Promise<Universe[]> {
  if (!predefined) {
    const raw = await fs.readFile(CATALOG_URL, 'utf-8');
    predefined = z.array(UniverseSchema).parse(JSON.parse(raw));
  }
  return predefined.map((universe) => structuredClone(universe));
}

/**
 * Saved universes shadow predefined ones with the same name.
 */
export function mergeCatalog(builtIn: Universe[], saved: Universe[]): Universe[] {
  const byName = new Map<string, Universe>();
  for (const universe of [...builtIn, ...saved]) {
    byName.set(universe.name.toLowerCase(), universe);
  }
  return [...byName.values()];
}
