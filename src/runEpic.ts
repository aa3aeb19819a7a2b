import 'dotenv/config';
import path from 'node:path';
import { createEngine } from './bootstrap.js';
import { loadConfig } from './config.js';
import { isEpicEngineError } from './errors.js';
import type { EpicOrchestrator } from './orchestrator.js';
import * as logger from './services/logger.js';

const USAGE = `
Usage:
  runEpic universes
  runEpic create <universe> <protagonist> <theme> <title>
  runEpic advance <storyId> <arcIndex> <numChapters>
  runEpic show <storyId>
  runEpic export <storyId>
`.trim();

/**
 * Advances a story, cancelling cleanly on Ctrl+C
 */
async function runAdvance(engine: EpicOrchestrator, storyId: string, arcIndex: number, count: number) {
  const controller = new AbortController();
  const onSigint = () => {
    console.log('\nStopping after the current chapter is discarded...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const progress = await engine.advance(storyId, arcIndex, count, { signal: controller.signal });
    console.log(`Committed chapters ${progress.chapters.join(', ') || '(none)'}`);
    console.log(`Cursor: arc ${progress.cursor.arcIndex}, chapter ${progress.cursor.chapter}`);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

export async function runEpic(argv: string[]): Promise<void> {
  const [command, ...args] = argv;
  const config = await loadConfig();
  // The CLI always persists so consecutive runs continue the same story
  const dataDir = config.dataDir || path.join(process.cwd(), 'projects');
  const { engine, backend } = createEngine({ ...config, dataDir });

  console.log('='.repeat(50));
  console.log('Epic Saga Engine');
  console.log(`   Backend: ${backend.name}`);
  console.log(`   Data: ${dataDir}`);
  console.log('='.repeat(50));

  switch (command) {
    case 'universes': {
      for (const universe of await engine.listUniverses()) {
        console.log(`- ${universe.name} (${universe.genre}): ${universe.mainCharacters.join(', ')}`);
      }
      return;
    }
    case 'create': {
      const [universe, protagonist, theme, title] = args;
      if (!universe || !protagonist || !theme || !title) break;
      const storyId = await engine.createEpic({ universe, protagonist, theme, title });
      const story = await engine.getStory(storyId);
      console.log(`Created "${story.title}" (${storyId})`);
      for (const arc of story.arcs) {
        console.log(`   Arc ${arc.index}: ${arc.name} [${arc.startChapter}-${arc.endChapter}]`);
        console.log(`      ${arc.brief.entryConflict}`);
      }
      return;
    }
    case 'advance': {
      const [storyId, arcIndex, count] = args;
      if (!storyId || !arcIndex || !count) break;
      await runAdvance(engine, storyId, parseInt(arcIndex, 10), parseInt(count, 10));
      return;
    }
    case 'show': {
      const [storyId] = args;
      if (!storyId) break;
      const stats = await engine.getStats(storyId);
      console.log(`${stats.title}: ${stats.cursor.chapter}/${stats.totalChapters} chapters`);
      const continuity = await engine.getContinuity(storyId);
      console.log(`Open threads: ${Object.keys(continuity.threads).join(', ') || '(none)'}`);
      return;
    }
    case 'export': {
      const [storyId] = args;
      if (!storyId) break;
      process.stdout.write(await engine.exportStory(storyId));
      return;
    }
  }

  console.error(USAGE);
  process.exitCode = 1;
}

// CLI entry - only when executed directly
const isMain = import.meta.url === `file://${process.argv[1]}`;

if (isMain) {
  runEpic(process.argv.slice(2)).catch((err: unknown) => {
    if (isEpicEngineError(err)) {
      logger.error(err.message, { code: err.code, resume: err.resume });
    } else {
      logger.error('Run failed', { error: err instanceof Error ? err.message : String(err) });
    }
    process.exit(1);
  });
}
