import type { AppConfig } from './config.js';
import { eventBus } from './eventBus.js';
import { EpicOrchestrator } from './orchestrator.js';
import { createBackend, type GenerationBackend } from './services/aiClient.js';
import * as logger from './services/logger.js';
import { RetryPolicy } from './services/retryPolicy.js';
import { FileStore } from './storage/fileStore.js';
import { MemoryStore } from './storage/memoryStore.js';
import type { EpicStore } from './storage/types.js';

export type Engine = {
  engine: EpicOrchestrator;
  backend: GenerationBackend;
  store: EpicStore;
};

/**
 * Wires backend, store and retry policy from the loaded configuration
 */
export function createEngine(config: AppConfig): Engine {
  logger.setLogConfig({ level: config.logLevel, logPrompts: config.logLevel === 'debug' });

  const backend = createBackend(config.ai, config.generation);
  const store: EpicStore = config.dataDir ? new FileStore(config.dataDir) : new MemoryStore();
  const retryPolicy = new RetryPolicy(config.retry);

  const engine = new EpicOrchestrator({
    backend,
    store,
    retryPolicy,
    continuityLimits: config.continuity,
    events: eventBus,
  });

  logger.info('Engine ready', {
    backend: backend.name,
    storage: config.dataDir ? `file:${config.dataDir}` : 'memory',
    window: config.continuity.windowSize,
    retries: config.retry.maxAttempts,
  });
  return { engine, backend, store };
}
