/**
 * Logging and generation metrics.
 *
 * Records the key figures of every chapter generation for debugging and
 * tuning.
 */

/**
 * Generation phase
 */
export type GenerationPhase =
  | 'context_build'
  | 'model_call'
  | 'recap_extract'
  | 'continuity_fold'
  | 'state_save';

/**
 * Metrics of one chapter generation
 */
export interface GenerationMetrics {
  storyId: string;
  chapter: number;
  /** Estimated prompt tokens */
  promptTokens: number;
  /** Estimated output tokens */
  outputTokens: number;
  /** Total generation time (ms) */
  generationTime: number;
  phaseTimes: Partial<Record<GenerationPhase, number>>;
  /** Whether the recap needed a second backend call */
  recapRequested: boolean;
  /** Whether the fold evicted a window entry into the summary */
  compressed: boolean;
  error?: string;
  timestamp: Date;
}

/**
 * Aggregated statistics of one story
 */
export interface StoryStats {
  totalChapters: number;
  successfulChapters: number;
  failedChapters: number;
  /** Average generation time (ms) */
  averageGenerationTime: number;
  /** Share of chapters whose recap needed a second call */
  recapRequestRate: number;
  /** Estimated total token usage */
  totalTokensUsed: number;
  averagePhaseTimes: Partial<Record<GenerationPhase, number>>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogConfig {
  level: LogLevel;
  /** Log full prompts at debug level */
  logPrompts: boolean;
  /** Max metric entries kept per story */
  maxEntries: number;
}

const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  logPrompts: false,
  maxEntries: 1000,
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PHASES: readonly GenerationPhase[] = [
  'context_build',
  'model_call',
  'recap_extract',
  'continuity_fold',
  'state_save',
];

/**
 * In-memory metrics store
 */
const metricsStore = new Map<string, GenerationMetrics[]>();
let logConfig = { ...DEFAULT_LOG_CONFIG };

export function setLogConfig(config: Partial<LogConfig>): void {
  logConfig = { ...logConfig, ...config };
}

export function getLogConfig(): LogConfig {
  return { ...logConfig };
}

/**
 * Rough token estimate (~4 characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Record generation metrics
 */
export function logGenerationMetrics(metrics: GenerationMetrics): void {
  const key = metrics.storyId;
  const storyMetrics = metricsStore.get(key) ?? [];
  storyMetrics.push(metrics);

  if (storyMetrics.length > logConfig.maxEntries) {
    storyMetrics.shift();
  }
  metricsStore.set(key, storyMetrics);

  if (metrics.error) {
    log('warn', `[Chapter ${metrics.chapter}] Failed after ${metrics.generationTime}ms`, {
      storyId: metrics.storyId,
      error: metrics.error,
    });
    return;
  }

  log('info', `[Chapter ${metrics.chapter}] Generated in ${metrics.generationTime}ms`, {
    storyId: metrics.storyId,
    tokens: metrics.promptTokens + metrics.outputTokens,
    recapRequested: metrics.recapRequested,
    compressed: metrics.compressed,
  });
}

/**
 * Aggregate statistics for a story, null when nothing was recorded
 */
export function getStoryStats(storyId: string): StoryStats | null {
  const metrics = metricsStore.get(storyId);

  if (!metrics || metrics.length === 0) {
    return null;
  }

  const successful = metrics.filter((m) => !m.error);
  const failed = metrics.filter((m) => m.error);

  const avgTime = successful.length > 0
    ? successful.reduce((sum, m) => sum + m.generationTime, 0) / successful.length
    : 0;

  const recapRequests = successful.filter((m) => m.recapRequested).length;
  const totalTokens = metrics.reduce((sum, m) => sum + m.promptTokens + m.outputTokens, 0);

  const phaseTotals = new Map<GenerationPhase, { sum: number; count: number }>();
  for (const m of successful) {
    for (const [phase, time] of phaseEntries(m.phaseTimes)) {
      const total = phaseTotals.get(phase) ?? { sum: 0, count: 0 };
      total.sum += time;
      total.count += 1;
      phaseTotals.set(phase, total);
    }
  }

  const averagePhaseTimes: Partial<Record<GenerationPhase, number>> = {};
  for (const [phase, data] of phaseTotals) {
    averagePhaseTimes[phase] = data.sum / data.count;
  }

  return {
    totalChapters: metrics.length,
    successfulChapters: successful.length,
    failedChapters: failed.length,
    averageGenerationTime: avgTime,
    recapRequestRate: successful.length > 0 ? recapRequests / successful.length : 0,
    totalTokensUsed: totalTokens,
    averagePhaseTimes,
  };
}

function phaseEntries(
  phaseTimes: Partial<Record<GenerationPhase, number>>
): Array<[GenerationPhase, number]> {
  const out: Array<[GenerationPhase, number]> = [];
  for (const phase of PHASES) {
    const time = phaseTimes[phase];
    if (time !== undefined) out.push([phase, time]);
  }
  return out;
}

export function getStoryMetrics(storyId: string): GenerationMetrics[] {
  return metricsStore.get(storyId) || [];
}

export function clearStoryMetrics(storyId: string): void {
  metricsStore.delete(storyId);
}

/**
 * Most recent failed generations
 */
export function getRecentErrors(storyId: string, limit = 10): GenerationMetrics[] {
  const metrics = metricsStore.get(storyId) || [];
  return metrics
    .filter((m) => m.error)
    .slice(-limit);
}

/**
 * Generic log function
 */
export function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[logConfig.level]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (data) {
    write(prefix, message, JSON.stringify(data));
  } else {
    write(prefix, message);
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

/**
 * Create a timer
 */
export function createTimer(): { elapsed: () => number } {
  const start = Date.now();
  return {
    elapsed: () => Date.now() - start,
  };
}

/**
 * Wrap a function to measure its execution time
 */
export async function measureTime<T>(
  phase: GenerationPhase,
  fn: () => Promise<T>,
  phaseTimes: Partial<Record<GenerationPhase, number>>
): Promise<T> {
  const timer = createTimer();
  try {
    return await fn();
  } finally {
    phaseTimes[phase] = timer.elapsed();
  }
}
