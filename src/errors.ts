import type { StoryCursor } from './types/story.js';

export type EngineErrorCode =
  | 'INVALID_PREMISE'
  | 'INVALID_BATCH'
  | 'ARC_BOUNDARY'
  | 'OUT_OF_ORDER'
  | 'GENERATION_BACKEND'
  | 'STORY_BUSY'
  | 'CONTINUITY_FOLD'
  | 'STORY_NOT_FOUND'
  | 'CURSOR_CONFLICT'
  | 'CANCELLED';

/**
 * Where a caller can pick up after a failed advance.
 */
export type ResumePoint = {
  storyId: string;
  lastCommittedChapter: number;
  cursor: StoryCursor;
  requested: number;
  completed: number;
};

export abstract class EpicEngineError extends Error {
  abstract readonly code: EngineErrorCode;
  abstract readonly retryable: boolean;
  /** Filled in by the orchestrator before the error leaves `advance` */
  resume?: ResumePoint;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      resume: this.resume,
    };
  }
}

export class InvalidPremiseError extends EpicEngineError {
  readonly code = 'INVALID_PREMISE';
  readonly retryable = false;
}

export class InvalidBatchRequestError extends EpicEngineError {
  readonly code = 'INVALID_BATCH';
  readonly retryable = false;
}

export class ArcBoundaryError extends EpicEngineError {
  readonly code = 'ARC_BOUNDARY';
  readonly retryable = false;

  constructor(
    readonly arcIndex: number,
    readonly startChapter: number,
    readonly count: number,
    detail: string
  ) {
    super(`Chapters ${startChapter}-${startChapter + count - 1} do not fit arc ${arcIndex}: ${detail}`);
  }
}

export class OutOfOrderError extends EpicEngineError {
  readonly code = 'OUT_OF_ORDER';
  readonly retryable = false;

  constructor(readonly requestedChapter: number, readonly expectedChapter: number) {
    super(`Chapter ${requestedChapter} requested but the next chapter is ${expectedChapter}`);
  }
}

export class GenerationBackendError extends EpicEngineError {
  readonly code = 'GENERATION_BACKEND';
  readonly retryable = true;

  constructor(
    readonly chapter: number,
    readonly lastCommittedChapter: number,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Generation failed for chapter ${chapter} after ${attempts} attempts ` +
        `(last committed chapter: ${lastCommittedChapter})`,
      options
    );
  }
}

export class StoryBusyError extends EpicEngineError {
  readonly code = 'STORY_BUSY';
  readonly retryable = true;

  constructor(readonly storyId: string) {
    super(`Story ${storyId} already has an advance in flight`);
  }
}

export class ContinuityFoldError extends EpicEngineError {
  readonly code = 'CONTINUITY_FOLD';
  readonly retryable = true;

  constructor(readonly chapter: number, options?: { cause?: unknown }) {
    super(`Continuity fold failed for chapter ${chapter}; the chapter was not committed`, options);
  }
}

export class StoryNotFoundError extends EpicEngineError {
  readonly code = 'STORY_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly storyId: string) {
    super(`Story not found: ${storyId}`);
  }
}

export class CursorConflictError extends EpicEngineError {
  readonly code = 'CURSOR_CONFLICT';
  readonly retryable = true;

  constructor(readonly storyId: string, readonly expected: number, readonly actual: number) {
    super(`Cursor of story ${storyId} moved: expected ${expected}, found ${actual}`);
  }
}

export class GenerationCancelledError extends EpicEngineError {
  readonly code = 'CANCELLED';
  readonly retryable = true;

  constructor(readonly chapter: number) {
    super(`Generation cancelled before chapter ${chapter} was committed`);
  }
}

export function isEpicEngineError(error: unknown): error is EpicEngineError {
  return error instanceof EpicEngineError;
}
