import { EventEmitter } from 'node:events';
import * as logger from './services/logger.js';

// Event types
export type EventLevel = 'info' | 'success' | 'warning' | 'error';

export interface LogEvent {
  type: 'log';
  level: EventLevel;
  message: string;
  timestamp: string;
  storyId?: string;
}

export interface ProgressEvent {
  type: 'progress';
  storyId: string;
  arcIndex: number;
  /** Chapters finished in this advance */
  current: number;
  /** Chapters requested in this advance */
  total: number;
  chapter: number;
  chapterTitle?: string;
  status: 'starting' | 'generating' | 'folding' | 'committed' | 'done' | 'error';
  message?: string;
  timestamp: string;
}

export type EngineEvent = LogEvent | ProgressEvent;

// Process-wide event bus, consumed by the SSE route
export class EngineEventBus extends EventEmitter {
  log(level: EventLevel, message: string, storyId?: string) {
    const event: LogEvent = {
      type: 'log',
      level,
      message,
      timestamp: new Date().toISOString(),
      storyId,
    };
    this.emit('event', event);

    const data = storyId ? { storyId } : undefined;
    if (level === 'error') logger.error(message, data);
    else if (level === 'warning') logger.warn(message, data);
    else logger.info(message, data);
  }

  progress(data: Omit<ProgressEvent, 'type' | 'timestamp'>) {
    const event: ProgressEvent = {
      ...data,
      type: 'progress',
      timestamp: new Date().toISOString(),
    };
    this.emit('event', event);
  }

  info(message: string, storyId?: string) {
    this.log('info', message, storyId);
  }

  success(message: string, storyId?: string) {
    this.log('success', message, storyId);
  }

  warning(message: string, storyId?: string) {
    this.log('warning', message, storyId);
  }

  error(message: string, storyId?: string) {
    this.log('error', message, storyId);
  }

  /**
   * Subscribe to events, optionally for one story only. Returns the
   * unsubscribe function.
   */
  subscribe(listener: (event: EngineEvent) => void, storyId?: string): () => void {
    const handler = (event: EngineEvent) => {
      if (!storyId || event.storyId === storyId) listener(event);
    };
    this.on('event', handler);
    return () => {
      this.off('event', handler);
    };
  }
}

export const eventBus = new EngineEventBus();
