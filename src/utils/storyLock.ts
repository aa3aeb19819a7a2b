import { StoryBusyError } from '../errors.js';

/**
 * Non-blocking per-story locks. A second advance on a story that already
 * has one in flight is rejected instead of queued.
 */
export class StoryLocks {
  private readonly held = new Set<string>();

  /**
   * Takes the lock synchronously and returns its release function.
   * Throws `StoryBusyError` when the lock is already held.
   */
  acquire(storyId: string): () => void {
    if (this.held.has(storyId)) {
      throw new StoryBusyError(storyId);
    }
    this.held.add(storyId);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held.delete(storyId);
    };
  }

  isHeld(storyId: string): boolean {
    return this.held.has(storyId);
  }
}
