/**
 * Per-instance entry lock
 */

import { ReentrantCallError } from '../types';

export class ReentrancyGuard {
  private activeEntry: string | null = null;

  /**
   * Run `body` holding the lock; a nested call while held fails with ReentrantCall
   */
  enter<T>(entry: string, body: () => T): T {
    if (this.activeEntry !== null) {
      throw new ReentrantCallError(entry);
    }
    this.activeEntry = entry;
    try {
      return body();
    } finally {
      this.activeEntry = null;
    }
  }

  isEntered(): boolean {
    return this.activeEntry !== null;
  }
}
