/**
 * All-or-nothing execution across stateful participants
 */

/**
 * Restores a participant to the state captured by its checkpoint
 */
export type Rollback = () => void;

export interface Checkpointable {
  checkpoint(): Rollback;
}

export function isCheckpointable(value: object): value is Checkpointable {
  return 'checkpoint' in value && typeof value.checkpoint === 'function';
}

/**
 * Runs a request against a fixed set of participants; if it throws, every
 * participant is rolled back before the error propagates.
 */
export class AtomicScope {
  private readonly participants: Checkpointable[];

  constructor(participants: readonly object[]) {
    this.participants = participants.filter(isCheckpointable);
  }

  run<T>(request: () => T): T {
    const rollbacks = this.participants.map((p) => p.checkpoint());
    try {
      return request();
    } catch (error) {
      for (let i = rollbacks.length - 1; i >= 0; i--) {
        rollbacks[i]?.();
      }
      throw error;
    }
  }
}
