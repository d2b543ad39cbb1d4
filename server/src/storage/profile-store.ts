import { LearnerProfileStateSchema } from '../engine/schemas.js';
import type { LearnerProfileState } from '../engine/types.js';

/**
 * Key-value persistence for learner state. Each call is atomic on its own;
 * callers serialize read-modify-write cycles per learner.
 */
export interface ProfileStore {
  load(learnerId: string): Promise<LearnerProfileState | null>;
  save(state: LearnerProfileState): Promise<void>;
}

export function emptyProfile(learnerId: string): LearnerProfileState {
  return LearnerProfileStateSchema.parse({ learner_id: learnerId });
}

/** Process-local store. Copies on the way in and out so callers never share state. */
export class InMemoryProfileStore implements ProfileStore {
  private profiles = new Map<string, LearnerProfileState>();

  async load(learnerId: string): Promise<LearnerProfileState | null> {
    const state = this.profiles.get(learnerId);
    return state ? structuredClone(state) : null;
  }

  async save(state: LearnerProfileState): Promise<void> {
    this.profiles.set(state.learner_id, structuredClone(state));
  }

  get size(): number {
    return this.profiles.size;
  }
}
