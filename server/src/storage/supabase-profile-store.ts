import { LearnerProfileStateSchema } from '../engine/schemas.js';
import type { LearnerProfileState } from '../engine/types.js';
import logger from '../lib/logger.js';
import type { ProfileStore } from './profile-store.js';

const TABLE = 'learner_profiles';

// Lazy import so the module loads without SUPABASE_URL /
// SUPABASE_SERVICE_ROLE_KEY when the in-memory store is used.
async function getSupabaseAdmin() {
  const { supabaseAdmin } = await import('../lib/supabase.js');
  return supabaseAdmin;
}

/**
 * Learner profiles in the `learner_profiles` table: `learner_id` primary key,
 * `state` jsonb, `updated_at`. Loaded state is re-validated before it reaches
 * the engine.
 */
export class SupabaseProfileStore implements ProfileStore {
  async load(learnerId: string): Promise<LearnerProfileState | null> {
    const supabaseAdmin = await getSupabaseAdmin();
    const { data, error } = await supabaseAdmin
      .from(TABLE)
      .select('state')
      .eq('learner_id', learnerId)
      .maybeSingle();

    if (error) {
      logger.error({ learnerId, error: error.message }, 'Failed to load learner profile');
      throw new Error(`Failed to load learner profile: ${error.message}`);
    }
    if (!data) return null;

    const parsed = LearnerProfileStateSchema.safeParse(data.state);
    if (!parsed.success) {
      logger.error({ learnerId, issues: parsed.error.issues.length }, 'Stored learner profile failed validation');
      throw new Error(`Stored learner profile for ${learnerId} is invalid`);
    }
    return parsed.data;
  }

  async save(state: LearnerProfileState): Promise<void> {
    const supabaseAdmin = await getSupabaseAdmin();
    const { error } = await supabaseAdmin
      .from(TABLE)
      .upsert({
        learner_id: state.learner_id,
        state,
        updated_at: new Date().toISOString(),
      }, { onConflict: 'learner_id' });

    if (error) {
      logger.error({ learnerId: state.learner_id, error: error.message }, 'Failed to save learner profile');
      throw new Error(`Failed to save learner profile: ${error.message}`);
    }
  }
}
