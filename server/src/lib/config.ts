import { z } from 'zod';
import { parsePositiveInt } from './http-body-guard.js';

/**
 * Calibration constants for the skill model, roadmap pacing and interviews.
 * Every value can be overridden through the environment; the zod schema is
 * the single source of defaults and bounds.
 */

const unit = z.number().min(0).max(1);

export const SourceConfidenceSchema = z.object({
  resume: unit.default(0.35),
  repository: unit.default(0.5),
  interview: unit.default(0.9),
  manual: unit.default(0.7),
});

export const EngineConfigSchema = z.object({
  mastery: z.object({
    decay_half_life_days: z.number().positive().default(90),
    confidence_floor: unit.default(0.1),
    history_limit: z.number().int().positive().default(50),
  }).default({}),
  extraction: z.object({
    source_confidence: SourceConfidenceSchema.default({}),
    min_salience: unit.default(0.05),
  }).default({}),
  roadmap: z.object({
    max_unit_delta: z.number().gt(0).max(1).default(0.25),
    hours_per_mastery_point: z.number().positive().default(40),
    tier_multipliers: z.object({
      foundational: z.number().positive().default(1),
      intermediate: z.number().positive().default(1.5),
      advanced: z.number().positive().default(2),
    }).default({}),
    review_confidence_threshold: unit.default(0.3),
    review_hours: z.number().nonnegative().default(2),
  }).default({}),
  interview: z.object({
    default_question_count: z.number().int().positive().max(50).default(5),
    recent_window: z.number().int().positive().default(2),
    confident_threshold: unit.default(0.75),
    struggling_threshold: unit.default(0.4),
    session_timeout_ms: z.number().int().positive().default(45 * 60_000),
    // How long a fully answered session waits for completion before it is abandoned.
    scoring_timeout_ms: z.number().int().positive().default(60 * 60_000),
    history_limit: z.number().int().positive().default(20),
  }).default({}),
  capability: z.object({
    timeout_ms: z.number().int().positive().default(20_000),
    max_attempts: z.number().int().positive().default(3),
    base_delay_ms: z.number().int().nonnegative().default(500),
  }).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type SourceConfidence = z.infer<typeof SourceConfidenceSchema>;

export function envBool(key: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

/** Undefined when unset so the schema default applies. */
function envFloat(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number.parseFloat(raw);
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number.parseInt(raw, 10);
}

/**
 * Builds the engine configuration from environment variables.
 * Throws on any out-of-range value: bad calibration is a startup failure.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const input = {
    mastery: {
      decay_half_life_days: envFloat(env, 'MASTERY_DECAY_HALF_LIFE_DAYS'),
      confidence_floor: envFloat(env, 'MASTERY_CONFIDENCE_FLOOR'),
      history_limit: envInt(env, 'MASTERY_HISTORY_LIMIT'),
    },
    extraction: {
      source_confidence: {
        resume: envFloat(env, 'CONFIDENCE_RESUME'),
        repository: envFloat(env, 'CONFIDENCE_REPOSITORY'),
        interview: envFloat(env, 'CONFIDENCE_INTERVIEW'),
        manual: envFloat(env, 'CONFIDENCE_MANUAL'),
      },
      min_salience: envFloat(env, 'EXTRACTION_MIN_SALIENCE'),
    },
    roadmap: {
      max_unit_delta: envFloat(env, 'ROADMAP_MAX_UNIT_DELTA'),
      hours_per_mastery_point: envFloat(env, 'ROADMAP_HOURS_PER_MASTERY_POINT'),
      review_confidence_threshold: envFloat(env, 'ROADMAP_REVIEW_CONFIDENCE_THRESHOLD'),
      review_hours: envFloat(env, 'ROADMAP_REVIEW_HOURS'),
    },
    interview: {
      default_question_count: envInt(env, 'INTERVIEW_QUESTION_COUNT'),
      recent_window: envInt(env, 'INTERVIEW_RECENT_WINDOW'),
      confident_threshold: envFloat(env, 'INTERVIEW_CONFIDENT_THRESHOLD'),
      struggling_threshold: envFloat(env, 'INTERVIEW_STRUGGLING_THRESHOLD'),
      session_timeout_ms: envInt(env, 'INTERVIEW_SESSION_TIMEOUT_MS'),
      scoring_timeout_ms: envInt(env, 'INTERVIEW_SCORING_TIMEOUT_MS'),
      history_limit: envInt(env, 'INTERVIEW_HISTORY_LIMIT'),
    },
    capability: {
      timeout_ms: parsePositiveInt(env.CAPABILITY_TIMEOUT_MS, 20_000),
      max_attempts: parsePositiveInt(env.CAPABILITY_MAX_ATTEMPTS, 3),
      base_delay_ms: envInt(env, 'CAPABILITY_BASE_DELAY_MS'),
    },
  };

  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid engine configuration: ${detail}`);
  }

  const config = result.data;
  const { resume, repository, manual } = config.extraction.source_confidence;
  if (!(resume <= repository && repository <= manual)) {
    throw new Error('Invalid engine configuration: source confidence must satisfy resume <= repository <= manual');
  }
  if (config.interview.struggling_threshold >= config.interview.confident_threshold) {
    throw new Error('Invalid engine configuration: struggling_threshold must be below confident_threshold');
  }
  return config;
}

/** Full default configuration, overridable per test. */
export function buildEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides);
}
