/**
 * Zod schemas for every record that crosses an engine boundary: the skill
 * graph document, observations, and the persisted learner profile.
 *
 * Unlike LLM output schemas these are strict. An out-of-range mastery or
 * confidence is rejected, never clamped, so a bad value cannot reach the
 * skill model.
 */

import { z } from 'zod';

export const DIFFICULTY_TIERS = ['foundational', 'intermediate', 'advanced'] as const;
export const OBSERVATION_SOURCES = ['resume', 'repository', 'interview', 'manual'] as const;
export const INTERVIEW_TYPES = ['technical', 'behavioral', 'system_design'] as const;
export const INTERVIEW_STATUSES = ['created', 'in_progress', 'scoring', 'completed', 'abandoned'] as const;

const unitInterval = z.number().min(0).max(1);
const isoTimestamp = z.string().datetime({ offset: true });
const identifier = z.string().min(1).max(200);

export const DifficultyTierSchema = z.enum(DIFFICULTY_TIERS);
export const ObservationSourceSchema = z.enum(OBSERVATION_SOURCES);
export const InterviewTypeSchema = z.enum(INTERVIEW_TYPES);

// ─── Skill graph document ─────────────────────────────────────────────

export const SkillConfigSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9._+-]*$/, 'skill ids are lowercase slugs'),
  name: z.string().min(1),
  tier: DifficultyTierSchema,
  prerequisites: z.array(z.string().min(1)).default([]),
  aliases: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
});

export const RoleConfigSchema = z.object({
  title: z.string().optional(),
  targets: z.record(z.string(), unitInterval),
});

export const SkillGraphConfigSchema = z.object({
  skills: z.array(SkillConfigSchema).min(1),
  roles: z.record(z.string(), RoleConfigSchema).default({}),
});

// ─── Skill model ──────────────────────────────────────────────────────

export const ObservationSchema = z.object({
  skill: identifier,
  strength: unitInterval,
  confidence: unitInterval,
  source: ObservationSourceSchema,
  observed_at: isoTimestamp.optional(),
});

export const MasteryEstimateSchema = z.object({
  skill: identifier,
  mastery: unitInterval,
  confidence: unitInterval,
  updated_at: isoTimestamp,
});

export const MasteryHistoryPointSchema = z.object({
  at: isoTimestamp,
  mastery: unitInterval,
  confidence: unitInterval,
  source: ObservationSourceSchema,
});

// ─── Roadmap ──────────────────────────────────────────────────────────

export const RoadmapUnitSchema = z.object({
  id: identifier,
  skill: identifier,
  skill_name: z.string(),
  tier: DifficultyTierSchema,
  kind: z.enum(['learn', 'review']),
  position: z.number().int().positive(),
  part: z.number().int().positive(),
  parts: z.number().int().positive(),
  from_mastery: unitInterval,
  target_mastery: unitInterval,
  target_delta: unitInterval,
  effort_hours: z.number().nonnegative(),
});

export const RoadmapSchema = z.object({
  role: identifier,
  units: z.array(RoadmapUnitSchema),
  generated_at: isoTimestamp,
  mastery_version: z.number().int().nonnegative(),
  progress_version: z.number().int().nonnegative(),
  /** When a met target's confidence will have decayed enough to need a review unit. */
  review_due_at: isoTimestamp.optional(),
});

// ─── Progress ─────────────────────────────────────────────────────────

export const ProgressEventSchema = z.object({
  subject_id: identifier,
  subject_kind: z.enum(['unit', 'session']),
  fraction: unitInterval,
  recorded_at: isoTimestamp,
});

// ─── Interviews ───────────────────────────────────────────────────────

export const TargetMoveSchema = z.enum(['planned', 'escalate', 'deescalate', 'steady']);

export const InterviewTurnSchema = z.object({
  index: z.number().int().nonnegative(),
  skill: identifier,
  question: z.string(),
  move: TargetMoveSchema,
  asked_at: isoTimestamp,
  response: z.string().optional(),
  answered_at: isoTimestamp.optional(),
  provisional_score: unitInterval.optional(),
  score: unitInterval.optional(),
  confidence: unitInterval.optional(),
});

export const InterviewSessionSchema = z.object({
  id: identifier,
  learner_id: identifier,
  role: identifier,
  interview_type: InterviewTypeSchema,
  status: z.enum(INTERVIEW_STATUSES),
  question_count: z.number().int().positive(),
  planned_targets: z.array(identifier),
  skill_pool: z.array(identifier),
  turns: z.array(InterviewTurnSchema),
  difficulty_cursor: z.number().int().min(0).max(DIFFICULTY_TIERS.length - 1),
  created_at: isoTimestamp,
  started_at: isoTimestamp.optional(),
  deadline_at: isoTimestamp.optional(),
  scoring_started_at: isoTimestamp.optional(),
  completed_at: isoTimestamp.optional(),
  abandoned_at: isoTimestamp.optional(),
  abandon_reason: z.enum(['cancelled', 'timeout']).optional(),
});

// ─── Persisted learner profile ────────────────────────────────────────

export const LearnerProfileStateSchema = z.object({
  learner_id: identifier,
  mastery: z.array(MasteryEstimateSchema).default([]),
  mastery_history: z.record(z.string(), z.array(MasteryHistoryPointSchema)).default({}),
  mastery_version: z.number().int().nonnegative().default(0),
  progress_events: z.array(ProgressEventSchema).default([]),
  progress_version: z.number().int().nonnegative().default(0),
  roadmap: RoadmapSchema.nullable().default(null),
  interviews: z.array(InterviewSessionSchema).default([]),
});
