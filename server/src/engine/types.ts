import type { z } from 'zod';
import type {
  DifficultyTierSchema,
  InterviewSessionSchema,
  InterviewTurnSchema,
  InterviewTypeSchema,
  LearnerProfileStateSchema,
  MasteryEstimateSchema,
  MasteryHistoryPointSchema,
  ObservationSchema,
  ObservationSourceSchema,
  ProgressEventSchema,
  RoadmapSchema,
  RoadmapUnitSchema,
  SkillGraphConfigSchema,
  TargetMoveSchema,
} from './schemas.js';

export type DifficultyTier = z.infer<typeof DifficultyTierSchema>;
export type ObservationSource = z.infer<typeof ObservationSourceSchema>;
export type InterviewType = z.infer<typeof InterviewTypeSchema>;
export type TargetMove = z.infer<typeof TargetMoveSchema>;

export type SkillGraphConfig = z.input<typeof SkillGraphConfigSchema>;

/** A node in the prerequisite graph. */
export interface Skill {
  readonly id: string;
  readonly name: string;
  readonly tier: DifficultyTier;
  readonly prerequisites: readonly string[];
  readonly aliases: readonly string[];
  readonly description?: string;
}

/** One piece of evidence about a skill. Consumed once by MasteryModel.merge. */
export type Observation = z.infer<typeof ObservationSchema>;

export type MasteryEstimate = z.infer<typeof MasteryEstimateSchema>;
export type MasteryHistoryPoint = z.infer<typeof MasteryHistoryPointSchema>;

export type SkillLevel = 'beginner' | 'intermediate' | 'advanced' | 'expert';

export type RoadmapUnit = z.infer<typeof RoadmapUnitSchema>;
export type Roadmap = z.infer<typeof RoadmapSchema>;

export type ProgressEvent = z.infer<typeof ProgressEventSchema>;

export type InterviewTurn = z.infer<typeof InterviewTurnSchema>;
export type InterviewSession = z.infer<typeof InterviewSessionSchema>;
export type InterviewStatus = InterviewSession['status'];

export type LearnerProfileState = z.infer<typeof LearnerProfileStateSchema>;

/** Repository metadata as returned by a code-hosting API. */
export interface RepositorySummary {
  name: string;
  description?: string | null;
  language?: string | null;
  topics?: string[];
  stars?: number;
  updated_at?: string;
}
