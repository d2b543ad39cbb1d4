import type { Skill } from '../engine/types.js';

/** A skill the analyzer recognized in free text. */
export interface SkillMention {
  mention: string;
  /** 0..1 — how central the skill is to the text. */
  salience: number;
}

/**
 * Text → recognized skill mentions. Best-effort: an empty result means
 * nothing was recognized, not that the service failed.
 */
export interface TextAnalysisCapability {
  readonly name: string;
  analyze(text: string, signal?: AbortSignal): Promise<SkillMention[]>;
}

export interface Judgment {
  score: number;
  confidence: number;
}

export interface JudgeOptions {
  question?: string;
  signal?: AbortSignal;
}

/** Interview answer + target skill → score and how sure the judge is. */
export interface ResponseJudgmentCapability {
  readonly name: string;
  judge(response: string, skill: Skill, options?: JudgeOptions): Promise<Judgment>;
}
