import type { Skill } from '../engine/types.js';
import { buildMentionPattern, countMentions } from './mention-matcher.js';
import type { Judgment, ResponseJudgmentCapability } from './types.js';

const TECHNICAL_MARKERS = [
  'i used',
  'i implemented',
  'code',
  'algorithm',
  'optimized',
  'debugged',
  'framework',
];

/** Word-count bands: under 10 words is band 1, 100 or more is band 5. */
const BAND_LIMITS = [10, 30, 60, 100];

export interface HeuristicJudgeOptions {
  /** Reported confidence; low, since this is not a real assessment. */
  confidence?: number;
}

/**
 * Offline answer rating. Length band (1-5), +1 for concrete technical
 * language, +1 for naming the target skill, capped at 5 and scaled to 0..1.
 * Used to pace interviews and as a fallback judge when no LLM is configured.
 */
export class HeuristicJudge implements ResponseJudgmentCapability {
  readonly name = 'heuristic-judge';
  private readonly confidence: number;

  constructor(options: HeuristicJudgeOptions = {}) {
    this.confidence = options.confidence ?? 0.4;
  }

  async judge(response: string, skill: Skill): Promise<Judgment> {
    return { score: this.rate(response, skill) / 5, confidence: this.confidence };
  }

  /** Band 0 (empty) to 5. */
  rate(response: string, skill: Skill): number {
    const words = response.trim().split(/\s+/).filter(Boolean).length;
    if (words === 0) return 0;

    let band = BAND_LIMITS.findIndex((limit) => words < limit) + 1;
    if (band === 0) band = BAND_LIMITS.length + 1;

    const lower = response.toLowerCase();
    if (TECHNICAL_MARKERS.some((marker) => lower.includes(marker))) band += 1;
    if (countMentions(response, buildMentionPattern([skill.id, skill.name, ...skill.aliases])) > 0) band += 1;

    return Math.min(5, band);
  }
}
