import { z } from 'zod';
import type { Skill } from '../engine/types.js';
import { CapabilityResponseError } from '../lib/errors.js';
import { repairJSON } from '../lib/json-repair.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { JudgeOptions, Judgment, ResponseJudgmentCapability } from './types.js';

const JudgmentSchema = z.object({
  score: z.coerce.number().min(0).max(1),
  confidence: z.coerce.number().min(0).max(1),
}).passthrough();

/**
 * Scores a mock-interview answer against its target skill with the LLM
 * layer. An unusable judgment throws: the interview stays in scoring and can
 * be retried, rather than recording a made-up score.
 */
export class LlmResponseJudge implements ResponseJudgmentCapability {
  readonly name = 'llm-response-judge';

  constructor(
    private readonly llm: LLMProvider,
    private readonly model: string,
    private readonly maxTokens = 1024,
  ) {}

  async judge(response: string, skill: Skill, options: JudgeOptions = {}): Promise<Judgment> {
    const result = await this.llm.chat({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      signal: options.signal,
      system: `You are a strict technical interviewer grading one answer for evidence of a single skill.
score: 0..1, how well the answer demonstrates the skill at a working professional level.
confidence: 0..1, how much the answer lets you tell (short or evasive answers deserve low confidence).`,
      messages: [{
        role: 'user',
        content: `SKILL: ${skill.name} (${skill.tier})
${options.question ? `QUESTION: ${options.question}\n` : ''}ANSWER:
${response}

Return ONLY valid JSON: { "score": 0.0, "confidence": 0.0 }`,
      }],
    });

    const parsed = JudgmentSchema.safeParse(repairJSON(result.text));
    if (!parsed.success) {
      throw new CapabilityResponseError(this.name, `an unusable judgment for ${skill.id}`);
    }
    return { score: parsed.data.score, confidence: parsed.data.confidence };
  }
}
