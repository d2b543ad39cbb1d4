import { z } from 'zod';
import type { SkillGraph } from '../engine/skill-graph.js';
import { CapabilityResponseError } from '../lib/errors.js';
import { repairJSON } from '../lib/json-repair.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import type { SkillMention, TextAnalysisCapability } from './types.js';

const MAX_EVIDENCE_CHARS = 30_000;

// Individual bad entries are dropped; only a reply with no JSON object at all
// fails the call.
const MentionsResponseSchema = z.object({
  mentions: z.array(z.unknown()).optional().default([]),
}).passthrough();

const MentionSchema = z.object({
  skill: z.string().min(1),
  salience: z.coerce.number(),
}).passthrough();

/**
 * Skill-mention extraction backed by the LLM layer. The model is given the
 * graph's skill ids and must answer with ids from that list only.
 */
export class LlmTextAnalyzer implements TextAnalysisCapability {
  readonly name = 'llm-text-analyzer';
  private readonly catalog: string;

  constructor(
    graph: SkillGraph,
    private readonly llm: LLMProvider,
    private readonly model: string,
    private readonly maxTokens = 2048,
  ) {
    this.catalog = graph.topologicalOrder()
      .map((skill) => `- ${skill.id}: ${skill.name}${skill.aliases.length ? ` (${skill.aliases.join(', ')})` : ''}`)
      .join('\n');
  }

  async analyze(text: string, signal?: AbortSignal): Promise<SkillMention[]> {
    const response = await this.llm.chat({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      signal,
      system: `You identify demonstrated technical skills in a learner's evidence (resume text or repository summaries).
Only report skills from the catalog. Salience is 0..1: 1 means the evidence shows sustained, hands-on use; 0.2 means a passing mention.
Do not infer skills that are not supported by the text.`,
      messages: [{
        role: 'user',
        content: `SKILL CATALOG (id: name):
${this.catalog}

EVIDENCE:
${text.slice(0, MAX_EVIDENCE_CHARS)}

Return ONLY valid JSON:
{ "mentions": [ { "skill": "<catalog id>", "salience": 0.0 } ] }`,
      }],
    });

    const parsed = MentionsResponseSchema.safeParse(repairJSON(response.text));
    if (!parsed.success) {
      throw new CapabilityResponseError(this.name, 'an unparseable skill mention response');
    }

    const mentions: SkillMention[] = [];
    for (const entry of parsed.data.mentions) {
      const mention = MentionSchema.safeParse(entry);
      if (mention.success) {
        mentions.push({ mention: mention.data.skill, salience: mention.data.salience });
      }
    }
    return mentions;
  }
}
