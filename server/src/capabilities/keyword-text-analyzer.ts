import type { SkillGraph } from '../engine/skill-graph.js';
import { buildMentionPattern, countMentions } from './mention-matcher.js';
import type { SkillMention, TextAnalysisCapability } from './types.js';

/**
 * Deterministic analyzer that matches skill ids, names and aliases from the
 * graph. Salience grows with repetition: 1 - 0.5^count.
 */
export class KeywordTextAnalyzer implements TextAnalysisCapability {
  readonly name = 'keyword-text-analyzer';
  private readonly patterns: Array<{ skill: string; pattern: RegExp | null }>;

  constructor(graph: SkillGraph) {
    this.patterns = graph.topologicalOrder().map((skill) => ({
      skill: skill.id,
      pattern: buildMentionPattern([skill.id, skill.name, ...skill.aliases]),
    }));
  }

  async analyze(text: string): Promise<SkillMention[]> {
    const mentions: SkillMention[] = [];
    for (const { skill, pattern } of this.patterns) {
      const count = countMentions(text, pattern);
      if (count > 0) {
        mentions.push({ mention: skill, salience: 1 - Math.pow(0.5, count) });
      }
    }
    return mentions;
  }
}
