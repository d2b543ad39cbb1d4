import { callCapability, type CapabilityCallOptions } from '../capabilities/call-capability.js';
import type { TextAnalysisCapability } from '../capabilities/types.js';
import type { SourceConfidence } from '../lib/config.js';
import logger from '../lib/logger.js';
import { repositoryEvidenceText } from './repository-evidence.js';
import type { SkillGraph } from './skill-graph.js';
import type { Observation, ObservationSource, RepositorySummary } from './types.js';

export interface SkillExtractorOptions {
  source_confidence: SourceConfidence;
  min_salience: number;
  capability: CapabilityCallOptions;
  now?: () => Date;
}

/**
 * Turns unstructured evidence into observations for the skill model.
 *
 * Capability failures propagate (a timeout is CapabilityTimeoutError after the
 * retry budget). Bad individual mentions do not: they are dropped with a
 * warning and the rest of the result is kept.
 */
export class SkillExtractor {
  private readonly now: () => Date;

  constructor(
    private readonly graph: SkillGraph,
    private readonly analyzer: TextAnalysisCapability,
    private readonly options: SkillExtractorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async extract(evidenceText: string, source: ObservationSource): Promise<Observation[]> {
    if (evidenceText.trim().length === 0) return [];

    const mentions = await callCapability(
      this.analyzer.name,
      (signal) => this.analyzer.analyze(evidenceText, signal),
      this.options.capability,
    );

    const best = new Map<string, number>();
    let dropped = 0;
    for (const { mention, salience } of mentions) {
      const skill = this.graph.resolveSkill(mention);
      if (!skill || !Number.isFinite(salience) || salience < 0 || salience > 1) {
        dropped += 1;
        continue;
      }
      if (salience < this.options.min_salience) continue;
      best.set(skill, Math.max(best.get(skill) ?? 0, salience));
    }

    if (dropped > 0) {
      logger.warn({ analyzer: this.analyzer.name, source, dropped }, 'Dropped unrecognized or invalid skill mentions');
    }

    const observedAt = this.now().toISOString();
    const confidence = this.options.source_confidence[source];
    return [...best.entries()]
      .sort((a, b) => this.graph.positionOf(a[0]) - this.graph.positionOf(b[0]))
      .map(([skill, salience]) => ({
        skill,
        strength: salience,
        confidence,
        source,
        observed_at: observedAt,
      }));
  }

  extractRepositories(repositories: readonly RepositorySummary[]): Promise<Observation[]> {
    return this.extract(repositoryEvidenceText(repositories), 'repository');
  }
}
