import type { EngineConfig } from '../lib/config.js';
import type { MasteryModel } from './mastery-model.js';
import type { SkillGraph } from './skill-graph.js';
import type { RoadmapUnit } from './types.js';

export type RoadmapOptions = EngineConfig['roadmap'];

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Mastery value as integer basis points, used in unit ids. */
function basisPoints(value: number): number {
  return Math.round(value * 10_000);
}

/**
 * Number of equal parts a gap is split into. The quotient is rounded first so
 * 0.5 / 0.25 is 2 parts, not 3 through float error.
 */
export function partCount(gap: number, maxUnitDelta: number): number {
  return Math.max(1, Math.ceil(round(gap / maxUnitDelta, 9)));
}

/**
 * Builds the ordered learning roadmap for a role from the current mastery
 * state. Pure with respect to its inputs: the same graph and mastery always
 * give the same units, including ids.
 */
export class RoadmapGenerator {
  constructor(private readonly options: RoadmapOptions) {}

  generate(role: string, model: MasteryModel, graph: SkillGraph): RoadmapUnit[] {
    const gap = model.gap(role);
    const targets = graph.roleTargets(role) ?? new Map<string, number>();
    const units: Array<Omit<RoadmapUnit, 'position'>> = [];

    for (const skill of graph.topologicalOrder()) {
      const target = targets.get(skill.id);
      if (target === undefined) continue;

      const multiplier = this.options.tier_multipliers[skill.tier];
      const shortfall = gap.get(skill.id);
      const current = model.masteryOf(skill.id);

      if (shortfall !== undefined) {
        const parts = partCount(shortfall, this.options.max_unit_delta);
        const delta = shortfall / parts;
        for (let part = 1; part <= parts; part++) {
          const from = current + delta * (part - 1);
          const to = part === parts ? target : current + delta * part;
          units.push({
            id: `${role}:${skill.id}:${basisPoints(from)}-${basisPoints(to)}`,
            skill: skill.id,
            skill_name: skill.name,
            tier: skill.tier,
            kind: 'learn',
            part,
            parts,
            from_mastery: round(from, 4),
            target_mastery: round(to, 4),
            target_delta: round(delta, 4),
            effort_hours: round(delta * this.options.hours_per_mastery_point * multiplier, 2),
          });
        }
        continue;
      }

      // Target met: schedule a refresher once the evidence has gone stale.
      const estimate = model.estimate(skill.id);
      if (estimate && estimate.confidence < this.options.review_confidence_threshold) {
        units.push({
          id: `${role}:${skill.id}:review-${basisPoints(current)}`,
          skill: skill.id,
          skill_name: skill.name,
          tier: skill.tier,
          kind: 'review',
          part: 1,
          parts: 1,
          from_mastery: round(current, 4),
          target_mastery: round(current, 4),
          target_delta: 0,
          effort_hours: round(this.options.review_hours * multiplier, 2),
        });
      }
    }

    return units.map((unit, index) => ({ ...unit, position: index + 1 }));
  }

  /**
   * Earliest time a met target without a review unit decays below the review
   * threshold. Past it, the roadmap must be rebuilt even though no mastery or
   * progress changed.
   */
  reviewDueAt(role: string, model: MasteryModel, graph: SkillGraph): string | undefined {
    const targets = graph.roleTargets(role);
    if (!targets) return undefined;
    const gap = model.gap(role);
    const threshold = this.options.review_confidence_threshold;

    let earliest: number | undefined;
    for (const skill of targets.keys()) {
      if (gap.has(skill) || model.effectiveConfidence(skill) < threshold) continue;
      const due = model.confidenceReachesAt(skill, threshold)?.getTime();
      if (due !== undefined && (earliest === undefined || due < earliest)) earliest = due;
    }
    return earliest === undefined ? undefined : new Date(earliest).toISOString();
  }
}
