import type { EngineConfig } from '../lib/config.js';
import { DIFFICULTY_TIERS } from './schemas.js';
import { tierRank, type SkillGraph } from './skill-graph.js';
import type { InterviewSession, Skill, TargetMove } from './types.js';

export type TargetingOptions = Pick<
  EngineConfig['interview'],
  'recent_window' | 'confident_threshold' | 'struggling_threshold'
>;

/** The parts of a session the targeting decision reads. */
export type TargetingHistory = Pick<
  InterviewSession,
  'planned_targets' | 'skill_pool' | 'turns' | 'difficulty_cursor'
>;

export interface TargetDecision {
  skill: Skill;
  cursor: number;
  move: TargetMove;
}

export type Trend = 'confident' | 'struggling' | 'steady' | 'unknown';

const MAX_CURSOR = DIFFICULTY_TIERS.length - 1;

/** Average provisional score of the last `window` answered turns. */
export function recentAverage(history: TargetingHistory, window: number): number | undefined {
  const scores = history.turns
    .filter((turn) => turn.provisional_score !== undefined)
    .slice(-window)
    .map((turn) => turn.provisional_score ?? 0);
  if (scores.length === 0) return undefined;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function classifyTrend(history: TargetingHistory, options: TargetingOptions): Trend {
  const average = recentAverage(history, options.recent_window);
  if (average === undefined) return 'unknown';
  if (average > options.confident_threshold) return 'confident';
  if (average < options.struggling_threshold) return 'struggling';
  return 'steady';
}

function byTierThenPosition(graph: SkillGraph) {
  return (a: Skill, b: Skill) =>
    tierRank(a.tier) - tierRank(b.tier) || graph.positionOf(a.id) - graph.positionOf(b.id);
}

/**
 * Chooses the skill the next interview question targets.
 *
 * Difficulty state is a cursor over the tiers. A confident streak moves up
 * (an unasked dependent of the current skill, else a pooled skill at or above
 * the new cursor), a struggling streak moves down (an unasked prerequisite,
 * lowest tier first), and anything else continues with the planned targets.
 * When a branch finds no candidate the plan is followed instead.
 */
export function nextTarget(
  history: TargetingHistory,
  graph: SkillGraph,
  options: TargetingOptions,
): TargetDecision {
  const asked = new Set(history.turns.map((turn) => turn.skill));
  const pool = new Set(history.skill_pool);
  const isFresh = (skill: Skill) => !asked.has(skill.id);
  const current = history.turns.at(-1);
  const cursor = history.difficulty_cursor;

  if (current) {
    const trend = classifyTrend(history, options);

    if (trend === 'confident') {
      const nextCursor = Math.min(MAX_CURSOR, cursor + 1);
      const dependents = graph.dependentsOf(current.skill).filter(isFresh);
      const harder = dependents.find((skill) => pool.has(skill.id))
        ?? dependents[0]
        ?? history.skill_pool
          .map((id) => graph.getSkill(id))
          .filter((skill): skill is Skill => skill !== undefined && isFresh(skill))
          .filter((skill) => tierRank(skill.tier) >= nextCursor)
          .sort(byTierThenPosition(graph))[0];
      if (harder) return { skill: harder, cursor: nextCursor, move: 'escalate' };
    }

    if (trend === 'struggling') {
      const easier = graph.prerequisitesOf(current.skill).find(isFresh)
        ?? graph.ancestorsOf(current.skill).filter(isFresh).sort(byTierThenPosition(graph))[0];
      if (easier) return { skill: easier, cursor: Math.max(0, cursor - 1), move: 'deescalate' };
    }
  }

  const move: TargetMove = current ? 'steady' : 'planned';
  const planned = history.planned_targets
    .map((id) => graph.getSkill(id))
    .filter((skill): skill is Skill => skill !== undefined);

  const next = planned.find(isFresh)
    ?? history.skill_pool
      .map((id) => graph.getSkill(id))
      .filter((skill): skill is Skill => skill !== undefined && isFresh(skill))
      .sort((a, b) =>
        Math.abs(tierRank(a.tier) - cursor) - Math.abs(tierRank(b.tier) - cursor)
        || graph.positionOf(a.id) - graph.positionOf(b.id))[0]
    // Every pooled skill has been asked: cycle through the plan again.
    ?? planned[history.turns.length % Math.max(1, planned.length)];

  if (!next) {
    throw new Error('Interview has no skills to target');
  }
  return { skill: next, cursor: current ? cursor : tierRank(next.tier), move };
}
