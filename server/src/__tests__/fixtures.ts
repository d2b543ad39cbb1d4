import { buildEngineConfig, type EngineConfigInput } from '../lib/config.js';
import { MasteryModel, type MasteryModelOptions } from '../engine/mastery-model.js';
import { SkillGraph } from '../engine/skill-graph.js';
import type { MasteryEstimate, SkillGraphConfig } from '../engine/types.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

/**
 * Topological order of this graph:
 *   linux, networking-basics, docker, http, sql, api-design
 */
export const TEST_GRAPH_CONFIG: SkillGraphConfig = {
  skills: [
    { id: 'networking-basics', name: 'Networking Basics', tier: 'foundational', aliases: ['tcp/ip'] },
    { id: 'http', name: 'HTTP', tier: 'intermediate', prerequisites: ['networking-basics'], aliases: ['rest api'] },
    { id: 'sql', name: 'SQL', tier: 'intermediate', aliases: ['postgresql'] },
    { id: 'api-design', name: 'API Design', tier: 'advanced', prerequisites: ['http'], aliases: ['openapi'] },
    { id: 'linux', name: 'Linux', tier: 'foundational' },
    { id: 'docker', name: 'Docker', tier: 'intermediate', prerequisites: ['linux'], aliases: ['containers'] },
  ],
  roles: {
    'backend-engineer': { title: 'Backend Engineer', targets: { http: 0.7, sql: 0.6 } },
    'platform-engineer': { targets: { docker: 0.8, 'api-design': 0.5 } },
    'empty-role': { targets: {} },
  },
};

export function buildTestGraph(): SkillGraph {
  return SkillGraph.fromConfig(TEST_GRAPH_CONFIG);
}

export function testConfig(overrides: EngineConfigInput = {}) {
  return buildEngineConfig({
    capability: { timeout_ms: 1_000, max_attempts: 1, base_delay_ms: 1 },
    ...overrides,
  });
}

export function masteryOptions(now: () => Date = () => NOW): MasteryModelOptions {
  return { decay: { half_life_days: 90, floor: 0.1 }, history_limit: 50, now };
}

/** A model holding exactly the given estimates, stamped at NOW unless set. */
export function modelWith(
  graph: SkillGraph,
  estimates: Array<Pick<MasteryEstimate, 'skill' | 'mastery' | 'confidence'> & { updated_at?: string }>,
  now: () => Date = () => NOW,
): MasteryModel {
  return MasteryModel.restore(graph, masteryOptions(now), {
    mastery: estimates.map((e) => ({ ...e, updated_at: e.updated_at ?? NOW.toISOString() })),
    mastery_history: {},
    mastery_version: 0,
  });
}
