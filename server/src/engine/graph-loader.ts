import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { GraphError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { SkillGraph } from './skill-graph.js';

export const DEFAULT_SKILL_GRAPH_PATH = fileURLToPath(
  new URL('../../config/skill-graph.json', import.meta.url),
);

/**
 * Loads the role/skill graph document once at startup.
 * Any problem (unreadable file, bad JSON, invalid graph) is a GraphError and
 * must stop the process.
 */
export function loadSkillGraph(path: string = process.env.SKILL_GRAPH_PATH ?? DEFAULT_SKILL_GRAPH_PATH): SkillGraph {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new GraphError(
      `Cannot read skill graph at ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'INVALID_CONFIG',
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new GraphError(
      `Skill graph at ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      'INVALID_CONFIG',
    );
  }

  const graph = SkillGraph.fromDocument(document);
  logger.info({ path, skills: graph.size, roles: graph.roles().length }, 'Skill graph loaded');
  return graph;
}
