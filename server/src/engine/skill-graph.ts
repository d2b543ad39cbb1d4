import { GraphError } from '../lib/errors.js';
import { DIFFICULTY_TIERS, SkillGraphConfigSchema } from './schemas.js';
import type { DifficultyTier, Skill, SkillGraphConfig } from './types.js';

export interface RoleDefinition {
  id: string;
  title: string;
  targets: ReadonlyMap<string, number>;
}

export function tierRank(tier: DifficultyTier): number {
  return DIFFICULTY_TIERS.indexOf(tier);
}

/** Ascending tier, then ascending id. */
function compareSkills(a: Skill, b: Skill): number {
  const byTier = tierRank(a.tier) - tierRank(b.tier);
  if (byTier !== 0) return byTier;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function normalizeMention(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Finds one cycle among the nodes Kahn's algorithm could not place.
 * Returned as a path that starts and ends on the same skill.
 */
function findCycle(remaining: Set<string>, skills: ReadonlyMap<string, Skill>): string[] {
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  const dfs = (id: string): string[] | null => {
    visited.add(id);
    stack.push(id);
    onStack.add(id);
    for (const prereq of skills.get(id)?.prerequisites ?? []) {
      if (!remaining.has(prereq)) continue;
      if (onStack.has(prereq)) {
        return [...stack.slice(stack.indexOf(prereq)), prereq];
      }
      if (!visited.has(prereq)) {
        const found = dfs(prereq);
        if (found) return found;
      }
    }
    stack.pop();
    onStack.delete(id);
    return null;
  };

  for (const id of [...remaining].sort()) {
    if (visited.has(id)) continue;
    const cycle = dfs(id);
    if (cycle) return cycle.reverse();
  }
  return [...remaining];
}

/**
 * Immutable prerequisite graph plus per-role mastery targets.
 *
 * All validation happens in `fromDocument`; once constructed, every query is a
 * lookup against precomputed maps and no query can fail on graph shape.
 */
export class SkillGraph {
  private readonly order: readonly Skill[];
  private readonly positions = new Map<string, number>();
  private readonly dependents = new Map<string, Set<string>>();
  private readonly mentions = new Map<string, string>();

  private constructor(
    private readonly skills: ReadonlyMap<string, Skill>,
    private readonly roleDefinitions: ReadonlyMap<string, RoleDefinition>,
  ) {
    for (const skill of skills.values()) {
      for (const prereq of skill.prerequisites) {
        const set = this.dependents.get(prereq) ?? new Set<string>();
        set.add(skill.id);
        this.dependents.set(prereq, set);
      }
      for (const form of [skill.id, skill.name, ...skill.aliases]) {
        const key = normalizeMention(form);
        if (!this.mentions.has(key)) this.mentions.set(key, skill.id);
      }
    }

    this.order = this.linearize();
    this.order.forEach((skill, index) => this.positions.set(skill.id, index));
  }

  static fromConfig(config: SkillGraphConfig): SkillGraph {
    return SkillGraph.fromDocument(config);
  }

  /**
   * Validates an untyped graph document and builds the graph.
   * Throws GraphError on schema violations, duplicate ids, dangling
   * prerequisites, role targets for unknown skills, or cycles.
   */
  static fromDocument(document: unknown): SkillGraph {
    const parsed = SkillGraphConfigSchema.safeParse(document);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new GraphError(`Invalid skill graph configuration: ${detail}`, 'INVALID_CONFIG');
    }

    const skills = new Map<string, Skill>();
    for (const raw of parsed.data.skills) {
      if (skills.has(raw.id)) {
        throw new GraphError(`Skill '${raw.id}' is defined more than once`, 'DUPLICATE_SKILL');
      }
      skills.set(raw.id, {
        id: raw.id,
        name: raw.name,
        tier: raw.tier,
        prerequisites: [...new Set(raw.prerequisites)],
        aliases: raw.aliases,
        ...(raw.description !== undefined && { description: raw.description }),
      });
    }

    for (const skill of skills.values()) {
      for (const prereq of skill.prerequisites) {
        if (!skills.has(prereq)) {
          throw new GraphError(
            `Skill '${skill.id}' requires unknown skill '${prereq}'`,
            'MISSING_PREREQUISITE',
          );
        }
        if (prereq === skill.id) {
          throw new GraphError(`Skill '${skill.id}' lists itself as a prerequisite`, 'CYCLE');
        }
      }
    }

    const roles = new Map<string, RoleDefinition>();
    for (const [roleId, role] of Object.entries(parsed.data.roles)) {
      const targets = new Map<string, number>();
      for (const [skillId, target] of Object.entries(role.targets)) {
        if (!skills.has(skillId)) {
          throw new GraphError(
            `Role '${roleId}' targets unknown skill '${skillId}'`,
            'UNKNOWN_SKILL',
          );
        }
        targets.set(skillId, target);
      }
      roles.set(roleId, { id: roleId, title: role.title ?? roleId, targets });
    }

    return new SkillGraph(skills, roles);
  }

  get size(): number {
    return this.skills.size;
  }

  getSkill(id: string): Skill | undefined {
    return this.skills.get(id);
  }

  hasSkill(id: string): boolean {
    return this.skills.has(id);
  }

  /** Direct prerequisites. */
  prerequisitesOf(id: string): Skill[] {
    const skill = this.skills.get(id);
    if (!skill) return [];
    return skill.prerequisites
      .map((prereq) => this.skills.get(prereq))
      .filter((s): s is Skill => s !== undefined)
      .sort(compareSkills);
  }

  /** Transitive prerequisites, in topological order. */
  ancestorsOf(id: string): Skill[] {
    const seen = new Set<string>();
    const queue = [...(this.skills.get(id)?.prerequisites ?? [])];
    while (queue.length > 0) {
      const next = queue.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...(this.skills.get(next)?.prerequisites ?? []));
    }
    return this.order.filter((skill) => seen.has(skill.id));
  }

  /** Skills that list `id` as a direct prerequisite. */
  dependentsOf(id: string): Skill[] {
    return [...(this.dependents.get(id) ?? [])]
      .map((dep) => this.skills.get(dep))
      .filter((s): s is Skill => s !== undefined)
      .sort(compareSkills);
  }

  /**
   * Every skill after all of its prerequisites; among skills that are ready
   * at the same time, lower tiers come first, then ids ascending.
   */
  topologicalOrder(): readonly Skill[] {
    return this.order;
  }

  /** Index in topologicalOrder(); Infinity for unknown skills. */
  positionOf(id: string): number {
    return this.positions.get(id) ?? Number.POSITIVE_INFINITY;
  }

  targetMastery(role: string, skill: string): number | undefined {
    return this.roleDefinitions.get(role)?.targets.get(skill);
  }

  /** Undefined when the role is unknown or has no targets. */
  roleTargets(role: string): ReadonlyMap<string, number> | undefined {
    const targets = this.roleDefinitions.get(role)?.targets;
    return targets && targets.size > 0 ? targets : undefined;
  }

  roles(): RoleDefinition[] {
    return [...this.roleDefinitions.values()];
  }

  /**
   * Role targets plus all their prerequisites, in topological order.
   * The pool an interview for the role may draw questions from.
   */
  rolePool(role: string): Skill[] {
    const targets = this.roleTargets(role);
    if (!targets) return [];
    const ids = new Set<string>();
    for (const skillId of targets.keys()) {
      ids.add(skillId);
      for (const ancestor of this.ancestorsOf(skillId)) ids.add(ancestor.id);
    }
    return this.order.filter((skill) => ids.has(skill.id));
  }

  /** Maps an id, display name or alias (case-insensitive) to a skill id. */
  resolveSkill(mention: string): string | undefined {
    return this.mentions.get(normalizeMention(mention));
  }

  private linearize(): Skill[] {
    const inDegree = new Map<string, number>();
    for (const skill of this.skills.values()) {
      inDegree.set(skill.id, skill.prerequisites.length);
    }

    const ready = [...this.skills.values()].filter((s) => s.prerequisites.length === 0);
    const order: Skill[] = [];

    while (ready.length > 0) {
      ready.sort(compareSkills);
      const current = ready.shift();
      if (!current) break;
      order.push(current);
      for (const depId of this.dependents.get(current.id) ?? []) {
        const remaining = (inDegree.get(depId) ?? 0) - 1;
        inDegree.set(depId, remaining);
        const dep = this.skills.get(depId);
        if (remaining === 0 && dep) ready.push(dep);
      }
    }

    if (order.length < this.skills.size) {
      const placed = new Set(order.map((s) => s.id));
      const remaining = new Set([...this.skills.keys()].filter((id) => !placed.has(id)));
      const cycle = findCycle(remaining, this.skills);
      throw new GraphError(`Prerequisite cycle detected: ${cycle.join(' -> ')}`, 'CYCLE');
    }

    return order;
  }
}
