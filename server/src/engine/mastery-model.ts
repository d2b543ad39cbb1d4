import { UnknownRoleError, ValidationError } from '../lib/errors.js';
import { parseOrThrow } from '../lib/validate.js';
import { ObservationSchema } from './schemas.js';
import type { SkillGraph } from './skill-graph.js';
import type {
  LearnerProfileState,
  MasteryEstimate,
  MasteryHistoryPoint,
  Observation,
  Skill,
  SkillLevel,
} from './types.js';

const DAY_MS = 86_400_000;
const DEFAULT_HISTORY_LIMIT = 50;

export interface ConfidenceDecay {
  half_life_days: number;
  floor: number;
}

export interface MasteryModelOptions {
  decay: ConfidenceDecay;
  history_limit?: number;
  now?: () => Date;
}

export interface MasteryPoint {
  mastery: number;
  confidence: number;
}

export type MasterySnapshot = Pick<LearnerProfileState, 'mastery' | 'mastery_history' | 'mastery_version'>;

/**
 * Exponential decay toward the floor. A confidence already at or below the
 * floor is left alone, so decay never raises a value.
 */
export function decayConfidence(confidence: number, elapsedMs: number, decay: ConfidenceDecay): number {
  if (elapsedMs <= 0 || confidence <= decay.floor) return confidence;
  const halfLives = elapsedMs / DAY_MS / decay.half_life_days;
  return decay.floor + (confidence - decay.floor) * Math.pow(0.5, halfLives);
}

/**
 * Confidence-weighted merge of one observation into a prior estimate.
 *
 *   mastery    = (m_old * c_old + strength * c_src) / (c_old + c_src)
 *   confidence = min(1, c_old + c_src * (1 - c_old))
 *
 * With no prior (or both confidences zero) the observed strength is taken.
 */
export function combineEstimate(
  prior: MasteryPoint | undefined,
  strength: number,
  sourceConfidence: number,
): MasteryPoint {
  const mOld = prior?.mastery ?? 0;
  const cOld = prior?.confidence ?? 0;
  const weight = cOld + sourceConfidence;
  const mastery = weight > 0 ? (mOld * cOld + strength * sourceConfidence) / weight : strength;
  const confidence = Math.min(1, cOld + sourceConfidence * (1 - cOld));
  // Inputs are validated; this only absorbs floating-point overshoot.
  return { mastery: Math.min(1, Math.max(0, mastery)), confidence };
}

/** Level bands used on dashboards. */
export function masteryLevel(mastery: number): SkillLevel {
  if (mastery > 0.8) return 'expert';
  if (mastery > 0.6) return 'advanced';
  if (mastery > 0.4) return 'intermediate';
  return 'beginner';
}

/**
 * A single learner's mastery estimates.
 *
 * The only write path is `merge`; everything else reads. Stored confidences
 * are as of `updated_at`, and reads decay them to the query time, so stale
 * evidence weighs less without ever being deleted.
 *
 * The model is synchronous and not safe to share between concurrent
 * read-modify-write cycles. Callers serialize per learner (see LearnerLock).
 */
export class MasteryModel {
  private estimates = new Map<string, MasteryEstimate>();
  private history = new Map<string, MasteryHistoryPoint[]>();
  private currentVersion = 0;
  private readonly now: () => Date;
  private readonly historyLimit: number;

  constructor(
    private readonly graph: SkillGraph,
    private readonly options: MasteryModelOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.historyLimit = options.history_limit ?? DEFAULT_HISTORY_LIMIT;
  }

  static restore(graph: SkillGraph, options: MasteryModelOptions, snapshot: MasterySnapshot): MasteryModel {
    const model = new MasteryModel(graph, options);
    for (const estimate of snapshot.mastery) {
      model.estimates.set(estimate.skill, { ...estimate });
    }
    for (const [skill, points] of Object.entries(snapshot.mastery_history)) {
      model.history.set(skill, points.slice(-model.historyLimit));
    }
    model.currentVersion = snapshot.mastery_version;
    return model;
  }

  /** Incremented on every successful merge. */
  get version(): number {
    return this.currentVersion;
  }

  /**
   * Folds one observation into the skill's estimate and returns the result.
   * Invalid observations throw ValidationError and leave the model untouched.
   */
  merge(observation: Observation): MasteryEstimate {
    const obs = this.validate(observation);
    const at = obs.observed_at ? new Date(obs.observed_at) : this.now();
    const prior = this.estimates.get(obs.skill);
    const priorPoint = prior
      ? { mastery: prior.mastery, confidence: this.confidenceAt(prior, at) }
      : undefined;

    const next = combineEstimate(priorPoint, obs.strength, obs.confidence);
    const atIso = at.toISOString();
    const updatedAt = prior && Date.parse(prior.updated_at) > at.getTime() ? prior.updated_at : atIso;

    const estimate: MasteryEstimate = {
      skill: obs.skill,
      mastery: next.mastery,
      confidence: next.confidence,
      updated_at: updatedAt,
    };
    this.estimates.set(obs.skill, estimate);

    const points = this.history.get(obs.skill) ?? [];
    points.push({ at: atIso, mastery: next.mastery, confidence: next.confidence, source: obs.source });
    this.history.set(obs.skill, points.slice(-this.historyLimit));
    this.currentVersion += 1;

    return { ...estimate };
  }

  /** Validates every observation before merging any of them. */
  mergeAll(observations: readonly Observation[]): MasteryEstimate[] {
    const validated = observations.map((obs) => this.validate(obs));
    return validated.map((obs) => this.merge(obs));
  }

  /** The estimate with confidence decayed to `at` (default: now). */
  estimate(skill: string, at: Date = this.now()): MasteryEstimate | undefined {
    const stored = this.estimates.get(skill);
    if (!stored) return undefined;
    return { ...stored, confidence: this.confidenceAt(stored, at) };
  }

  masteryOf(skill: string): number {
    return this.estimates.get(skill)?.mastery ?? 0;
  }

  effectiveConfidence(skill: string, at: Date = this.now()): number {
    const stored = this.estimates.get(skill);
    return stored ? this.confidenceAt(stored, at) : 0;
  }

  /**
   * The moment the skill's effective confidence falls to `threshold`, or null
   * when it never will: no estimate, or a decay floor at or above the threshold.
   */
  confidenceReachesAt(skill: string, threshold: number): Date | null {
    const stored = this.estimates.get(skill);
    const { floor, half_life_days: halfLifeDays } = this.options.decay;
    if (!stored || threshold <= floor) return null;

    const updatedAt = Date.parse(stored.updated_at);
    if (stored.confidence <= threshold) return new Date(updatedAt);
    const halfLives = Math.log2((stored.confidence - floor) / (threshold - floor));
    return new Date(updatedAt + halfLives * halfLifeDays * DAY_MS);
  }

  /** All estimates (decayed to now), in graph order. */
  all(): MasteryEstimate[] {
    const at = this.now();
    return [...this.estimates.values()]
      .sort((a, b) => this.graph.positionOf(a.skill) - this.graph.positionOf(b.skill))
      .map((stored) => ({ ...stored, confidence: this.confidenceAt(stored, at) }));
  }

  /**
   * Shortfall per role skill: max(0, target - mastery). Met skills are
   * omitted. Keys are in topological order.
   */
  gap(role: string): Map<string, number> {
    const targets = this.graph.roleTargets(role);
    if (!targets) throw new UnknownRoleError(role);

    const gaps = new Map<string, number>();
    for (const skill of this.graph.topologicalOrder()) {
      const target = targets.get(skill.id);
      if (target === undefined) continue;
      const shortfall = Math.max(0, target - this.masteryOf(skill.id));
      if (shortfall > 0) gaps.set(skill.id, shortfall);
    }
    return gaps;
  }

  /**
   * The n skills with the lowest mastery × effective confidence, drawn from
   * `among` (default: every skill). Missing estimates score 0. Ties go to the
   * skill earlier in topological order.
   */
  weakestUncertain(n: number, among?: Iterable<string>): Skill[] {
    if (n <= 0) return [];
    const at = this.now();
    const candidates = among
      ? [...new Set(among)]
          .map((id) => this.graph.getSkill(id))
          .filter((s): s is Skill => s !== undefined)
      : [...this.graph.topologicalOrder()];

    return candidates
      .map((skill) => {
        const stored = this.estimates.get(skill.id);
        const score = stored ? stored.mastery * this.confidenceAt(stored, at) : 0;
        return { skill, score, position: this.graph.positionOf(skill.id) };
      })
      .sort((a, b) => a.score - b.score || a.position - b.position)
      .slice(0, n)
      .map((entry) => entry.skill);
  }

  levelOf(skill: string): SkillLevel {
    return masteryLevel(this.masteryOf(skill));
  }

  historyOf(skill: string): MasteryHistoryPoint[] {
    return [...(this.history.get(skill) ?? [])];
  }

  snapshot(): MasterySnapshot {
    return {
      mastery: [...this.estimates.values()].map((e) => ({ ...e })),
      mastery_history: Object.fromEntries(
        [...this.history.entries()].map(([skill, points]) => [skill, points.map((p) => ({ ...p }))]),
      ),
      mastery_version: this.currentVersion,
    };
  }

  private validate(observation: Observation): Observation {
    const obs = parseOrThrow(ObservationSchema, observation, 'observation');
    if (!this.graph.hasSkill(obs.skill)) {
      throw new ValidationError(`Invalid observation: unknown skill '${obs.skill}'`);
    }
    return obs;
  }

  private confidenceAt(estimate: MasteryEstimate, at: Date): number {
    const elapsed = at.getTime() - Date.parse(estimate.updated_at);
    return decayConfidence(estimate.confidence, elapsed, this.options.decay);
  }
}
