import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { callCapability, type CapabilityCallOptions } from '../capabilities/call-capability.js';
import { HeuristicJudge } from '../capabilities/heuristic-judge.js';
import type { Judgment, ResponseJudgmentCapability } from '../capabilities/types.js';
import type { EngineConfig } from '../lib/config.js';
import { InterviewStateError, UnknownRoleError, ValidationError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { parseOrThrow } from '../lib/validate.js';
import { nextTarget } from './interview-targeting.js';
import type { MasteryModel } from './mastery-model.js';
import { InterviewTypeSchema } from './schemas.js';
import type { SkillGraph } from './skill-graph.js';
import type {
  InterviewSession,
  InterviewTurn,
  InterviewType,
  MasteryEstimate,
  Observation,
  Skill,
} from './types.js';

export interface InterviewEngineOptions {
  interview: EngineConfig['interview'];
  /** Multiplier applied to judge confidence on interview observations. */
  interview_confidence: number;
  capability: CapabilityCallOptions;
  now?: () => Date;
  newId?: () => string;
}

export const CreateInterviewSchema = z.object({
  learner_id: z.string().min(1),
  role: z.string().min(1),
  interview_type: InterviewTypeSchema.default('technical'),
  question_count: z.number().int().positive().max(50).optional(),
});

export type CreateInterviewInput = z.input<typeof CreateInterviewSchema>;

export interface ScoredInterview {
  session: InterviewSession;
  observations: Observation[];
}

export interface CompletedInterview extends ScoredInterview {
  estimates: MasteryEstimate[];
}

const JudgmentSchema = z.object({
  score: z.number().min(0).max(1),
  confidence: z.number().min(0).max(1),
});

const ACTIVE_STATUSES: ReadonlySet<InterviewSession['status']> = new Set(['in_progress', 'scoring']);

export function isActive(session: InterviewSession): boolean {
  return ACTIVE_STATUSES.has(session.status);
}

// ─── Question templates ───────────────────────────────────────────────

const QUESTION_TEMPLATES: Record<InterviewType, readonly string[]> = {
  technical: [
    'Explain the core ideas of {skill} and how you have applied them in a real project.',
    'Describe a bug or performance problem involving {skill}. How did you find and fix it?',
    'How would you teach {skill} to a new teammate? Which pitfalls would you warn them about?',
  ],
  behavioral: [
    'Tell me about a time you had to learn {skill} quickly to deliver something. What happened?',
    'Describe a disagreement with a colleague about how to approach {skill}. How was it resolved?',
    'When did a decision you made about {skill} turn out wrong, and what did you change afterwards?',
  ],
  system_design: [
    'Design a service where {skill} is central. Walk through the components and their trade-offs.',
    'How would the design of a system built on {skill} change at 100x the current load?',
    'Which failure modes would you plan for in a production system relying on {skill}?',
  ],
};

export function questionFor(type: InterviewType, skill: Skill, index: number): string {
  const templates = QUESTION_TEMPLATES[type];
  return templates[index % templates.length].replace('{skill}', skill.name);
}

// ─── Engine ───────────────────────────────────────────────────────────

/**
 * Mock-interview state machine:
 *
 *   created → in_progress → scoring → completed
 *         ↘        ↓           ↓
 *                  abandoned
 *
 * Every method takes a session and returns a new one; nothing is mutated in
 * place, so a failed step leaves the caller's copy as it was. Observations are
 * only produced by `score`, and only for a session in `scoring`.
 */
export class InterviewEngine {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly graph: SkillGraph,
    private readonly judge: ResponseJudgmentCapability,
    private readonly options: InterviewEngineOptions,
    private readonly pacingJudge: ResponseJudgmentCapability = new HeuristicJudge(),
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  create(input: CreateInterviewInput): InterviewSession {
    const params = parseOrThrow(CreateInterviewSchema, input, 'interview request');
    if (!this.graph.roleTargets(params.role)) throw new UnknownRoleError(params.role);

    return {
      id: this.newId(),
      learner_id: params.learner_id,
      role: params.role,
      interview_type: params.interview_type,
      status: 'created',
      question_count: params.question_count ?? this.options.interview.default_question_count,
      planned_targets: [],
      skill_pool: this.graph.rolePool(params.role).map((skill) => skill.id),
      turns: [],
      difficulty_cursor: 0,
      created_at: this.now().toISOString(),
    };
  }

  /** Plans targets from the weakest, least certain pooled skills and asks the first question. */
  start(session: InterviewSession, model: MasteryModel, questionCount?: number): InterviewSession {
    this.assertStatus(session, 'created', 'start');
    const count = questionCount ?? session.question_count;
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError(`Invalid question count: ${count}`);
    }

    const planned = model.weakestUncertain(count, session.skill_pool).map((skill) => skill.id);
    const now = this.now();
    const next: InterviewSession = {
      ...session,
      status: 'in_progress',
      question_count: count,
      planned_targets: planned,
      started_at: now.toISOString(),
      deadline_at: new Date(now.getTime() + this.options.interview.session_timeout_ms).toISOString(),
    };
    return this.ask(next);
  }

  /** The open question, if the session is waiting for an answer. */
  currentQuestion(session: InterviewSession): InterviewTurn | undefined {
    if (session.status !== 'in_progress') return undefined;
    const last = session.turns.at(-1);
    return last && last.response === undefined ? last : undefined;
  }

  /**
   * Records an answer with a provisional score from the pacing judge, then
   * asks the next question or, once every question is answered, moves to
   * `scoring`.
   */
  async submitResponse(session: InterviewSession, response: string): Promise<InterviewSession> {
    this.assertStatus(session, 'in_progress', 'answer');
    if (this.isOverdue(session)) {
      throw new InterviewStateError(`Interview ${session.id} passed its deadline`);
    }
    const open = this.currentQuestion(session);
    if (!open) throw new InterviewStateError(`Interview ${session.id} has no open question`);

    const text = response.trim();
    if (text.length === 0) throw new ValidationError('Invalid response: answer text is empty');

    const skill = this.skillOf(open.skill);
    const provisional = await this.judgeWith(this.pacingJudge, text, skill, open.question);

    const answered: InterviewTurn = {
      ...open,
      response: text,
      answered_at: this.now().toISOString(),
      provisional_score: provisional.score,
    };
    const next: InterviewSession = {
      ...session,
      turns: [...session.turns.slice(0, -1), answered],
    };

    if (next.turns.length >= next.question_count) {
      return { ...next, status: 'scoring', scoring_started_at: this.now().toISOString() };
    }
    return this.ask(next);
  }

  /**
   * Judges every answered turn, then builds one interview observation per
   * turn. No observation is returned unless every judgment succeeded.
   */
  async score(session: InterviewSession): Promise<ScoredInterview> {
    this.assertStatus(session, 'scoring', 'score');

    const answered = session.turns.filter((turn) => turn.response !== undefined);
    const judgments = await Promise.all(
      answered.map((turn) =>
        this.judgeWith(this.judge, turn.response ?? '', this.skillOf(turn.skill), turn.question)),
    );

    const scoredTurns = new Map<number, Judgment>();
    answered.forEach((turn, i) => scoredTurns.set(turn.index, judgments[i]));

    const turns = session.turns.map((turn) => {
      const judgment = scoredTurns.get(turn.index);
      return judgment ? { ...turn, score: judgment.score, confidence: judgment.confidence } : turn;
    });

    const observations: Observation[] = answered.map((turn, i) => ({
      skill: turn.skill,
      strength: judgments[i].score,
      confidence: judgments[i].confidence * this.options.interview_confidence,
      source: 'interview',
      observed_at: turn.answered_at,
    }));

    logger.info(
      { sessionId: session.id, learnerId: session.learner_id, observations: observations.length },
      'Interview scored',
    );

    return {
      session: { ...session, turns, status: 'completed', completed_at: this.now().toISOString() },
      observations,
    };
  }

  /** Scores the session and merges its observations into the model. */
  async complete(session: InterviewSession, model: MasteryModel): Promise<CompletedInterview> {
    const scored = await this.score(session);
    const estimates = model.mergeAll(scored.observations);
    return { ...scored, estimates };
  }

  /** Ends the session without emitting observations. */
  abandon(session: InterviewSession, reason: 'cancelled' | 'timeout' = 'cancelled'): InterviewSession {
    if (session.status === 'completed' || session.status === 'abandoned') {
      throw new InterviewStateError(`Cannot abandon interview ${session.id}: it is already ${session.status}`);
    }
    return {
      ...session,
      status: 'abandoned',
      abandoned_at: this.now().toISOString(),
      abandon_reason: reason,
    };
  }

  /**
   * An in-progress session is overdue after its deadline. A scoring session is
   * overdue once it has waited `scoring_timeout_ms` for completion.
   */
  isOverdue(session: InterviewSession): boolean {
    const now = this.now().getTime();
    if (session.status === 'in_progress') {
      return session.deadline_at !== undefined && now > Date.parse(session.deadline_at);
    }
    if (session.status === 'scoring') {
      return session.scoring_started_at !== undefined
        && now > Date.parse(session.scoring_started_at) + this.options.interview.scoring_timeout_ms;
    }
    return false;
  }

  /** Abandons an overdue session; otherwise returns it unchanged. */
  expireIfOverdue(session: InterviewSession): InterviewSession {
    if (!this.isOverdue(session)) return session;
    logger.info({ sessionId: session.id, learnerId: session.learner_id }, 'Interview expired');
    return this.abandon(session, 'timeout');
  }

  private ask(session: InterviewSession): InterviewSession {
    const decision = nextTarget(session, this.graph, this.options.interview);
    const index = session.turns.length;
    const turn: InterviewTurn = {
      index,
      skill: decision.skill.id,
      question: questionFor(session.interview_type, decision.skill, index),
      move: decision.move,
      asked_at: this.now().toISOString(),
    };
    return { ...session, difficulty_cursor: decision.cursor, turns: [...session.turns, turn] };
  }

  private async judgeWith(
    judge: ResponseJudgmentCapability,
    response: string,
    skill: Skill,
    question: string,
  ): Promise<Judgment> {
    const judgment = await callCapability(
      judge.name,
      (signal) => judge.judge(response, skill, { question, signal }),
      this.options.capability,
    );
    return parseOrThrow(JudgmentSchema, judgment, `${judge.name} judgment`);
  }

  private skillOf(id: string): Skill {
    const skill = this.graph.getSkill(id);
    if (!skill) throw new InterviewStateError(`Interview targets unknown skill '${id}'`);
    return skill;
  }

  private assertStatus(session: InterviewSession, expected: InterviewSession['status'], action: string): void {
    if (session.status !== expected) {
      throw new InterviewStateError(
        `Cannot ${action} interview ${session.id}: status is ${session.status}, expected ${expected}`,
      );
    }
  }
}
