import { z } from 'zod';
import type { ResponseJudgmentCapability, TextAnalysisCapability } from '../capabilities/types.js';
import type { EngineConfig } from '../lib/config.js';
import { InterviewStateError, NotFoundError, SessionConflictError, UnknownRoleError, ValidationError } from '../lib/errors.js';
import { LearnerLock } from '../lib/learner-lock.js';
import { createLearnerLogger } from '../lib/logger.js';
import { parseOrThrow } from '../lib/validate.js';
import { emptyProfile, type ProfileStore } from '../storage/profile-store.js';
import { assessCode, type CodeAssessment, type CodeAssessmentInput } from './code-assessor.js';
import { InterviewEngine, isActive, type CreateInterviewInput } from './interview-engine.js';
import { MasteryModel, type MasteryModelOptions } from './mastery-model.js';
import { ProgressInputSchema, ProgressTracker, type ProgressInput, type ProgressSummary, type UnitProgress } from './progress-tracker.js';
import { languageBreakdown, type LanguageShare } from './repository-evidence.js';
import { RoadmapGenerator } from './roadmap-generator.js';
import { ObservationSourceSchema } from './schemas.js';
import { SkillExtractor } from './skill-extractor.js';
import type { SkillGraph } from './skill-graph.js';
import type {
  InterviewSession,
  InterviewTurn,
  LearnerProfileState,
  MasteryEstimate,
  MasteryHistoryPoint,
  Observation,
  ObservationSource,
  ProgressEvent,
  RepositorySummary,
  Roadmap,
  SkillLevel,
} from './types.js';

export interface LearnerServiceDeps {
  graph: SkillGraph;
  config: EngineConfig;
  store: ProfileStore;
  analyzer: TextAnalysisCapability;
  judge: ResponseJudgmentCapability;
  /** Scores answers during the interview to steer difficulty. Defaults to the local heuristic. */
  pacingJudge?: ResponseJudgmentCapability;
  lock?: LearnerLock;
  now?: () => Date;
  newId?: () => string;
}

export interface MasteryView extends MasteryEstimate {
  skill_name: string;
  level: SkillLevel;
}

export interface IngestResult {
  observations: Observation[];
  estimates: MasteryEstimate[];
}

export interface RepositoryIngestResult extends IngestResult {
  languages: LanguageShare[];
}

export interface CodeAssessmentResult {
  assessment: CodeAssessment;
  observation: Observation;
  estimate: MasteryEstimate;
}

export interface InterviewView {
  session: InterviewSession;
  question: InterviewTurn | null;
}

export interface ProgressView {
  role: string;
  units: UnitProgress[];
  summary: ProgressSummary;
  completed_sessions: string[];
}

export interface LearnerSnapshot {
  learner_id: string;
  mastery: MasteryView[];
  roadmap: Roadmap;
  progress: ProgressView;
  active_interview: InterviewSession | null;
}

export const AttestationSchema = z.object({
  skill: z.string().min(1),
  strength: z.number().min(0).max(1),
});

const EvidenceSourceSchema = ObservationSourceSchema.exclude(['interview']);

/** Mutable view of one learner's state while their lock is held. */
interface LearnerContext {
  state: LearnerProfileState;
  model: MasteryModel;
  tracker: ProgressTracker;
  dirty: boolean;
}

/**
 * Per-learner coordinator over the engine components.
 *
 * Every read-modify-write of a learner's profile runs under that learner's
 * lock. Capability calls (extraction, judgment) happen before the lock is
 * taken; only their results are merged inside it.
 */
export class LearnerService {
  readonly extractor: SkillExtractor;
  readonly interviews: InterviewEngine;
  readonly roadmaps: RoadmapGenerator;
  private readonly graph: SkillGraph;
  private readonly config: EngineConfig;
  private readonly store: ProfileStore;
  private readonly lock: LearnerLock;
  private readonly now: () => Date;
  private readonly masteryOptions: MasteryModelOptions;

  constructor(deps: LearnerServiceDeps) {
    this.graph = deps.graph;
    this.config = deps.config;
    this.store = deps.store;
    this.lock = deps.lock ?? new LearnerLock();
    this.now = deps.now ?? (() => new Date());

    this.masteryOptions = {
      decay: {
        half_life_days: deps.config.mastery.decay_half_life_days,
        floor: deps.config.mastery.confidence_floor,
      },
      history_limit: deps.config.mastery.history_limit,
      now: this.now,
    };
    this.extractor = new SkillExtractor(deps.graph, deps.analyzer, {
      source_confidence: deps.config.extraction.source_confidence,
      min_salience: deps.config.extraction.min_salience,
      capability: deps.config.capability,
      now: this.now,
    });
    this.interviews = new InterviewEngine(deps.graph, deps.judge, {
      interview: deps.config.interview,
      interview_confidence: deps.config.extraction.source_confidence.interview,
      capability: deps.config.capability,
      now: this.now,
      newId: deps.newId,
    }, deps.pacingJudge);
    this.roadmaps = new RoadmapGenerator(deps.config.roadmap);
  }

  // ─── Evidence ─────────────────────────────────────────────────────────

  async ingestEvidence(learnerId: string, text: string, source: ObservationSource = 'resume'): Promise<IngestResult> {
    const evidenceSource = parseOrThrow(EvidenceSourceSchema, source, 'evidence source');
    const observations = await this.extractor.extract(text, evidenceSource);
    return this.mergeObservations(learnerId, observations, evidenceSource);
  }

  async ingestRepositories(learnerId: string, repositories: readonly RepositorySummary[]): Promise<RepositoryIngestResult> {
    const observations = await this.extractor.extractRepositories(repositories);
    const result = await this.mergeObservations(learnerId, observations, 'repository');
    return { ...result, languages: languageBreakdown(repositories) };
  }

  /**
   * Grades a code sample and records the score as a `repository` observation
   * for the requested skill, or for the skill the language resolves to.
   */
  async assessCode(learnerId: string, input: CodeAssessmentInput): Promise<CodeAssessmentResult> {
    const assessment = assessCode(input);
    const requested = input.skill ?? input.language;
    const skillId = this.graph.resolveSkill(requested.trim());
    if (!skillId) throw new ValidationError(`Invalid code assessment: no skill matches '${requested.trim()}'`);

    const observation: Observation = {
      skill: skillId,
      strength: assessment.score,
      confidence: this.config.extraction.source_confidence.repository,
      source: 'repository',
      observed_at: this.now().toISOString(),
    };
    const estimate = await this.mutate(learnerId, (ctx) => ctx.model.merge(observation));
    this.logger(learnerId).info({ skill: skillId, level: assessment.level, score: assessment.score }, 'Code assessed');
    return { assessment, observation, estimate };
  }

  /** Self- or mentor-reported mastery, recorded as a `manual` observation. */
  async attestSkill(learnerId: string, attestation: z.input<typeof AttestationSchema>): Promise<MasteryEstimate> {
    const { skill, strength } = parseOrThrow(AttestationSchema, attestation, 'attestation');
    const skillId = this.graph.resolveSkill(skill);
    if (!skillId) throw new ValidationError(`Invalid attestation: unknown skill '${skill}'`);

    return this.mutate(learnerId, (ctx) => ctx.model.merge({
      skill: skillId,
      strength,
      confidence: this.config.extraction.source_confidence.manual,
      source: 'manual',
      observed_at: this.now().toISOString(),
    }));
  }

  async getMastery(learnerId: string): Promise<MasteryView[]> {
    const state = await this.loadState(learnerId);
    return this.masteryView(this.restoreModel(state));
  }

  async getMasteryHistory(learnerId: string, skill: string): Promise<MasteryHistoryPoint[]> {
    const skillId = this.graph.resolveSkill(skill);
    if (!skillId) throw new NotFoundError(`Unknown skill '${skill}'`);
    const state = await this.loadState(learnerId);
    return this.restoreModel(state).historyOf(skillId);
  }

  // ─── Roadmap & progress ──────────────────────────────────────────────

  /** The learner's roadmap for a role, regenerated only when it is out of date. */
  async getRoadmap(learnerId: string, role: string): Promise<Roadmap> {
    return this.mutate(learnerId, (ctx) => this.ensureRoadmap(ctx, role));
  }

  async getProgress(learnerId: string, role: string): Promise<ProgressView> {
    return this.mutate(learnerId, (ctx) => this.progressView(ctx, this.ensureRoadmap(ctx, role)));
  }

  /**
   * Appends a progress event. Completing a roadmap unit (fraction 1) also
   * records a `manual` observation: a learn unit at its target mastery, a
   * review unit at the current mastery.
   */
  async recordProgress(
    learnerId: string,
    input: ProgressInput,
  ): Promise<{ event: ProgressEvent; estimate: MasteryEstimate | null }> {
    const progress = parseOrThrow(ProgressInputSchema, input, 'progress event');
    return this.mutate(learnerId, (ctx) => {
      const unit = progress.subject_kind === 'unit'
        ? ctx.state.roadmap?.units.find((candidate) => candidate.id === progress.subject_id)
        : undefined;

      if (progress.subject_kind === 'unit' && !unit) {
        throw new NotFoundError(`Roadmap unit ${progress.subject_id} not found`);
      }
      if (progress.subject_kind === 'session' && !ctx.state.interviews.some((s) => s.id === progress.subject_id)) {
        throw new NotFoundError(`Interview ${progress.subject_id} not found`);
      }

      const alreadyCompleted = ctx.tracker.fractionOf(progress.subject_id) === 1;
      const event = ctx.tracker.recordCompletion(progress);
      let estimate: MasteryEstimate | null = null;
      if (unit && event.fraction === 1 && !alreadyCompleted) {
        estimate = ctx.model.merge({
          skill: unit.skill,
          strength: unit.kind === 'learn' ? unit.target_mastery : ctx.model.masteryOf(unit.skill),
          confidence: this.config.extraction.source_confidence.manual,
          source: 'manual',
          observed_at: event.recorded_at,
        });
      }
      return { event, estimate };
    });
  }

  async snapshot(learnerId: string, role: string): Promise<LearnerSnapshot> {
    return this.mutate(learnerId, (ctx) => {
      const roadmap = this.ensureRoadmap(ctx, role);
      return {
        learner_id: learnerId,
        mastery: this.masteryView(ctx.model),
        roadmap,
        progress: this.progressView(ctx, roadmap),
        active_interview: ctx.state.interviews.find(isActive) ?? null,
      };
    });
  }

  // ─── Interviews ──────────────────────────────────────────────────────

  /** Creates and starts a session. Fails while another session is still in progress or scoring. */
  async startInterview(learnerId: string, request: Omit<CreateInterviewInput, 'learner_id'>): Promise<InterviewView> {
    return this.mutate(learnerId, (ctx) => {
      this.expireOverdue(ctx);
      const active = ctx.state.interviews.find(isActive);
      if (active) throw new SessionConflictError(learnerId, active.id);

      const created = this.interviews.create({ ...request, learner_id: learnerId });
      const session = this.interviews.start(created, ctx.model);
      this.putSession(ctx, session);
      ctx.state.interviews = ctx.state.interviews.slice(-this.config.interview.history_limit);
      this.logger(learnerId).info(
        { sessionId: session.id, role: session.role, planned: session.planned_targets },
        'Interview started',
      );
      return { session, question: this.interviews.currentQuestion(session) ?? null };
    });
  }

  async getInterview(learnerId: string, sessionId: string): Promise<InterviewView> {
    const session = this.findSession(await this.loadState(learnerId), sessionId);
    return { session, question: this.interviews.currentQuestion(session) ?? null };
  }

  async submitInterviewResponse(learnerId: string, sessionId: string, response: string): Promise<InterviewView> {
    const before = await this.activeSession(learnerId, sessionId);
    const updated = await this.interviews.submitResponse(before, response);

    return this.mutate(learnerId, (ctx) => {
      this.assertUnchanged(ctx, before);
      this.putSession(ctx, updated);
      return { session: updated, question: this.interviews.currentQuestion(updated) ?? null };
    });
  }

  /**
   * Judges every answer, then merges one interview observation per answer.
   * If any judgment fails the session stays in `scoring` and can be retried.
   */
  async completeInterview(
    learnerId: string,
    sessionId: string,
  ): Promise<{ session: InterviewSession; observations: Observation[]; estimates: MasteryEstimate[] }> {
    const before = await this.activeSession(learnerId, sessionId);
    const scored = await this.interviews.score(before);

    return this.mutate(learnerId, (ctx) => {
      this.assertUnchanged(ctx, before);
      const estimates = ctx.model.mergeAll(scored.observations);
      this.putSession(ctx, scored.session);
      ctx.tracker.recordCompletion({ subject_id: sessionId, subject_kind: 'session', fraction: 1 });
      this.logger(learnerId).info(
        { sessionId, observations: scored.observations.length, masteryVersion: ctx.model.version },
        'Interview completed',
      );
      return { session: scored.session, observations: scored.observations, estimates };
    });
  }

  async cancelInterview(learnerId: string, sessionId: string): Promise<InterviewSession> {
    return this.mutate(learnerId, (ctx) => {
      const session = this.interviews.abandon(this.findSession(ctx.state, sessionId), 'cancelled');
      this.putSession(ctx, session);
      this.logger(learnerId).info({ sessionId }, 'Interview cancelled');
      return session;
    });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private async mergeObservations(
    learnerId: string,
    observations: Observation[],
    source: ObservationSource,
  ): Promise<IngestResult> {
    if (observations.length === 0) {
      this.logger(learnerId).info({ source }, 'No skills recognized in evidence');
      return { observations, estimates: [] };
    }
    const estimates = await this.mutate(learnerId, (ctx) => ctx.model.mergeAll(observations));
    this.logger(learnerId).info({ source, observations: observations.length }, 'Evidence merged');
    return { observations, estimates };
  }

  /**
   * Runs fn against freshly loaded state under the learner's lock and saves
   * the result if anything changed. A throw discards every change.
   */
  private async mutate<T>(learnerId: string, fn: (ctx: LearnerContext) => T): Promise<T> {
    return this.lock.run(learnerId, async () => {
      const state = await this.loadState(learnerId);
      const ctx: LearnerContext = {
        state,
        model: this.restoreModel(state),
        tracker: new ProgressTracker(state.progress_events, state.progress_version, this.now),
        dirty: false,
      };
      const masteryVersion = ctx.model.version;
      const progressVersion = ctx.tracker.version;

      const result = fn(ctx);

      if (ctx.dirty || ctx.model.version !== masteryVersion || ctx.tracker.version !== progressVersion) {
        await this.store.save({
          ...ctx.state,
          ...ctx.model.snapshot(),
          progress_events: ctx.tracker.events,
          progress_version: ctx.tracker.version,
        });
      }
      return result;
    });
  }

  private async loadState(learnerId: string): Promise<LearnerProfileState> {
    return (await this.store.load(learnerId)) ?? emptyProfile(learnerId);
  }

  private restoreModel(state: LearnerProfileState): MasteryModel {
    return MasteryModel.restore(this.graph, this.masteryOptions, state);
  }

  private ensureRoadmap(ctx: LearnerContext, role: string): Roadmap {
    if (!this.graph.roleTargets(role)) throw new UnknownRoleError(role);

    const current = ctx.state.roadmap;
    if (current && current.role === role && !ctx.tracker.isRoadmapStale(current, ctx.model.version)) {
      return current;
    }

    const reviewDueAt = this.roadmaps.reviewDueAt(role, ctx.model, this.graph);
    const roadmap: Roadmap = {
      role,
      units: this.roadmaps.generate(role, ctx.model, this.graph),
      generated_at: this.now().toISOString(),
      mastery_version: ctx.model.version,
      progress_version: ctx.tracker.version,
      ...(reviewDueAt !== undefined && { review_due_at: reviewDueAt }),
    };
    ctx.state.roadmap = roadmap;
    ctx.dirty = true;
    this.logger(ctx.state.learner_id).info(
      { role, units: roadmap.units.length, masteryVersion: roadmap.mastery_version },
      'Roadmap regenerated',
    );
    return roadmap;
  }

  private progressView(ctx: LearnerContext, roadmap: Roadmap): ProgressView {
    return {
      role: roadmap.role,
      units: ctx.tracker.snapshot(roadmap.units),
      summary: ctx.tracker.summary(roadmap.role, roadmap.units),
      completed_sessions: ctx.tracker.completedSessions(),
    };
  }

  private masteryView(model: MasteryModel): MasteryView[] {
    return model.all().map((estimate) => ({
      ...estimate,
      skill_name: this.graph.getSkill(estimate.skill)?.name ?? estimate.skill,
      level: model.levelOf(estimate.skill),
    }));
  }

  private findSession(state: LearnerProfileState, sessionId: string): InterviewSession {
    const session = state.interviews.find((candidate) => candidate.id === sessionId);
    if (!session) throw new NotFoundError(`Interview ${sessionId} not found`);
    return session;
  }

  private putSession(ctx: LearnerContext, session: InterviewSession): void {
    const index = ctx.state.interviews.findIndex((candidate) => candidate.id === session.id);
    if (index === -1) {
      ctx.state.interviews.push(session);
    } else {
      ctx.state.interviews[index] = session;
    }
    ctx.dirty = true;
  }

  private expireOverdue(ctx: LearnerContext): void {
    ctx.state.interviews.forEach((session) => {
      const expired = this.interviews.expireIfOverdue(session);
      if (expired !== session) this.putSession(ctx, expired);
    });
  }

  /**
   * Loads a session for an answer or completion step. A session past its
   * deadline is abandoned and saved before the error is raised.
   */
  private async activeSession(learnerId: string, sessionId: string): Promise<InterviewSession> {
    const session = this.findSession(await this.loadState(learnerId), sessionId);
    if (this.interviews.isOverdue(session)) {
      await this.mutate(learnerId, (ctx) => {
        const current = this.findSession(ctx.state, sessionId);
        this.putSession(ctx, this.interviews.expireIfOverdue(current));
      });
      throw new InterviewStateError(`Interview ${sessionId} expired before it was finished`);
    }
    return session;
  }

  /** Guards the locked write step against a session that moved on while a capability was running. */
  private assertUnchanged(ctx: LearnerContext, before: InterviewSession): void {
    const current = this.findSession(ctx.state, before.id);
    if (current.status !== before.status || current.turns.length !== before.turns.length
      || current.turns.at(-1)?.response !== before.turns.at(-1)?.response) {
      throw new InterviewStateError(`Interview ${before.id} changed while it was being processed`);
    }
  }

  private logger(learnerId: string) {
    return createLearnerLogger(learnerId, { component: 'learner-service' });
  }
}
