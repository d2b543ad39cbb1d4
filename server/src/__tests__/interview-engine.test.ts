import { describe, expect, it, vi } from 'vitest';
import type { Judgment, ResponseJudgmentCapability } from '../capabilities/types.js';
import { InterviewEngine, questionFor } from '../engine/interview-engine.js';
import type { InterviewSession } from '../engine/types.js';
import { InterviewStateError, UnknownRoleError, ValidationError } from '../lib/errors.js';
import { buildTestGraph, modelWith, NOW, testConfig } from './fixtures.js';

const graph = buildTestGraph();

function judgeReturning(...judgments: Judgment[]) {
  let call = 0;
  const judge = vi.fn(async () => judgments[Math.min(call++, judgments.length - 1)]);
  const capability: ResponseJudgmentCapability = { name: 'stub-judge', judge };
  return { capability, judge };
}

function setup(options: { judge?: ResponseJudgmentCapability; pacing?: ResponseJudgmentCapability } = {}) {
  let now = NOW;
  const clock = {
    now: () => now,
    advance: (ms: number) => {
      now = new Date(now.getTime() + ms);
    },
  };
  const config = testConfig();
  const judge = options.judge ?? judgeReturning({ score: 0.8, confidence: 0.5 }).capability;
  const pacing = options.pacing ?? judgeReturning({ score: 0.6, confidence: 0.4 }).capability;
  const engine = new InterviewEngine(graph, judge, {
    interview: config.interview,
    interview_confidence: 0.9,
    capability: config.capability,
    now: clock.now,
    newId: () => 'session-1',
  }, pacing);
  const model = modelWith(graph, [
    { skill: 'networking-basics', mastery: 0.9, confidence: 0.9 },
    { skill: 'http', mastery: 0.3, confidence: 0.4 },
  ], clock.now);
  return { engine, model, clock };
}

async function answeredSession(engine: InterviewEngine, session: InterviewSession, answers: string[]) {
  let current = session;
  for (const answer of answers) {
    current = await engine.submitResponse(current, answer);
  }
  return current;
}

describe('InterviewEngine lifecycle', () => {
  it('creates a session over the role pool', () => {
    const { engine } = setup();
    const session = engine.create({ learner_id: 'learner-1', role: 'backend-engineer' });

    expect(session).toEqual({
      id: 'session-1',
      learner_id: 'learner-1',
      role: 'backend-engineer',
      interview_type: 'technical',
      status: 'created',
      question_count: 5,
      planned_targets: [],
      skill_pool: ['networking-basics', 'http', 'sql'],
      turns: [],
      difficulty_cursor: 0,
      created_at: NOW.toISOString(),
    });
  });

  it('rejects unknown roles', () => {
    const { engine } = setup();
    expect(() => engine.create({ learner_id: 'learner-1', role: 'astronaut' })).toThrow(UnknownRoleError);
  });

  it('plans the weakest skills and asks the first question on start', () => {
    const { engine, model } = setup();
    const session = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer' }), model, 2);

    expect(session.status).toBe('in_progress');
    expect(session.question_count).toBe(2);
    expect(session.planned_targets).toEqual(['sql', 'http']);
    expect(session.deadline_at).toBe(new Date(NOW.getTime() + 45 * 60_000).toISOString());
    expect(engine.currentQuestion(session)).toEqual({
      index: 0,
      skill: 'sql',
      question: 'Explain the core ideas of SQL and how you have applied them in a real project.',
      move: 'planned',
      asked_at: NOW.toISOString(),
    });
  });

  it('moves to scoring once every question is answered', async () => {
    const { engine, model } = setup();
    const started = engine.start(
      engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 2 }),
      model,
    );

    const afterFirst = await engine.submitResponse(started, '  I used window functions for reporting.  ');
    expect(afterFirst.turns[0].response).toBe('I used window functions for reporting.');
    expect(afterFirst.turns[0].provisional_score).toBe(0.6);
    expect(engine.currentQuestion(afterFirst)?.skill).toBe('http');
    expect(afterFirst.turns[1].move).toBe('steady');

    const scoring = await engine.submitResponse(afterFirst, 'Status codes and caching headers.');
    expect(scoring.status).toBe('scoring');
    expect(scoring.scoring_started_at).toBe(NOW.toISOString());
    expect(engine.currentQuestion(scoring)).toBeUndefined();
    expect(started.status).toBe('in_progress');
  });

  it('de-escalates to a prerequisite when the learner struggles', async () => {
    const { engine } = setup({ pacing: judgeReturning({ score: 0.1, confidence: 0.4 }).capability });
    const model = modelWith(graph, [
      { skill: 'sql', mastery: 0.9, confidence: 0.9 },
      { skill: 'networking-basics', mastery: 0.9, confidence: 0.9 },
    ]);
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 3 }), model);
    expect(started.planned_targets).toEqual(['http', 'networking-basics', 'sql']);

    const next = await engine.submitResponse(started, 'Not sure.');
    expect(next.turns[1]).toMatchObject({ skill: 'networking-basics', move: 'deescalate' });
    expect(next.difficulty_cursor).toBe(0);
  });

  it('emits exactly one observation per answered question on completion', async () => {
    const { engine, model } = setup();
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 2 }), model);
    const scoring = await answeredSession(engine, started, ['first answer', 'second answer']);

    const result = await engine.complete(scoring, model);

    expect(result.session.status).toBe('completed');
    expect(result.session.completed_at).toBe(NOW.toISOString());
    expect(result.observations).toEqual([
      { skill: 'sql', strength: 0.8, confidence: 0.45, source: 'interview', observed_at: NOW.toISOString() },
      { skill: 'http', strength: 0.8, confidence: 0.45, source: 'interview', observed_at: NOW.toISOString() },
    ]);
    expect(result.session.turns.map((t) => [t.score, t.confidence])).toEqual([[0.8, 0.5], [0.8, 0.5]]);
    expect(result.estimates).toHaveLength(2);
    expect(model.version).toBe(2);
    expect(model.masteryOf('sql')).toBeCloseTo(0.8, 10);
  });

  it('leaves the session in scoring and the model untouched when a judgment fails', async () => {
    const failing: ResponseJudgmentCapability = {
      name: 'failing-judge',
      judge: vi.fn(async () => {
        throw new Error('judge exploded');
      }),
    };
    const { engine, model } = setup({ judge: failing });
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 1 }), model);
    const scoring = await answeredSession(engine, started, ['answer']);

    await expect(engine.complete(scoring, model)).rejects.toThrow('judge exploded');
    expect(scoring.status).toBe('scoring');
    expect(model.version).toBe(0);
  });

  it('rejects judgments outside [0, 1]', async () => {
    const { engine, model } = setup({ judge: judgeReturning({ score: 1.5, confidence: 0.5 }).capability });
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 1 }), model);
    const scoring = await answeredSession(engine, started, ['answer']);

    await expect(engine.score(scoring)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('InterviewEngine abandonment', () => {
  it('abandons without observations and refuses to complete afterwards', async () => {
    const { engine, model } = setup();
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 2 }), model);
    const partial = await engine.submitResponse(started, 'half an interview');

    const abandoned = engine.abandon(partial);
    expect(abandoned).toMatchObject({ status: 'abandoned', abandon_reason: 'cancelled', abandoned_at: NOW.toISOString() });
    await expect(engine.complete(abandoned, model)).rejects.toBeInstanceOf(InterviewStateError);
    expect(model.version).toBe(0);
    expect(() => engine.abandon(abandoned)).toThrow(InterviewStateError);
  });

  it('expires overdue sessions with a timeout reason', async () => {
    const { engine, model, clock } = setup();
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer' }), model);

    expect(engine.expireIfOverdue(started)).toBe(started);
    clock.advance(46 * 60_000);

    await expect(engine.submitResponse(started, 'late answer')).rejects.toThrow('passed its deadline');
    expect(engine.expireIfOverdue(started)).toMatchObject({ status: 'abandoned', abandon_reason: 'timeout' });
  });

  it('expires a session left in scoring past the scoring timeout', async () => {
    const { engine, model, clock } = setup();
    const started = engine.start(engine.create({ learner_id: 'learner-1', role: 'backend-engineer', question_count: 1 }), model);
    const scoring = await answeredSession(engine, started, ['answer']);
    expect(scoring.status).toBe('scoring');

    clock.advance(60 * 60_000);
    expect(engine.isOverdue(scoring)).toBe(false);
    clock.advance(1);
    expect(engine.isOverdue(scoring)).toBe(true);
    expect(engine.expireIfOverdue(scoring)).toMatchObject({ status: 'abandoned', abandon_reason: 'timeout' });
  });

  it('rejects illegal transitions and empty answers', async () => {
    const { engine, model } = setup();
    const created = engine.create({ learner_id: 'learner-1', role: 'backend-engineer' });

    await expect(engine.submitResponse(created, 'too early')).rejects.toBeInstanceOf(InterviewStateError);
    const started = engine.start(created, model);
    expect(() => engine.start(started, model)).toThrow(InterviewStateError);
    await expect(engine.submitResponse(started, '   ')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('questionFor', () => {
  it('rotates templates per interview type', () => {
    const sql = graph.getSkill('sql');
    if (!sql) throw new Error('fixture is missing sql');
    expect(questionFor('behavioral', sql, 0))
      .toBe('Tell me about a time you had to learn SQL quickly to deliver something. What happened?');
    expect(questionFor('system_design', sql, 4))
      .toBe('How would the design of a system built on SQL change at 100x the current load?');
  });
});
