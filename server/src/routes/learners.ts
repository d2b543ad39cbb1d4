import { Hono } from 'hono';
import { z } from 'zod';
import { CodeAssessmentInputSchema } from '../engine/code-assessor.js';
import { AttestationSchema, type LearnerService } from '../engine/learner-service.js';
import { InterviewTypeSchema, OBSERVATION_SOURCES } from '../engine/schemas.js';
import { ValidationError } from '../lib/errors.js';
import { parseJsonBodyWithLimit, parsePositiveInt } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';

const MAX_EVIDENCE_BODY_BYTES = parsePositiveInt(process.env.MAX_EVIDENCE_BODY_BYTES, 200_000);
const MAX_SMALL_BODY_BYTES = parsePositiveInt(process.env.MAX_SMALL_BODY_BYTES, 20_000);

const learnerIdSchema = z.string().regex(/^[A-Za-z0-9._:-]{1,128}$/);

const evidenceSchema = z.object({
  text: z.string().min(1).max(100_000),
  source: z.enum(OBSERVATION_SOURCES).exclude(['interview']).default('resume'),
});

const repositoriesSchema = z.object({
  repositories: z.array(z.object({
    name: z.string().min(1).max(200),
    description: z.string().max(2_000).nullish(),
    language: z.string().max(100).nullish(),
    topics: z.array(z.string().max(100)).max(50).optional(),
    stars: z.number().int().nonnegative().optional(),
    updated_at: z.string().optional(),
  })).min(1).max(200),
});

const progressSchema = z.object({
  subject_id: z.string().min(1).max(300),
  subject_kind: z.enum(['unit', 'session']).default('unit'),
  fraction: z.number().min(0).max(1).optional(),
});

const startInterviewSchema = z.object({
  role: z.string().min(1).max(100),
  interview_type: InterviewTypeSchema.default('technical'),
  question_count: z.number().int().positive().max(50).optional(),
});

const responseSchema = z.object({
  response: z.string().min(1).max(20_000),
});

function parseWith<T extends z.ZodType>(schema: T, body: unknown): z.infer<T> {
  const result = validateBody(schema, body);
  if (!result.success) throw new ValidationError('Invalid request', result.issues);
  return result.data;
}

function learnerIdOf(raw: string): string {
  const parsed = learnerIdSchema.safeParse(raw);
  if (!parsed.success) throw new ValidationError('Invalid learner id', parsed.error.issues);
  return parsed.data;
}

function roleOf(raw: string | undefined): string {
  if (!raw) throw new ValidationError('Query parameter "role" is required');
  return raw;
}

/** Learner-scoped API. Errors surface through the app's onError handler. */
export function createLearnerRoutes(service: LearnerService) {
  const learners = new Hono();

  // POST /learners/:id/evidence — Extract skills from resume (or other) text
  learners.post('/:id/evidence', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_EVIDENCE_BODY_BYTES);
    if (!body.ok) return body.response;
    const { text, source } = parseWith(evidenceSchema, body.data);
    return c.json(await service.ingestEvidence(learnerId, text, source));
  });

  // POST /learners/:id/repositories — Extract skills from repository metadata
  learners.post('/:id/repositories', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_EVIDENCE_BODY_BYTES);
    if (!body.ok) return body.response;
    const { repositories } = parseWith(repositoriesSchema, body.data);
    return c.json(await service.ingestRepositories(learnerId, repositories));
  });

  // POST /learners/:id/code-assessments — Grade a code sample as skill evidence
  learners.post('/:id/code-assessments', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_EVIDENCE_BODY_BYTES);
    if (!body.ok) return body.response;
    return c.json(await service.assessCode(learnerId, parseWith(CodeAssessmentInputSchema, body.data)), 201);
  });

  learners.post('/:id/attestations', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_SMALL_BODY_BYTES);
    if (!body.ok) return body.response;
    const estimate = await service.attestSkill(learnerId, parseWith(AttestationSchema, body.data));
    return c.json({ estimate }, 201);
  });

  learners.get('/:id/mastery', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json({ mastery: await service.getMastery(learnerId) });
  });

  learners.get('/:id/mastery/:skill/history', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json({ history: await service.getMasteryHistory(learnerId, c.req.param('skill')) });
  });

  learners.get('/:id/roadmap', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json(await service.getRoadmap(learnerId, roleOf(c.req.query('role'))));
  });

  learners.get('/:id/progress', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json(await service.getProgress(learnerId, roleOf(c.req.query('role'))));
  });

  learners.post('/:id/progress', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_SMALL_BODY_BYTES);
    if (!body.ok) return body.response;
    return c.json(await service.recordProgress(learnerId, parseWith(progressSchema, body.data)), 201);
  });

  learners.get('/:id/snapshot', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json(await service.snapshot(learnerId, roleOf(c.req.query('role'))));
  });

  // ─── Mock interviews ─────────────────────────────────────────────────

  learners.post('/:id/interviews', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_SMALL_BODY_BYTES);
    if (!body.ok) return body.response;
    return c.json(await service.startInterview(learnerId, parseWith(startInterviewSchema, body.data)), 201);
  });

  learners.get('/:id/interviews/:sessionId', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json(await service.getInterview(learnerId, c.req.param('sessionId')));
  });

  learners.post('/:id/interviews/:sessionId/responses', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    const body = await parseJsonBodyWithLimit(c, MAX_SMALL_BODY_BYTES);
    if (!body.ok) return body.response;
    const { response } = parseWith(responseSchema, body.data);
    return c.json(await service.submitInterviewResponse(learnerId, c.req.param('sessionId'), response));
  });

  learners.post('/:id/interviews/:sessionId/complete', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json(await service.completeInterview(learnerId, c.req.param('sessionId')));
  });

  learners.post('/:id/interviews/:sessionId/cancel', async (c) => {
    const learnerId = learnerIdOf(c.req.param('id'));
    return c.json({ session: await service.cancelInterview(learnerId, c.req.param('sessionId')) });
  });

  return learners;
}
