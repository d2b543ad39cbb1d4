import { describe, expect, it, vi } from 'vitest';
import { KeywordTextAnalyzer } from '../capabilities/keyword-text-analyzer.js';
import type { TextAnalysisCapability } from '../capabilities/types.js';
import { LearnerService } from '../engine/learner-service.js';
import { createApp } from '../index.js';
import { CapabilityResponseError, CapabilityTimeoutError } from '../lib/errors.js';
import { InMemoryProfileStore } from '../storage/profile-store.js';
import { buildTestGraph, NOW, testConfig } from './fixtures.js';

interface ErrorBody {
  error: string;
  code?: string;
  details?: unknown[];
  request_id?: string;
}

function buildApp(analyzer?: TextAnalysisCapability) {
  const graph = buildTestGraph();
  let ids = 0;
  const service = new LearnerService({
    graph,
    config: testConfig(),
    store: new InMemoryProfileStore(),
    analyzer: analyzer ?? new KeywordTextAnalyzer(graph),
    judge: { name: 'stub-judge', judge: vi.fn(async () => ({ score: 0.7, confidence: 0.6 })) },
    now: () => NOW,
    newId: () => `session-${++ids}`,
  });
  return createApp({ service, graph });
}

function postJson(path: string, body: unknown, headers: Record<string, string> = {}): [string, RequestInit] {
  return [`http://test${path}`, {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json', ...headers },
  }];
}

describe('request ids', () => {
  it('echoes a well-formed X-Request-ID', async () => {
    const app = buildApp();
    const res = await app.request('http://test/health', { headers: { 'X-Request-ID': 'req-123' } });
    expect(res.headers.get('X-Request-ID')).toBe('req-123');
  });

  it('replaces a malformed X-Request-ID with a generated one', async () => {
    const app = buildApp();
    const res = await app.request('http://test/health', { headers: { 'X-Request-ID': 'bad id!' } });
    expect(res.headers.get('X-Request-ID')).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('GET /health', () => {
  it('reports the loaded graph', async () => {
    const res = await buildApp().request('http://test/health');
    expect(res.status).toBe(200);
    const body = await res.json() as { status: string; skills: number; roles: string[] };
    expect(body.status).toBe('ok');
    expect(body.skills).toBe(6);
    expect(body.roles).toEqual(['backend-engineer', 'platform-engineer', 'empty-role']);
  });
});

describe('learner routes', () => {
  it('ingests evidence and lists mastery', async () => {
    const app = buildApp();
    const ingest = await app.request(...postJson('/learners/learner-1/evidence', { text: 'Tuned PostgreSQL queries.' }));
    expect(ingest.status).toBe(200);
    const ingested = await ingest.json() as { observations: Array<{ skill: string; source: string }> };
    expect(ingested.observations.map((o) => [o.skill, o.source])).toEqual([['sql', 'resume']]);

    const res = await app.request('http://test/learners/learner-1/mastery');
    const body = await res.json() as { mastery: Array<{ skill: string; level: string }> };
    expect(body.mastery.map((m) => [m.skill, m.level])).toEqual([['sql', 'intermediate']]);
  });

  it('ingests repositories and reports their languages', async () => {
    const res = await buildApp().request(...postJson('/learners/learner-1/repositories', {
      repositories: [
        { name: 'api', language: 'Go', topics: ['rest api'] },
        { name: 'ops', language: 'Shell', description: 'Linux provisioning' },
        { name: 'edge', language: 'Go' },
      ],
    }));
    expect(res.status).toBe(200);
    const body = await res.json() as { observations: Array<{ skill: string }>; languages: unknown[] };
    expect(body.observations.map((o) => o.skill).sort()).toEqual(['http', 'linux']);
    expect(body.languages).toEqual([
      { language: 'Go', repositories: 2 },
      { language: 'Shell', repositories: 1 },
    ]);
  });

  it('grades a code sample with 201', async () => {
    const res = await buildApp().request(...postJson('/learners/learner-1/code-assessments', {
      code: '-- active users\nSELECT id FROM users WHERE active;',
      language: 'sql',
    }));
    expect(res.status).toBe(201);
    const body = await res.json() as { assessment: { level: string }; observation: { skill: string; source: string } };
    expect(body.assessment.level).toBe('expert');
    expect(body.observation).toMatchObject({ skill: 'sql', source: 'repository' });
  });

  it('records attestations with 201', async () => {
    const res = await buildApp().request(...postJson('/learners/learner-1/attestations', { skill: 'docker', strength: 0.5 }));
    expect(res.status).toBe(201);
    const body = await res.json() as { estimate: { skill: string; source?: string } };
    expect(body.estimate.skill).toBe('docker');
  });

  it('serves the roadmap and records unit progress', async () => {
    const app = buildApp();
    const roadmapRes = await app.request('http://test/learners/learner-1/roadmap?role=platform-engineer');
    expect(roadmapRes.status).toBe(200);
    const roadmap = await roadmapRes.json() as { units: Array<{ id: string }> };
    expect(roadmap.units[0].id).toBe('platform-engineer:docker:0-2000');

    const progressRes = await app.request(...postJson('/learners/learner-1/progress', { subject_id: roadmap.units[0].id }));
    expect(progressRes.status).toBe(201);
    const progress = await progressRes.json() as { event: { fraction: number }; estimate: { skill: string } | null };
    expect(progress.event.fraction).toBe(1);
    expect(progress.estimate?.skill).toBe('docker');
  });

  it('runs an interview over HTTP', async () => {
    const app = buildApp();
    const startRes = await app.request(...postJson('/learners/learner-1/interviews', {
      role: 'backend-engineer',
      question_count: 1,
    }));
    expect(startRes.status).toBe(201);
    const started = await startRes.json() as { session: { id: string }; question: { skill: string } };
    expect(started.session.id).toBe('session-1');
    expect(started.question.skill).toBe('networking-basics');

    const answerRes = await app.request(...postJson('/learners/learner-1/interviews/session-1/responses', {
      response: 'I debugged TCP retransmits in our code.',
    }));
    const answered = await answerRes.json() as { session: { status: string }; question: null };
    expect(answered.session.status).toBe('scoring');
    expect(answered.question).toBeNull();

    const completeRes = await app.request('http://test/learners/learner-1/interviews/session-1/complete', { method: 'POST' });
    expect(completeRes.status).toBe(200);
    const completed = await completeRes.json() as { session: { status: string }; observations: unknown[] };
    expect(completed.session.status).toBe('completed');
    expect(completed.observations).toHaveLength(1);
  });
});

describe('error mapping', () => {
  it('returns 400 for an invalid learner id', async () => {
    const res = await buildApp().request('http://test/learners/bad!id/mastery', { headers: { 'X-Request-ID': 'req-1' } });
    expect(res.status).toBe(400);
    const body = await res.json() as ErrorBody;
    expect(body.error).toBe('Invalid learner id');
    expect(body.code).toBe('VALIDATION_ERROR');
    expect(body.request_id).toBe('req-1');
  });

  it('returns 400 with details for an invalid body', async () => {
    const res = await buildApp().request(...postJson('/learners/learner-1/attestations', { skill: 'sql', strength: 3 }));
    expect(res.status).toBe(400);
    const body = await res.json() as ErrorBody;
    expect(body.error).toBe('Invalid request');
    expect(body.details).toHaveLength(1);
  });

  it('returns 400 for malformed JSON', async () => {
    const res = await buildApp().request('http://test/learners/learner-1/evidence', {
      method: 'POST',
      body: '{"text":',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('requires the role query parameter', async () => {
    const res = await buildApp().request('http://test/learners/learner-1/roadmap');
    expect(res.status).toBe(400);
    const body = await res.json() as ErrorBody;
    expect(body.error).toBe('Query parameter "role" is required');
    expect(body.details).toBeUndefined();
  });

  it('returns 404 for unknown roles', async () => {
    const res = await buildApp().request('http://test/learners/learner-1/roadmap?role=astronaut');
    expect(res.status).toBe(404);
    const body = await res.json() as ErrorBody;
    expect(body).toMatchObject({ error: "Role 'astronaut' has no target mastery entries", code: 'UNKNOWN_ROLE' });
  });

  it('returns 404 for unknown interviews and paths', async () => {
    const app = buildApp();
    const missing = await app.request('http://test/learners/learner-1/interviews/session-9');
    expect(missing.status).toBe(404);
    expect((await missing.json() as ErrorBody).code).toBe('NOT_FOUND');

    const unknown = await app.request('http://test/nowhere');
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Not found' });
  });

  it('returns 409 when an interview is already active', async () => {
    const app = buildApp();
    await app.request(...postJson('/learners/learner-1/interviews', { role: 'backend-engineer' }));
    const res = await app.request(...postJson('/learners/learner-1/interviews', { role: 'backend-engineer' }));
    expect(res.status).toBe(409);
    expect((await res.json() as ErrorBody).code).toBe('SESSION_CONFLICT');
  });

  it('returns 503 when a capability times out', async () => {
    const app = buildApp({
      name: 'stub-analyzer',
      analyze: async () => {
        throw new CapabilityTimeoutError('stub-analyzer', 1_000);
      },
    });
    const res = await app.request(...postJson('/learners/learner-1/evidence', { text: 'SQL' }, { 'X-Request-ID': 'req-2' }));
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'Analysis service unavailable. Please retry shortly.',
      code: 'CAPABILITY_TIMEOUT',
      request_id: 'req-2',
    });
  });

  it('returns 503 when a capability keeps answering with nothing usable', async () => {
    const app = buildApp({
      name: 'stub-analyzer',
      analyze: async () => {
        throw new CapabilityResponseError('stub-analyzer', 'an unparseable skill mention response');
      },
    });
    const res = await app.request(...postJson('/learners/learner-1/evidence', { text: 'SQL' }, { 'X-Request-ID': 'req-4' }));
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'Analysis service unavailable. Please retry shortly.',
      code: 'CAPABILITY_RESPONSE',
      request_id: 'req-4',
    });
  });

  it('hides unexpected errors behind a 500', async () => {
    const app = buildApp({
      name: 'stub-analyzer',
      analyze: async () => {
        throw new Error('analyzer crashed');
      },
    });
    const res = await app.request(...postJson('/learners/learner-1/evidence', { text: 'SQL' }, { 'X-Request-ID': 'req-3' }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error', request_id: 'req-3' });
  });
});
