import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createLearnerRoutes } from './routes/learners.js';
import { LearnerService } from './engine/learner-service.js';
import { loadSkillGraph } from './engine/graph-loader.js';
import type { SkillGraph } from './engine/skill-graph.js';
import { KeywordTextAnalyzer } from './capabilities/keyword-text-analyzer.js';
import { HeuristicJudge } from './capabilities/heuristic-judge.js';
import { LlmTextAnalyzer } from './capabilities/llm-text-analyzer.js';
import { LlmResponseJudge } from './capabilities/llm-response-judge.js';
import type { ResponseJudgmentCapability, TextAnalysisCapability } from './capabilities/types.js';
import { InMemoryProfileStore, type ProfileStore } from './storage/profile-store.js';
import { SupabaseProfileStore } from './storage/supabase-profile-store.js';
import { envBool, loadEngineConfig } from './lib/config.js';
import { createProvider, MODEL_LIGHT, MODEL_MID } from './lib/llm.js';
import { parsePositiveInt } from './lib/http-body-guard.js';
import logger from './lib/logger.js';

const isProduction = process.env.NODE_ENV === 'production';
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map(o => o.trim())
  : isProduction
    ? [] // Block all CORS in production if not configured
    : ['http://localhost:5173', 'http://localhost:5174'];

let shuttingDown = false;

export interface AppOptions {
  service: LearnerService;
  graph: SkillGraph;
}

/** Builds the HTTP app around an already-wired service. */
export function createApp({ service, graph }: AppOptions) {
  const app = new Hono();
  const startTime = Date.now();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    const startedAt = Date.now();
    await next();
    logger.debug({
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration_ms: Date.now() - startedAt,
    }, 'Request completed');
  });

  app.use('*', cors({
    origin: allowedOrigins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-ID'],
  }));

  app.get('/health', (c) => {
    return c.json({
      status: shuttingDown ? 'shutting_down' : 'ok',
      skills: graph.size,
      roles: graph.roles().map((role) => role.id),
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString(),
    }, shuttingDown ? 503 : 200);
  });

  app.route('/learners', createLearnerRoutes(service));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError(errorHandler);

  return app;
}

function createCapabilities(graph: SkillGraph): { analyzer: TextAnalysisCapability; judge: ResponseJudgmentCapability } {
  if (!envBool('USE_LLM_CAPABILITIES', false)) {
    return { analyzer: new KeywordTextAnalyzer(graph), judge: new HeuristicJudge() };
  }
  const provider = createProvider();
  logger.info({ provider: provider.name, light: MODEL_LIGHT, mid: MODEL_MID }, 'Using LLM capabilities');
  return {
    analyzer: new LlmTextAnalyzer(graph, provider, MODEL_LIGHT),
    judge: new LlmResponseJudge(provider, MODEL_MID),
  };
}

function createProfileStore(): ProfileStore {
  const kind = process.env.PROFILE_STORE?.toLowerCase() ?? 'memory';
  if (kind === 'supabase') return new SupabaseProfileStore();
  if (kind !== 'memory') {
    throw new Error(`Unknown PROFILE_STORE '${kind}' (expected memory or supabase)`);
  }
  if (isProduction) {
    logger.warn('PROFILE_STORE=memory in production: learner state is lost on restart');
  }
  return new InMemoryProfileStore();
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  // Bad calibration or a malformed skill graph stops startup here.
  const config = loadEngineConfig();
  const graph = loadSkillGraph();
  const { analyzer, judge } = createCapabilities(graph);
  const service = new LearnerService({ graph, config, store: createProfileStore(), analyzer, judge });
  const app = createApp({ service, graph });

  const port = parsePositiveInt(process.env.PORT, 3001);
  logger.info({ port, analyzer: analyzer.name, judge: judge.name }, 'Skill engine server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
