import { describe, expect, it, vi } from 'vitest';
import type { SkillMention, TextAnalysisCapability } from '../capabilities/types.js';
import { languageBreakdown, repositoryEvidenceText } from '../engine/repository-evidence.js';
import { SkillExtractor } from '../engine/skill-extractor.js';
import { CapabilityTimeoutError } from '../lib/errors.js';
import { buildTestGraph, NOW, testConfig } from './fixtures.js';

function stubAnalyzer(mentions: SkillMention[]) {
  const analyze = vi.fn(async (_text: string, _signal?: AbortSignal) => mentions);
  const analyzer: TextAnalysisCapability = { name: 'stub-analyzer', analyze };
  return { analyzer, analyze };
}

function extractorFor(analyzer: TextAnalysisCapability, capability = testConfig().capability) {
  const config = testConfig();
  return new SkillExtractor(buildTestGraph(), analyzer, {
    source_confidence: config.extraction.source_confidence,
    min_salience: config.extraction.min_salience,
    capability,
    now: () => NOW,
  });
}

describe('SkillExtractor.extract', () => {
  it('resolves mentions, keeps the highest salience and drops bad entries', async () => {
    const { analyzer } = stubAnalyzer([
      { mention: 'HTTP', salience: 0.4 },
      { mention: 'rest api', salience: 0.9 },
      { mention: 'cobol', salience: 0.8 },
      { mention: 'sql', salience: 1.7 },
      { mention: 'networking-basics', salience: 0.01 },
      { mention: 'linux', salience: Number.NaN },
    ]);

    const observations = await extractorFor(analyzer).extract('resume body', 'resume');

    expect(observations).toEqual([
      { skill: 'http', strength: 0.9, confidence: 0.35, source: 'resume', observed_at: NOW.toISOString() },
    ]);
  });

  it('orders observations topologically and uses the source confidence', async () => {
    const { analyzer } = stubAnalyzer([
      { mention: 'sql', salience: 0.5 },
      { mention: 'docker', salience: 0.6 },
      { mention: 'linux', salience: 0.7 },
    ]);

    const observations = await extractorFor(analyzer).extract('notes', 'manual');

    expect(observations.map((o) => [o.skill, o.confidence])).toEqual([
      ['linux', 0.7],
      ['docker', 0.7],
      ['sql', 0.7],
    ]);
  });

  it('returns no observations for blank text without calling the analyzer', async () => {
    const { analyzer, analyze } = stubAnalyzer([{ mention: 'sql', salience: 1 }]);
    expect(await extractorFor(analyzer).extract('  \n ', 'resume')).toEqual([]);
    expect(analyze).not.toHaveBeenCalled();
  });

  it('surfaces a hung analyzer as CapabilityTimeoutError rather than an empty result', async () => {
    const analyze = vi.fn(() => new Promise<SkillMention[]>(() => {}));
    const extractor = extractorFor(
      { name: 'hung-analyzer', analyze },
      { timeout_ms: 15, max_attempts: 2, base_delay_ms: 1 },
    );

    await expect(extractor.extract('resume body', 'resume')).rejects.toBeInstanceOf(CapabilityTimeoutError);
    expect(analyze).toHaveBeenCalledTimes(2);
  });
});

describe('repository evidence', () => {
  const repositories = [
    {
      name: 'orders-api',
      description: 'Order service',
      language: 'TypeScript',
      topics: ['rest-api', 'postgres'],
      stars: 3,
      updated_at: '2025-05-01T00:00:00Z',
    },
    { name: 'dotfiles', language: 'Shell', stars: 0, updated_at: '2025-06-01T00:00:00Z' },
    { name: '   ' },
    { name: 'cli-tools', language: 'TypeScript' },
  ];

  it('renders repositories newest first, skipping unnamed ones', () => {
    expect(repositoryEvidenceText(repositories)).toBe([
      'Repository: dotfiles\nPrimary language: Shell',
      'Repository: orders-api\nPrimary language: TypeScript\nTopics: rest-api, postgres\nDescription: Order service\nStars: 3',
      'Repository: cli-tools\nPrimary language: TypeScript',
    ].join('\n\n'));
  });

  it('counts primary languages', () => {
    expect(languageBreakdown(repositories)).toEqual([
      { language: 'TypeScript', repositories: 2 },
      { language: 'Shell', repositories: 1 },
    ]);
  });

  it('extracts repository observations with the repository confidence', async () => {
    const { analyzer, analyze } = stubAnalyzer([{ mention: 'sql', salience: 0.6 }]);
    const observations = await extractorFor(analyzer).extractRepositories(repositories);

    expect(analyze.mock.calls[0][0]).toBe(repositoryEvidenceText(repositories));
    expect(observations).toEqual([
      { skill: 'sql', strength: 0.6, confidence: 0.5, source: 'repository', observed_at: NOW.toISOString() },
    ]);
  });
});
