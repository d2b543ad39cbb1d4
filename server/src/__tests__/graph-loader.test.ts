import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { loadSkillGraph } from '../engine/graph-loader.js';
import { GraphError } from '../lib/errors.js';

const dir = mkdtempSync(path.join(tmpdir(), 'skill-graph-'));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeGraph(name: string, contents: string): string {
  const file = path.join(dir, name);
  writeFileSync(file, contents, 'utf8');
  return file;
}

function loadError(file: string): GraphError {
  try {
    loadSkillGraph(file);
  } catch (err) {
    if (err instanceof GraphError) return err;
    throw err;
  }
  throw new Error('expected a GraphError');
}

describe('loadSkillGraph', () => {
  it('loads the bundled skill graph', () => {
    const graph = loadSkillGraph();
    expect(graph.size).toBe(29);
    expect(graph.roles().map((role) => role.id)).toEqual([
      'backend-engineer',
      'frontend-engineer',
      'data-scientist',
      'ml-engineer',
      'devops-engineer',
    ]);
    expect(graph.resolveSkill('RESTful APIs')).toBe('http');
  });

  it('loads a graph from an explicit path', () => {
    const file = writeGraph('small.json', JSON.stringify({
      skills: [
        { id: 'git', name: 'Git', tier: 'foundational' },
        { id: 'ci', name: 'Continuous Integration', tier: 'intermediate', prerequisites: ['git'] },
      ],
      roles: { 'release-engineer': { targets: { ci: 0.7 } } },
    }));

    const graph = loadSkillGraph(file);
    expect(graph.topologicalOrder().map((skill) => skill.id)).toEqual(['git', 'ci']);
  });

  it('fails on a missing file', () => {
    const err = loadError(path.join(dir, 'missing.json'));
    expect(err.kind).toBe('INVALID_CONFIG');
    expect(err.message).toContain('Cannot read skill graph at');
  });

  it('fails on malformed JSON', () => {
    const err = loadError(writeGraph('broken.json', '{"skills": ['));
    expect(err.kind).toBe('INVALID_CONFIG');
    expect(err.message).toContain('is not valid JSON');
  });

  it('fails on a cyclic graph', () => {
    const err = loadError(writeGraph('cycle.json', JSON.stringify({
      skills: [
        { id: 'a', name: 'A', tier: 'foundational', prerequisites: ['b'] },
        { id: 'b', name: 'B', tier: 'foundational', prerequisites: ['a'] },
      ],
    })));
    expect(err.kind).toBe('CYCLE');
  });
});
