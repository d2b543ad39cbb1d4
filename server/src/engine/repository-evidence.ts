import type { RepositorySummary } from './types.js';

const MAX_REPOSITORIES = 50;

/**
 * Renders repository metadata as plain evidence text, one paragraph per
 * repository, most recently updated first. The text analyzer then treats it
 * the same way as a resume.
 */
export function repositoryEvidenceText(repositories: readonly RepositorySummary[]): string {
  const sorted = [...repositories]
    .filter((repo) => repo.name.trim().length > 0)
    .sort((a, b) => (b.updated_at ?? '').localeCompare(a.updated_at ?? ''))
    .slice(0, MAX_REPOSITORIES);

  return sorted
    .map((repo) => {
      const lines = [`Repository: ${repo.name.trim()}`];
      if (repo.language) lines.push(`Primary language: ${repo.language}`);
      if (repo.topics && repo.topics.length > 0) lines.push(`Topics: ${repo.topics.join(', ')}`);
      if (repo.description) lines.push(`Description: ${repo.description.trim()}`);
      if (repo.stars !== undefined && repo.stars > 0) lines.push(`Stars: ${repo.stars}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export interface LanguageShare {
  language: string;
  repositories: number;
}

/** Primary languages by repository count, most used first. */
export function languageBreakdown(repositories: readonly RepositorySummary[]): LanguageShare[] {
  const counts = new Map<string, number>();
  for (const repo of repositories) {
    if (!repo.language) continue;
    counts.set(repo.language, (counts.get(repo.language) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([language, count]) => ({ language, repositories: count }));
}
