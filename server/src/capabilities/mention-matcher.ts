function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive matcher for a set of surface forms. Forms only match on
 * their own ("sql" does not match inside "postgresql"), and punctuation in a
 * form ("c++", "node.js") is taken literally.
 */
export function buildMentionPattern(forms: readonly string[]): RegExp | null {
  const unique = [...new Set(forms.map((f) => f.trim().toLowerCase()).filter(Boolean))]
    // Longest first so "rest api" wins over "rest" at the same position
    .sort((a, b) => b.length - a.length);
  if (unique.length === 0) return null;
  return new RegExp(`(?<![a-z0-9])(?:${unique.map(escapeRegExp).join('|')})(?![a-z0-9])`, 'gi');
}

export function countMentions(text: string, pattern: RegExp | null): number {
  if (!pattern) return 0;
  return text.match(pattern)?.length ?? 0;
}
