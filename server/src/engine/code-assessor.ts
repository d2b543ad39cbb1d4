import { z } from 'zod';
import { parseOrThrow } from '../lib/validate.js';
import { masteryLevel } from './mastery-model.js';
import type { SkillLevel } from './types.js';

export const CodeAssessmentInputSchema = z.object({
  code: z.string().max(100_000).refine((code) => code.trim().length > 0, 'Code must not be blank'),
  language: z.string().trim().min(1).max(50),
  /** Skill to credit. Defaults to the skill the language name resolves to. */
  skill: z.string().trim().min(1).max(100).optional(),
});

export type CodeAssessmentInput = z.input<typeof CodeAssessmentInputSchema>;

export interface CodeMetrics {
  lines: number;
  code_lines: number;
  average_line_length: number;
  comment_ratio: number;
  functions: number;
  average_function_lines: number;
  complexity_per_function: number;
  /** 0..1 */
  readability: number;
  /** 0..1 */
  modularity: number;
  /** 0..100 */
  maintainability: number;
}

export interface CodeAssessment {
  language: string;
  metrics: CodeMetrics;
  level: SkillLevel;
  score: number;
  recommendations: string[];
}

const LEVEL_BASE_SCORE: Record<SkillLevel, number> = {
  beginner: 0.3,
  intermediate: 0.5,
  advanced: 0.75,
  expert: 0.9,
};

const HASH_COMMENT_LANGUAGES = new Set(['python', 'py', 'ruby', 'rb', 'shell', 'sh', 'bash', 'zsh', 'r', 'perl', 'yaml', 'dockerfile']);
const DASH_COMMENT_LANGUAGES = new Set(['sql', 'postgresql', 'postgres', 'mysql', 'lua', 'haskell']);

const FUNCTION_PATTERN = /\b(?:def|function|func|fn|fun|sub)\s+[A-Za-z_$][\w$]*|=>/g;
const DECISION_PATTERN = /\b(?:if|elif|for|while|case|catch|except)\b|&&|\|\||\band\b|\bor\b/g;

function commentMarkers(language: string): string[] {
  const key = language.toLowerCase();
  if (HASH_COMMENT_LANGUAGES.has(key)) return ['#'];
  if (DASH_COMMENT_LANGUAGES.has(key)) return ['--'];
  return ['//', '/*', '*'];
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Static text metrics for a snippet. Lines, comments and branches are
 * counted lexically, so any language gets a reading without a parser.
 */
export function measureCode(code: string, language: string): CodeMetrics {
  const lines = code.replace(/\r\n/g, '\n').split('\n');
  const markers = commentMarkers(language);
  const isComment = (line: string) => markers.some((marker) => line.trim().startsWith(marker));

  const commentLines = lines.filter(isComment).length;
  const codeLines = lines.filter((line) => line.trim().length > 0 && !isComment(line));
  const body = codeLines.join('\n');

  const averageLineLength = lines.reduce((sum, line) => sum + line.length, 0) / lines.length;
  const commentRatio = commentLines / lines.length;
  // Up to 100 characters per line and a third of lines commented count in full.
  const readability = Math.max(0, 1 - averageLineLength / 100) * 0.6 + Math.min(1, commentRatio * 3) * 0.4;

  const functions = countMatches(body, FUNCTION_PATTERN);
  const averageFunctionLines = functions > 0 ? codeLines.length / functions : codeLines.length;
  const modularity = functions > 0
    ? Math.min(1, functions / 10) * 0.4 + Math.max(0, 1 - averageFunctionLines / 50) * 0.6
    : 0.5;

  const complexity = 1 + countMatches(body, DECISION_PATTERN) / Math.max(1, functions);
  const maintainability = 100 * Math.max(0, 1 - (complexity - 1) / 20);

  return {
    lines: lines.length,
    code_lines: codeLines.length,
    average_line_length: round(averageLineLength),
    comment_ratio: round(commentRatio),
    functions,
    average_function_lines: round(averageFunctionLines),
    complexity_per_function: round(complexity),
    readability: round(readability),
    modularity: round(modularity),
    maintainability: round(maintainability),
  };
}

function recommendations(metrics: CodeMetrics): string[] {
  const tips: string[] = [];
  if (metrics.average_line_length > 80) {
    tips.push(`Wrap long lines: they average ${Math.round(metrics.average_line_length)} characters.`);
  }
  if (metrics.comment_ratio < 0.05) {
    tips.push('Comment the blocks whose intent is not obvious from the code.');
  }
  if (metrics.functions === 0 && metrics.code_lines > 15) {
    tips.push('Split the script into named functions.');
  }
  if (metrics.functions > 0 && metrics.average_function_lines > 30) {
    tips.push(`Extract helpers from long functions (about ${Math.round(metrics.average_function_lines)} lines each).`);
  }
  if (metrics.complexity_per_function > 10) {
    tips.push('Reduce branching per function with early returns or lookup tables.');
  }
  return tips;
}

/**
 * Grades a code sample. The level comes from maintainability (60%) and
 * readability (40%) on the mastery bands; the score blends the level's base
 * score with both metrics.
 */
export function assessCode(input: CodeAssessmentInput): CodeAssessment {
  const { code, language } = parseOrThrow(CodeAssessmentInputSchema, input, 'code assessment');
  const metrics = measureCode(code, language);
  const maintainability = metrics.maintainability / 100;

  const level = masteryLevel(maintainability * 0.6 + metrics.readability * 0.4);
  const score = LEVEL_BASE_SCORE[level] * 0.6 + maintainability * 0.2 + metrics.readability * 0.2;

  return {
    language: language.toLowerCase(),
    metrics,
    level,
    score: round(score),
    recommendations: recommendations(metrics),
  };
}
