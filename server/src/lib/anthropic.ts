import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(): Anthropic {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  if (!anthropicClient) {
    anthropicClient = new Anthropic({ apiKey });
  }
  return anthropicClient;
}

export const MODEL = process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest';
