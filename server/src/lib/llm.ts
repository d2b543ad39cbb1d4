import { type LLMProvider, AnthropicProvider, ZAIProvider } from './llm-provider.js';
import { MODEL as ANTHROPIC_MODEL } from './anthropic.js';

/** Skill-mention extraction — cheap, high volume. */
export const MODEL_LIGHT = process.env.LLM_MODEL_LIGHT
  ?? (process.env.ZAI_API_KEY ? 'glm-4.7-flash' : ANTHROPIC_MODEL);

/** Interview answer judgment — analytical comparison. */
export const MODEL_MID = process.env.LLM_MODEL_MID
  ?? (process.env.ZAI_API_KEY ? 'glm-4.5-air' : ANTHROPIC_MODEL);

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const configuredProvider = env.LLM_PROVIDER?.toLowerCase();
  const providerName = configuredProvider === 'zai' || configuredProvider === 'anthropic'
    ? configuredProvider
    : (env.ZAI_API_KEY ? 'zai' : 'anthropic');

  if (providerName === 'zai') {
    const apiKey = env.ZAI_API_KEY;
    if (!apiKey) {
      throw new Error('ZAI_API_KEY environment variable is required when LLM_PROVIDER=zai');
    }
    const baseUrl = env.ZAI_BASE_URL ?? 'https://api.z.ai/api/paas/v4';
    return new ZAIProvider({ apiKey, baseUrl });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider();
}
