import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  text: string;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 180_000;

/**
 * Merges the caller's signal with a hard request timeout so a hung provider
 * can never outlive the capability call that issued it.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    combinedController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!combinedController.signal.aborted) combinedController.abort(callerSignal?.reason);
  };
  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, DEFAULT_REQUEST_TIMEOUT_MS);
    try {
      const response = await anthropic.messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          system: params.system,
          messages: params.messages,
          ...(params.temperature !== undefined && { temperature: params.temperature }),
        },
        { signal },
      );

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') text += block.text;
      }

      return { text };
    } finally {
      cleanup();
    }
  }
}

// ─── ZAI provider (OpenAI-compatible) ────────────────────────────────

interface ZAIConfig {
  apiKey: string;
  baseUrl: string;
}

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).passthrough().optional(),
  }).passthrough()).optional(),
}).passthrough();

export class ZAIProvider implements LLMProvider {
  readonly name = 'zai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: ZAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(params.signal, DEFAULT_REQUEST_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          messages: [{ role: 'system', content: params.system }, ...params.messages],
          stream: false,
          ...(params.temperature !== undefined && { temperature: params.temperature }),
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw Object.assign(new Error(`ZAI API error ${response.status}: ${errText}`), { status: response.status });
      }

      const data = OpenAIChatResponseSchema.parse(await response.json());
      return { text: data.choices?.[0]?.message?.content ?? '' };
    } finally {
      cleanup();
    }
  }
}
