import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from '../config.js';
import { ClassifierUnavailableError, MalformedResponseError, errorMessage } from '../errors.js';

export interface CompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
}

/** "Given a prompt, return text": the only LLM capability the core relies on. */
export interface CompletionClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

type LlmSettings = AppConfig['llm'] & { apiKey: string };

// Failures that mean the backend is unusable right now, not that one reply was bad
function isBackendUnavailable(err: unknown): boolean {
  return err instanceof Anthropic.APIConnectionError
    || err instanceof Anthropic.RateLimitError
    || err instanceof Anthropic.InternalServerError
    || err instanceof Anthropic.AuthenticationError
    || err instanceof Anthropic.PermissionDeniedError;
}

export class AnthropicCompletionClient implements CompletionClient {
  private readonly anthropic: Anthropic;

  constructor(private readonly settings: LlmSettings) {
    this.anthropic = new Anthropic({
      apiKey: settings.apiKey,
      maxRetries: settings.maxRetries,
      timeout: settings.timeoutMs,
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.anthropic.messages.create(
        {
          model: this.settings.model,
          max_tokens: options.maxTokens ?? 1024,
          temperature: 0.1,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal }
      );

      const content = response.content[0];
      if (!content || content.type !== 'text') {
        throw new MalformedResponseError('Unexpected response type from Claude');
      }
      return content.text;
    } catch (err) {
      if (isBackendUnavailable(err)) {
        throw new ClassifierUnavailableError(`LLM backend unavailable: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }
  }
}

export function createCompletionClient(settings: AppConfig['llm']): CompletionClient | null {
  if (!settings.apiKey) {
    console.warn('[LLM] ANTHROPIC_API_KEY not set, generic parsing and enrichment are disabled');
    return null;
  }
  return new AnthropicCompletionClient({ ...settings, apiKey: settings.apiKey });
}

/**
 * Extract JSON from a model reply, tolerating a markdown code fence around it.
 */
export function parseJsonReply(reply: string): unknown {
  let jsonStr = reply.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*/i, '').replace(/```\s*$/, '').trim();
  }

  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    throw new MalformedResponseError(`Reply is not valid JSON: ${errorMessage(err)}`, reply);
  }
}
