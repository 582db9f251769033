/**
 * Claude Client - LLM Integration for candidate sourcing
 *
 * Thin wrapper over the Anthropic Messages API used by:
 * - Fit scoring (rubric-constrained JSON output)
 * - Outreach drafting (free text)
 *
 * Callers depend on the LlmClient interface so tests can swap in a fake.
 */

import Anthropic, { APIError } from '@anthropic-ai/sdk';
import type { Message, MessageParam, ContentBlock } from '@anthropic-ai/sdk/resources/messages';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  defaultModel: string;
  maxRetries: number;
  timeoutMs: number;
}

export type ClaudeModel =
  | 'claude-sonnet-4-20250514'
  | 'claude-3-5-sonnet-20241022'
  | 'claude-3-5-haiku-20241022';

const DEFAULT_MODEL: ClaudeModel = 'claude-3-5-haiku-20241022';

const DEFAULT_CONFIG = {
  defaultModel: DEFAULT_MODEL,
  maxRetries: 0, // single attempt per request
  timeoutMs: 60000,
} satisfies Omit<ClaudeClientConfig, 'apiKey'>;

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface ClaudeRequest {
  prompt: string;
  systemPrompt?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface ClaudeResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  stopReason: string | null;
  latencyMs: number;
}

export interface LlmClient {
  chat(request: ClaudeRequest): Promise<ClaudeResponse>;
}

// =============================================================================
// ERRORS
// =============================================================================

/**
 * Non-2xx answer (or no answer at all) from the LLM service.
 * `status` is undefined for connection failures and timeouts.
 */
export class LlmServiceError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'LlmServiceError';
  }
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient implements LlmClient {
  private client: Anthropic;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig>) {
    this.config = {
      apiKey: config.apiKey || '',
      defaultModel: config.defaultModel || DEFAULT_CONFIG.defaultModel,
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      timeoutMs: config.timeoutMs || DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required');
    }

    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      maxRetries: this.config.maxRetries,
      timeout: this.config.timeoutMs,
    });
  }

  async chat(request: ClaudeRequest): Promise<ClaudeResponse> {
    const startTime = Date.now();

    const messages: MessageParam[] = [
      {
        role: 'user',
        content: request.prompt,
      },
    ];

    let response: Message;
    try {
      response = await this.client.messages.create({
        model: request.model || this.config.defaultModel,
        max_tokens: request.maxTokens || 1024,
        system: request.systemPrompt,
        messages,
        temperature: request.temperature,
      });
    } catch (error) {
      if (error instanceof APIError) {
        throw new LlmServiceError(`Claude API error: ${error.status ?? 'no response'}`, error.status);
      }
      throw error;
    }

    const textContent = response.content
      .filter((block): block is ContentBlock & { type: 'text' } => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content: textContent,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: response.stop_reason,
      latencyMs: Date.now() - startTime,
    };
  }
}
