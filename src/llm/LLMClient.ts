import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger } from '../utils/logger.js';
import { loadDebugConfig } from '../config/debug.js';

export interface ChatRequest {
  systemPrompt: string;
  userContent: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the model for a JSON object response */
  jsonMode?: boolean;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatResult {
  content: string;
  finishReason: string;
  usage?: TokenUsage;
}

/**
 * The chat completion seam the term extractor depends on. Tests provide a
 * scripted implementation.
 */
export interface ChatClient {
  complete(request: ChatRequest): Promise<ChatResult>;
  getDefaultModel(): string;
}

/**
 * A failed model request. `status` carries the HTTP status when the API
 * answered, so retry logic can tell rate limits from bad requests.
 */
export class LLMRequestError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'LLMRequestError';
    this.status = status;
  }
}

/**
 * LLMClient
 * Wrapper around the OpenAI SDK for single-turn chat completions
 */
export class LLMClient implements ChatClient {
  private openai: OpenAI;
  private defaultModel: string;

  constructor(apiKey: string, defaultModel = 'gpt-4o-mini') {
    this.openai = new OpenAI({ apiKey });
    this.defaultModel = defaultModel;
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    const model = request.model || this.defaultModel;
    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userContent },
      ],
    };

    // GPT-5 models use max_completion_tokens instead of max_tokens
    if (request.maxTokens) {
      if (model.startsWith('gpt-5')) {
        params.max_completion_tokens = request.maxTokens;
      } else {
        params.max_tokens = request.maxTokens;
      }
    }

    if (request.temperature !== undefined) {
      params.temperature = request.temperature;
    }

    if (request.jsonMode) {
      params.response_format = { type: 'json_object' };
    }

    const shouldTrackTokens = loadDebugConfig().enableTokenTracking;

    let response: OpenAI.Chat.Completions.ChatCompletion;
    const startTime = Date.now();
    try {
      response = await this.openai.chat.completions.create(params);
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      const message = error instanceof Error ? error.message : String(error);
      logger.error('LLM API error', { model, status, error });
      throw new LLMRequestError(`LLM request failed: ${message}`, status, error);
    }
    const latencyMs = Date.now() - startTime;

    const choice = response.choices[0];
    if (!choice) {
      throw new LLMRequestError('LLM response contained no choices');
    }

    const usage = response.usage
      ? {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        }
      : undefined;

    if (shouldTrackTokens && usage) {
      logger.metric('llm.usage', {
        model,
        latencyMs,
        finishReason: choice.finish_reason,
        ...usage,
      });
    }

    return {
      content: choice.message.content ?? '',
      finishReason: choice.finish_reason,
      usage,
    };
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }
}
