import { ChatClient } from './LLMClient.js';
import { PromptManager } from './PromptManager.js';
import { ParsedQuery, ParsedTerm, TermExtractor } from './TermExtractor.js';
import { isPlainObject } from '../filters/wire.js';
import { QueryParsingError } from '../pipeline/PipelineError.js';
import { executeWithRetry, RetryOptions } from '../utils/RetryStrategy.js';
import { debugLog, errorMessage, logger } from '../utils/logger.js';

export interface LlmExtractorOptions {
  model?: string;
  temperature: number;
  maxTokens: number;
  retry?: RetryOptions;
}

const DEFAULT_CONFIDENCE = 0.8;

function clampConfidence(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value)
    ? Math.max(0, Math.min(1, value))
    : DEFAULT_CONFIDENCE;
}

function parseJsonObject(content: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    // Models sometimes wrap the object in prose or a code fence
    const match = content.match(/\{[\s\S]*\}/);
    if (!match) {
      throw new Error('No JSON object in model response');
    }
    parsed = JSON.parse(match[0]);
  }

  if (!isPlainObject(parsed)) {
    throw new Error('Model response is not a JSON object');
  }
  return parsed;
}

/**
 * Read the model's answer into a ParsedQuery. Term entries without a string
 * `original` and `normalized` are dropped.
 */
export function parseExtraction(content: string, rawQuery: string): ParsedQuery {
  const body = parseJsonObject(content);
  if (!Array.isArray(body.terms)) {
    throw new Error('Model response has no "terms" array');
  }

  const terms: ParsedTerm[] = [];
  body.terms.forEach((entry: unknown, i: number) => {
    if (!isPlainObject(entry)) {
      return;
    }
    const { original, normalized, position, confidence } = entry;
    if (typeof original !== 'string' || typeof normalized !== 'string' || !normalized.trim()) {
      return;
    }
    terms.push({
      original,
      normalized: normalized.trim().toLowerCase(),
      position: typeof position === 'number' && Number.isInteger(position) ? position : i,
      confidence: clampConfidence(confidence),
    });
  });

  return {
    terms,
    logic: typeof body.logic === 'string' && body.logic.trim().toUpperCase() === 'OR' ? 'OR' : 'AND',
    rawQuery,
    confidence: clampConfidence(body.confidence),
  };
}

/**
 * Term extraction through a chat model. Transient API failures are retried;
 * any other failure, or an answer without usable terms, falls back to the
 * given extractor.
 */
export class LlmTermExtractor implements TermExtractor {
  readonly name = 'llm';

  private readonly client: ChatClient;
  private readonly prompts: PromptManager;
  private readonly fallback: TermExtractor;
  private readonly options: LlmExtractorOptions;

  constructor(
    client: ChatClient,
    prompts: PromptManager,
    fallback: TermExtractor,
    options: LlmExtractorOptions
  ) {
    this.client = client;
    this.prompts = prompts;
    this.fallback = fallback;
    this.options = options;
  }

  async extract(text: string): Promise<ParsedQuery> {
    const query = text.trim();
    if (!query) {
      throw new QueryParsingError('Query text is empty', { query: text });
    }

    try {
      const result = await executeWithRetry(
        () =>
          this.client.complete({
            systemPrompt: this.prompts.getPrompt('extraction-system'),
            userContent: this.prompts.render('extract-terms', { query }),
            model: this.options.model,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
            jsonMode: true,
          }),
        { ...this.options.retry, operation: 'term extraction' }
      );

      const parsed = parseExtraction(result.content, text);
      if (parsed.terms.length === 0) {
        throw new Error('Model returned no usable terms');
      }

      debugLog('extractor', 'LLM extraction', {
        terms: parsed.terms.map((t) => t.normalized),
        logic: parsed.logic,
      });
      return parsed;
    } catch (error) {
      logger.warn(`LLM term extraction failed, falling back to ${this.fallback.name}`, {
        reason: errorMessage(error),
      });
      return this.fallback.extract(text);
    }
  }
}
