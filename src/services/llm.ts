/**
 * Text-generation client using the Vercel AI SDK.
 * Supports Anthropic, OpenAI and any OpenAI-compatible local server (Ollama).
 *
 * The client is built once per process and is read-only afterwards; the
 * provider model is loaded lazily on first use.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { LLMConfig } from '../config.js';
import { LLMError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * One part of a structured reply. Only untyped or `text` parts carry SQL;
 * `content` nests further parts.
 */
export interface ReplyPart {
  type?: string;
  text?: string;
  content?: GenerationReply;
}

/**
 * Raw reply from the generation service: plain text, a part, or a list.
 */
export type GenerationReply = string | ReplyPart | GenerationReply[];

export interface CompletionRequest {
  system: string;
  prompt: string;
}

/**
 * Anything that can turn a prompt into a reply. The pipeline depends on this
 * interface, not on a concrete provider.
 */
export interface TextGenerator {
  /** Provider and model, e.g. "ollama/sqlcoder:7b-q4_K_M" */
  readonly modelId: string;
  /** Base URL of the service */
  readonly endpoint: string;
  complete(request: CompletionRequest): Promise<GenerationReply>;
}

const DEFAULT_ENDPOINTS: Record<LLMConfig['provider'], string> = {
  anthropic: 'https://api.anthropic.com/v1',
  openai: 'https://api.openai.com/v1',
  ollama: 'http://localhost:11434/v1',
};

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService implements TextGenerator {
  readonly modelId: string;
  readonly endpoint: string;
  private modelPromise: Promise<LanguageModel> | null = null;

  constructor(private readonly config: LLMConfig) {
    this.modelId = `${config.provider}/${config.model}`;
    this.endpoint = config.baseURL ?? DEFAULT_ENDPOINTS[config.provider];
  }

  /**
   * Lazy initialization of LLM model.
   * Concurrent first callers share the same load.
   */
  private initializeModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().catch((error: unknown) => {
        this.modelPromise = null;
        throw error;
      });
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration
   */
  private async loadModel(): Promise<LanguageModel> {
    const { provider, model, apiKey, baseURL } = this.config;
    logger.info(`Initializing LLM: ${this.modelId} (${this.endpoint})`);

    switch (provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey, baseURL })(model);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey, baseURL })(model);
      }

      case 'ollama': {
        // Ollama only implements the chat completions API
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey, baseURL: this.endpoint }).chat(model);
      }
    }
  }

  /**
   * Call the model once. No retries: a failed call is reported to the
   * caller, which decides whether to retry the whole request.
   *
   * @throws LLMError on provider failure or when the deadline passes
   */
  async complete(request: CompletionRequest): Promise<GenerationReply> {
    const model = await this.initializeModel();

    try {
      const result = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        temperature: 0,
        maxOutputTokens: this.config.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.config.timeoutMs),
      });

      logger.info(
        `LLM API call successful - ` +
          `Input: ${result.usage.inputTokens}, ` +
          `Output: ${result.usage.outputTokens}`
      );

      return result.content.map((part): ReplyPart =>
        part.type === 'text' ? { type: 'text', text: part.text } : { type: part.type }
      );
    } catch (error) {
      logger.warn(`LLM API call failed: ${errorMessage(error)}`);
      throw new LLMError(`Generation service call failed: ${errorMessage(error)}`);
    }
  }
}
