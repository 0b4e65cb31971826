/**
 * LLM integration layer using AI SDK for provider-agnostic support.
 *
 * Anthropic Claude and OpenAI models are supported; both are loaded lazily so
 * only the configured provider's SDK is imported.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { Logger } from 'pino';
import { LLMError } from './errors.js';
import type { LLMConfig } from './types.js';
import { errorMessage } from './utils.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
}

/**
 * Anything that turns a prompt into text. The translator depends on this,
 * not on the AI SDK, so tests can hand it a fake.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService implements CompletionClient {
  private model: LanguageModel | null = null;
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  /**
   * @param model pre-built model; skips provider loading when given
   */
  constructor(
    private config: LLMConfig,
    private logger: Logger,
    model?: LanguageModel
  ) {
    this.maxTokens = config.maxTokens ?? 1024;
    this.temperature = config.temperature ?? 0.1;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.model = model ?? null;
  }

  /**
   * Lazy initialization of LLM model.
   * Concurrent first calls share one load.
   */
  private async initializeModel(): Promise<LanguageModel> {
    if (this.model) {
      return this.model;
    }

    if (!this.modelPromise) {
      this.modelPromise = this.loadModel().then((model) => {
        this.model = model;
        return model;
      });
    }
    return this.modelPromise;
  }

  /**
   * Load the model based on provider configuration
   */
  private async loadModel(): Promise<LanguageModel> {
    this.logger.info(`Initializing LLM: ${this.config.provider}/${this.config.model}`);

    switch (this.config.provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey: this.config.apiKey })(this.config.model);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey: this.config.apiKey })(this.config.model);
      }

      default: {
        const provider: never = this.config.provider;
        throw new LLMError(`Unsupported provider: ${String(provider)}`);
      }
    }
  }

  /**
   * Call the LLM and return its text.
   *
   * Retries with exponential backoff (1x, 2x, 4x the base delay).
   *
   * @throws LLMError if all retries fail
   */
  async complete(request: CompletionRequest): Promise<string> {
    const model = await this.initializeModel();
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await generateText({
          model,
          system: request.system,
          prompt: request.prompt,
          temperature: request.temperature ?? this.temperature,
          maxOutputTokens: request.maxOutputTokens ?? this.maxTokens,
          // Retries are ours, so the SDK's own are disabled
          maxRetries: 0,
        });
        return result.text;
      } catch (error) {
        lastError = error;
        this.logger.warn(
          { attempt: attempt + 1, maxRetries: this.maxRetries, err: error },
          'LLM call failed'
        );

        if (attempt < this.maxRetries - 1) {
          const waitTime = this.retryDelayMs * Math.pow(2, attempt);
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        }
      }
    }

    throw new LLMError(
      `LLM API failed after ${this.maxRetries} attempts: ${errorMessage(lastError)}`
    );
  }
}
