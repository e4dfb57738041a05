import Anthropic from '@anthropic-ai/sdk';
import { GoogleGenAI } from '@google/genai';
import { config, type AIProvider } from '../../config.js';
import { ConfigurationError, ModelCallError, errorMessage, isAbortError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { createRateLimiter, withRetry, withTimeout, type RateLimiter, type SleepFn } from '../../utils/retry.js';
import type {
  AIResponse,
  CompletionProvider,
  CompletionRequest,
  ModelClientOptions,
  TextModel,
  TokenUsage,
  UsageStats,
  UsageTracker,
} from './types.js';

const logger = createLogger('ai-clients');

function emptyStats(): UsageStats {
  return {
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalTokens: 0,
    requestCount: 0,
    byModel: {},
  };
}

// Token usage tracking
export class InMemoryUsageTracker implements UsageTracker {
  private stats: UsageStats = emptyStats();

  track(usage: TokenUsage): void {
    this.stats.totalInputTokens += usage.inputTokens;
    this.stats.totalOutputTokens += usage.outputTokens;
    this.stats.totalTokens += usage.totalTokens;
    this.stats.requestCount++;

    const perModel = this.stats.byModel[usage.model] ?? {
      inputTokens: 0,
      outputTokens: 0,
      requestCount: 0,
    };
    perModel.inputTokens += usage.inputTokens;
    perModel.outputTokens += usage.outputTokens;
    perModel.requestCount++;
    this.stats.byModel[usage.model] = perModel;
  }

  getStats(): UsageStats {
    return {
      ...this.stats,
      byModel: Object.fromEntries(
        Object.entries(this.stats.byModel).map(([model, usage]) => [model, { ...usage }])
      ),
    };
  }

  reset(): void {
    this.stats = emptyStats();
  }
}

// Claude
export function createAnthropicProvider(apiKey: string, model: string): CompletionProvider {
  // The SDK's own retries are disabled; ModelClient applies the retry policy
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    name: 'anthropic',
    model,
    async complete({ prompt, temperature, maxTokens, signal }: CompletionRequest): Promise<AIResponse> {
      const response = await client.messages.create(
        {
          model,
          max_tokens: maxTokens,
          temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );

      const content = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map(block => block.text)
        .join('');

      return {
        content,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
          model,
          timestamp: new Date().toISOString(),
        },
        stopReason: response.stop_reason,
      };
    },
  };
}

// Gemini
export function createGeminiProvider(apiKey: string, model: string): CompletionProvider {
  const client = new GoogleGenAI({ apiKey });

  return {
    name: 'gemini',
    model,
    async complete({ prompt, temperature, maxTokens, signal }: CompletionRequest): Promise<AIResponse> {
      const response = await client.models.generateContent({
        model,
        contents: prompt,
        config: {
          maxOutputTokens: maxTokens,
          temperature,
          abortSignal: signal,
        },
      });

      const usageMetadata = response.usageMetadata;

      return {
        content: response.text || '',
        usage: {
          inputTokens: usageMetadata?.promptTokenCount || 0,
          outputTokens: usageMetadata?.candidatesTokenCount || 0,
          totalTokens: usageMetadata?.totalTokenCount || 0,
          model,
          timestamp: new Date().toISOString(),
        },
        stopReason: response.candidates?.[0]?.finishReason ?? null,
      };
    },
  };
}

function resolveApiKey(provider: AIProvider): string {
  return provider === 'anthropic' ? config.apiKeys.anthropic : config.apiKeys.googleAi;
}

function resolveModel(provider: AIProvider): string {
  return provider === 'anthropic' ? config.ai.claude.model : config.ai.gemini.model;
}

function createProvider(provider: AIProvider, apiKey: string, model: string): CompletionProvider {
  if (!apiKey) {
    const variable = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'GOOGLE_AI_API_KEY';
    throw new ConfigurationError(`${variable} is not configured`);
  }
  return provider === 'anthropic'
    ? createAnthropicProvider(apiKey, model)
    : createGeminiProvider(apiKey, model);
}

/**
 * Text-in/text-out model access with bounded retries. Attempt i (0-based)
 * that fails is followed by a wait of backoffMs * 2^i before the next one.
 * One instance is meant to be shared by every generation branch: calls keep
 * no state of their own apart from the usage counters.
 */
export class ModelClient implements TextModel {
  readonly usage: UsageTracker;

  private readonly providerName: AIProvider;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;
  private readonly rateLimit: RateLimiter | null;
  private readonly sleep?: SleepFn;
  private provider: CompletionProvider | null;

  constructor(options: ModelClientOptions = {}) {
    this.providerName = options.provider ?? config.ai.provider;
    this.apiKey = options.apiKey ?? resolveApiKey(this.providerName);
    this.model = options.model ?? options.completionProvider?.model ?? resolveModel(this.providerName);
    this.temperature = options.temperature ?? config.ai.temperature;
    this.maxTokens = options.maxTokens ?? config.ai.maxTokens;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? config.ai.maxAttempts);
    this.backoffMs = options.backoffMs ?? config.ai.backoffMs;
    this.timeoutMs = options.timeoutMs ?? config.ai.timeoutMs;
    this.sleep = options.sleep;
    this.provider = options.completionProvider ?? null;
    this.usage = options.usageTracker ?? new InMemoryUsageTracker();

    const requestsPerMinute = options.requestsPerMinute ?? config.ai.requestsPerMinute;
    this.rateLimit = requestsPerMinute > 0 ? createRateLimiter(requestsPerMinute, this.sleep) : null;
  }

  get modelName(): string {
    return this.model;
  }

  private getProvider(): CompletionProvider {
    if (!this.provider) {
      this.provider = createProvider(this.providerName, this.apiKey, this.model);
    }
    return this.provider;
  }

  async call(prompt: string, signal?: AbortSignal): Promise<string> {
    let provider: CompletionProvider;
    try {
      provider = this.getProvider();
    } catch (error) {
      throw new ModelCallError(`Model client is not configured: ${errorMessage(error)}`, 0, error);
    }

    logger.debug('Calling model', { provider: provider.name, model: this.model, promptLength: prompt.length });

    const attempt = async (): Promise<string> => {
      const response = await withTimeout(
        timeoutSignal => provider.complete({
          prompt,
          temperature: this.temperature,
          maxTokens: this.maxTokens,
          signal: timeoutSignal,
        }),
        this.timeoutMs,
        signal,
        `Model call timed out after ${this.timeoutMs}ms`
      );

      const text = response.content.trim();
      if (!text) {
        throw new Error('Model returned an empty response');
      }

      this.usage.track(response.usage);
      logger.debug('Model response received', { usage: response.usage, stopReason: response.stopReason });
      return text;
    };

    let attempts = 0;

    try {
      return await withRetry(
        async (n) => {
          attempts = n;
          return this.rateLimit ? this.rateLimit(attempt, signal) : attempt();
        },
        {
          maxRetries: this.maxAttempts - 1,
          initialDelay: this.backoffMs,
          backoffFactor: 2,
          maxDelay: Number.POSITIVE_INFINITY,
          signal,
          sleep: this.sleep,
        }
      );
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      throw new ModelCallError(
        `Model call failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(error)}`,
        attempts,
        error
      );
    }
  }
}
