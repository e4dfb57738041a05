import type { AIProvider } from '../../config.js';
import type { SleepFn } from '../../utils/retry.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  model: string;
  timestamp: string;
}

export interface AIResponse {
  content: string;
  usage: TokenUsage;
  stopReason?: string | null;
}

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * One text-in/text-out call against a hosted model. No retries here;
 * ModelClient owns those.
 */
export interface CompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<AIResponse>;
}

/** The single operation the generation and edit flows need from a model client. */
export interface TextModel {
  call(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface ModelClientOptions {
  provider?: AIProvider;
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  requestsPerMinute?: number;
  /** Overrides the SDK-backed provider, e.g. with an in-process fake. */
  completionProvider?: CompletionProvider;
  usageTracker?: UsageTracker;
  sleep?: SleepFn;
}

export interface UsageTracker {
  track(usage: TokenUsage): void;
  getStats(): UsageStats;
  reset(): void;
}

export interface UsageStats {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  requestCount: number;
  byModel: Record<string, {
    inputTokens: number;
    outputTokens: number;
    requestCount: number;
  }>;
}
