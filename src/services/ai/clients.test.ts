import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, ModelCallError, TimeoutError } from '../../utils/errors.js';
import { InMemoryUsageTracker, ModelClient } from './clients.js';
import type { AIResponse, CompletionProvider, CompletionRequest } from './types.js';

function reply(content: string): AIResponse {
  return {
    content,
    usage: {
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
      model: 'fake-model',
      timestamp: '2024-05-01T10:00:00.000Z',
    },
    stopReason: 'end_turn',
  };
}

function fakeProvider(complete: (request: CompletionRequest) => Promise<AIResponse>): CompletionProvider {
  return { name: 'fake', model: 'fake-model', complete: vi.fn(complete) };
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

function client(provider: CompletionProvider, sleep: (ms: number) => Promise<void>, timeoutMs = 0) {
  return new ModelClient({
    completionProvider: provider,
    maxAttempts: 3,
    backoffMs: 1000,
    timeoutMs,
    requestsPerMinute: 0,
    sleep,
  });
}

describe('ModelClient', () => {
  it('returns the trimmed text and records usage', async () => {
    const { sleep } = recordingSleep();
    const model = client(fakeProvider(async () => reply('  Headline: Hi  \n')), sleep);

    await expect(model.call('prompt')).resolves.toBe('Headline: Hi');
    expect(model.usage.getStats()).toMatchObject({ requestCount: 1, totalTokens: 15 });
  });

  it('sends the prompt with the configured sampling settings', async () => {
    const { sleep } = recordingSleep();
    const provider = fakeProvider(async () => reply('ok'));
    const model = new ModelClient({ completionProvider: provider, temperature: 0.3, maxTokens: 512, timeoutMs: 0, sleep });

    await model.call('Write a headline');

    expect(provider.complete).toHaveBeenCalledWith(expect.objectContaining({
      prompt: 'Write a headline',
      temperature: 0.3,
      maxTokens: 512,
    }));
    expect(model.modelName).toBe('fake-model');
  });

  it('makes three attempts with 1s and 2s waits before giving up', async () => {
    const { delays, sleep } = recordingSleep();
    const failure = new Error('service unavailable');
    const provider = fakeProvider(async () => {
      throw failure;
    });
    const model = client(provider, sleep);

    const error = await model.call('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({
      attempts: 3,
      message: 'Model call failed after 3 attempts: service unavailable',
      cause: failure,
    });
    expect(provider.complete).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('treats an empty response as a failed attempt', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const model = client(fakeProvider(async () => reply(++calls === 1 ? '   ' : 'second try')), sleep);

    await expect(model.call('prompt')).resolves.toBe('second try');
    expect(delays).toEqual([1000]);
  });

  it('counts a timed out attempt as a failure and aborts the request', async () => {
    const { sleep } = recordingSleep();
    const signals: AbortSignal[] = [];
    const provider = fakeProvider((request) => {
      if (request.signal) {
        signals.push(request.signal);
      }
      return new Promise<AIResponse>(() => undefined);
    });
    const model = client(provider, sleep, 10);

    const error = await model.call('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({ attempts: 3 });
    expect(error instanceof ModelCallError && error.cause).toBeInstanceOf(TimeoutError);
    expect(signals).toHaveLength(3);
    expect(signals.every(signal => signal.aborted)).toBe(true);
  });

  it('fails without retrying when the credential is missing', async () => {
    const { delays, sleep } = recordingSleep();
    const model = new ModelClient({ provider: 'anthropic', apiKey: '', sleep });

    const error = await model.call('prompt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({ attempts: 0 });
    expect(error instanceof ModelCallError && error.cause).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error && error.message).toContain('ANTHROPIC_API_KEY');
    expect(delays).toEqual([]);
  });

  it('rethrows cancellation instead of wrapping it', async () => {
    const { sleep } = recordingSleep();
    const provider = fakeProvider(async () => reply('never'));
    const controller = new AbortController();
    controller.abort();

    const error = await client(provider, sleep).call('prompt', controller.signal).catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({ name: 'AbortError' });
    expect(provider.complete).not.toHaveBeenCalled();
  });
});

describe('InMemoryUsageTracker', () => {
  it('sums usage per model and resets', () => {
    const tracker = new InMemoryUsageTracker();
    tracker.track(reply('a').usage);
    tracker.track({ ...reply('b').usage, model: 'other-model', inputTokens: 1, outputTokens: 2, totalTokens: 3 });

    expect(tracker.getStats()).toEqual({
      totalInputTokens: 11,
      totalOutputTokens: 7,
      totalTokens: 18,
      requestCount: 2,
      byModel: {
        'fake-model': { inputTokens: 10, outputTokens: 5, requestCount: 1 },
        'other-model': { inputTokens: 1, outputTokens: 2, requestCount: 1 },
      },
    });

    tracker.reset();
    expect(tracker.getStats().requestCount).toBe(0);
  });
});
