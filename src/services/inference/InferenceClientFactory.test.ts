import { describe, it, expect, vi, beforeEach } from 'vitest';
import { APIConnectionError } from 'openai';
import { InferenceClientFactory } from './InferenceClientFactory.js';
import { DirectInferenceClient } from './DirectInferenceClient.js';
import { FailoverInferenceClient } from './FailoverInferenceClient.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';
import type { InferenceClient, ClientStats } from './InferenceClient.interface.js';
import type { Generation, GenerationParams, InferenceEngine } from './InferenceEngine.interface.js';
import { TokenEstimator } from '../tokens/TokenEstimator.js';
import { AcceleratorMonitor } from '../monitoring/AcceleratorMonitor.js';
import type { TelemetrySource } from '../monitoring/TelemetrySource.js';
import { buildConfig } from '../../config/index.js';
import {
  AcceleratorMemoryError,
  BackendUnavailableError,
  ConfigurationError,
  ContextOverflowError,
  GenerationError,
  InferenceConnectionError,
  TelemetryError,
} from '../../utils/errors.js';
import type { ChatMessage, InferenceRequest, InferenceResponse } from '../../types/extraction.types.js';

const { mockCreate, mockList } = vi.hoisted(() => ({ mockCreate: vi.fn(), mockList: vi.fn() }));

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  class MockOpenAI {
    chat = { completions: { create: mockCreate } };
    models = { list: mockList };
    embeddings = { create: vi.fn() };
  }
  return { ...actual, default: MockOpenAI };
});

class FakeEngine implements InferenceEngine {
  readonly modelName = 'fake-engine';
  calls: { prompts: ChatMessage[][]; params: GenerationParams[] }[] = [];
  closed = false;

  async generate(prompts: ChatMessage[][], params: GenerationParams[]): Promise<Generation[]> {
    this.calls.push({ prompts, params });
    return prompts.map((messages) => ({ text: `gen:${messages[messages.length - 1].content}` }));
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => [text.length]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const config = buildConfig({
  inference: {
    retryBackoffMs: [0],
    backends: { extraction: { baseUrl: 'http://extraction.test/v1', model: 'extractor' } },
    direct: {},
  },
});

const estimator = new TokenEstimator({ charsPerToken: 4, accurate: false, minCompletionTokens: 100 });

const request = (content: string): InferenceRequest => ({ messages: [{ role: 'user', content }] });

const telemetry = (freeMB: number): TelemetrySource => ({
  read: async () => [
    { index: 0, memoryUsedMB: 16_384 - freeMB, memoryTotalMB: 16_384, memoryFreeMB: freeMB, utilizationPercent: 10 },
  ],
});

const directClient = (engine: InferenceEngine, monitor?: AcceleratorMonitor) =>
  new DirectInferenceClient(config.inference, estimator, {
    engineLoader: async () => engine,
    monitor,
    requiredMemoryGB: 2,
    waitTimeoutSeconds: 0.01,
  });

const monitorOptions = { deviceIndex: 0, warningThreshold: 0.9, pollIntervalMs: 1, waitTimeoutSeconds: 0.01 };

describe('DirectInferenceClient', () => {
  it('hands the whole batch to the engine in one call', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine);
    await client.initialize();

    const responses = await client.completeBatch([request('a'), request('b'), request('c')]);

    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].prompts).toHaveLength(3);
    expect(responses.map((r) => r.text)).toEqual(['gen:a', 'gen:b', 'gen:c']);
    expect(responses[0]).toMatchObject({ transport: 'direct', model: 'fake-engine', backend: 'extraction' });
    expect(client.getStats()).toMatchObject({ requests: 3, batches: 1 });
  });

  it('enforces reproducible generation parameters', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine);
    await client.initialize();

    await client.complete({ ...request('a'), temperature: 1.2, seed: 3 });

    expect(engine.calls[0].params[0]).toEqual({ temperature: 0, seed: 42, maxTokens: 4096, responseSchema: undefined });
  });

  it('rejects oversized prompts before generating', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine);
    await client.initialize();

    await expect(client.complete(request('x'.repeat(4 * 33_000)))).rejects.toBeInstanceOf(ContextOverflowError);
    expect(engine.calls).toHaveLength(0);
  });

  it('raises accelerator memory exhaustion when memory never frees up', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine, new AcceleratorMonitor(telemetry(512), monitorOptions));
    await client.initialize();

    const error = await client.complete(request('a')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AcceleratorMemoryError);
    expect(error).toMatchObject({ requiredGB: 2, freeGB: 0.5 });
    expect(engine.calls).toHaveLength(0);
  });

  it('generates when enough memory is free', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine, new AcceleratorMonitor(telemetry(4_096), monitorOptions));
    await client.initialize();

    await expect(client.complete(request('a'))).resolves.toMatchObject({ text: 'gen:a' });
  });

  it('ignores telemetry failures', async () => {
    const broken: TelemetrySource = {
      read: async () => {
        throw new TelemetryError('nvidia-smi not found');
      },
    };
    const engine = new FakeEngine();
    const client = directClient(engine, new AcceleratorMonitor(broken, monitorOptions));
    await client.initialize();

    await expect(client.complete(request('a'))).resolves.toMatchObject({ text: 'gen:a' });
  });

  it('retries failed generations as generation errors', async () => {
    const engine = new FakeEngine();
    const generate = vi
      .spyOn(engine, 'generate')
      .mockRejectedValue(new Error('CUDA error'));
    const client = directClient(engine);
    await client.initialize();

    await expect(client.complete(request('a'))).rejects.toBeInstanceOf(GenerationError);
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it('requires a configured engine', async () => {
    const client = new DirectInferenceClient(config.inference, estimator, { requiredMemoryGB: 2, waitTimeoutSeconds: 1 });

    await expect(client.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('embeds through the engine and closes it', async () => {
    const engine = new FakeEngine();
    const client = directClient(engine);
    await client.initialize();

    const response = await client.embed(['abcd', 'ef']);
    expect(response.embeddings).toEqual([[4], [2]]);
    expect(response.usage.promptTokens).toBe(1);

    await client.close();
    expect(engine.closed).toBe(true);
  });
});

class ScriptedClient implements InferenceClient {
  initialized = 0;
  closed = false;

  constructor(
    readonly transport: 'http' | 'direct',
    private readonly behaviour: () => Promise<InferenceResponse>,
    private readonly initBehaviour: () => Promise<void> = async () => undefined
  ) {}

  async initialize(): Promise<void> {
    this.initialized++;
    await this.initBehaviour();
  }

  complete(): Promise<InferenceResponse> {
    return this.behaviour();
  }

  async completeBatch(requests: InferenceRequest[]): Promise<InferenceResponse[]> {
    return Promise.all(requests.map(() => this.behaviour()));
  }

  async embed() {
    return { embeddings: [], model: 'none', usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 } };
  }

  getStats(): ClientStats {
    return {
      transport: this.transport,
      requests: 0,
      batches: 0,
      failures: 0,
      retries: 0,
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      averageLatencyMs: 0,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const ok = (transport: 'http' | 'direct') => async (): Promise<InferenceResponse> => ({
  text: transport,
  usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
  latencyMs: 1,
  backend: 'extraction',
  model: transport,
  transport,
});

const unreachable = async (): Promise<InferenceResponse> => {
  throw new InferenceConnectionError('connection refused', 'extraction', 'http://extraction.test/v1');
};

describe('FailoverInferenceClient', () => {
  it('switches to the standby transport on connection failure', async () => {
    const http = new ScriptedClient('http', unreachable);
    const direct = new ScriptedClient('direct', ok('direct'));
    const client = new FailoverInferenceClient(http, direct);

    const response = await client.complete(request('a'));

    expect(response.transport).toBe('direct');
    expect(client.transport).toBe('direct');
    expect(direct.initialized).toBe(1);

    await client.complete(request('b'));
    expect(direct.initialized).toBe(1);
  });

  it('keeps the standby active when in-flight requests fail one after another', async () => {
    const failures: Array<() => void> = [];
    const http = new ScriptedClient(
      'http',
      () =>
        new Promise<InferenceResponse>((_resolve, reject) => {
          failures.push(() =>
            reject(new InferenceConnectionError('connection refused', 'extraction', 'http://extraction.test/v1'))
          );
        })
    );
    const direct = new ScriptedClient('direct', ok('direct'));
    const client = new FailoverInferenceClient(http, direct);

    const first = client.complete(request('a'));
    const second = client.complete(request('b'));
    expect(failures).toHaveLength(2);

    failures[0]();
    expect((await first).transport).toBe('direct');
    failures[1]();
    expect((await second).transport).toBe('direct');

    expect(client.transport).toBe('direct');
    expect(direct.initialized).toBe(1);
  });

  it('initializes the standby once for concurrent failures', async () => {
    let finishInit: () => void = () => undefined;
    const http = new ScriptedClient('http', unreachable);
    const direct = new ScriptedClient(
      'direct',
      ok('direct'),
      () =>
        new Promise<void>((resolve) => {
          finishInit = resolve;
        })
    );
    const client = new FailoverInferenceClient(http, direct);

    const pending = Promise.all([client.complete(request('a')), client.complete(request('b'))]);
    await new Promise((resolve) => setTimeout(resolve, 0));
    finishInit();
    const responses = await pending;

    expect(responses.map((response) => response.transport)).toEqual(['direct', 'direct']);
    expect(direct.initialized).toBe(1);
    expect(client.transport).toBe('direct');
  });

  it('does not switch transports when only the reasoning backend is unreachable', async () => {
    const refused = new InferenceConnectionError('connection refused', 'reasoning', 'http://reasoning.test/v1');
    const http = new ScriptedClient('http', async () => {
      throw refused;
    });
    const direct = new ScriptedClient('direct', ok('direct'));
    const client = new FailoverInferenceClient(http, direct);

    await expect(client.complete(request('a'))).rejects.toBe(refused);
    expect(client.transport).toBe('http');
    expect(direct.initialized).toBe(0);
  });

  it('passes other errors through untouched', async () => {
    const failure = new GenerationError('bad request', 'extraction', 400, false);
    const http = new ScriptedClient('http', async () => {
      throw failure;
    });
    const direct = new ScriptedClient('direct', ok('direct'));
    const client = new FailoverInferenceClient(http, direct);

    await expect(client.complete(request('a'))).rejects.toBe(failure);
    expect(direct.initialized).toBe(0);
  });

  it('reports the backend as unavailable when no transport answers', async () => {
    const client = new FailoverInferenceClient(
      new ScriptedClient('http', unreachable),
      new ScriptedClient('direct', ok('direct'), async () => {
        throw new ConfigurationError('No in-process inference engine configured');
      })
    );

    const error = await client.complete(request('a')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({ backend: 'extraction' });
  });

  it('reports the backend as unavailable without a standby', async () => {
    const client = new FailoverInferenceClient(new ScriptedClient('http', unreachable), null);

    await expect(client.complete(request('a'))).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});

describe('InferenceClientFactory', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockList.mockReset();
    OpenAIClientFactory.reset();
  });

  it('uses the preferred transport when it initializes', async () => {
    mockList.mockResolvedValue({ data: [] });

    const client = await InferenceClientFactory.create(config, estimator, { engineLoader: async () => new FakeEngine() });

    expect(client.transport).toBe('http');
  });

  it('falls back to the in-process engine when the server is unreachable', async () => {
    mockList.mockRejectedValue(new APIConnectionError({ message: 'connect ECONNREFUSED' }));

    const client = await InferenceClientFactory.create(config, estimator, { engineLoader: async () => new FakeEngine() });

    expect(client.transport).toBe('direct');
    await expect(client.complete(request('a'))).resolves.toMatchObject({ text: 'gen:a' });
  });

  it('honours a preference for the in-process engine', async () => {
    const directConfig = buildConfig({ ...config, inference: { ...config.inference, preferredTransport: 'direct' } });

    const client = await InferenceClientFactory.create(directConfig, estimator, {
      engineLoader: async () => new FakeEngine(),
    });

    expect(client.transport).toBe('direct');
    expect(mockList).not.toHaveBeenCalled();
  });

  it('fails when neither transport initializes', async () => {
    mockList.mockRejectedValue(new APIConnectionError({ message: 'connect ECONNREFUSED' }));

    await expect(InferenceClientFactory.create(config, estimator)).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('surfaces the initialization error when fallback is disabled', async () => {
    mockList.mockRejectedValue(new APIConnectionError({ message: 'connect ECONNREFUSED' }));
    const strict = buildConfig({ ...config, inference: { ...config.inference, enableFallback: false } });

    await expect(
      InferenceClientFactory.create(strict, estimator, { engineLoader: async () => new FakeEngine() })
    ).rejects.toBeInstanceOf(InferenceConnectionError);
  });
});
