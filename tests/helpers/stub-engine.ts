/**
 * Scripted SynthesisEngine for orchestrator and server tests
 */

import type {
  EngineCapabilities,
  EngineChunk,
  EngineGenerationParams,
  SynthesisEngine,
} from '@/modules/engine/types';

export interface StubFragment {
  samples: number;
  value?: number;
  generationTime?: number;
  readyAt?: number;
}

export interface StubEngineOptions {
  capabilities?: Partial<EngineCapabilities>;
  /** Throw this error instead of producing fragment `failAt` */
  failAt?: number;
  error?: Error;
  /** On the first generation, wait for abort instead of producing fragment `holdAt` */
  holdAt?: number;
}

export const TEST_CAPABILITIES: EngineCapabilities = {
  sampleRate: 24000,
  samplesPerToken: 2,
  overlapsContext: false,
};

export function fragments(count: number, samples = 100, generationTime = 0.002): StubFragment[] {
  return Array.from({ length: count }, () => ({ samples, value: 1000, generationTime }));
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise<void>((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

export class StubEngine implements SynthesisEngine {
  readonly name = 'stub';
  readonly capabilities: EngineCapabilities;
  readonly calls: EngineGenerationParams[] = [];
  produced = 0;
  finished = 0;
  disposed = false;

  private readonly script: StubFragment[];
  private readonly options: StubEngineOptions;

  constructor(script: StubFragment[], options: StubEngineOptions = {}) {
    this.script = script;
    this.options = options;
    this.capabilities = { ...TEST_CAPABILITIES, ...options.capabilities };
  }

  async *generateStream(
    params: EngineGenerationParams,
    signal: AbortSignal
  ): AsyncGenerator<EngineChunk, void, undefined> {
    this.calls.push(params);
    const holdAt = this.calls.length === 1 ? this.options.holdAt : undefined;
    try {
      for (let i = 0; i < this.script.length; i++) {
        if (holdAt === i) {
          await waitForAbort(signal);
          return;
        }
        if (this.options.failAt === i) {
          throw this.options.error ?? new Error('stub engine failure');
        }

        const fragment = this.script[i];
        const audio = new Int16Array(fragment.samples).fill(fragment.value ?? 1000);
        this.produced++;
        yield {
          audio,
          metrics: {
            generationTime: fragment.generationTime ?? 0.002,
            readyAt: fragment.readyAt,
          },
        };
      }
    } finally {
      this.finished++;
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}
