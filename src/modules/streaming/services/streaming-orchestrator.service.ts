/**
 * Streaming Orchestrator
 * Drives one stream request end to end:
 * validate → engine readiness → voice → capacity → info → fragments → done | error
 *
 * Every admitted request produces exactly one terminal message (`done` or
 * `error`) unless the connection is gone, and always releases the session.
 */

import { env } from '@/shared/config';
import { generateId, logger } from '@/shared/utils';
import { engineService, type EngineService } from '@/modules/engine/services/engine.service';
import {
  EngineError,
  EngineErrorType,
  type EngineChunk,
  type EngineGenerationParams,
  type SynthesisEngine,
} from '@/modules/engine/types';
import { voiceLibraryService, type VoiceResolver } from '@/modules/voice';
import { connectionRegistry, type ConnectionRegistry } from '@/modules/socket/services/connection-registry.service';
import type { RequestHandle, StreamSession } from '@/modules/socket/services/stream-session';
import { sendFault } from '@/modules/socket/handlers/error.handler';
import { MessageFactory } from '@/modules/socket/utils';
import { SessionState } from '@/modules/socket/types';
import { IGNORED_PARAMETERS } from '../config';
import { StreamRequestSchema, formatValidationIssues } from '../schemas';
import {
  StreamErrorCode,
  type EffectiveParameters,
  type IgnoredParameter,
  type RequestOutcome,
  type SessionMetricsSummary,
  type StreamRequest,
} from '../types';
import {
  BusyFault,
  ResolutionFault,
  ValidationFault,
  isRequestScoped,
  toStreamFault,
  type StreamFault,
} from '../utils/faults';
import { AudioFragmentAssembler } from './audio-assembler.service';
import { MetricsAggregator, type Clock } from './metrics-aggregator.service';

export interface StreamingOrchestratorDeps {
  engine: Pick<EngineService, 'isReady' | 'acquire' | 'release' | 'markUnavailable'>;
  voices: VoiceResolver;
  registry: Pick<ConnectionRegistry, 'countByState'>;
  maxConcurrentGenerations: number;
  clock?: Clock;
}

const ABORTED = Symbol('aborted');

/**
 * Wait for the next engine fragment, or for the request to be aborted,
 * whichever comes first
 */
export function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal
): Promise<IteratorResult<T> | typeof ABORTED> {
  if (signal.aborted) {
    return Promise.resolve(ABORTED);
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });

    void iterator.next().then(
      (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function stopIterator(iterator: AsyncIterator<EngineChunk>, requestId: string): void {
  if (!iterator.return) {
    return;
  }
  iterator.return().catch((error: unknown) => {
    logger.warn('Error stopping engine stream', {
      requestId,
      error: error instanceof Error ? error.message : String(error),
    });
  });
}

function effectiveParameters(request: StreamRequest): EffectiveParameters {
  return {
    exaggeration: request.exaggeration,
    cfgWeight: request.cfgWeight,
    temperature: request.temperature,
    chunkSize: request.chunkSize,
    contextWindow: request.contextWindow,
    fadeDuration: request.fadeDuration,
  };
}

function ignoredParameters(request: StreamRequest): IgnoredParameter[] {
  return IGNORED_PARAMETERS.filter((name) => request[name] !== undefined);
}

type StreamEnd = { kind: 'exhausted' } | { kind: 'aborted' } | { kind: 'channel_closed' };

export class StreamingOrchestrator {
  private readonly deps: StreamingOrchestratorDeps;
  private readonly clock: Clock;

  constructor(deps: StreamingOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Admit a request on `session` and start it in the background.
   * Returns undefined (after sending BUSY) if the session is not idle.
   */
  start(session: StreamSession, payload: unknown): RequestHandle | undefined {
    const handle = session.reserveRequest(generateId(), this.clock());
    if (!handle) {
      sendFault(session, new BusyFault('A request is already streaming on this connection'));
      return undefined;
    }

    this.execute(session, handle, payload).catch((error: unknown) => {
      logger.error('Unexpected orchestrator failure', {
        sessionId: session.id,
        requestId: handle.requestId,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    return handle;
  }

  /**
   * Admit and run a request to completion
   */
  async run(session: StreamSession, payload: unknown): Promise<RequestOutcome> {
    const handle = this.start(session, payload);
    if (!handle) {
      return {
        requestId: generateId(),
        status: 'rejected',
        error: new BusyFault('A request is already streaming on this connection'),
      };
    }
    return handle.completion;
  }

  private async execute(
    session: StreamSession,
    handle: RequestHandle,
    payload: unknown
  ): Promise<void> {
    let outcome: RequestOutcome;
    try {
      outcome = await this.process(session, handle, payload);
    } catch (error) {
      outcome = this.reportFault(session, handle, toStreamFault(error), undefined);
    }
    session.releaseRequest(handle, outcome);
  }

  private async process(
    session: StreamSession,
    handle: RequestHandle,
    payload: unknown
  ): Promise<RequestOutcome> {
    const { requestId } = handle;

    // 1. Validate
    if (payload === undefined) {
      throw new ValidationFault("Missing 'data' field in stream_request message");
    }
    const parsed = StreamRequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationFault(formatValidationIssues(parsed.error));
    }
    const request = parsed.data;

    // 2. Engine readiness, checked once
    if (!this.deps.engine.isReady()) {
      throw new ValidationFault('Engine not ready', StreamErrorCode.ENGINE_NOT_READY);
    }

    // 3. Voice
    let voiceSamplePath: string;
    try {
      voiceSamplePath = await this.deps.voices.resolve(request.voice);
    } catch (error) {
      if (error instanceof ResolutionFault) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ResolutionFault(`Could not resolve voice: ${message}`, { cause: error });
    }

    if (handle.signal.aborted) {
      return this.finishAborted(session, handle, undefined);
    }

    // 4. Capacity
    const streaming = this.deps.registry.countByState(SessionState.STREAMING);
    if (streaming >= this.deps.maxConcurrentGenerations) {
      throw new BusyFault(
        `Server is at capacity (${this.deps.maxConcurrentGenerations} concurrent streams)`,
        StreamErrorCode.CAPACITY
      );
    }

    // 5. Generate
    const engine = this.deps.engine.acquire();
    try {
      if (!session.beginStreaming(handle)) {
        return { requestId, status: 'disconnected' };
      }
      return await this.stream(session, handle, request, engine, voiceSamplePath);
    } finally {
      this.deps.engine.release();
    }
  }

  private async stream(
    session: StreamSession,
    handle: RequestHandle,
    request: StreamRequest,
    engine: SynthesisEngine,
    voiceSamplePath: string
  ): Promise<RequestOutcome> {
    const { requestId } = handle;
    const { capabilities } = engine;
    const effective = effectiveParameters(request);
    const ignored = ignoredParameters(request);

    logger.info('Stream started', {
      sessionId: session.id,
      requestId,
      engine: engine.name,
      textLength: request.text.length,
      outputFormat: request.outputFormat,
      ignoredParameters: ignored,
    });

    session.sendControl(
      MessageFactory.info({
        requestId,
        message: 'Streaming audio',
        textLength: request.text.length,
        voice: request.voice ?? 'default',
        outputFormat: request.outputFormat,
        sampleRate: capabilities.sampleRate,
        effectiveParameters: effective,
        ignoredParameters: ignored,
      })
    );

    const assembler = new AudioFragmentAssembler({
      ...capabilities,
      outputFormat: request.outputFormat,
      contextWindow: request.contextWindow,
      fadeDuration: request.fadeDuration,
    });
    const aggregator = new MetricsAggregator(handle.admittedAt, capabilities.sampleRate, this.clock);

    const params: EngineGenerationParams = {
      text: request.text,
      voiceSamplePath,
      ...effective,
      printMetrics: request.printMetrics,
    };

    let iterator: AsyncIterator<EngineChunk> | undefined;
    let end: StreamEnd = { kind: 'exhausted' };

    try {
      iterator = engine.generateStream(params, handle.signal)[Symbol.asyncIterator]();
      let sequenceNumber = 0;
      for (;;) {
        const next = await nextOrAbort(iterator, handle.signal);
        if (next === ABORTED) {
          end = { kind: 'aborted' };
          break;
        }
        if (next.done) {
          break;
        }

        const { audio, metrics } = next.value;
        const frame = assembler.assemble({
          samples: audio,
          sequenceNumber,
          isFirst: sequenceNumber === 0,
        });

        if (handle.signal.aborted) {
          end = { kind: 'aborted' };
          break;
        }

        // Waits on backpressure; a cancel meanwhile drops this fragment unsent
        const chunk = sequenceNumber + 1;
        const written =
          request.outputFormat === 'raw'
            ? await session.send(frame.bytes, handle.signal)
            : await session.send(MessageFactory.audio(requestId, chunk, frame.bytes), handle.signal);
        if (!written) {
          end = handle.signal.aborted ? { kind: 'aborted' } : { kind: 'channel_closed' };
          break;
        }

        // Only queued fragments are counted
        const snapshot = aggregator.observe(frame.sampleCount, metrics);
        if (handle.signal.aborted) {
          end = { kind: 'aborted' };
          break;
        }

        if (request.includeMetrics) {
          session.sendControl(
            MessageFactory.metrics({
              requestId,
              chunk: snapshot.chunk,
              firstChunkLatency: snapshot.firstChunkLatency,
              elapsedTime: snapshot.elapsedTime,
              audioDuration: snapshot.audioDuration,
              rtf: snapshot.rtf,
              frameSizeBytes: frame.bytes.length,
              sampleRate: capabilities.sampleRate,
            })
          );
        }

        if (request.printMetrics) {
          logger.info('Chunk metrics', { requestId, ...snapshot });
        }

        if (metrics.isFinal) {
          logger.debug('Engine marked final fragment', { requestId, chunk: snapshot.chunk });
        }

        sequenceNumber++;
      }
    } catch (error) {
      const fault = toStreamFault(error);
      if (iterator) stopIterator(iterator, requestId);
      if (error instanceof EngineError && error.type === EngineErrorType.CONNECTION) {
        // Sidecar unreachable: reject at admission until it is back
        this.deps.engine.markUnavailable(error.message);
      }
      return this.reportFault(session, handle, fault, aggregator.summary());
    }

    if (end.kind !== 'exhausted' && iterator) {
      stopIterator(iterator, requestId);
    }

    const summary = aggregator.summary();

    if (end.kind === 'aborted' || handle.signal.aborted) {
      return this.finishAborted(session, handle, summary);
    }
    if (end.kind === 'channel_closed' || session.isClosing) {
      return { requestId, status: 'disconnected', summary };
    }

    session.sendControl(
      MessageFactory.done({ requestId, totalChunks: summary.totalChunks, cancelled: false, summary })
    );
    logger.info('Stream completed', { sessionId: session.id, requestId, ...summary });

    return { requestId, status: 'completed', summary };
  }

  /**
   * Cancelled by the client, the reaper or shutdown: acknowledge with
   * done{cancelled}. Disconnected: nothing to send.
   */
  private finishAborted(
    session: StreamSession,
    handle: RequestHandle,
    summary: SessionMetricsSummary | undefined
  ): RequestOutcome {
    const { requestId } = handle;
    const finalSummary = summary ?? emptySummary();

    if (session.isClosing || handle.cancelReason === 'disconnect') {
      logger.info('Stream abandoned on disconnect', { sessionId: session.id, requestId });
      return { requestId, status: 'disconnected', summary: finalSummary };
    }

    session.sendControl(
      MessageFactory.done({
        requestId,
        totalChunks: finalSummary.totalChunks,
        cancelled: true,
        summary: finalSummary,
      })
    );
    logger.info('Stream cancelled', {
      sessionId: session.id,
      requestId,
      reason: handle.cancelReason,
      chunks: finalSummary.totalChunks,
    });

    return { requestId, status: 'cancelled', summary: finalSummary };
  }

  private reportFault(
    session: StreamSession,
    handle: RequestHandle,
    fault: StreamFault,
    summary: SessionMetricsSummary | undefined
  ): RequestOutcome {
    const { requestId } = handle;

    if (session.isClosing || !isRequestScoped(fault)) {
      return { requestId, status: 'disconnected', summary, error: fault };
    }
    if (handle.cancelReason !== null) {
      return this.finishAborted(session, handle, summary);
    }

    sendFault(session, fault, requestId);

    const admitted = summary !== undefined;
    if (admitted) {
      logger.error('Stream failed', {
        sessionId: session.id,
        requestId,
        code: fault.code,
        error: fault.message,
      });
    }

    return { requestId, status: admitted ? 'failed' : 'rejected', summary, error: fault };
  }
}

function emptySummary(): SessionMetricsSummary {
  return {
    totalChunks: 0,
    averageRTF: 0,
    totalElapsed: 0,
    totalAudioDuration: 0,
    firstChunkLatency: null,
  };
}

// Export singleton instance
export const streamingOrchestrator = new StreamingOrchestrator({
  engine: engineService,
  voices: voiceLibraryService,
  registry: connectionRegistry,
  maxConcurrentGenerations: env.MAX_CONCURRENT_GENERATIONS,
});
