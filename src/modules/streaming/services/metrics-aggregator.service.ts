/**
 * Metrics Aggregator
 * Converts per-fragment engine statistics into cumulative request telemetry.
 *
 * The engine is the source of truth for generation time; wall-clock is only
 * used for latency to the first fragment.
 */

import type { EngineMetrics } from '@/modules/engine/types';
import type { SessionMetricsSnapshot, SessionMetricsSummary } from '../types';

export type Clock = () => number;

export class MetricsAggregator {
  private readonly admittedAt: number;
  private readonly sampleRate: number;
  private readonly clock: Clock;

  private chunkCount = 0;
  private firstChunkLatency: number | null = null;
  private cumulativeAudioDuration = 0;
  private cumulativeElapsed = 0;

  /**
   * @param admittedAt - epoch ms at which the request was admitted
   * @param sampleRate - emitted audio sample rate in Hz
   */
  constructor(admittedAt: number, sampleRate: number, clock: Clock = Date.now) {
    this.admittedAt = admittedAt;
    this.sampleRate = sampleRate;
    this.clock = clock;
  }

  observe(sampleCount: number, engineMetrics: EngineMetrics): SessionMetricsSnapshot {
    this.chunkCount++;

    if (this.firstChunkLatency === null) {
      const readyAt = engineMetrics.readyAt ?? this.clock();
      this.firstChunkLatency = Math.max(0, readyAt - this.admittedAt) / 1000;
    }

    const chunkDuration = sampleCount / this.sampleRate;
    this.cumulativeAudioDuration += chunkDuration;
    this.cumulativeElapsed += Math.max(0, engineMetrics.generationTime);

    return {
      chunk: this.chunkCount,
      firstChunkLatency: this.firstChunkLatency,
      elapsedTime: this.cumulativeElapsed,
      audioDuration: this.cumulativeAudioDuration,
      chunkDuration,
      rtf: this.runningRTF(),
    };
  }

  /**
   * Generation time over produced audio; below 1.0 is faster than playback
   */
  runningRTF(): number {
    return this.cumulativeAudioDuration > 0 ? this.cumulativeElapsed / this.cumulativeAudioDuration : 0;
  }

  getChunkCount(): number {
    return this.chunkCount;
  }

  /**
   * Final telemetry; valid after success, failure or cancellation
   */
  summary(): SessionMetricsSummary {
    return {
      totalChunks: this.chunkCount,
      averageRTF: this.runningRTF(),
      totalElapsed: this.cumulativeElapsed,
      totalAudioDuration: this.cumulativeAudioDuration,
      firstChunkLatency: this.firstChunkLatency,
    };
  }
}
