/**
 * Metrics Aggregator Tests
 */

import { describe, it, expect } from 'vitest';
import { MetricsAggregator } from '@/modules/streaming/services/metrics-aggregator.service';

describe('MetricsAggregator', () => {
  const admittedAt = 1000;
  const clock = () => 5000;

  it('should take first-chunk latency from the engine ready time', () => {
    const aggregator = new MetricsAggregator(admittedAt, 24000, clock);

    const snapshot = aggregator.observe(2400, { generationTime: 0.05, readyAt: 1250 });

    expect(snapshot.chunk).toBe(1);
    expect(snapshot.firstChunkLatency).toBe(0.25);
    expect(snapshot.chunkDuration).toBe(0.1);
    expect(snapshot.audioDuration).toBe(0.1);
    expect(snapshot.elapsedTime).toBe(0.05);
    expect(snapshot.rtf).toBe(0.5);
  });

  it('should fall back to the clock when the engine gives no ready time', () => {
    const aggregator = new MetricsAggregator(admittedAt, 24000, clock);

    const snapshot = aggregator.observe(2400, { generationTime: 0.05 });

    expect(snapshot.firstChunkLatency).toBe(4);
  });

  it('should accumulate audio and elapsed time across fragments', () => {
    const aggregator = new MetricsAggregator(admittedAt, 24000, clock);

    aggregator.observe(2400, { generationTime: 0.05, readyAt: 1250 });
    const snapshot = aggregator.observe(4800, { generationTime: 0.1, readyAt: 9999 });

    expect(snapshot.chunk).toBe(2);
    expect(snapshot.firstChunkLatency).toBe(0.25);
    expect(snapshot.chunkDuration).toBe(0.2);
    expect(snapshot.audioDuration).toBeCloseTo(0.3, 10);
    expect(snapshot.elapsedTime).toBeCloseTo(0.15, 10);
    expect(snapshot.rtf).toBeCloseTo(0.5, 10);
  });

  it('should summarize completed work', () => {
    const aggregator = new MetricsAggregator(admittedAt, 24000, clock);
    aggregator.observe(2400, { generationTime: 0.05, readyAt: 1250 });
    aggregator.observe(2400, { generationTime: 0.15 });

    const summary = aggregator.summary();

    expect(summary.totalChunks).toBe(2);
    expect(summary.totalAudioDuration).toBeCloseTo(0.2, 10);
    expect(summary.totalElapsed).toBeCloseTo(0.2, 10);
    expect(summary.averageRTF).toBeCloseTo(1, 10);
    expect(summary.firstChunkLatency).toBe(0.25);
  });

  it('should report an empty summary before any fragment', () => {
    const aggregator = new MetricsAggregator(admittedAt, 24000, clock);

    expect(aggregator.summary()).toEqual({
      totalChunks: 0,
      averageRTF: 0,
      totalElapsed: 0,
      totalAudioDuration: 0,
      firstChunkLatency: null,
    });
  });
});
