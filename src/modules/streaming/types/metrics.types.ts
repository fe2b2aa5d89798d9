/**
 * Session Metrics Types
 * Durations are seconds; latency is measured from request admission.
 */

export interface SessionMetricsSnapshot {
  chunk: number;
  firstChunkLatency: number | null;
  elapsedTime: number;
  audioDuration: number;
  chunkDuration: number;
  rtf: number;
}

export interface SessionMetricsSummary {
  totalChunks: number;
  averageRTF: number;
  totalElapsed: number;
  totalAudioDuration: number;
  firstChunkLatency: number | null;
}
