/**
 * Streaming Constants
 * Bounds and defaults for stream requests
 */

export const STREAMING_LIMITS = {
  TEXT_MAX_LENGTH: 3000,

  EXAGGERATION: { min: 0.25, max: 2.0, default: 0.5 },
  CFG_WEIGHT: { min: 0, max: 1, default: 0.5 },
  TEMPERATURE: { min: 0.05, max: 5.0, default: 0.8 },

  CHUNK_SIZE: { min: 10, max: 100, default: 25 },
  CONTEXT_WINDOW: { min: 0, max: 200, default: 50 },
  FADE_DURATION: { min: 0, max: 0.1, default: 0.02 }, // seconds

  // Accepted for compatibility, never passed to the engine
  TOP_P: { min: 0, max: 1 },
  MAX_NEW_TOKENS: { min: 100, max: 10000 },
  MIN_NEW_TOKENS: { min: 0, max: 1000 },
  ALIGNMENT_WINDOW_SIZE: { min: 10, max: 200 },
  ALIGNMENT_THRESHOLD: { min: 0, max: 1 },
} as const;

export const AUDIO_FORMAT = {
  CHANNELS: 1,
  BIT_DEPTH: 16,
  BYTES_PER_SAMPLE: 2,
  WAV_HEADER_BYTES: 44,
} as const;

export const SUPPORTED_OUTPUT_FORMATS = ['raw', 'encoded'] as const;

export const IGNORED_PARAMETERS = [
  'topP',
  'maxNewTokens',
  'minNewTokens',
  'enableAlignmentMonitoring',
  'alignmentWindowSize',
  'alignmentThreshold',
] as const;
