/**
 * Streaming Module - Public API
 */

export * from './services';
export * from './types';
export * from './utils';
export { StreamRequestSchema, formatValidationIssues } from './schemas';
export { STREAMING_LIMITS, AUDIO_FORMAT, SUPPORTED_OUTPUT_FORMATS, IGNORED_PARAMETERS } from './config';
