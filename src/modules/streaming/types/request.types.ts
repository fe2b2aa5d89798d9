/**
 * Stream Request Types
 */

import type { z } from 'zod';
import type { StreamRequestSchema } from '../schemas/stream-request.schema';
import type { IGNORED_PARAMETERS, SUPPORTED_OUTPUT_FORMATS } from '../config';

export type StreamRequest = z.infer<typeof StreamRequestSchema>;

export type OutputFormat = (typeof SUPPORTED_OUTPUT_FORMATS)[number];

export type IgnoredParameter = (typeof IGNORED_PARAMETERS)[number];

/**
 * Parameter set actually threaded into the engine call
 */
export interface EffectiveParameters {
  exaggeration: number;
  cfgWeight: number;
  temperature: number;
  chunkSize: number;
  contextWindow: number;
  fadeDuration: number;
}
