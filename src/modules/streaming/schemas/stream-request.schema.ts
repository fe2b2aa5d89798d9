/**
 * Stream Request Schema
 * Every bound is checked before any generation work starts.
 */

import { z } from 'zod';
import { STREAMING_LIMITS, SUPPORTED_OUTPUT_FORMATS } from '../config';

const bounded = (bounds: { min: number; max: number }) =>
  z.number().finite().min(bounds.min).max(bounds.max);

const boundedInt = (bounds: { min: number; max: number }) =>
  z.number().int().min(bounds.min).max(bounds.max);

const L = STREAMING_LIMITS;

export const StreamRequestSchema = z.preprocess(
  // `input` is the older name for `text`
  (value) => {
    if (typeof value === 'object' && value !== null && !('text' in value) && 'input' in value) {
      const { input, ...rest } = value;
      return { ...rest, text: input };
    }
    return value;
  },
  z.object({
    text: z
      .string({ required_error: 'required' })
      .trim()
      .min(1, 'text cannot be empty')
      .max(L.TEXT_MAX_LENGTH, `text cannot exceed ${L.TEXT_MAX_LENGTH} characters`),
    voice: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,64}$/, 'voice must be 1-64 letters, digits, "-" or "_"')
      .optional(),

    exaggeration: bounded(L.EXAGGERATION).default(L.EXAGGERATION.default),
    cfgWeight: bounded(L.CFG_WEIGHT).default(L.CFG_WEIGHT.default),
    temperature: bounded(L.TEMPERATURE).default(L.TEMPERATURE.default),

    chunkSize: boundedInt(L.CHUNK_SIZE).default(L.CHUNK_SIZE.default),
    contextWindow: boundedInt(L.CONTEXT_WINDOW).default(L.CONTEXT_WINDOW.default),
    fadeDuration: bounded(L.FADE_DURATION).default(L.FADE_DURATION.default),

    outputFormat: z.enum(SUPPORTED_OUTPUT_FORMATS).default('raw'),
    includeMetrics: z.boolean().default(true),
    printMetrics: z.boolean().default(false),

    topP: bounded(L.TOP_P).optional(),
    maxNewTokens: boundedInt(L.MAX_NEW_TOKENS).optional(),
    minNewTokens: boundedInt(L.MIN_NEW_TOKENS).optional(),
    enableAlignmentMonitoring: z.boolean().optional(),
    alignmentWindowSize: boundedInt(L.ALIGNMENT_WINDOW_SIZE).optional(),
    alignmentThreshold: bounded(L.ALIGNMENT_THRESHOLD).optional(),
  })
);

/**
 * Flatten zod issues into one client-facing message
 */
export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
