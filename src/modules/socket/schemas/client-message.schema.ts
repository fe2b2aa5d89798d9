/**
 * Client Message Schema
 * Inbound control messages are JSON text: { type, ... }
 */

import { z } from 'zod';

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('stream_request'),
    // Validated by the orchestrator so bound violations report VALIDATION_ERROR
    data: z.unknown(),
  }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('cancel') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
