/**
 * Session Configuration
 */

import { env } from '@/shared/config';
import type { SessionConfig } from '../types';

export const sessionConfig: SessionConfig = {
  idleTimeout: env.SESSION_IDLE_TIMEOUT_MS,
  maxSessionDuration: 2 * 60 * 60 * 1000, // 2 hours
  cleanupInterval: 60 * 1000, // 1 minute
  evictionGrace: 2000,
};

export const outboundConfig = {
  // Frames allowed to wait for the client before producers are suspended
  capacity: env.OUTBOUND_QUEUE_CAPACITY,
} as const;
