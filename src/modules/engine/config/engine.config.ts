/**
 * Synthesis Engine Configuration
 */

import { env } from '@/shared/config';

export const engineConfig = {
  // Sidecar WebSocket endpoint
  url: env.ENGINE_URL,

  // Timeout for the capability handshake and for opening generation sockets
  connectTimeoutMs: env.ENGINE_CONNECT_TIMEOUT_MS,

  // Wait before reconnecting after the sidecar is lost
  recoveryDelayMs: env.ENGINE_RECOVERY_DELAY_MS,

  // Sidecar messages carry base64 audio; keep headroom over a few seconds of PCM
  maxPayload: 16 * 1024 * 1024,
} as const;
