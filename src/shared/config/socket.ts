/**
 * WebSocket Configuration
 */

/**
 * WebSocket server configuration
 */
export const websocketConfig = {
  // Streaming endpoint path
  path: '/ws/stream/audio',

  // Inbound messages are small JSON control messages
  maxPayload: 1024 * 1024,

  // Disable for lower latency with binary audio
  perMessageDeflate: false,

  clientTracking: true,
};

/**
 * WebSocket close codes used by the server
 */
export const websocketCloseCodes = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
  TRY_AGAIN_LATER: 1013,
} as const;

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,
};
