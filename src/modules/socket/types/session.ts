/**
 * Session Types
 */

export enum SessionState {
  IDLE = 'idle', // Connected, no request in flight
  STREAMING = 'streaming', // Request admitted and generating
  CLOSING = 'closing', // Transport gone or being torn down
}

export interface SessionMetadata {
  ipAddress?: string;
  userAgent?: string;
}

export interface SessionConfig {
  idleTimeout: number; // Milliseconds without inbound or outbound traffic
  maxSessionDuration: number; // Maximum connection age (milliseconds)
  cleanupInterval: number; // Reaper period (milliseconds)
  evictionGrace: number; // Wait for a cancel acknowledgment before closing (milliseconds)
}

export interface SessionStats {
  total: number;
  idle: number;
  streaming: number;
  closing: number;
  avgDuration: number;
}
