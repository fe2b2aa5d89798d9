/**
 * Shared Configuration
 * Centralized exports for all configuration
 */

import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Environment variables
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: intFromEnv(process.env.PORT, 3001),

  // Synthesis engine sidecar
  ENGINE_URL: process.env.ENGINE_URL || '',
  ENGINE_CONNECT_TIMEOUT_MS: intFromEnv(process.env.ENGINE_CONNECT_TIMEOUT_MS, 10000),
  ENGINE_RECOVERY_DELAY_MS: intFromEnv(process.env.ENGINE_RECOVERY_DELAY_MS, 5000),

  // Voice samples
  VOICE_LIBRARY_DIR: process.env.VOICE_LIBRARY_DIR || './voices',
  DEFAULT_VOICE_SAMPLE: process.env.DEFAULT_VOICE_SAMPLE || './voices/default.wav',

  // Limits
  MAX_CONNECTIONS: intFromEnv(process.env.MAX_CONNECTIONS, 1000),
  MAX_CONCURRENT_GENERATIONS: intFromEnv(process.env.MAX_CONCURRENT_GENERATIONS, 4),
  OUTBOUND_QUEUE_CAPACITY: intFromEnv(process.env.OUTBOUND_QUEUE_CAPACITY, 32),
  SESSION_IDLE_TIMEOUT_MS: intFromEnv(process.env.SESSION_IDLE_TIMEOUT_MS, 5 * 60 * 1000),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

/**
 * Validate required environment variables
 */
export function validateEnv(): void {
  const required: (keyof typeof env)[] = ['PORT', 'ENGINE_URL', 'DEFAULT_VOICE_SAMPLE'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const positive: (keyof typeof env)[] = [
    'MAX_CONNECTIONS',
    'MAX_CONCURRENT_GENERATIONS',
    'OUTBOUND_QUEUE_CAPACITY',
    'SESSION_IDLE_TIMEOUT_MS',
  ];
  const invalid = positive.filter((key) => {
    const value = env[key];
    return typeof value !== 'number' || value <= 0;
  });

  if (invalid.length > 0) {
    throw new Error(`Environment variables must be positive integers: ${invalid.join(', ')}`);
  }
}

/**
 * Check if running in development mode
 */
export const isDevelopment = env.NODE_ENV === 'development';

/**
 * Check if running in production mode
 */
export const isProduction = env.NODE_ENV === 'production';

/**
 * Check if running in test mode
 */
export const isTest = env.NODE_ENV === 'test';

// Export socket configuration
export * from './socket';
