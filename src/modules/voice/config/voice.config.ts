/**
 * Voice Library Configuration
 */

import { env } from '@/shared/config';

export const voiceConfig = {
  voicesDir: env.VOICE_LIBRARY_DIR,
  defaultSample: env.DEFAULT_VOICE_SAMPLE,

  // Names that always map to the default sample
  defaultAliases: ['default', 'alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'],

  extensions: ['.wav', '.mp3', '.flac'],
} as const;
