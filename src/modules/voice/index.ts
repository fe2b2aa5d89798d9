/**
 * Voice Module - Public API
 */

export { VoiceLibraryService, voiceLibraryService } from './services/voice-library.service';
export type { VoiceResolver, VoiceLibraryOptions } from './services/voice-library.service';
export { voiceConfig } from './config';
