/**
 * Voice Library Service
 * Maps a client voice reference to a reference sample on disk.
 */

import { access } from 'fs/promises';
import path from 'path';
import { logger } from '@/shared/utils';
import { ResolutionFault } from '@/modules/streaming/utils/faults';
import { voiceConfig } from '../config';

const VOICE_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface VoiceLibraryOptions {
  voicesDir: string;
  defaultSample: string;
  defaultAliases: readonly string[];
  extensions: readonly string[];
}

export interface VoiceResolver {
  resolve(voice?: string): Promise<string>;
}

export class VoiceLibraryService implements VoiceResolver {
  private readonly options: VoiceLibraryOptions;

  constructor(options: Partial<VoiceLibraryOptions> = {}) {
    this.options = { ...voiceConfig, ...options };
  }

  /**
   * Absolute path of the sample for `voice`; no voice or an alias gives the
   * default sample
   */
  async resolve(voice?: string): Promise<string> {
    if (voice === undefined || this.options.defaultAliases.includes(voice)) {
      return this.requireFile(path.resolve(this.options.defaultSample), 'default');
    }

    if (!VOICE_NAME_PATTERN.test(voice)) {
      throw new ResolutionFault(`Invalid voice name: ${voice}`);
    }

    const voicesDir = path.resolve(this.options.voicesDir);
    for (const extension of this.options.extensions) {
      const candidate = path.join(voicesDir, `${voice}${extension}`);
      if (await fileExists(candidate)) {
        logger.debug('Voice resolved', { voice, path: candidate });
        return candidate;
      }
    }

    throw new ResolutionFault(`Voice not found: ${voice}`);
  }

  private async requireFile(filePath: string, voice: string): Promise<string> {
    if (!(await fileExists(filePath))) {
      throw new ResolutionFault(`Voice sample for "${voice}" is missing`);
    }
    return filePath;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// Export singleton instance
export const voiceLibraryService = new VoiceLibraryService();
