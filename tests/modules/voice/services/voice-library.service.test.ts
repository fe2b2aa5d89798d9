/**
 * Voice Library Service Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { VoiceLibraryService } from '@/modules/voice/services/voice-library.service';
import { ResolutionFault } from '@/modules/streaming/utils/faults';

describe('VoiceLibraryService', () => {
  let dir: string;
  let library: VoiceLibraryService;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'voices-'));
    await writeFile(path.join(dir, 'default.wav'), 'RIFF');
    await writeFile(path.join(dir, 'narrator.mp3'), 'ID3');
    await writeFile(path.join(dir, 'both.wav'), 'RIFF');
    await writeFile(path.join(dir, 'both.flac'), 'fLaC');

    library = new VoiceLibraryService({
      voicesDir: dir,
      defaultSample: path.join(dir, 'default.wav'),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should resolve no voice to the default sample', async () => {
    await expect(library.resolve()).resolves.toBe(path.join(dir, 'default.wav'));
  });

  it('should resolve aliases to the default sample', async () => {
    await expect(library.resolve('alloy')).resolves.toBe(path.join(dir, 'default.wav'));
    await expect(library.resolve('default')).resolves.toBe(path.join(dir, 'default.wav'));
  });

  it('should find a named voice by extension', async () => {
    await expect(library.resolve('narrator')).resolves.toBe(path.join(dir, 'narrator.mp3'));
  });

  it('should prefer extensions in configured order', async () => {
    await expect(library.resolve('both')).resolves.toBe(path.join(dir, 'both.wav'));
  });

  it('should fail for an unknown voice', async () => {
    await expect(library.resolve('ghost')).rejects.toThrow(new ResolutionFault('Voice not found: ghost'));
  });

  it('should reject names that could escape the library directory', async () => {
    await expect(library.resolve('../default')).rejects.toThrow('Invalid voice name: ../default');
  });

  it('should fail when the default sample is missing', async () => {
    const missing = new VoiceLibraryService({
      voicesDir: dir,
      defaultSample: path.join(dir, 'absent.wav'),
    });

    await expect(missing.resolve()).rejects.toBeInstanceOf(ResolutionFault);
    await expect(missing.resolve('nova')).rejects.toThrow('Voice sample for "default" is missing');
  });
});
