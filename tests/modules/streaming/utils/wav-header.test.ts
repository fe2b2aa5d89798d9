/**
 * Streaming WAV Header Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createWavHeader,
  STREAMING_DATA_SIZE,
  STREAMING_RIFF_SIZE,
} from '@/modules/streaming/utils/wav-header';

describe('createWavHeader', () => {
  it('should describe 16-bit mono PCM of unknown length', () => {
    const header = createWavHeader({ sampleRate: 24000 });

    expect(header.length).toBe(44);
    expect(header.toString('ascii', 0, 4)).toBe('RIFF');
    expect(header.readUInt32LE(4)).toBe(STREAMING_RIFF_SIZE);
    expect(header.toString('ascii', 8, 12)).toBe('WAVE');
    expect(header.toString('ascii', 12, 16)).toBe('fmt ');
    expect(header.readUInt32LE(16)).toBe(16);
    expect(header.readUInt16LE(20)).toBe(1);
    expect(header.readUInt16LE(22)).toBe(1);
    expect(header.readUInt32LE(24)).toBe(24000);
    expect(header.readUInt32LE(28)).toBe(48000);
    expect(header.readUInt16LE(32)).toBe(2);
    expect(header.readUInt16LE(34)).toBe(16);
    expect(header.toString('ascii', 36, 40)).toBe('data');
    expect(header.readUInt32LE(40)).toBe(STREAMING_DATA_SIZE);
  });

  it('should use the streaming size markers', () => {
    expect(STREAMING_RIFF_SIZE).toBe(2147483611);
    expect(STREAMING_DATA_SIZE).toBe(4294967295);
  });

  it('should write real sizes when the data length is known', () => {
    const header = createWavHeader({ sampleRate: 16000, dataSize: 200 });

    expect(header.readUInt32LE(4)).toBe(236);
    expect(header.readUInt32LE(40)).toBe(200);
  });

  it('should reject an invalid sample rate', () => {
    expect(() => createWavHeader({ sampleRate: 0 })).toThrow('Invalid sampleRate');
  });
});
