/**
 * Streaming WAV header
 * Lengths are unknown while streaming, so RIFF and data sizes carry the
 * conventional "unspecified" values instead of real byte counts.
 */

import { AUDIO_FORMAT } from '../config';

export const STREAMING_DATA_SIZE = 0xffffffff;
export const STREAMING_RIFF_SIZE = 0x7fffffff - 36;

export interface WavHeaderOptions {
  sampleRate: number;
  channels?: number;
  bitsPerSample?: number;
  /** Known data length in bytes; omit for a live stream */
  dataSize?: number;
}

export function createWavHeader(options: WavHeaderOptions): Buffer {
  const channels = options.channels ?? AUDIO_FORMAT.CHANNELS;
  const bitsPerSample = options.bitsPerSample ?? AUDIO_FORMAT.BIT_DEPTH;
  const { sampleRate } = options;

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) throw new Error('Invalid sampleRate');
  if (!Number.isInteger(channels) || channels <= 0) throw new Error('Invalid channels');

  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRate * blockAlign;
  const dataSize = options.dataSize ?? STREAMING_DATA_SIZE;
  const riffSize = options.dataSize === undefined ? STREAMING_RIFF_SIZE : 36 + options.dataSize;

  const header = Buffer.alloc(AUDIO_FORMAT.WAV_HEADER_BYTES);
  header.write('RIFF', 0);
  header.writeUInt32LE(riffSize, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16); // PCM header size
  header.writeUInt16LE(1, 20); // PCM format
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36);
  header.writeUInt32LE(dataSize, 40);

  return header;
}
