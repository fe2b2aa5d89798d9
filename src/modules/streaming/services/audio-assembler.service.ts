/**
 * Audio Fragment Assembler
 * Turns engine fragments into wire-ready PCM bytes.
 *
 * Per fragment:
 * - first fragment (raw output): streaming WAV header prepended
 * - later fragments: duplicated context lead-in trimmed, then a linear fade-in
 *   applied across the boundary
 *
 * One assembler per request; it holds no state between fragments.
 */

import { createWavHeader } from '../utils/wav-header';
import { GenerationFault } from '../utils/faults';
import { AUDIO_FORMAT } from '../config';
import type { OutputFormat } from '../types';

export interface Fragment {
  samples: Int16Array;
  sequenceNumber: number;
  isFirst: boolean;
}

export interface AssemblerOptions {
  sampleRate: number;
  samplesPerToken: number;
  overlapsContext: boolean;
  outputFormat: OutputFormat;
  /** Overlap tokens carried into each later fragment */
  contextWindow: number;
  /** Fade-in length in seconds */
  fadeDuration: number;
}

export interface AssembledFrame {
  bytes: Buffer;
  /** PCM samples in `bytes`, header excluded */
  sampleCount: number;
}

export class AudioFragmentAssembler {
  readonly trimLength: number;
  readonly fadeLength: number;
  private readonly options: AssemblerOptions;

  constructor(options: AssemblerOptions) {
    this.options = options;
    this.trimLength = options.overlapsContext ? options.contextWindow * options.samplesPerToken : 0;
    this.fadeLength = Math.round(options.fadeDuration * options.sampleRate);
  }

  assemble(fragment: Fragment, isFirstOfStream: boolean = fragment.isFirst): AssembledFrame {
    const { samples, sequenceNumber } = fragment;

    if (!(samples instanceof Int16Array)) {
      throw new GenerationFault(`Fragment ${sequenceNumber} is not 16-bit PCM`);
    }
    if (samples.length === 0) {
      throw new GenerationFault(`Fragment ${sequenceNumber} is empty`);
    }

    let body = samples;

    if (!isFirstOfStream && this.trimLength > 0) {
      if (samples.length <= this.trimLength) {
        throw new GenerationFault(
          `Fragment ${sequenceNumber} has ${samples.length} samples, ` +
            `not more than the ${this.trimLength}-sample context overlap`
        );
      }
      body = samples.subarray(this.trimLength);
    }

    if (!isFirstOfStream && this.fadeLength > 0) {
      body = applyFadeIn(body, this.fadeLength);
    }

    const pcm = toPcm16Bytes(body);

    if (isFirstOfStream && this.options.outputFormat === 'raw') {
      const header = createWavHeader({ sampleRate: this.options.sampleRate });
      return { bytes: Buffer.concat([header, pcm]), sampleCount: body.length };
    }

    return { bytes: pcm, sampleCount: body.length };
  }
}

/**
 * Linear ramp from 0 to 1 over `fadeLength` samples: gain(i) = i / (fadeLength - 1).
 * Shorter input is ramped over its own length with the same curve.
 * Returns a copy; scaled values truncate toward zero.
 */
export function applyFadeIn(samples: Int16Array, fadeLength: number): Int16Array {
  const out = Int16Array.from(samples);
  const rampEnd = Math.min(fadeLength, out.length);
  const denominator = fadeLength - 1;

  for (let i = 0; i < rampEnd; i++) {
    const gain = denominator > 0 ? i / denominator : 0;
    out[i] = Math.trunc(out[i] * gain);
  }

  return out;
}

/**
 * Little-endian 16-bit PCM bytes
 */
export function toPcm16Bytes(samples: Int16Array): Buffer {
  const bytes = Buffer.alloc(samples.length * AUDIO_FORMAT.BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    bytes.writeInt16LE(samples[i], i * AUDIO_FORMAT.BYTES_PER_SAMPLE);
  }
  return bytes;
}
