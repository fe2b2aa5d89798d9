/**
 * Synthesis Engine Types
 * The engine is an opaque capability: given bounded parameters it produces a
 * finite, non-restartable lazy sequence of (audio fragment, metrics) pairs.
 */

export interface EngineCapabilities {
  /** Output sample rate in Hz (mono, 16-bit signed PCM) */
  sampleRate: number;
  /** Audio samples produced per speech token */
  samplesPerToken: number;
  /** Whether non-initial fragments repeat `contextWindow` tokens of lead-in audio */
  overlapsContext: boolean;
}

/**
 * Parameters the engine recognises. Nothing else is ever passed to it.
 */
export interface EngineGenerationParams {
  text: string;
  voiceSamplePath: string;
  exaggeration: number;
  cfgWeight: number;
  temperature: number;
  chunkSize: number;
  contextWindow: number;
  fadeDuration: number;
  printMetrics: boolean;
}

export interface EngineMetrics {
  /** Seconds the engine spent producing this fragment */
  generationTime: number;
  /** Epoch ms at which the fragment became available */
  readyAt?: number;
  /** Speech tokens covered by this fragment */
  tokenCount?: number;
  /** Engine marks its last fragment */
  isFinal?: boolean;
}

export interface EngineChunk {
  audio: Int16Array;
  metrics: EngineMetrics;
}

export interface SynthesisEngine {
  readonly name: string;
  readonly capabilities: EngineCapabilities;

  /**
   * Start one generation. Aborting `signal`, or calling `return()` on the
   * iterator, asks the engine to stop.
   */
  generateStream(params: EngineGenerationParams, signal: AbortSignal): AsyncIterable<EngineChunk>;

  dispose?(): Promise<void>;
}

export type EngineFactory = () => Promise<SynthesisEngine>;

export enum EngineLifecycle {
  UNINITIALIZED = 'uninitialized',
  INITIALIZING = 'initializing',
  READY = 'ready',
  ERROR = 'error',
}

export interface EngineStatus {
  state: EngineLifecycle;
  ready: boolean;
  engine: string | null;
  capabilities: EngineCapabilities | null;
  activeGenerations: number;
  error: string | null;
  readySince: number | null;
}
