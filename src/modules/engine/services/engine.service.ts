/**
 * Engine Service
 * Process-wide owner of the single synthesis engine instance.
 *
 * Lifecycle: uninitialized → initializing → ready | error
 * Requests consult readiness once at admission; a generation already running
 * keeps its acquired engine even if readiness later flips.
 *
 * With a recovery delay set, an unavailable engine is re-created from the last
 * factory after that delay, and again after each failed attempt.
 */

import { logger } from '@/shared/utils';
import { engineConfig } from '../config';
import {
  EngineError,
  EngineErrorType,
  EngineLifecycle,
  type EngineFactory,
  type EngineStatus,
  type SynthesisEngine,
} from '../types';

export interface EngineServiceOptions {
  /** ms before re-initializing after a failure; 0 disables recovery */
  recoveryDelayMs?: number;
}

export class EngineService {
  private engine: SynthesisEngine | null = null;
  private state: EngineLifecycle = EngineLifecycle.UNINITIALIZED;
  private lastError: string | null = null;
  private readySince: number | null = null;
  private activeGenerations = 0;
  private initializing: Promise<void> | null = null;
  private factory: EngineFactory | null = null;
  private recoveryTimer: NodeJS.Timeout | null = null;
  private readonly recoveryDelayMs: number;

  constructor(options: EngineServiceOptions = {}) {
    this.recoveryDelayMs = options.recoveryDelayMs ?? 0;
  }

  /**
   * Create the engine through `factory`. Concurrent calls share one attempt.
   * Failure leaves the service in ERROR and rethrows.
   */
  async initialize(factory: EngineFactory): Promise<void> {
    if (this.initializing) {
      return this.initializing;
    }

    this.factory = factory;
    const attempt = this.runInitialization(factory);
    this.initializing = attempt;
    try {
      await attempt;
    } finally {
      if (this.initializing === attempt) {
        this.initializing = null;
      }
    }
  }

  private async runInitialization(factory: EngineFactory): Promise<void> {
    this.state = EngineLifecycle.INITIALIZING;
    this.lastError = null;
    logger.info('Initializing synthesis engine');

    try {
      const engine = await factory();
      this.engine = engine;
      this.state = EngineLifecycle.READY;
      this.readySince = Date.now();
      logger.info('Synthesis engine ready', {
        engine: engine.name,
        capabilities: engine.capabilities,
      });
    } catch (error) {
      this.engine = null;
      this.state = EngineLifecycle.ERROR;
      this.lastError = error instanceof Error ? error.message : String(error);
      logger.error('Synthesis engine initialization failed', {
        error: this.lastError,
      });
      this.scheduleRecovery();
      throw error;
    }
  }

  isReady(): boolean {
    return this.state === EngineLifecycle.READY && this.engine !== null;
  }

  getStatus(): EngineStatus {
    return {
      state: this.state,
      ready: this.isReady(),
      engine: this.engine?.name ?? null,
      capabilities: this.engine?.capabilities ?? null,
      activeGenerations: this.activeGenerations,
      error: this.lastError,
      readySince: this.readySince,
    };
  }

  /**
   * Take a reference to the engine for one generation.
   * Every successful acquire must be paired with release().
   */
  acquire(): SynthesisEngine {
    if (!this.isReady() || !this.engine) {
      throw new EngineError(
        EngineErrorType.NOT_READY,
        this.lastError ? `Engine not ready: ${this.lastError}` : 'Engine not ready: not initialized'
      );
    }
    this.activeGenerations++;
    return this.engine;
  }

  release(): void {
    if (this.activeGenerations > 0) {
      this.activeGenerations--;
    }
  }

  getActiveGenerations(): number {
    return this.activeGenerations;
  }

  /**
   * Take the engine out of service (e.g. sidecar lost). Running generations are
   * not interrupted; new requests are rejected at admission.
   */
  markUnavailable(reason: string): void {
    if (this.state === EngineLifecycle.ERROR && this.lastError === reason) {
      return;
    }
    logger.warn('Synthesis engine marked unavailable', { reason });
    this.state = EngineLifecycle.ERROR;
    this.lastError = reason;
    this.readySince = null;
    this.scheduleRecovery();
  }

  private scheduleRecovery(): void {
    const factory = this.factory;
    if (!factory || this.recoveryTimer || this.recoveryDelayMs <= 0) {
      return;
    }

    logger.info('Scheduling synthesis engine recovery', { delayMs: this.recoveryDelayMs });
    this.recoveryTimer = setTimeout(() => {
      this.recoveryTimer = null;
      this.initialize(factory).catch((error: unknown) => {
        logger.warn('Synthesis engine recovery failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.recoveryDelayMs);
    this.recoveryTimer.unref();
  }

  /**
   * Dispose the engine and return to UNINITIALIZED
   */
  async shutdown(): Promise<void> {
    if (this.recoveryTimer) {
      clearTimeout(this.recoveryTimer);
      this.recoveryTimer = null;
    }
    this.factory = null;

    const engine = this.engine;
    this.engine = null;
    this.state = EngineLifecycle.UNINITIALIZED;
    this.readySince = null;
    this.lastError = null;

    if (engine?.dispose) {
      try {
        await engine.dispose();
      } catch (error) {
        logger.error('Error disposing synthesis engine', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info('Synthesis engine shut down', {
      activeGenerations: this.activeGenerations,
    });
  }
}

// Export singleton instance
export const engineService = new EngineService({
  recoveryDelayMs: engineConfig.recoveryDelayMs,
});
