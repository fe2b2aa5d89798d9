/**
 * Outbound Channel
 * Bounded FIFO of frames waiting for one client, drained by a single loop.
 *
 * - enqueue(): audio path; suspends the producer while `capacity` frames are pending,
 *   until room frees up or the producer's signal aborts
 * - enqueueControl(): small control messages; never waits, keeps FIFO order
 * - a failed send closes the channel and reports a TransportFault
 */

import { logger } from '@/shared/utils';
import { TransportFault } from '@/modules/streaming/utils/faults';
import type { MessageTransport } from './websocket-transport';

export type OutboundFrame = string | Buffer;

export interface OutboundChannelOptions {
  capacity: number;
  /** Called after every frame written */
  onSent?: () => void;
  /** Called once when the transport rejects a frame */
  onFault?: (fault: TransportFault) => void;
  label?: string;
}

export interface OutboundChannelStats {
  pending: number;
  capacity: number;
  framesSent: number;
  bytesSent: number;
  framesDropped: number;
  closed: boolean;
}

export class OutboundChannel {
  private readonly transport: MessageTransport;
  private readonly capacity: number;
  private readonly onSent?: () => void;
  private readonly onFault?: (fault: TransportFault) => void;
  private readonly label: string;

  private pending: OutboundFrame[] = [];
  private capacityWaiters: Array<() => void> = [];
  private flushWaiters: Array<() => void> = [];
  private draining = false;
  private closed = false;

  private framesSent = 0;
  private bytesSent = 0;
  private framesDropped = 0;

  constructor(transport: MessageTransport, options: OutboundChannelOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new Error(`Outbound capacity must be a positive integer, got ${options.capacity}`);
    }
    this.transport = transport;
    this.capacity = options.capacity;
    this.onSent = options.onSent;
    this.onFault = options.onFault;
    this.label = options.label ?? 'outbound';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.pending.length;
  }

  /**
   * Queue a frame, waiting for room first. Resolves false, without queueing,
   * if the channel closes or `signal` aborts before there is room.
   */
  async enqueue(frame: OutboundFrame, signal?: AbortSignal): Promise<boolean> {
    while (!this.closed && !signal?.aborted && this.pending.length >= this.capacity) {
      await this.waitForCapacity(signal);
    }

    if (this.closed || signal?.aborted) {
      return false;
    }

    this.pending.push(frame);
    this.startDrain();
    return true;
  }

  /**
   * Queue a frame without waiting for room
   */
  enqueueControl(frame: OutboundFrame): boolean {
    if (this.closed) {
      return false;
    }

    this.pending.push(frame);
    this.startDrain();
    return true;
  }

  /**
   * Resolves when every queued frame has been written (or the channel closed)
   */
  flush(): Promise<void> {
    if (this.closed || (!this.draining && this.pending.length === 0)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.flushWaiters.push(resolve);
    });
  }

  /**
   * Drop pending frames and release everyone waiting on the channel
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.framesDropped += this.pending.length;
    if (this.pending.length > 0) {
      logger.debug('Outbound channel closed with pending frames', {
        channel: this.label,
        dropped: this.pending.length,
      });
    }
    this.pending = [];
    this.wakeCapacityWaiters();
    this.wakeFlushWaiters();
  }

  getStats(): OutboundChannelStats {
    return {
      pending: this.pending.length,
      capacity: this.capacity,
      framesSent: this.framesSent,
      bytesSent: this.bytesSent,
      framesDropped: this.framesDropped,
      closed: this.closed,
    };
  }

  private startDrain(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    this.drain().catch((error: unknown) => {
      this.fail(error);
    });
  }

  private async drain(): Promise<void> {
    try {
      while (!this.closed) {
        const frame = this.pending.shift();
        if (frame === undefined) {
          break;
        }
        this.wakeCapacityWaiters();

        try {
          await this.transport.send(frame);
        } catch (error) {
          this.fail(error);
          break;
        }

        this.framesSent++;
        this.bytesSent += typeof frame === 'string' ? Buffer.byteLength(frame) : frame.length;
        this.onSent?.();
      }
    } finally {
      this.draining = false;
      if (this.closed || this.pending.length === 0) {
        this.wakeFlushWaiters();
      }
    }
  }

  private fail(error: unknown): void {
    if (this.closed) {
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    const fault = new TransportFault(`Send failed: ${message}`, { cause: error });
    logger.warn('Outbound send failed, closing channel', {
      channel: this.label,
      error: message,
    });

    this.close();
    this.onFault?.(fault);
  }

  private waitForCapacity(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        const index = this.capacityWaiters.indexOf(wake);
        if (index !== -1) this.capacityWaiters.splice(index, 1);
        resolve();
      };
      const wake = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this.capacityWaiters.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private wakeCapacityWaiters(): void {
    for (const wake of this.capacityWaiters.splice(0)) {
      wake();
    }
  }

  private wakeFlushWaiters(): void {
    for (const wake of this.flushWaiters.splice(0)) {
      wake();
    }
  }
}
