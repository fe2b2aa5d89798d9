/**
 * Stream Session
 * One per accepted connection: state machine, outbound channel and the
 * (at most one) in-flight request.
 *
 * States: idle → streaming → idle, idle | streaming → closing
 */

import { generateId, logger } from '@/shared/utils';
import { websocketCloseCodes } from '@/shared/config';
import type { CancelReason, RequestOutcome } from '@/modules/streaming/types';
import type { TransportFault } from '@/modules/streaming/utils/faults';
import { SessionState, type SessionMetadata } from '../types';
import { outboundConfig } from '../config';
import { OutboundChannel, type OutboundFrame } from './outbound-channel';
import type { MessageTransport } from './websocket-transport';

/**
 * Handle on one admitted request. Completion resolves exactly once, with the
 * request's outcome.
 */
export class RequestHandle {
  readonly requestId: string;
  readonly admittedAt: number;
  readonly completion: Promise<RequestOutcome>;
  private readonly controller = new AbortController();
  private reason: CancelReason | null = null;
  private settled = false;
  private resolveCompletion: (outcome: RequestOutcome) => void = () => undefined;

  constructor(requestId: string, admittedAt: number = Date.now()) {
    this.requestId = requestId;
    this.admittedAt = admittedAt;
    this.completion = new Promise<RequestOutcome>((resolve) => {
      this.resolveCompletion = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelReason(): CancelReason | null {
    return this.reason;
  }

  /**
   * Abort the request. The first reason wins.
   */
  cancel(reason: CancelReason): boolean {
    if (this.settled || this.reason !== null) {
      return false;
    }
    this.reason = reason;
    this.controller.abort(reason);
    return true;
  }

  settle(outcome: RequestOutcome): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolveCompletion(outcome);
  }
}

export interface StreamSessionOptions {
  transport: MessageTransport;
  id?: string;
  metadata?: SessionMetadata;
  queueCapacity?: number;
}

const validTransitions: Record<SessionState, SessionState[]> = {
  [SessionState.IDLE]: [SessionState.STREAMING, SessionState.CLOSING],
  [SessionState.STREAMING]: [SessionState.IDLE, SessionState.CLOSING],
  [SessionState.CLOSING]: [],
};

export class StreamSession {
  readonly id: string;
  readonly createdAt: number;
  readonly metadata: SessionMetadata;
  readonly outbound: OutboundChannel;

  private readonly transport: MessageTransport;
  private currentState: SessionState = SessionState.IDLE;
  private lastActivityAt: number;
  private request: RequestHandle | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: StreamSessionOptions) {
    this.id = options.id ?? generateId();
    this.transport = options.transport;
    this.metadata = { ...options.metadata };
    this.createdAt = Date.now();
    this.lastActivityAt = this.createdAt;
    this.outbound = new OutboundChannel(this.transport, {
      capacity: options.queueCapacity ?? outboundConfig.capacity,
      label: this.id,
      onSent: () => this.touch(),
      onFault: (fault) => this.handleTransportFault(fault),
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get lastActivity(): number {
    return this.lastActivityAt;
  }

  get activeRequest(): RequestHandle | null {
    return this.request;
  }

  get isClosing(): boolean {
    return this.currentState === SessionState.CLOSING;
  }

  touch(): void {
    this.lastActivityAt = Date.now();
  }

  getDuration(): number {
    return Date.now() - this.createdAt;
  }

  /**
   * Move to `next` if the state table allows it
   */
  transitionTo(next: SessionState): boolean {
    const allowed = validTransitions[this.currentState];
    if (!allowed.includes(next)) {
      logger.warn('Invalid session state transition', {
        sessionId: this.id,
        from: this.currentState,
        to: next,
      });
      return false;
    }

    logger.debug('Session state transition', {
      sessionId: this.id,
      from: this.currentState,
      to: next,
    });
    this.currentState = next;
    return true;
  }

  /**
   * Claim the request slot. Returns null unless idle with no request reserved;
   * synchronous so two requests can never both be admitted.
   */
  reserveRequest(requestId: string = generateId(), admittedAt: number = Date.now()): RequestHandle | null {
    if (this.currentState !== SessionState.IDLE || this.request !== null) {
      return null;
    }

    const handle = new RequestHandle(requestId, admittedAt);
    this.request = handle;
    return handle;
  }

  /**
   * Start generating for a reserved request
   */
  beginStreaming(handle: RequestHandle): boolean {
    if (this.request !== handle) {
      return false;
    }
    return this.transitionTo(SessionState.STREAMING);
  }

  /**
   * Free the request slot and settle the handle. Returns to idle unless closing.
   */
  releaseRequest(handle: RequestHandle, outcome: RequestOutcome): void {
    if (this.request === handle) {
      this.request = null;
      if (this.currentState === SessionState.STREAMING) {
        this.transitionTo(SessionState.IDLE);
      }
    }
    handle.settle(outcome);
  }

  cancelActiveRequest(reason: CancelReason): boolean {
    return this.request?.cancel(reason) ?? false;
  }

  /**
   * Queue an audio frame; waits for channel capacity unless `signal` aborts
   */
  send(frame: OutboundFrame, signal?: AbortSignal): Promise<boolean> {
    return this.outbound.enqueue(frame, signal);
  }

  /**
   * Queue a control message without waiting
   */
  sendControl(frame: OutboundFrame): boolean {
    return this.outbound.enqueueControl(frame);
  }

  /**
   * Tear down after the transport is gone: abort the request, drop queued
   * frames, wait for the request to settle. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.runClose();
    }
    return this.closing;
  }

  closeTransport(code?: number, reason?: string): void {
    this.transport.close(code, reason);
  }

  private async runClose(): Promise<void> {
    this.transitionTo(SessionState.CLOSING);

    const request = this.request;
    request?.cancel('disconnect');
    this.outbound.close();

    if (request) {
      await request.completion;
    }

    logger.debug('Session closed', {
      sessionId: this.id,
      duration: this.getDuration(),
      outbound: this.outbound.getStats(),
    });
  }

  private handleTransportFault(fault: TransportFault): void {
    logger.warn('Transport fault, closing connection', {
      sessionId: this.id,
      error: fault.message,
    });
    this.request?.cancel('disconnect');
    this.transport.close(websocketCloseCodes.INTERNAL_ERROR, 'Transport failure');
  }
}
