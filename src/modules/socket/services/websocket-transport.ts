/**
 * Message Transport
 * What a session needs from its connection. The ws-backed implementation is
 * used in production; tests substitute an in-memory one.
 */

import type { WebSocket } from 'ws';
import { WebSocketUtils } from '../utils';

export interface MessageTransport {
  readonly isOpen: boolean;
  /** Resolves once the frame has been handed to the socket */
  send(data: string | Buffer): Promise<void>;
  close(code?: number, reason?: string): void;
}

export class WebSocketTransport implements MessageTransport {
  private readonly ws: WebSocket;

  constructor(ws: WebSocket) {
    this.ws = ws;
  }

  get isOpen(): boolean {
    return WebSocketUtils.canSend(this.ws);
  }

  send(data: string | Buffer): Promise<void> {
    return WebSocketUtils.sendAsync(this.ws, data);
  }

  close(code?: number, reason?: string): void {
    WebSocketUtils.safeClose(this.ws, 'client', code, reason);
  }
}
