/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket, type RawData } from 'ws';
import { logger } from '@/shared/utils';

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling
   */
  static safeClose(ws: WebSocket | undefined, label: string, code?: number, reason?: string): void {
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;

    try {
      ws.close(code, reason);
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, { error });
    }
  }

  /**
   * Check if WebSocket is in a state where it can send messages
   */
  static canSend(ws: WebSocket | undefined): boolean {
    return ws !== undefined && ws.readyState === WebSocket.OPEN;
  }

  /**
   * Send and resolve once ws has handed the frame to the socket
   */
  static sendAsync(ws: WebSocket, data: string | Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.canSend(ws)) {
        reject(new Error('WebSocket is not open'));
        return;
      }

      ws.send(data, { binary: typeof data !== 'string' }, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Decode a text frame regardless of how ws delivered it
   */
  static rawDataToString(data: RawData): string {
    if (Buffer.isBuffer(data)) {
      return data.toString('utf8');
    }
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
  }
}
