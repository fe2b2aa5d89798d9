/**
 * Centralized Error Handling for WebSocket Events
 */

import { logger } from '@/shared/utils';
import type { StreamFault } from '@/modules/streaming/utils/faults';
import { StreamErrorCode } from '@/modules/streaming/types';
import type { StreamSession } from '../services/stream-session';
import { MessageFactory } from '../utils';

/**
 * Send an error message to the client
 * @param requestId - request the error belongs to, when there is one
 */
export function sendError(
  session: StreamSession,
  code: StreamErrorCode,
  message: string,
  requestId?: string
): boolean {
  const queued = session.sendControl(MessageFactory.error({ requestId, code, message }));

  logger.warn('Error sent to client', {
    sessionId: session.id,
    requestId,
    code,
    message,
    queued,
  });

  return queued;
}

/**
 * Report a request-scoped fault
 */
export function sendFault(session: StreamSession, fault: StreamFault, requestId?: string): boolean {
  return sendError(session, fault.code, fault.message, requestId);
}

/**
 * Malformed inbound message
 */
export function handleInvalidMessage(session: StreamSession, reason: string): void {
  sendError(session, StreamErrorCode.INVALID_MESSAGE, reason);
}

/**
 * Connection-level errors are logged only; the close handler tears the session down
 */
export function handleConnectionError(sessionId: string, error: Error): void {
  logger.error('Connection error', {
    sessionId,
    error: error.message,
    stack: error.stack,
  });
}
