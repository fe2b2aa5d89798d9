/**
 * WebSocket Message Handler
 * Parses inbound JSON control messages and routes them
 */

import type { RawData } from 'ws';
import { logger } from '@/shared/utils';
import {
  streamingOrchestrator,
  type StreamingOrchestrator,
} from '@/modules/streaming/services/streaming-orchestrator.service';
import { StreamErrorCode } from '@/modules/streaming/types';
import { ClientMessageSchema, type ClientMessage } from '../schemas';
import type { StreamSession } from '../services/stream-session';
import { MessageFactory, WebSocketUtils } from '../utils';
import { handleInvalidMessage, sendError } from './error.handler';

/**
 * Parse one inbound frame; undefined (after reporting INVALID_MESSAGE) when unusable
 */
function parseClientMessage(
  session: StreamSession,
  data: RawData,
  isBinary: boolean
): ClientMessage | undefined {
  if (isBinary) {
    handleInvalidMessage(session, 'Binary messages are not supported');
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(WebSocketUtils.rawDataToString(data));
  } catch {
    handleInvalidMessage(session, 'Invalid JSON');
    return undefined;
  }

  const result = ClientMessageSchema.safeParse(json);
  if (!result.success) {
    const type =
      typeof json === 'object' && json !== null && 'type' in json ? String(json.type) : undefined;
    handleInvalidMessage(
      session,
      type === undefined ? 'Message type is required' : `Unknown message type: ${type}`
    );
    return undefined;
  }

  return result.data;
}

export function handleClientMessage(
  session: StreamSession,
  data: RawData,
  isBinary: boolean,
  orchestrator: Pick<StreamingOrchestrator, 'start'> = streamingOrchestrator
): void {
  if (session.isClosing) {
    logger.debug('Session closing, skipping message', { sessionId: session.id });
    return;
  }

  session.touch();

  const message = parseClientMessage(session, data, isBinary);
  if (!message) {
    return;
  }

  switch (message.type) {
    case 'ping': {
      session.sendControl(MessageFactory.pong());
      break;
    }

    case 'cancel': {
      const request = session.activeRequest;
      if (!request || !session.cancelActiveRequest('client')) {
        sendError(session, StreamErrorCode.NOT_STREAMING, 'No active stream to cancel');
        break;
      }
      logger.info('Cancel requested', { sessionId: session.id, requestId: request.requestId });
      break;
    }

    case 'stream_request': {
      orchestrator.start(session, message.data);
      break;
    }
  }
}
