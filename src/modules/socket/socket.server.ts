/**
 * Native WebSocket Server Initialization
 * One StreamSession per connection; JSON control messages in, binary PCM and
 * JSON control messages out.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import { logger } from '@/shared/utils';
import {
  env,
  websocketCloseCodes,
  websocketConfig,
  websocketShutdownConfig,
} from '@/shared/config';
import type { StreamingOrchestrator } from '@/modules/streaming/services/streaming-orchestrator.service';
import { connectionRegistry, type ConnectionRegistry } from './services/connection-registry.service';
import { StreamSession } from './services/stream-session';
import { WebSocketTransport } from './services/websocket-transport';
import { handleClientMessage, handleConnectionError } from './handlers';
import { MessageFactory, WebSocketUtils } from './utils';
import { SessionState, type SessionStats } from './types';

export interface SocketServerOptions {
  registry?: ConnectionRegistry;
  /** Defaults to the process-wide orchestrator */
  orchestrator?: Pick<StreamingOrchestrator, 'start'>;
  maxConnections?: number;
  queueCapacity?: number;
}

interface ConnectionContext {
  registry: ConnectionRegistry;
  orchestrator?: Pick<StreamingOrchestrator, 'start'>;
  maxConnections: number;
  queueCapacity?: number;
}

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  options: SocketServerOptions = {}
): WebSocketServer {
  logger.info('Initializing WebSocket server', { path: websocketConfig.path });

  const context: ConnectionContext = {
    registry: options.registry ?? connectionRegistry,
    orchestrator: options.orchestrator,
    maxConnections: options.maxConnections ?? env.MAX_CONNECTIONS,
    queueCapacity: options.queueCapacity,
  };

  const wss = new WebSocketServer({
    server: httpServer,
    path: websocketConfig.path,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    handleConnection(ws, request, context);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', error);
  });

  logger.info('WebSocket server initialized successfully');

  return wss;
}

/**
 * Handle new WebSocket connection
 */
function handleConnection(ws: WebSocket, request: IncomingMessage, context: ConnectionContext): void {
  const clientIP = request.socket.remoteAddress || 'unknown';
  const userAgent = request.headers['user-agent'] || 'unknown';
  const { registry } = context;

  if (registry.count() >= context.maxConnections) {
    logger.warn('Connection limit reached, rejecting client', {
      clientIP,
      limit: context.maxConnections,
    });
    WebSocketUtils.safeClose(
      ws,
      'rejected',
      websocketCloseCodes.TRY_AGAIN_LATER,
      'Server at connection limit'
    );
    return;
  }

  const session = new StreamSession({
    transport: new WebSocketTransport(ws),
    metadata: { ipAddress: clientIP, userAgent },
    queueCapacity: context.queueCapacity,
  });
  registry.register(session);

  logger.info('Client connected', {
    sessionId: session.id,
    clientIP,
    userAgent,
  });

  ws.on('message', (data: RawData, isBinary: boolean) => {
    handleClientMessage(session, data, isBinary, context.orchestrator);
  });

  ws.on('close', (code: number, reason: Buffer) => {
    handleDisconnect(session, registry, code, reason.toString()).catch((error: unknown) => {
      logger.error('Error during disconnect cleanup', { sessionId: session.id, error });
    });
  });

  ws.on('error', (error: Error) => {
    handleConnectionError(session.id, error);
  });

  session.sendControl(MessageFactory.connected(session.id));
}

/**
 * Handle WebSocket disconnection: abort the request, wait for it, then unregister
 */
async function handleDisconnect(
  session: StreamSession,
  registry: ConnectionRegistry,
  code: number,
  reason: string
): Promise<void> {
  logger.info('Client disconnected', {
    sessionId: session.id,
    code,
    reason,
    state: session.state,
    requestId: session.activeRequest?.requestId,
  });

  await session.close();
  registry.unregister(session.id, session);
}

/**
 * Get socket server statistics
 */
export function getSocketStats(
  wss: WebSocketServer,
  registry: ConnectionRegistry = connectionRegistry
): {
  totalConnections: number;
  activeStreams: number;
  sessionStats: SessionStats;
} {
  return {
    totalConnections: wss.clients.size,
    activeStreams: registry.countByState(SessionState.STREAMING),
    sessionStats: registry.getStats(),
  };
}

/**
 * Graceful shutdown for WebSocket server
 */
export async function shutdownSocketServer(
  wss: WebSocketServer,
  registry: ConnectionRegistry = connectionRegistry
): Promise<void> {
  logger.info('Shutting down WebSocket server');

  const clientsClosed = Promise.all(
    Array.from(wss.clients, (ws) =>
      ws.readyState === WebSocket.CLOSED
        ? Promise.resolve()
        : new Promise<void>((resolve) => {
            ws.once('close', () => resolve());
          })
    )
  );

  await registry.closeAll();

  // Force close after timeout
  let timer: NodeJS.Timeout | undefined;
  const forceClose = new Promise<void>((resolve) => {
    timer = setTimeout(() => {
      logger.warn('WebSocket server force closing remaining clients');
      for (const ws of wss.clients) {
        ws.terminate();
      }
      resolve();
    }, websocketShutdownConfig.shutdownTimeout);
  });

  await Promise.race([clientsClosed.then(() => undefined), forceClose]);
  clearTimeout(timer);

  await new Promise<void>((resolve) => {
    wss.close(() => resolve());
  });

  logger.info('WebSocket server closed');
}
