/**
 * Socket Module - Public API
 */

// Server initialization and stats
export {
  initializeSocketServer,
  shutdownSocketServer,
  getSocketStats,
  type SocketServerOptions,
} from './socket.server';

export { connectionRegistry, ConnectionRegistry, StreamSession, RequestHandle } from './services';
export type { MessageTransport, OutboundFrame } from './services';

export { SessionState } from './types';
export type { SessionMetadata, SessionConfig, SessionStats, ServerMessage } from './types';
