/**
 * Socket Services
 */

export { ConnectionRegistry, connectionRegistry } from './connection-registry.service';
export { StreamSession, RequestHandle, type StreamSessionOptions } from './stream-session';
export {
  OutboundChannel,
  type OutboundFrame,
  type OutboundChannelOptions,
  type OutboundChannelStats,
} from './outbound-channel';
export { WebSocketTransport, type MessageTransport } from './websocket-transport';
