export { WebSocketUtils } from './WebSocketUtils';
export { MessageFactory } from './MessageFactory';
