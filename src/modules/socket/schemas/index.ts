export { ClientMessageSchema, type ClientMessage } from './client-message.schema';
