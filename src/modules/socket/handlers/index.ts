/**
 * Socket Handlers
 */

export { handleClientMessage } from './message.handler';
export {
  sendError,
  sendFault,
  handleInvalidMessage,
  handleConnectionError,
} from './error.handler';
