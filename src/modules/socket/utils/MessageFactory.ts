/**
 * Message Factory
 * Builds the JSON text frames the server sends.
 */

import type {
  AudioMessage,
  ConnectedMessage,
  DoneMessage,
  ErrorMessage,
  InfoMessage,
  MetricsMessage,
  PongMessage,
  ServerMessage,
} from '../types';

type Body<T extends ServerMessage> = Omit<T, 'type'>;

export class MessageFactory {
  static serialize(message: ServerMessage): string {
    return JSON.stringify(message);
  }

  static connected(connectionId: string): string {
    const message: ConnectedMessage = {
      type: 'connected',
      connectionId,
      message: 'Connected to streaming speech server',
    };
    return this.serialize(message);
  }

  static info(body: Body<InfoMessage>): string {
    return this.serialize({ type: 'info', ...body });
  }

  static audio(requestId: string, chunk: number, pcm: Buffer): string {
    const message: AudioMessage = {
      type: 'audio',
      requestId,
      chunk,
      encoding: 'base64',
      data: pcm.toString('base64'),
    };
    return this.serialize(message);
  }

  static metrics(body: Body<MetricsMessage>): string {
    return this.serialize({ type: 'metrics', ...body });
  }

  static done(body: Body<DoneMessage>): string {
    return this.serialize({ type: 'done', ...body });
  }

  static error(body: Body<ErrorMessage>): string {
    return this.serialize({ type: 'error', ...body });
  }

  static pong(timestamp: number = Date.now()): string {
    const message: PongMessage = { type: 'pong', timestamp };
    return this.serialize(message);
  }
}
