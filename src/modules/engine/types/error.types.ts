/**
 * Engine Error Types
 */

export enum EngineErrorType {
  CONNECTION = 'connection',
  TIMEOUT = 'timeout',
  PROTOCOL = 'protocol',
  REMOTE = 'remote',
  NOT_READY = 'not_ready',
}

export class EngineError extends Error {
  readonly type: EngineErrorType;

  constructor(type: EngineErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.type = type;
  }
}
