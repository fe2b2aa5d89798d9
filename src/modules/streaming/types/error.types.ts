/**
 * Stream Error Types
 */

export enum StreamErrorCode {
  INVALID_MESSAGE = 'INVALID_MESSAGE',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  ENGINE_NOT_READY = 'ENGINE_NOT_READY',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  BUSY = 'BUSY',
  CAPACITY = 'CAPACITY',
  NOT_STREAMING = 'NOT_STREAMING',
  GENERATION_ERROR = 'GENERATION_ERROR',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export enum FaultKind {
  VALIDATION = 'validation',
  RESOLUTION = 'resolution',
  BUSY = 'busy',
  GENERATION = 'generation',
  TRANSPORT = 'transport',
}
