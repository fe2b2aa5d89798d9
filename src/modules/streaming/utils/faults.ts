/**
 * Stream Faults
 * Everything that can end a request (or a connection) is one of these.
 */

import { EngineError, EngineErrorType } from '@/modules/engine/types';
import { FaultKind, StreamErrorCode } from '../types/error.types';

export abstract class StreamFault extends Error {
  abstract readonly kind: FaultKind;
  readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Malformed or out-of-bound request; engine not ready at admission */
export class ValidationFault extends StreamFault {
  readonly kind = FaultKind.VALIDATION;

  constructor(message: string, code: StreamErrorCode = StreamErrorCode.VALIDATION_ERROR) {
    super(code, message);
  }
}

/** Voice reference cannot be located */
export class ResolutionFault extends StreamFault {
  readonly kind = FaultKind.RESOLUTION;

  constructor(message: string, options?: { cause?: unknown }) {
    super(StreamErrorCode.RESOLUTION_ERROR, message, options);
  }
}

/** Session already streaming, or generation capacity exhausted */
export class BusyFault extends StreamFault {
  readonly kind = FaultKind.BUSY;

  constructor(message: string, code: StreamErrorCode = StreamErrorCode.BUSY) {
    super(code, message);
  }
}

/** Engine failure or malformed fragment during generation */
export class GenerationFault extends StreamFault {
  readonly kind = FaultKind.GENERATION;

  constructor(message: string, options?: { cause?: unknown }) {
    super(StreamErrorCode.GENERATION_ERROR, message, options);
  }
}

/** Underlying connection broke; never reported to the client */
export class TransportFault extends StreamFault {
  readonly kind = FaultKind.TRANSPORT;

  constructor(message: string, options?: { cause?: unknown }) {
    super(StreamErrorCode.TRANSPORT_ERROR, message, options);
  }
}

/**
 * Classify anything thrown while a request is generating.
 * Stream faults pass through; engine errors and unknown values become
 * GenerationFaults.
 */
export function toStreamFault(error: unknown): StreamFault {
  if (error instanceof StreamFault) {
    return error;
  }

  if (error instanceof EngineError) {
    switch (error.type) {
      case EngineErrorType.NOT_READY:
        return new ValidationFault(error.message, StreamErrorCode.ENGINE_NOT_READY);
      case EngineErrorType.TIMEOUT:
        return new GenerationFault(`Engine timed out: ${error.message}`, { cause: error });
      case EngineErrorType.CONNECTION:
        return new GenerationFault(`Engine unavailable: ${error.message}`, { cause: error });
      default:
        return new GenerationFault(`Engine failed: ${error.message}`, { cause: error });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GenerationFault(`Streaming failed: ${message}`, { cause: error });
}

/**
 * Whether a fault ends only the request (true) or the connection (false)
 */
export function isRequestScoped(fault: StreamFault): boolean {
  return fault.kind !== FaultKind.TRANSPORT;
}
