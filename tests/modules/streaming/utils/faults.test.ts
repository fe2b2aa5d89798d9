/**
 * Stream Fault Classification Tests
 */

import { describe, it, expect } from 'vitest';
import { EngineError, EngineErrorType } from '@/modules/engine/types';
import { FaultKind, StreamErrorCode } from '@/modules/streaming/types';
import {
  BusyFault,
  GenerationFault,
  TransportFault,
  ValidationFault,
  isRequestScoped,
  toStreamFault,
} from '@/modules/streaming/utils/faults';

describe('toStreamFault', () => {
  it('should pass stream faults through unchanged', () => {
    const fault = new BusyFault('busy');

    expect(toStreamFault(fault)).toBe(fault);
  });

  it('should classify an engine that is not ready as a validation fault', () => {
    const fault = toStreamFault(new EngineError(EngineErrorType.NOT_READY, 'Engine not ready'));

    expect(fault).toBeInstanceOf(ValidationFault);
    expect(fault.code).toBe(StreamErrorCode.ENGINE_NOT_READY);
    expect(fault.message).toBe('Engine not ready');
  });

  it('should classify engine timeouts as generation faults', () => {
    const fault = toStreamFault(new EngineError(EngineErrorType.TIMEOUT, 'no reply'));

    expect(fault).toBeInstanceOf(GenerationFault);
    expect(fault.message).toBe('Engine timed out: no reply');
  });

  it('should classify lost engine connections as generation faults', () => {
    const fault = toStreamFault(new EngineError(EngineErrorType.CONNECTION, 'refused'));

    expect(fault.code).toBe(StreamErrorCode.GENERATION_ERROR);
    expect(fault.message).toBe('Engine unavailable: refused');
  });

  it('should classify remote engine errors as generation faults', () => {
    const fault = toStreamFault(new EngineError(EngineErrorType.REMOTE, 'out of memory'));

    expect(fault.message).toBe('Engine failed: out of memory');
  });

  it('should wrap unknown errors', () => {
    const cause = new Error('boom');
    const fault = toStreamFault(cause);

    expect(fault).toBeInstanceOf(GenerationFault);
    expect(fault.message).toBe('Streaming failed: boom');
    expect(fault.cause).toBe(cause);
  });

  it('should wrap non-error values', () => {
    expect(toStreamFault('bad').message).toBe('Streaming failed: bad');
  });
});

describe('StreamFault', () => {
  it('should carry its class name, kind and code', () => {
    const fault = new BusyFault('full', StreamErrorCode.CAPACITY);

    expect(fault.name).toBe('BusyFault');
    expect(fault.kind).toBe(FaultKind.BUSY);
    expect(fault.code).toBe(StreamErrorCode.CAPACITY);
  });

  it('should scope transport faults to the connection', () => {
    expect(isRequestScoped(new TransportFault('gone'))).toBe(false);
    expect(isRequestScoped(new GenerationFault('bad fragment'))).toBe(true);
  });
});
