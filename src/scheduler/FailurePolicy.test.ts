import { describe, expect, it } from 'vitest';
import { classifyDispatchFailure } from './FailurePolicy.js';
import {
  DeviceOperationError,
  DispatchTimeoutError,
  LinkError,
  ParameterMismatchError,
  UnknownTaskError,
} from '../core/errors.js';

describe('FailurePolicy', () => {
  it('classifies bad task names and arguments as validation failures', () => {
    const unknown = classifyDispatchFailure(new UnknownTaskError('NOPE'));
    expect(unknown).toEqual({ failureClass: 'validation', retryRecommended: false, failureCode: 'UNKNOWN_TASK', reason: 'invalid_task_or_arguments' });

    const mismatch = classifyDispatchFailure(new ParameterMismatchError('DG4202_TOGGLE', ['Missing required param: status.']));
    expect(mismatch.failureClass).toBe('validation');
    expect(mismatch.failureCode).toBe('PARAMETER_MISMATCH');
  });

  it('classifies an absent device as retryable', () => {
    const absent = classifyDispatchFailure(new DeviceOperationError('device_absent', 'DG4202 is not available'));
    expect(absent.failureClass).toBe('device_absent');
    expect(absent.retryRecommended).toBe(true);
    expect(absent.failureCode).toBe('DEVICE_ABSENT');

    expect(classifyDispatchFailure(new LinkError('TCPIP::h::1::SOCKET', 'connection closed')).failureClass).toBe('device_absent');
  });

  it('classifies timeouts as transient', () => {
    const timeout = classifyDispatchFailure(new DispatchTimeoutError('EDUX1002A_AUTO', 50));
    expect(timeout.failureClass).toBe('timeout');
    expect(timeout.retryRecommended).toBe(true);
    expect(timeout.failureCode).toBe('DISPATCH_TIMEOUT');

    expect(classifyDispatchFailure(new Error('read timed out')).failureCode).toBe('TIMEOUT');
  });

  it('classifies anything else as a terminal task error', () => {
    expect(classifyDispatchFailure(new Error('boom'))).toEqual({
      failureClass: 'task_error',
      retryRecommended: false,
      failureCode: 'TASK_ERROR',
      reason: 'task_error',
    });
    expect(classifyDispatchFailure(new DeviceOperationError('unsupported', 'x')).failureCode).toBe('DEVICE_OPERATION_UNSUPPORTED');
  });
});
