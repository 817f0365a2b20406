import {
  BenchError,
  DeviceOperationError,
  DispatchTimeoutError,
  LinkError,
  LockTimeoutError,
  ParameterMismatchError,
  UnknownTaskError,
} from '../core/errors.js';
import type { FailureClass } from './types.js';

export type FailurePolicyResult = {
  failureClass: FailureClass;
  retryRecommended: boolean;
  failureCode: string;
  reason: string;
};

/**
 * Classify why a dispatched task failed. Nothing is retried automatically;
 * `retryRecommended` only tells an operator whether resubmitting may help.
 */
export function classifyDispatchFailure(err: unknown): FailurePolicyResult {
  if (err instanceof UnknownTaskError || err instanceof ParameterMismatchError) {
    return { failureClass: 'validation', retryRecommended: false, failureCode: err.code, reason: 'invalid_task_or_arguments' };
  }
  if (err instanceof DispatchTimeoutError || err instanceof LockTimeoutError) {
    return { failureClass: 'timeout', retryRecommended: true, failureCode: err.code, reason: 'timeout' };
  }
  if (err instanceof DeviceOperationError && err.reason === 'device_absent') {
    return { failureClass: 'device_absent', retryRecommended: true, failureCode: err.code, reason: 'device_absent' };
  }
  if (err instanceof LinkError) {
    return { failureClass: 'device_absent', retryRecommended: true, failureCode: err.code, reason: 'link_failure' };
  }
  if (err instanceof DeviceOperationError && err.reason === 'unsupported') {
    return { failureClass: 'task_error', retryRecommended: false, failureCode: 'DEVICE_OPERATION_UNSUPPORTED', reason: 'unsupported_operation' };
  }

  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();
  if (message.includes('timeout') || message.includes('timed out')) {
    return { failureClass: 'timeout', retryRecommended: true, failureCode: 'TIMEOUT', reason: 'timeout' };
  }
  if (err instanceof BenchError) {
    return { failureClass: 'task_error', retryRecommended: false, failureCode: err.code, reason: 'task_error' };
  }
  return { failureClass: 'task_error', retryRecommended: false, failureCode: 'TASK_ERROR', reason: 'task_error' };
}
