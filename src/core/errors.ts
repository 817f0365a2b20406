/**
 * Error taxonomy shared across the store, device, task and scheduler layers.
 *
 * Each error carries a stable `code` and the HTTP status the API layer
 * answers with. Conditions that are part of normal operation (an absent
 * instrument, a recovered corrupt file, a failed task run) are not modelled
 * as exceptions; they are reported through return values and the archive.
 */

export class BenchError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * A store lock could not be acquired in time. Retryable.
 */
export class LockTimeoutError extends BenchError {
  readonly lockPath: string;

  constructor(lockPath: string, timeoutMs: number) {
    super('LOCK_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`, 503);
    this.lockPath = lockPath;
  }
}

/**
 * A task name did not resolve against the registry.
 */
export class UnknownTaskError extends BenchError {
  readonly taskName: string;

  constructor(taskName: string) {
    super('UNKNOWN_TASK', `Unknown task: '${taskName}'`, 404);
    this.taskName = taskName;
  }
}

/**
 * Supplied task parameters failed validation. Carries the full itemized list.
 */
export class ParameterMismatchError extends BenchError {
  readonly errors: string[];
  readonly warnings: string[];

  constructor(taskName: string, errors: string[], warnings: string[] = []) {
    super('PARAMETER_MISMATCH', `Invalid parameters for ${taskName}: ${errors.join(' ')}`, 400);
    this.errors = errors;
    this.warnings = warnings;
  }
}

/**
 * An instrument operation could not be carried out. Raised by task
 * implementations so the dispatcher can record the failure.
 */
export class DeviceOperationError extends BenchError {
  readonly reason: 'device_absent' | 'unsupported' | 'failed';

  constructor(reason: 'device_absent' | 'unsupported' | 'failed', message: string) {
    super(reason === 'device_absent' ? 'DEVICE_ABSENT' : 'DEVICE_OPERATION_FAILED', message, 503);
    this.reason = reason;
  }
}

/**
 * Transport failure talking to an instrument: refused connection, timeout,
 * closed socket, or a simulated instrument that has been killed.
 */
export class LinkError extends BenchError {
  readonly resource: string;

  constructor(resource: string, message: string) {
    super('LINK_ERROR', `${resource}: ${message}`, 503);
    this.resource = resource;
  }
}

/**
 * A task ran longer than the dispatcher allows.
 */
export class DispatchTimeoutError extends BenchError {
  constructor(taskName: string, timeoutMs: number) {
    super('DISPATCH_TIMEOUT', `Task ${taskName} did not finish within ${timeoutMs}ms`, 504);
  }
}

/**
 * A schedule time that does not denote an instant.
 */
export class InvalidScheduleTimeError extends BenchError {
  constructor(value: string) {
    super('INVALID_SCHEDULE_TIME', `Invalid schedule time: '${value}'`, 400);
  }
}

/**
 * An experiment failed part way and some of its jobs could not be
 * cancelled, because they were already running or had fired.
 */
export class PartialSubmissionError extends BenchError {
  readonly jobIds: string[];
  readonly failure: unknown;

  constructor(experiment: string, jobIds: string[], failure: unknown) {
    super(
      'PARTIAL_SUBMISSION',
      `Experiment '${experiment}' failed part way (${errorMessage(failure)}); jobs not rolled back: ${jobIds.join(', ')}`,
      409
    );
    this.jobIds = jobIds;
    this.failure = failure;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
