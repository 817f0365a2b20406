/**
 * Runs a single due job against the device managers.
 *
 * `execute()` never rejects: every outcome, including an unknown task or a
 * task that throws, comes back as an archive entry.
 */

import { DispatchTimeoutError, ParameterMismatchError, errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import type { JsonValue } from '../store/jsonFile.js';
import type { TaskRegistry } from '../tasks/TaskRegistry.js';
import { validateParameters, withDefaults } from '../tasks/TaskValidator.js';
import type { TaskContext, TaskDefinition, TaskArgs } from '../tasks/types.js';
import { classifyDispatchFailure } from './FailurePolicy.js';
import type { ArchiveEntry, Job } from './types.js';

const log = createLogger('dispatcher');

export interface DispatcherOptions {
  registry: TaskRegistry;
  context: TaskContext;
  /** Upper bound for one task run */
  timeoutMs?: number;
  now?: () => Date;
}

export class Dispatcher {
  private readonly registry: TaskRegistry;
  private readonly context: TaskContext;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.context = options.context;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.now = options.now ?? (() => new Date());
  }

  async execute(job: Job): Promise<ArchiveEntry> {
    const startedAt = this.now().toISOString();
    try {
      const definition = this.registry.require(job.taskName);
      const report = validateParameters(definition, job.kwargs);
      if (!report.ok) {
        throw new ParameterMismatchError(definition.name, report.errors, report.warnings);
      }

      log.info({ jobId: job.jobId, task: definition.name }, 'Dispatching job');
      const result = await this.runWithTimeout(definition, withDefaults(definition, job.kwargs));
      log.info({ jobId: job.jobId, task: definition.name }, 'Job completed');

      return {
        ...this.baseEntry(job, startedAt),
        status: 'completed',
        result,
        error: null,
        failureClass: null,
        failureCode: null,
        retryRecommended: false,
      };
    } catch (err) {
      const policy = classifyDispatchFailure(err);
      const message = errorMessage(err);
      log.warn(
        { jobId: job.jobId, task: job.taskName, failureClass: policy.failureClass, err: message },
        'Job failed'
      );
      return {
        ...this.baseEntry(job, startedAt),
        status: 'failed',
        result: null,
        error: message,
        failureClass: policy.failureClass,
        failureCode: policy.failureCode,
        retryRecommended: policy.retryRecommended,
      };
    }
  }

  private baseEntry(job: Job, startedAt: string) {
    return {
      jobId: job.jobId,
      taskName: job.taskName,
      scheduleTime: job.scheduleTime,
      kwargs: job.kwargs,
      startedAt,
      completionTime: this.now().toISOString(),
    };
  }

  private async runWithTimeout(definition: TaskDefinition, args: TaskArgs): Promise<JsonValue> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new DispatchTimeoutError(definition.name, this.timeoutMs)), this.timeoutMs);
    });
    try {
      return await Promise.race([definition.run(this.context, args), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
