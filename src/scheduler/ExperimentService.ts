/**
 * Experiment submission.
 *
 * An experiment is scheduled all or nothing: every step is validated first,
 * and if adding any job fails the jobs already added for it are cancelled.
 * Jobs that already started are reported through PartialSubmissionError.
 */

import { PartialSubmissionError, errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import { calculateScheduleTimes, parseExperimentYaml, type Experiment } from '../tasks/experiment.js';
import { invalidYamlReport, type TaskValidator } from '../tasks/TaskValidator.js';
import type { ExperimentValidation } from '../tasks/types.js';
import type { Timekeeper } from './Timekeeper.js';

const log = createLogger('experiments');

export interface ExperimentSubmission {
  scheduled: boolean;
  name: string | null;
  /** One per step, in step order; empty when nothing was scheduled */
  jobIds: string[];
  validation: ExperimentValidation;
}

export class ExperimentService {
  constructor(
    private readonly timekeeper: Timekeeper,
    private readonly validator: TaskValidator,
    private readonly now: () => Date = () => new Date()
  ) {}

  validate(experiment: Experiment): ExperimentValidation {
    return this.validator.validateExperiment(experiment);
  }

  validateYaml(text: string): ExperimentValidation {
    return this.validator.validateExperimentYaml(text);
  }

  async submit(experiment: Experiment, now: Date = this.now()): Promise<ExperimentSubmission> {
    const validation = this.validate(experiment);
    if (!validation.ok) {
      log.warn({ experiment: experiment.name, errors: validation.errors }, 'Experiment rejected');
      return { scheduled: false, name: experiment.name, jobIds: [], validation };
    }

    const jobIds: string[] = [];
    try {
      for (const { step, scheduleTime } of calculateScheduleTimes(experiment.steps, now)) {
        jobIds.push(await this.timekeeper.addJob(step.task, scheduleTime, step.parameters));
      }
    } catch (err) {
      log.error({ experiment: experiment.name, err: errorMessage(err) }, 'Scheduling failed, rolling back');
      const remaining: string[] = [];
      for (const jobId of jobIds) {
        if (!(await this.timekeeper.cancelJob(jobId))) remaining.push(jobId);
      }
      if (remaining.length > 0) {
        log.error({ experiment: experiment.name, jobIds: remaining }, 'Jobs could not be rolled back');
        throw new PartialSubmissionError(experiment.name, remaining, err);
      }
      throw err;
    }

    log.info({ experiment: experiment.name, jobs: jobIds.length }, 'Experiment scheduled');
    return { scheduled: true, name: experiment.name, jobIds, validation };
  }

  async submitYaml(text: string, now: Date = this.now()): Promise<ExperimentSubmission> {
    const parsed = parseExperimentYaml(text);
    if (!parsed.ok) {
      return { scheduled: false, name: null, jobIds: [], validation: invalidYamlReport(parsed.errors) };
    }
    return this.submit(parsed.experiment, now);
  }
}
