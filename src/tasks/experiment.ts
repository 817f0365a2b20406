/**
 * Experiment documents.
 *
 * An experiment is a named list of task steps, written in YAML:
 *
 *   experiment:
 *     name: Sweep check
 *     steps:
 *       - task: DG4202_SET_WAVEFORM
 *         description: Prepare channel 1
 *         parameters: { channel: 1, ... }
 *       - task: DG4202_TOGGLE
 *         wait: 5
 *         parameters: { channel: 1, status: true }
 *
 * Step timing: `at_time` (seconds after submission, or an ISO timestamp) is
 * absolute; otherwise the step runs `wait` (or `delay`) seconds after the
 * previous step.
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { JsonValueSchema } from '../store/jsonFile.js';

export const ExperimentStepSchema = z.object({
  task: z.string().min(1),
  description: z.string().default(''),
  delay: z.number().nonnegative().optional(),
  wait: z.number().nonnegative().optional(),
  at_time: z.union([z.number().nonnegative(), z.string().datetime({ offset: true })]).optional(),
  parameters: z.record(JsonValueSchema).default({}),
});

export const ExperimentSchema = z.object({
  name: z.string().min(1),
  steps: z.array(ExperimentStepSchema).min(1),
});

export const ExperimentDocumentSchema = z.object({
  experiment: ExperimentSchema,
});

export type ExperimentStep = z.infer<typeof ExperimentStepSchema>;
export type Experiment = z.infer<typeof ExperimentSchema>;

export type ExperimentParseResult =
  | { ok: true; experiment: Experiment }
  | { ok: false; errors: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Shape-check an already parsed experiment document.
 */
export function parseExperimentDocument(document: unknown): ExperimentParseResult {
  const parsed = ExperimentDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  return { ok: true, experiment: parsed.data.experiment };
}

/**
 * Parse experiment YAML text and shape-check it.
 */
export function parseExperimentYaml(text: string): ExperimentParseResult {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (err) {
    return { ok: false, errors: [`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`] };
  }
  return parseExperimentDocument(document);
}

export interface ScheduledStep {
  step: ExperimentStep;
  scheduleTime: Date;
}

/**
 * Fire time of every step, in step order.
 */
export function calculateScheduleTimes(steps: readonly ExperimentStep[], now: Date): ScheduledStep[] {
  const scheduled: ScheduledStep[] = [];
  let previous = now;

  for (const step of steps) {
    let scheduleTime: Date;
    if (typeof step.at_time === 'number') {
      scheduleTime = new Date(now.getTime() + step.at_time * 1000);
    } else if (typeof step.at_time === 'string') {
      scheduleTime = new Date(step.at_time);
    } else {
      const waitSeconds = step.wait ?? step.delay ?? 0;
      scheduleTime = new Date(previous.getTime() + waitSeconds * 1000);
    }
    scheduled.push({ step, scheduleTime });
    previous = scheduleTime;
  }

  return scheduled;
}
