/**
 * Scheduler record shapes.
 *
 * Jobs and archive entries are persisted as JSON documents keyed by job id,
 * so both are declared as zod schemas and checked when read back.
 */

import { z } from 'zod';
import { JsonValueSchema } from '../store/jsonFile.js';

export const FailureClassSchema = z.enum(['device_absent', 'validation', 'timeout', 'task_error']);
export type FailureClass = z.infer<typeof FailureClassSchema>;

export const JobSchema = z.object({
  jobId: z.string().min(1),
  /** Canonical task identifier */
  taskName: z.string().min(1),
  /** ISO 8601 */
  scheduleTime: z.string(),
  kwargs: z.record(JsonValueSchema),
  /** Insertion order, breaks ties between equal schedule times */
  seq: z.number().int().nonnegative(),
  createdAt: z.string(),
});
export type Job = z.infer<typeof JobSchema>;

export const ArchiveEntrySchema = z.object({
  jobId: z.string().min(1),
  taskName: z.string().min(1),
  scheduleTime: z.string(),
  kwargs: z.record(JsonValueSchema),
  status: z.enum(['completed', 'failed']),
  result: JsonValueSchema,
  error: z.string().nullable(),
  failureClass: FailureClassSchema.nullable(),
  failureCode: z.string().nullable(),
  retryRecommended: z.boolean(),
  startedAt: z.string(),
  completionTime: z.string(),
});
export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;

/**
 * Pending job as listed to callers: `jobId -> {task, schedule_time, kwargs}`.
 */
export type JobSummary = {
  task: string;
  schedule_time: string;
  kwargs: Job['kwargs'];
};

export type SchedulerEvent =
  | { type: 'job_added'; job: Job }
  | { type: 'job_fired'; jobId: string; entry: ArchiveEntry }
  | { type: 'job_cancelled'; jobId: string }
  | { type: 'archive_cleared'; removed: number };

export type SchedulerCallback = (event: SchedulerEvent) => void | Promise<void>;
