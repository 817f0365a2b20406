/**
 * JobHandlers - pending jobs and the archive of finished ones.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { JsonValueSchema } from '../../store/jsonFile.js';
import type { ArchiveEntry } from '../../scheduler/types.js';
import type { AppContext } from '../../server.js';
import { errorReply, notFound } from '../errors.js';
import type { ApiError, ArchiveListResponse, CreateJobResponse, JobListResponse } from '../types.js';

const CreateJobSchema = z
  .object({
    task: z.string().min(1),
    /** ISO 8601 instant */
    scheduleTime: z.string().optional(),
    /** Seconds from now */
    delaySeconds: z.number().nonnegative().optional(),
    kwargs: z.record(JsonValueSchema).default({}),
  })
  .refine((body) => body.scheduleTime === undefined || body.delaySeconds === undefined, {
    message: 'Give scheduleTime or delaySeconds, not both',
  });

export function createJobHandlers(ctx: AppContext) {
  return {
    /**
     * GET /jobs
     */
    async listJobs(_request: FastifyRequest, reply: FastifyReply): Promise<JobListResponse | ApiError> {
      try {
        const jobs = await ctx.timekeeper.getJobs();
        return { jobs, total: Object.keys(jobs).length };
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * POST /jobs
     * Without a time the job runs on the next tick.
     */
    async createJob(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<CreateJobResponse | ApiError> {
      try {
        const body = CreateJobSchema.parse(request.body);
        const scheduleTime =
          body.scheduleTime ?? new Date(Date.now() + (body.delaySeconds ?? 0) * 1000).toISOString();
        const jobId = await ctx.timekeeper.addJob(body.task, scheduleTime, body.kwargs);
        const job = (await ctx.timekeeper.getJobs())[jobId];
        reply.status(201);
        return {
          jobId,
          task: job?.task ?? body.task,
          scheduleTime: job?.schedule_time ?? scheduleTime,
        };
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * DELETE /jobs/:id
     * Cancelling a job that already ran, or never existed, reports false.
     */
    async cancelJob(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<{ jobId: string; cancelled: boolean } | ApiError> {
      try {
        return { jobId: request.params.id, cancelled: await ctx.timekeeper.cancelJob(request.params.id) };
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * GET /archive
     */
    async listArchive(_request: FastifyRequest, reply: FastifyReply): Promise<ArchiveListResponse | ApiError> {
      try {
        const entries = await ctx.timekeeper.getArchive();
        return { entries, total: Object.keys(entries).length };
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * GET /archive/:id
     */
    async getArchiveEntry(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<ArchiveEntry | ApiError> {
      try {
        const entry = await ctx.timekeeper.getArchiveEntry(request.params.id);
        return entry ?? notFound(reply, 'ARCHIVE_ENTRY_NOT_FOUND', `No archive entry for job ${request.params.id}`);
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * DELETE /archive
     */
    async clearArchive(_request: FastifyRequest, reply: FastifyReply): Promise<{ removed: number } | ApiError> {
      try {
        return { removed: await ctx.timekeeper.clearArchive() };
      } catch (err) {
        return errorReply(reply, err);
      }
    },
  };
}

export type JobHandlers = ReturnType<typeof createJobHandlers>;
