/**
 * TaskHandlers - task catalogue, parameter validation and experiment
 * submission.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { JsonValueSchema } from '../../store/jsonFile.js';
import type { ExperimentSubmission } from '../../scheduler/ExperimentService.js';
import type { ExperimentValidation, ValidationReport } from '../../tasks/types.js';
import type { AppContext } from '../../server.js';
import { errorReply } from '../errors.js';
import type { ApiError, TaskListResponse } from '../types.js';

const ValidateTaskSchema = z.object({
  params: z.record(JsonValueSchema).default({}),
});

const ExperimentBodySchema = z.object({
  yaml: z.string().min(1),
});

export function createTaskHandlers(ctx: AppContext) {
  return {
    /**
     * GET /tasks
     */
    async listTasks(): Promise<TaskListResponse> {
      return {
        tasks: ctx.registry.list().map((task) => ({
          name: task.name,
          displayName: task.displayName,
          device: task.device,
          description: task.description,
          parameters: task.parameters,
        })),
      };
    },

    /**
     * POST /tasks/:name/validate
     * Always answers with the itemized report, even for an unknown task.
     */
    async validateTask(
      request: FastifyRequest<{ Params: { name: string }; Body: unknown }>,
      reply: FastifyReply
    ): Promise<ValidationReport | ApiError> {
      try {
        const body = ValidateTaskSchema.parse(request.body ?? {});
        return ctx.validator.validate(request.params.name, body.params);
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * POST /experiments/validate
     */
    async validateExperiment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ExperimentValidation | ApiError> {
      try {
        const body = ExperimentBodySchema.parse(request.body);
        return ctx.experiments.validateYaml(body.yaml);
      } catch (err) {
        return errorReply(reply, err);
      }
    },

    /**
     * POST /experiments/schedule
     * Schedules every step or none of them.
     */
    async scheduleExperiment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ExperimentSubmission | ApiError> {
      try {
        const body = ExperimentBodySchema.parse(request.body);
        const submission = await ctx.experiments.submitYaml(body.yaml);
        if (!submission.scheduled) {
          reply.status(400);
          return {
            error: 'INVALID_EXPERIMENT',
            message: 'Experiment failed validation, nothing was scheduled',
            details: submission.validation,
          };
        }
        reply.status(201);
        return submission;
      } catch (err) {
        return errorReply(reply, err);
      }
    },
  };
}

export type TaskHandlers = ReturnType<typeof createTaskHandlers>;
