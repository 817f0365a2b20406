/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over the application services.
 */

import type { FastifyInstance } from 'fastify';
import type { DeviceHandlers } from './handlers/DeviceHandlers.js';
import type { JobHandlers } from './handlers/JobHandlers.js';
import type { TaskHandlers } from './handlers/TaskHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  deviceHandlers: DeviceHandlers;
  taskHandlers: TaskHandlers;
  jobHandlers: JobHandlers;
  health: () => Promise<HealthResponse>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(fastify: FastifyInstance, options: RouteOptions): void {
  const { deviceHandlers, taskHandlers, jobHandlers } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => options.health());

  // ============================================================================
  // Device Routes
  // ============================================================================

  fastify.get('/devices', deviceHandlers.listDevices);
  fastify.get('/devices/:id', deviceHandlers.getDevice);
  fastify.put('/devices/:id/mock', deviceHandlers.setMockState);
  fastify.get('/devices/:id/data', deviceHandlers.getDeviceData);

  // ============================================================================
  // Task & Experiment Routes
  // ============================================================================

  fastify.get('/tasks', taskHandlers.listTasks);
  fastify.post('/tasks/:name/validate', taskHandlers.validateTask);
  fastify.post('/experiments/validate', taskHandlers.validateExperiment);
  fastify.post('/experiments/schedule', taskHandlers.scheduleExperiment);

  // ============================================================================
  // Job Routes
  // ============================================================================

  fastify.get('/jobs', jobHandlers.listJobs);
  fastify.post('/jobs', jobHandlers.createJob);
  fastify.delete('/jobs/:id', jobHandlers.cancelJob);

  // ============================================================================
  // Archive Routes
  // ============================================================================

  fastify.get('/archive', jobHandlers.listArchive);
  fastify.get('/archive/:id', jobHandlers.getArchiveEntry);
  fastify.delete('/archive', jobHandlers.clearArchive);
}
