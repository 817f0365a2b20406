/**
 * Server entry point for the benchctl API.
 *
 * This module:
 * - Builds every component once and holds it in an explicit AppContext
 * - Creates the Fastify server with routes
 * - Runs the scheduler and device monitor loops while the server is up
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import type { AppConfig } from './config/types.js';
import { configureLogging, createLogger } from './logging/logger.js';
import { errorMessage } from './core/errors.js';
import { StateStore } from './store/StateStore.js';
import { DeviceDetector, createSocketResourceProvider } from './devices/DeviceDetector.js';
import { DeviceMonitor } from './devices/DeviceMonitor.js';
import { OscilloscopeManager } from './devices/OscilloscopeManager.js';
import { SignalGeneratorManager } from './devices/SignalGeneratorManager.js';
import { TaskRegistry } from './tasks/TaskRegistry.js';
import { TaskValidator } from './tasks/TaskValidator.js';
import { INSTRUMENT_TASKS } from './tasks/instrumentTasks.js';
import { Dispatcher } from './scheduler/Dispatcher.js';
import { ExperimentService } from './scheduler/ExperimentService.js';
import { Timekeeper } from './scheduler/Timekeeper.js';
import { createDeviceHandlers, createJobHandlers, createTaskHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { HealthResponse } from './api/types.js';

const log = createLogger('server');

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  stateStore: StateStore;
  signalGenerator: SignalGeneratorManager;
  oscilloscope: OscilloscopeManager;
  monitor: DeviceMonitor;
  registry: TaskRegistry;
  validator: TaskValidator;
  dispatcher: Dispatcher;
  timekeeper: Timekeeper;
  experiments: ExperimentService;
}

export interface InitializeOptions {
  /** Clock for the scheduler (default: wall clock) */
  now?: () => Date;
}

/**
 * Initialize all application components and reconcile the pending jobs
 * with the archive. Background loops are not started here.
 */
export async function initializeApp(config: AppConfig, options: InitializeOptions = {}): Promise<AppContext> {
  configureLogging({ level: config.server.logLevel });

  const dataDir = resolve(config.storage.dataDir);
  const lockOptions = { timeoutMs: config.storage.lockTimeoutMs };
  const stateStore = new StateStore(resolve(dataDir, 'state.json'), lockOptions);
  const jobsStore = new StateStore(resolve(dataDir, 'jobs.json'), lockOptions);
  const archiveStore = new StateStore(resolve(dataDir, 'archive.json'), lockOptions);
  log.info({ dataDir, hardwareMock: config.devices.hardwareMock }, 'Initializing app');

  const detector = new DeviceDetector(
    createSocketResourceProvider(config.devices.resources, config.devices.probeTimeoutMs)
  );
  const deviceOptions = { store: stateStore, hardwareMock: config.devices.hardwareMock, detector };
  const signalGenerator = new SignalGeneratorManager(deviceOptions);
  const oscilloscope = new OscilloscopeManager({
    ...deviceOptions,
    bufferSize: config.devices.oscilloscopeBufferSize,
  });
  const monitor = new DeviceMonitor(signalGenerator, oscilloscope, config.devices.monitorIntervalMs);

  const registry = new TaskRegistry(INSTRUMENT_TASKS);
  const validator = new TaskValidator(registry);
  const dispatcher = new Dispatcher({
    registry,
    context: { signalGenerator, oscilloscope },
    timeoutMs: config.scheduler.taskTimeoutMs,
    ...(options.now ? { now: options.now } : {}),
  });
  const timekeeper = new Timekeeper({
    jobsStore,
    archiveStore,
    registry,
    dispatcher,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    ...(options.now ? { now: options.now } : {}),
  });
  const experiments = new ExperimentService(timekeeper, validator, options.now);

  await timekeeper.restore();

  return {
    config,
    stateStore,
    signalGenerator,
    oscilloscope,
    monitor,
    registry,
    validator,
    dispatcher,
    timekeeper,
    experiments,
  };
}

/**
 * Stop the background loops, let running jobs settle and release the
 * instrument links.
 */
export async function closeApp(ctx: AppContext): Promise<void> {
  ctx.timekeeper.stop();
  ctx.monitor.stop();
  await ctx.timekeeper.whenIdle();
  await ctx.signalGenerator.close();
  await ctx.oscilloscope.close();
}

async function health(ctx: AppContext): Promise<HealthResponse> {
  const devices: HealthResponse['components']['devices'] = {};
  for (const manager of [ctx.signalGenerator, ctx.oscilloscope]) {
    devices[manager.deviceId] = { alive: await manager.isAlive(), simulated: manager.hardwareMock };
  }
  const allAlive = Object.values(devices).every((device) => device.alive);
  return {
    status: allAlive ? 'ok' : 'degraded',
    timestamp: new Date().toISOString(),
    components: {
      devices,
      scheduler: ctx.timekeeper.status(),
      monitor: ctx.monitor.status(),
    },
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = createLogger('http');
  const fastify = Fastify({ loggerInstance });

  const corsConfig = ctx.config.server.cors;
  if (corsConfig.enabled) {
    await fastify.register(cors, {
      origin: corsConfig.origins.includes('*') ? true : corsConfig.origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const deviceHandlers = createDeviceHandlers(ctx);
  const taskHandlers = createTaskHandlers(ctx);
  const jobHandlers = createJobHandlers(ctx);

  // Register API routes with /api prefix
  await fastify.register(
    async (instance) => {
      registerRoutes(instance, {
        deviceHandlers,
        taskHandlers,
        jobHandlers,
        health: () => health(ctx),
      });
    },
    { prefix: '/api' }
  );

  return fastify;
}

/**
 * Start the server and the background loops. Runs until SIGINT or SIGTERM.
 */
export async function startServer(config: AppConfig): Promise<void> {
  const ctx = await initializeApp(config);
  const fastify = await createServer(ctx);

  ctx.monitor.start();
  ctx.timekeeper.start();

  const { port, host } = config.server;
  await fastify.listen({ port, host });
  log.info({ port, host, tasks: ctx.registry.list().length }, 'Server listening');

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (closing) return;
    closing = true;
    log.info({ signal }, 'Shutting down');
    await fastify.close();
    await closeApp(ctx);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err: errorMessage(err) }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}
