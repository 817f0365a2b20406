/**
 * benchctl - remote operation and time-scheduled control of laboratory
 * test instruments.
 *
 * This is the main entry point for the library.
 */

// Errors and logging
export * from './core/errors.js';
export { createLogger, configureLogging, isLogLevel } from './logging/logger.js';
export type { LogLevel, Logger } from './logging/logger.js';

// Configuration
export * from './config/types.js';
export { loadConfig, applyEnvOverrides, validateConfig, ConfigValidationError } from './config/loader.js';

// Persistent store
export { FileLock } from './store/FileLock.js';
export type { FileLockOptions } from './store/FileLock.js';
export { StateStore } from './store/StateStore.js';
export type { StateStoreOptions } from './store/StateStore.js';
export type { JsonObject, JsonValue } from './store/jsonFile.js';

// Devices
export * from './devices/types.js';
export { DeviceManager } from './devices/DeviceManager.js';
export { SignalGeneratorManager } from './devices/SignalGeneratorManager.js';
export { OscilloscopeManager } from './devices/OscilloscopeManager.js';
export { DeviceDetector, createSocketResourceProvider } from './devices/DeviceDetector.js';
export type { ResourceProvider } from './devices/DeviceDetector.js';
export { DeviceMonitor } from './devices/DeviceMonitor.js';

// Tasks
export * from './tasks/types.js';
export { TaskRegistry } from './tasks/TaskRegistry.js';
export { TaskValidator, validateParameters, withDefaults } from './tasks/TaskValidator.js';
export { INSTRUMENT_TASKS } from './tasks/instrumentTasks.js';
export { parseExperimentYaml, calculateScheduleTimes } from './tasks/experiment.js';
export type { Experiment, ExperimentStep } from './tasks/experiment.js';

// Scheduler
export * from './scheduler/types.js';
export { Dispatcher } from './scheduler/Dispatcher.js';
export { Timekeeper } from './scheduler/Timekeeper.js';
export { ExperimentService } from './scheduler/ExperimentService.js';
export { classifyDispatchFailure } from './scheduler/FailurePolicy.js';

// Server
export { initializeApp, createServer, startServer, closeApp } from './server.js';
export type { AppContext } from './server.js';
