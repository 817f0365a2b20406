/**
 * Configuration types for benchctl.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to runtime settings.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  devices: DevicesConfig;
  scheduler: SchedulerConfig;
}

/**
 * HTTP server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Persistent state settings.
 */
export interface StorageConfig {
  /** Directory holding state.json, jobs.json and archive.json (default: './data') */
  dataDir: string;
  /** Max wait for a store lock before LockTimeoutError (default: 10000) */
  lockTimeoutMs: number;
}

/**
 * Instrument settings.
 */
export interface DevicesConfig {
  /** Use simulated instruments instead of probing hardware */
  hardwareMock: boolean;
  /** Resource strings probed for hardware, e.g. TCPIP::192.168.1.20::5555::SOCKET */
  resources: string[];
  /** Per-query timeout when talking to hardware (default: 2000) */
  probeTimeoutMs: number;
  /** Samples kept per oscilloscope channel (default: 512) */
  oscilloscopeBufferSize: number;
  /** Device monitor poll interval (default: 1000) */
  monitorIntervalMs: number;
}

/**
 * Job scheduler settings.
 */
export interface SchedulerConfig {
  /** Interval between due-job evaluations (default: 500) */
  tickIntervalMs: number;
  /** Max run time of one task before it is recorded as timed out (default: 30000) */
  taskTimeoutMs: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  storage: {
    dataDir: './data',
    lockTimeoutMs: 10_000,
  },
  devices: {
    hardwareMock: false,
    resources: [],
    probeTimeoutMs: 2_000,
    oscilloscopeBufferSize: 512,
    monitorIntervalMs: 1_000,
  },
  scheduler: {
    tickIntervalMs: 500,
    taskTimeoutMs: 30_000,
  },
};
