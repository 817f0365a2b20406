/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { DeviceStatus } from '../devices/types.js';
import type { DeviceMonitorStatus } from '../devices/DeviceMonitor.js';
import type { TimekeeperStatus } from '../scheduler/Timekeeper.js';
import type { ArchiveEntry, JobSummary } from '../scheduler/types.js';
import type { ParameterSpec } from '../tasks/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Devices
// ============================================================================

export interface DeviceListResponse {
  devices: DeviceStatus[];
}

// ============================================================================
// Tasks
// ============================================================================

export interface TaskSummary {
  name: string;
  displayName: string;
  device: string;
  description: string;
  parameters: readonly ParameterSpec[];
}

export interface TaskListResponse {
  tasks: TaskSummary[];
}

// ============================================================================
// Jobs & Archive
// ============================================================================

export interface JobListResponse {
  jobs: Record<string, JobSummary>;
  total: number;
}

export interface CreateJobResponse {
  jobId: string;
  task: string;
  scheduleTime: string;
}

export interface ArchiveListResponse {
  entries: Record<string, ArchiveEntry>;
  total: number;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  status: 'ok' | 'degraded';
  timestamp: string;
  components: {
    devices: Record<string, { alive: boolean; simulated: boolean }>;
    scheduler: TimekeeperStatus;
    monitor: DeviceMonitorStatus;
  };
}
