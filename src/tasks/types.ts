/**
 * Task registry types.
 *
 * Each task declares its parameters explicitly. Supplied arguments are
 * validated structurally against that declaration before a job is accepted
 * and again right before it runs.
 */

import type { OscilloscopeManager } from '../devices/OscilloscopeManager.js';
import type { SignalGeneratorManager } from '../devices/SignalGeneratorManager.js';
import type { DeviceId } from '../devices/types.js';
import type { JsonValue } from '../store/jsonFile.js';

export type ParamType = 'int' | 'float' | 'bool' | 'str' | 'list' | 'dict';

export type ParameterConstraint =
  | { min?: number; max?: number }
  | { oneOf: readonly (string | number)[] };

export interface ParameterSpec {
  name: string;
  /** Untyped parameters accept anything */
  type?: ParamType;
  optional?: boolean;
  default?: JsonValue;
  constraint?: ParameterConstraint;
  description?: string;
}

export type TaskArgs = Record<string, JsonValue>;

/**
 * Devices a task implementation may drive.
 */
export interface TaskContext {
  signalGenerator: SignalGeneratorManager;
  oscilloscope: OscilloscopeManager;
}

export interface TaskDefinition {
  /** Canonical identifier, e.g. DG4202_TOGGLE */
  name: string;
  /** Human-facing name, also accepted when resolving */
  displayName: string;
  device: DeviceId;
  description: string;
  parameters: readonly ParameterSpec[];
  run(ctx: TaskContext, args: TaskArgs): Promise<JsonValue>;
}

export interface ValidationReport {
  ok: boolean;
  errors: string[];
  warnings: string[];
}

export type ErrorLevel = 'info' | 'bad_config' | 'invalid_yaml';

export interface StepValidation {
  /** `Step <i>: <TASK>` */
  step: string;
  ok: boolean;
  message: string;
  level: ErrorLevel;
}

export interface ExperimentValidation {
  ok: boolean;
  errors: string[];
  warnings: string[];
  level: ErrorLevel;
  steps: StepValidation[];
}
