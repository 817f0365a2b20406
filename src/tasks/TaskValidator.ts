/**
 * Structural validation of task arguments against declared parameters.
 */

import { isJsonObject } from '../store/jsonFile.js';
import { parseExperimentYaml, type Experiment } from './experiment.js';
import type { TaskRegistry } from './TaskRegistry.js';
import type {
  ExperimentValidation,
  ParamType,
  ParameterConstraint,
  ParameterSpec,
  StepValidation,
  TaskArgs,
  TaskDefinition,
  ValidationReport,
} from './types.js';

export const TASK_NOT_FOUND = 'Task function not found.';

/**
 * Name of a value's kind in the parameter type vocabulary.
 */
export function valueKind(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'str';
  if (Array.isArray(value)) return 'list';
  if (isJsonObject(value)) return 'dict';
  return typeof value;
}

/**
 * Whether `value` may be passed for a parameter of `type`. Ranges and
 * allowed values are not considered here.
 */
export function isTypeCompatible(type: ParamType | undefined, value: unknown): boolean {
  if (value === null || value === undefined) return true;
  switch (type ?? 'str') {
    case 'str':
      return true;
    case 'bool':
      return typeof value === 'boolean';
    case 'float':
      return typeof value === 'number';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'list':
      return Array.isArray(value);
    case 'dict':
      return isJsonObject(value);
  }
}

function constraintError(name: string, constraint: ParameterConstraint, value: unknown): string | null {
  if ('oneOf' in constraint) {
    if (typeof value === 'string' || typeof value === 'number') {
      if (constraint.oneOf.includes(value)) return null;
    }
    return `Invalid value: ${name} must be one of ${constraint.oneOf.join(', ')}`;
  }
  if (typeof value !== 'number') return null;
  if (constraint.min !== undefined && value < constraint.min) {
    return `Out of range: ${name} must be >= ${constraint.min}`;
  }
  if (constraint.max !== undefined && value > constraint.max) {
    return `Out of range: ${name} must be <= ${constraint.max}`;
  }
  return null;
}

function hasDefault(spec: ParameterSpec): boolean {
  return spec.optional === true || spec.default !== undefined;
}

/**
 * Check supplied arguments against a task's declared parameters.
 */
export function validateParameters(definition: TaskDefinition, params: Record<string, unknown>): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const spec of definition.parameters) {
    if (!Object.prototype.hasOwnProperty.call(params, spec.name)) {
      if (hasDefault(spec)) {
        warnings.push(`Missing optional param: ${spec.name}, using default value.`);
      } else {
        errors.push(`Missing required param: ${spec.name}.`);
      }
      continue;
    }

    const value = params[spec.name];
    if (!isTypeCompatible(spec.type, value)) {
      errors.push(`Type mismatch: ${spec.name} (got ${valueKind(value)}, expected ${spec.type ?? 'str'})`);
      continue;
    }

    if (spec.constraint && value !== null && value !== undefined) {
      const message = constraintError(spec.name, spec.constraint, value);
      if (message) errors.push(message);
    }
  }

  const declared = new Set(definition.parameters.map((spec) => spec.name));
  for (const name of Object.keys(params)) {
    if (!declared.has(name)) {
      errors.push(`Extra param provided: ${name}.`);
    }
  }

  return { ok: errors.length === 0, errors, warnings };
}

/**
 * Supplied arguments with declared defaults filled in.
 */
export function withDefaults(definition: TaskDefinition, args: TaskArgs): TaskArgs {
  const resolved: TaskArgs = { ...args };
  for (const spec of definition.parameters) {
    if (resolved[spec.name] === undefined && spec.default !== undefined) {
      resolved[spec.name] = spec.default;
    }
  }
  return resolved;
}

/**
 * Report for an experiment file that could not be read as an experiment.
 */
export function invalidYamlReport(errors: string[]): ExperimentValidation {
  return { ok: false, errors, warnings: [], level: 'invalid_yaml', steps: [] };
}

export class TaskValidator {
  constructor(private readonly registry: TaskRegistry) {}

  validate(taskName: string, params: Record<string, unknown>): ValidationReport {
    const definition = this.registry.resolve(taskName);
    if (!definition) {
      return { ok: false, errors: [TASK_NOT_FOUND], warnings: [] };
    }
    return validateParameters(definition, params);
  }

  /**
   * Validate every step of an experiment. The experiment is valid only if
   * every step is.
   */
  validateExperiment(experiment: Experiment): ExperimentValidation {
    const steps: StepValidation[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];

    experiment.steps.forEach((task, index) => {
      const label = `Step ${index + 1}: ${task.task.toUpperCase()}`;
      const report = this.validate(task.task, task.parameters);
      const issues = [...report.errors, ...report.warnings];
      const message = report.errors.includes(TASK_NOT_FOUND)
        ? TASK_NOT_FOUND
        : issues.length > 0
          ? `Validation issues: ${issues.join('; ')}`
          : 'No issues.';

      steps.push({ step: label, ok: report.ok, message, level: report.ok ? 'info' : 'bad_config' });
      errors.push(...report.errors.map((error) => `${label}: ${error}`));
      warnings.push(...report.warnings.map((warning) => `${label}: ${warning}`));
    });

    const ok = steps.every((step) => step.ok);
    return { ok, errors, warnings, level: ok ? 'info' : 'bad_config', steps };
  }

  validateExperimentYaml(text: string): ExperimentValidation {
    const parsed = parseExperimentYaml(text);
    return parsed.ok ? this.validateExperiment(parsed.experiment) : invalidYamlReport(parsed.errors);
  }
}
