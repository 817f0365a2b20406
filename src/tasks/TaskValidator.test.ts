import { describe, expect, it } from 'vitest';
import { TaskRegistry } from './TaskRegistry.js';
import { TaskValidator, isTypeCompatible, validateParameters, valueKind, withDefaults } from './TaskValidator.js';
import { INSTRUMENT_TASKS, setSweepTask } from './instrumentTasks.js';
import type { TaskDefinition } from './types.js';

const validator = new TaskValidator(new TaskRegistry(INSTRUMENT_TASKS));

function definition(parameters: TaskDefinition['parameters']): TaskDefinition {
  return {
    name: 'TEST_TASK',
    displayName: 'Test Task',
    device: 'dg4202',
    description: 'test',
    parameters,
    async run() {
      return true;
    },
  };
}

describe('isTypeCompatible', () => {
  it('accepts null for any type', () => {
    expect(isTypeCompatible('int', null)).toBe(true);
    expect(isTypeCompatible('bool', undefined)).toBe(true);
  });

  it('treats untyped and str parameters as accepting anything', () => {
    expect(isTypeCompatible(undefined, 42)).toBe(true);
    expect(isTypeCompatible('str', { a: 1 })).toBe(true);
  });

  it('requires an exact boolean for bool', () => {
    expect(isTypeCompatible('bool', true)).toBe(true);
    expect(isTypeCompatible('bool', 'on')).toBe(false);
    expect(isTypeCompatible('bool', 1)).toBe(false);
  });

  it('accepts integers for float but not floats for int', () => {
    expect(isTypeCompatible('float', 5)).toBe(true);
    expect(isTypeCompatible('int', 5)).toBe(true);
    expect(isTypeCompatible('int', 5.5)).toBe(false);
    expect(isTypeCompatible('float', '5')).toBe(false);
  });

  it('checks container kind only', () => {
    expect(isTypeCompatible('list', [1, 'a'])).toBe(true);
    expect(isTypeCompatible('list', { 0: 1 })).toBe(false);
    expect(isTypeCompatible('dict', { a: [1] })).toBe(true);
    expect(isTypeCompatible('dict', [])).toBe(false);
  });

  it('ignores ranges', () => {
    expect(isTypeCompatible('float', -1)).toBe(true);
  });
});

describe('valueKind', () => {
  it('names values in the parameter type vocabulary', () => {
    expect([null, true, 3, 3.5, 'x', [], {}].map(valueKind)).toEqual(['null', 'bool', 'int', 'float', 'str', 'list', 'dict']);
  });
});

describe('TaskValidator', () => {
  it('accepts a complete toggle', () => {
    expect(validator.validate('DG4202_TOGGLE', { channel: 1, status: true })).toEqual({ ok: true, errors: [], warnings: [] });
  });

  it('reports a missing required parameter', () => {
    expect(validator.validate('DG4202_TOGGLE', { channel: 1 })).toEqual({
      ok: false,
      errors: ['Missing required param: status.'],
      warnings: [],
    });
  });

  it('reports an extra parameter', () => {
    expect(validator.validate('DG4202_TOGGLE', { channel: 1, status: true, extra: 5 })).toEqual({
      ok: false,
      errors: ['Extra param provided: extra.'],
      warnings: [],
    });
  });

  it('rejects a string for a bool parameter', () => {
    expect(validator.validate('DG4202_TOGGLE', { channel: 1, status: 'on' }).errors).toEqual([
      'Type mismatch: status (got str, expected bool)',
    ]);
  });

  it('accepts an integer for a float parameter', () => {
    const report = validateParameters(definition([{ name: 'frequency', type: 'float' }]), { frequency: 5 });
    expect(report.ok).toBe(true);
  });

  it('enforces declared ranges and allowed values', () => {
    const report = validator.validate('DG4202_SET_WAVEFORM', {
      channel: 3,
      send_on: false,
      waveform_type: 'TRIANGLE',
      amplitude: 1,
      frequency: -10,
      offset: 7.5,
    });

    expect(report.errors).toEqual([
      'Invalid value: channel must be one of 1, 2',
      'Invalid value: waveform_type must be one of SIN, SQU, RAMP, PULSE, NOISE, USER',
      'Out of range: frequency must be >= 0',
      'Out of range: offset must be <= 5',
    ]);
  });

  it('warns about omitted parameters that have defaults', () => {
    const report = validator.validate('DG4202_SET_SWEEP', {
      channel: 1,
      send_on: true,
      fstart: 100,
      fstop: 1000,
      time: 2,
    });

    expect(report.ok).toBe(true);
    expect(report.warnings).toEqual([
      'Missing optional param: rtime, using default value.',
      'Missing optional param: htime_start, using default value.',
      'Missing optional param: htime_stop, using default value.',
    ]);
  });

  it('resolves display names case-insensitively', () => {
    expect(validator.validate('toggle output', { channel: 2, status: false }).ok).toBe(true);
  });

  it('reports an unknown task', () => {
    expect(validator.validate('DG4202_EXPLODE', {})).toEqual({ ok: false, errors: ['Task function not found.'], warnings: [] });
  });

  it('fills defaults for omitted parameters', () => {
    expect(withDefaults(setSweepTask, { channel: 1, send_on: false, fstart: 1, fstop: 2, time: 3 })).toEqual({
      channel: 1,
      send_on: false,
      fstart: 1,
      fstop: 2,
      time: 3,
      rtime: 0,
      htime_start: 0,
      htime_stop: 0,
    });
  });

  describe('validateExperiment', () => {
    it('labels each step and fails the experiment when any step fails', () => {
      const result = validator.validateExperiment({
        name: 'Bench check',
        steps: [
          { task: 'dg4202_toggle', description: '', parameters: { channel: 1, status: true } },
          { task: 'Press Auto', description: '', parameters: { extra: 1 } },
          { task: 'missing_task', description: '', parameters: {} },
        ],
      });

      expect(result.ok).toBe(false);
      expect(result.level).toBe('bad_config');
      expect(result.steps).toEqual([
        { step: 'Step 1: DG4202_TOGGLE', ok: true, message: 'No issues.', level: 'info' },
        { step: 'Step 2: PRESS AUTO', ok: false, message: 'Validation issues: Extra param provided: extra.', level: 'bad_config' },
        { step: 'Step 3: MISSING_TASK', ok: false, message: 'Task function not found.', level: 'bad_config' },
      ]);
      expect(result.errors).toEqual([
        'Step 2: PRESS AUTO: Extra param provided: extra.',
        'Step 3: MISSING_TASK: Task function not found.',
      ]);
    });

    it('passes with warnings only', () => {
      const result = validator.validateExperiment({
        name: 'Sweep',
        steps: [{ task: 'DG4202_SET_SWEEP', description: '', parameters: { channel: 1, send_on: false, fstart: 1, fstop: 2, time: 3, rtime: 0, htime_start: 0 } }],
      });

      expect(result).toMatchObject({
        ok: true,
        level: 'info',
        errors: [],
        warnings: ['Step 1: DG4202_SET_SWEEP: Missing optional param: htime_stop, using default value.'],
      });
    });
  });

  describe('validateExperimentYaml', () => {
    it('validates the steps of a parsed document', () => {
      const result = validator.validateExperimentYaml(
        'experiment:\n  name: One step\n  steps:\n    - task: EDUX1002A_AUTO\n'
      );

      expect(result.ok).toBe(true);
      expect(result.steps).toEqual([{ step: 'Step 1: EDUX1002A_AUTO', ok: true, message: 'No issues.', level: 'info' }]);
    });

    it('reports a document that is not an experiment', () => {
      const result = validator.validateExperimentYaml('experiment:\n  steps: []\n');

      expect(result).toEqual({
        ok: false,
        errors: ['experiment.name: Required', 'experiment.steps: Array must contain at least 1 element(s)'],
        warnings: [],
        level: 'invalid_yaml',
        steps: [],
      });
    });
  });
});

describe('TaskRegistry', () => {
  it('prefers an exact identifier and rejects duplicates', () => {
    const registry = new TaskRegistry(INSTRUMENT_TASKS);
    expect(registry.resolve('EDUX1002A_AUTO')?.displayName).toBe('Press Auto');
    expect(() => registry.register(INSTRUMENT_TASKS[0] ?? definition([]))).toThrow('Task already registered: DG4202_TOGGLE');
  });

  it('throws UnknownTaskError from require', () => {
    const registry = new TaskRegistry(INSTRUMENT_TASKS);
    expect(() => registry.require('nope')).toThrow("Unknown task: 'nope'");
  });

  it('lists in registration order', () => {
    expect(new TaskRegistry(INSTRUMENT_TASKS).list().map((t) => t.name)).toEqual([
      'DG4202_TOGGLE',
      'DG4202_SET_WAVEFORM',
      'DG4202_SET_SWEEP',
      'EDUX1002A_AUTO',
    ]);
  });
});
