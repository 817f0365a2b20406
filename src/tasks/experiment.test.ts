import { describe, expect, it } from 'vitest';
import { calculateScheduleTimes, parseExperimentYaml, type ExperimentStep } from './experiment.js';

const EXPERIMENT_YAML = `
experiment:
  name: Bench check
  steps:
    - task: DG4202_SET_WAVEFORM
      description: Prepare channel 1
      parameters:
        channel: 1
        send_on: false
        waveform_type: SIN
        amplitude: 2
        frequency: 1000
        offset: 0
    - task: DG4202_TOGGLE
      wait: 5
      parameters: { channel: 1, status: true }
`;

function step(timing: Partial<ExperimentStep>): ExperimentStep {
  return { task: 'EDUX1002A_AUTO', description: '', parameters: {}, ...timing };
}

describe('parseExperimentYaml', () => {
  it('parses an experiment and fills step defaults', () => {
    const result = parseExperimentYaml(EXPERIMENT_YAML);
    if (!result.ok) throw new Error(result.errors.join('\n'));

    expect(result.experiment.name).toBe('Bench check');
    expect(result.experiment.steps).toHaveLength(2);
    expect(result.experiment.steps[1]).toEqual({
      task: 'DG4202_TOGGLE',
      description: '',
      wait: 5,
      parameters: { channel: 1, status: true },
    });
  });

  it('reports YAML syntax errors', () => {
    const result = parseExperimentYaml('experiment: [unclosed');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errors[0]).toMatch(/^Invalid YAML: /);
  });

  it('reports shape errors with their path', () => {
    const result = parseExperimentYaml('experiment:\n  name: x\n  steps:\n    - description: no task\n');
    expect(result).toEqual({ ok: false, errors: ['experiment.steps.0.task: Required'] });
  });

  it('rejects an empty document', () => {
    expect(parseExperimentYaml('').ok).toBe(false);
  });
});

describe('calculateScheduleTimes', () => {
  const now = new Date('2026-03-01T12:00:00.000Z');

  it('chains waits from the previous step', () => {
    const times = calculateScheduleTimes([step({}), step({ wait: 5 }), step({ delay: 2.5 })], now);
    expect(times.map((t) => t.scheduleTime.toISOString())).toEqual([
      '2026-03-01T12:00:00.000Z',
      '2026-03-01T12:00:05.000Z',
      '2026-03-01T12:00:07.500Z',
    ]);
  });

  it('treats at_time as absolute and continues from it', () => {
    const times = calculateScheduleTimes(
      [step({ wait: 10 }), step({ at_time: 3 }), step({ wait: 1 }), step({ at_time: '2026-03-01T13:00:00Z' })],
      now
    );
    expect(times.map((t) => t.scheduleTime.toISOString())).toEqual([
      '2026-03-01T12:00:10.000Z',
      '2026-03-01T12:00:03.000Z',
      '2026-03-01T12:00:04.000Z',
      '2026-03-01T13:00:00.000Z',
    ]);
  });

  it('prefers wait over delay', () => {
    const [first] = calculateScheduleTimes([step({ wait: 1, delay: 9 })], now);
    expect(first?.scheduleTime.toISOString()).toBe('2026-03-01T12:00:01.000Z');
  });
});
