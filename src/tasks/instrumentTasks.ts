/**
 * Built-in instrument tasks.
 */

import { DeviceOperationError } from '../core/errors.js';
import type { CallResult, OutputChannel, WaveformType } from '../devices/types.js';
import { WAVEFORM_TYPES, isWaveformType } from '../devices/types.js';
import type { ParameterSpec, TaskArgs, TaskDefinition } from './types.js';

const CHANNEL: ParameterSpec = {
  name: 'channel',
  type: 'int',
  constraint: { oneOf: [1, 2] },
  description: 'Output channel',
};

const SEND_ON: ParameterSpec = {
  name: 'send_on',
  type: 'bool',
  description: 'Switch the output on after configuring it',
};

function nonNegative(name: string, description: string, extra: Partial<ParameterSpec> = {}): ParameterSpec {
  return { name, type: 'float', constraint: { min: 0 }, description, ...extra };
}

function channelArg(args: TaskArgs): OutputChannel {
  const value = args['channel'];
  if (value === 1 || value === 2) return value;
  throw new DeviceOperationError('failed', `channel must be 1 or 2, got ${String(value)}`);
}

function numberArg(args: TaskArgs, name: string): number {
  const value = args[name];
  if (typeof value === 'number') return value;
  throw new DeviceOperationError('failed', `${name} must be a number, got ${String(value)}`);
}

function booleanArg(args: TaskArgs, name: string): boolean {
  const value = args[name];
  if (typeof value === 'boolean') return value;
  throw new DeviceOperationError('failed', `${name} must be a boolean, got ${String(value)}`);
}

function waveformArg(args: TaskArgs): WaveformType {
  const value = args['waveform_type'];
  if (isWaveformType(value)) return value;
  throw new DeviceOperationError('failed', `waveform_type must be one of ${WAVEFORM_TYPES.join(', ')}`);
}

/**
 * Turn a device sentinel into an error so the run is recorded as failed.
 */
function unwrap(result: CallResult): void {
  if (!result.ok) {
    throw new DeviceOperationError(result.reason, result.message);
  }
}

export const toggleOutputTask: TaskDefinition = {
  name: 'DG4202_TOGGLE',
  displayName: 'Toggle Output',
  device: 'dg4202',
  description: 'Switch a signal generator output on or off.',
  parameters: [CHANNEL, { name: 'status', type: 'bool', description: 'true for ON' }],
  async run(ctx, args) {
    unwrap(await ctx.signalGenerator.call({ kind: 'toggleOutput', channel: channelArg(args), on: booleanArg(args, 'status') }));
    return true;
  },
};

export const setWaveformTask: TaskDefinition = {
  name: 'DG4202_SET_WAVEFORM',
  displayName: 'Set Waveform Parameters',
  device: 'dg4202',
  description: 'Apply a standard waveform to a signal generator channel.',
  parameters: [
    CHANNEL,
    SEND_ON,
    { name: 'waveform_type', type: 'str', constraint: { oneOf: WAVEFORM_TYPES }, description: 'Waveform shape' },
    { name: 'amplitude', type: 'float', description: 'Amplitude (Vpp)' },
    nonNegative('frequency', 'Frequency (Hz)'),
    { name: 'offset', type: 'float', constraint: { min: 0, max: 5 }, description: 'DC offset (V)' },
  ],
  async run(ctx, args) {
    const channel = channelArg(args);
    unwrap(
      await ctx.signalGenerator.call({
        kind: 'setWaveform',
        channel,
        waveform: {
          type: waveformArg(args),
          frequency: numberArg(args, 'frequency'),
          amplitude: numberArg(args, 'amplitude'),
          offset: numberArg(args, 'offset'),
        },
      })
    );
    if (booleanArg(args, 'send_on')) {
      unwrap(await ctx.signalGenerator.call({ kind: 'toggleOutput', channel, on: true }));
    }
    return true;
  },
};

export const setSweepTask: TaskDefinition = {
  name: 'DG4202_SET_SWEEP',
  displayName: 'Set Sweep Parameters',
  device: 'dg4202',
  description: 'Configure and enable a frequency sweep on a signal generator channel.',
  parameters: [
    CHANNEL,
    SEND_ON,
    nonNegative('fstart', 'Start frequency (Hz)'),
    nonNegative('fstop', 'Stop frequency (Hz)'),
    nonNegative('time', 'Sweep time (s)'),
    nonNegative('rtime', 'Return time (ms)', { default: 0 }),
    nonNegative('htime_start', 'Start hold (ms)', { default: 0 }),
    nonNegative('htime_stop', 'Stop hold (ms)', { default: 0 }),
  ],
  async run(ctx, args) {
    const channel = channelArg(args);
    unwrap(
      await ctx.signalGenerator.call({
        kind: 'setSweep',
        channel,
        sweep: {
          fstart: numberArg(args, 'fstart'),
          fstop: numberArg(args, 'fstop'),
          time: numberArg(args, 'time'),
          rtime: numberArg(args, 'rtime'),
          htimeStart: numberArg(args, 'htime_start'),
          htimeStop: numberArg(args, 'htime_stop'),
        },
      })
    );
    if (booleanArg(args, 'send_on')) {
      unwrap(await ctx.signalGenerator.call({ kind: 'toggleOutput', channel, on: true }));
    }
    return true;
  },
};

export const autoscaleTask: TaskDefinition = {
  name: 'EDUX1002A_AUTO',
  displayName: 'Press Auto',
  device: 'edux1002a',
  description: 'Run the oscilloscope autoscale.',
  parameters: [],
  async run(ctx) {
    unwrap(await ctx.oscilloscope.call({ kind: 'autoscale' }));
    return true;
  },
};

export const INSTRUMENT_TASKS: readonly TaskDefinition[] = [
  toggleOutputTask,
  setWaveformTask,
  setSweepTask,
  autoscaleTask,
];
