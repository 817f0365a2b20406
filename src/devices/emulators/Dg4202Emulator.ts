/**
 * Emulated DG4202 two-channel function/arbitrary waveform generator.
 */

import type { InstrumentEmulator } from '../links/SimulatedLink.js';
import { isWaveformType, type WaveformSettings } from '../types.js';

export const DG4202_IDN = 'Rigol Technologies,DG4202,DG4E000000001,00.01.14';

type ChannelState = {
  output: boolean;
  waveform: WaveformSettings;
  sweep: {
    enabled: boolean;
    fstart: number;
    fstop: number;
    time: number;
    rtime: number;
    htimeStart: number;
    htimeStop: number;
  };
};

function defaultChannel(): ChannelState {
  return {
    output: false,
    waveform: { type: 'SIN', frequency: 1000, amplitude: 5, offset: 0 },
    sweep: { enabled: false, fstart: 100, fstop: 1000, time: 1, rtime: 0, htimeStart: 0, htimeStop: 0 },
  };
}

const OUTPUT_STATE = /^:OUTPUT([12]):STATE\s+(ON|OFF)$/;
const OUTPUT_STATE_QUERY = /^:OUTPUT([12]):STATE\?$/;
const APPLY = /^:SOURCE([12]):APPLY:([A-Z]+)\s+([^,]+),([^,]+),([^,]+)$/;
const APPLY_QUERY = /^:SOURCE([12]):APPLY\?$/;
const SWEEP_STATE = /^:SOURCE([12]):SWEEP:STATE\s+(ON|OFF)$/;
const SWEEP_STATE_QUERY = /^:SOURCE([12]):SWEEP:STATE\?$/;
const SWEEP_VALUE = /^:SOURCE([12]):(FREQUENCY:START|FREQUENCY:STOP|SWEEP:TIME|SWEEP:RTIME|SWEEP:HTIME:START|SWEEP:HTIME:STOP)\s+(\S+)$/;

const SWEEP_FIELDS = {
  'FREQUENCY:START': 'fstart',
  'FREQUENCY:STOP': 'fstop',
  'SWEEP:TIME': 'time',
  'SWEEP:RTIME': 'rtime',
  'SWEEP:HTIME:START': 'htimeStart',
  'SWEEP:HTIME:STOP': 'htimeStop',
} as const;

function isSweepField(value: string): value is keyof typeof SWEEP_FIELDS {
  return Object.prototype.hasOwnProperty.call(SWEEP_FIELDS, value);
}

export class Dg4202Emulator implements InstrumentEmulator {
  private readonly channels: Record<'1' | '2', ChannelState> = {
    '1': defaultChannel(),
    '2': defaultChannel(),
  };

  handle(command: string): string | undefined {
    const normalized = command.trim().toUpperCase();

    if (normalized === '*IDN?') {
      return DG4202_IDN;
    }

    let match = OUTPUT_STATE.exec(normalized);
    if (match) {
      this.channel(match[1]).output = match[2] === 'ON';
      return undefined;
    }

    match = OUTPUT_STATE_QUERY.exec(normalized);
    if (match) {
      return this.channel(match[1]).output ? 'ON' : 'OFF';
    }

    match = APPLY.exec(normalized);
    if (match) {
      const type = match[2];
      const [frequency, amplitude, offset] = [match[3], match[4], match[5]].map((v) => Number(v));
      if (
        isWaveformType(type) &&
        frequency !== undefined && Number.isFinite(frequency) &&
        amplitude !== undefined && Number.isFinite(amplitude) &&
        offset !== undefined && Number.isFinite(offset)
      ) {
        const state = this.channel(match[1]);
        state.waveform = { type, frequency, amplitude, offset };
        state.sweep.enabled = false;
      }
      return undefined;
    }

    match = APPLY_QUERY.exec(normalized);
    if (match) {
      const { type, frequency, amplitude, offset } = this.channel(match[1]).waveform;
      return `${type},${frequency},${amplitude},${offset},0`;
    }

    match = SWEEP_STATE.exec(normalized);
    if (match) {
      this.channel(match[1]).sweep.enabled = match[2] === 'ON';
      return undefined;
    }

    match = SWEEP_STATE_QUERY.exec(normalized);
    if (match) {
      return this.channel(match[1]).sweep.enabled ? 'ON' : 'OFF';
    }

    match = SWEEP_VALUE.exec(normalized);
    if (match) {
      const field = match[2] ?? '';
      const value = Number(match[3]);
      if (isSweepField(field) && Number.isFinite(value)) {
        this.channel(match[1]).sweep[SWEEP_FIELDS[field]] = value;
      }
      return undefined;
    }

    return undefined;
  }

  private channel(index: string | undefined): ChannelState {
    return index === '2' ? this.channels['2'] : this.channels['1'];
  }
}
