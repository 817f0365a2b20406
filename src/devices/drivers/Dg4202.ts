/**
 * Driver for the DG4202 signal generator.
 */

import type {
  ChannelOutput,
  InstrumentLink,
  OutputChannel,
  SignalGeneratorData,
  SweepSettings,
  WaveformSettings,
} from '../types.js';
import { isWaveformType } from '../types.js';

export const DG4202_IDN_MATCH = 'DG4202';

/**
 * Parse an `:APPLy?` reply such as `SIN,1000,5,0,0`.
 */
export function parseApplyResponse(response: string): WaveformSettings | null {
  const [type, ...rest] = response.replace(/"/g, '').split(',').map((part) => part.trim());
  if (!isWaveformType(type)) return null;
  const [frequency, amplitude, offset] = rest.map(Number);
  if (
    frequency === undefined || !Number.isFinite(frequency) ||
    amplitude === undefined || !Number.isFinite(amplitude) ||
    offset === undefined || !Number.isFinite(offset)
  ) {
    return null;
  }
  return { type, frequency, amplitude, offset };
}

export class Dg4202 {
  constructor(readonly link: InstrumentLink) {}

  setOutput(channel: OutputChannel, on: boolean): Promise<void> {
    return this.link.write(`:OUTPut${channel}:STATe ${on ? 'ON' : 'OFF'}`);
  }

  applyWaveform(channel: OutputChannel, waveform: WaveformSettings): Promise<void> {
    return this.link.write(
      `:SOURce${channel}:APPLy:${waveform.type} ${waveform.frequency},${waveform.amplitude},${waveform.offset}`
    );
  }

  async configureSweep(channel: OutputChannel, sweep: SweepSettings): Promise<void> {
    const source = `:SOURce${channel}`;
    await this.link.write(`${source}:FREQuency:STARt ${sweep.fstart}`);
    await this.link.write(`${source}:FREQuency:STOP ${sweep.fstop}`);
    await this.link.write(`${source}:SWEep:TIME ${sweep.time}`);
    await this.link.write(`${source}:SWEep:RTIMe ${sweep.rtime}`);
    await this.link.write(`${source}:SWEep:HTIMe:STARt ${sweep.htimeStart}`);
    await this.link.write(`${source}:SWEep:HTIMe:STOP ${sweep.htimeStop}`);
    await this.link.write(`${source}:SWEep:STATe ON`);
  }

  async readChannel(channel: OutputChannel): Promise<ChannelOutput> {
    const output = await this.link.query(`:OUTPut${channel}:STATe?`);
    const apply = await this.link.query(`:SOURce${channel}:APPLy?`);
    const sweep = await this.link.query(`:SOURce${channel}:SWEep:STATe?`);
    return {
      channel,
      output: output.trim().toUpperCase() === 'ON',
      waveform: parseApplyResponse(apply),
      sweepEnabled: sweep.trim().toUpperCase() === 'ON',
    };
  }

  async readAll(): Promise<SignalGeneratorData> {
    return { channels: [await this.readChannel(1), await this.readChannel(2)] };
  }
}
