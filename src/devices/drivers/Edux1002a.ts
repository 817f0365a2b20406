/**
 * Driver for the EDUX1002A oscilloscope.
 */

import type { InstrumentLink, OutputChannel } from '../types.js';

export const EDUX1002A_IDN_MATCH = 'EDUX1002A';

/**
 * Parse an ASCII waveform block. A leading IEEE 488.2 definite-length header
 * (`#<n><length>`) is skipped.
 */
export function parseWaveformData(response: string): number[] {
  let body = response.trim();
  if (body.startsWith('#')) {
    const digits = Number.parseInt(body.charAt(1), 10);
    body = Number.isInteger(digits) ? body.slice(2 + digits) : body;
  }
  if (body.length === 0) return [];
  return body
    .split(',')
    .map((part) => Number(part.trim()))
    .filter((value) => Number.isFinite(value));
}

export class Edux1002a {
  constructor(readonly link: InstrumentLink) {}

  autoscale(): Promise<void> {
    return this.link.write(':AUToscale');
  }

  async readWaveform(channel: OutputChannel): Promise<number[]> {
    await this.link.write(`:WAVeform:SOURce CHANnel${channel}`);
    await this.link.write(':WAVeform:FORMat ASCii');
    return parseWaveformData(await this.link.query(':WAVeform:DATA?'));
  }
}
