/**
 * Emulated EDUX1002A two-channel oscilloscope.
 *
 * Each waveform read returns a fresh acquisition: channel 1 carries a sine,
 * channel 2 a square wave, both advancing in phase between reads.
 */

import type { InstrumentEmulator } from '../links/SimulatedLink.js';

export const EDUX1002A_IDN = 'KEYSIGHT TECHNOLOGIES,EDUX1002A,CN00000001,02.10.2019111333';

const WAVEFORM_SOURCE = /^:WAVEFORM:SOURCE\s+CHANNEL([12])$/;
const WAVEFORM_POINTS = /^:WAVEFORM:POINTS\s+(\d+)$/;

export class Edux1002aEmulator implements InstrumentEmulator {
  private source: 1 | 2 = 1;
  private points = 100;
  private acquisitions = 0;
  private autoscaleCount = 0;

  get autoscales(): number {
    return this.autoscaleCount;
  }

  handle(command: string): string | undefined {
    const normalized = command.trim().toUpperCase();

    if (normalized === '*IDN?') {
      return EDUX1002A_IDN;
    }
    if (normalized === ':AUTOSCALE') {
      this.autoscaleCount += 1;
      return undefined;
    }
    if (normalized === ':WAVEFORM:FORMAT ASCII') {
      return undefined;
    }
    if (normalized === ':WAVEFORM:SOURCE?') {
      return `CHAN${this.source}`;
    }

    let match = WAVEFORM_SOURCE.exec(normalized);
    if (match) {
      this.source = match[1] === '2' ? 2 : 1;
      return undefined;
    }

    match = WAVEFORM_POINTS.exec(normalized);
    if (match) {
      const points = Number.parseInt(match[1] ?? '', 10);
      if (points > 0) this.points = points;
      return undefined;
    }

    if (normalized === ':WAVEFORM:DATA?') {
      return this.acquire().map((v) => v.toFixed(4)).join(',');
    }

    return undefined;
  }

  private acquire(): number[] {
    const phase = (this.acquisitions * Math.PI) / 8;
    this.acquisitions += 1;
    const samples: number[] = [];
    for (let i = 0; i < this.points; i++) {
      const angle = (2 * Math.PI * i) / this.points + phase;
      samples.push(this.source === 1 ? Math.sin(angle) : Math.sign(Math.sin(angle)) * 0.5);
    }
    return samples;
  }
}
