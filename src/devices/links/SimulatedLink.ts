/**
 * In-process link to an instrument emulator. Used in mock mode and in tests.
 */

import { LinkError } from '../../core/errors.js';
import type { InstrumentLink } from '../types.js';

/**
 * Emulates an instrument's SCPI subset. Returns the response line for a
 * query, or `undefined` for commands that answer nothing.
 */
export interface InstrumentEmulator {
  handle(command: string): string | undefined;
}

export class SimulatedLink implements InstrumentLink {
  readonly resource: string;
  private readonly emulator: InstrumentEmulator;
  private killedFlag = false;
  private readonly commandLog: string[] = [];

  constructor(resource: string, emulator: InstrumentEmulator) {
    this.resource = resource;
    this.emulator = emulator;
  }

  get killed(): boolean {
    return this.killedFlag;
  }

  /**
   * A killed instrument stops answering until revived.
   */
  setKilled(killed: boolean): void {
    this.killedFlag = killed;
  }

  /** Commands received so far, oldest first */
  get commands(): readonly string[] {
    return this.commandLog;
  }

  async query(command: string): Promise<string> {
    const response = this.dispatch(command);
    if (response === undefined) {
      throw new LinkError(this.resource, `no response to '${command}'`);
    }
    return response;
  }

  async write(command: string): Promise<void> {
    this.dispatch(command);
  }

  async close(): Promise<void> {
    // Emulator state outlives the link.
  }

  private dispatch(command: string): string | undefined {
    if (this.killedFlag) {
      throw new LinkError(this.resource, 'instrument not responding');
    }
    this.commandLog.push(command);
    return this.emulator.handle(command);
  }
}
