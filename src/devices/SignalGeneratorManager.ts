import { DeviceManager, type DeviceManagerOptions } from './DeviceManager.js';
import { DG4202_IDN_MATCH, Dg4202 } from './drivers/Dg4202.js';
import { Dg4202Emulator } from './emulators/Dg4202Emulator.js';
import type { DeviceOperation, SignalGeneratorData } from './types.js';

export class SignalGeneratorManager extends DeviceManager<Dg4202> {
  protected readonly operations = new Set<DeviceOperation['kind']>(['toggleOutput', 'setWaveform', 'setSweep']);

  constructor(options: DeviceManagerOptions) {
    super(
      {
        deviceId: 'dg4202',
        idn: DG4202_IDN_MATCH,
        createEmulator: () => new Dg4202Emulator(),
        createDriver: (link) => new Dg4202(link),
      },
      options
    );
  }

  protected perform(driver: Dg4202, operation: DeviceOperation): Promise<void> {
    switch (operation.kind) {
      case 'toggleOutput':
        return driver.setOutput(operation.channel, operation.on);
      case 'setWaveform':
        return driver.applyWaveform(operation.channel, operation.waveform);
      case 'setSweep':
        return driver.configureSweep(operation.channel, operation.sweep);
      default:
        return this.unsupported(operation);
    }
  }

  /**
   * Output state and waveform of both channels, or null when absent.
   */
  async getData(): Promise<SignalGeneratorData | null> {
    const result = await this.withDevice('readAll', (driver) => driver.readAll());
    return result.ok ? result.value : null;
  }
}
