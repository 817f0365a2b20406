import { ChannelBuffer } from './ChannelBuffer.js';
import { DeviceManager, type DeviceManagerOptions } from './DeviceManager.js';
import { EDUX1002A_IDN_MATCH, Edux1002a } from './drivers/Edux1002a.js';
import { Edux1002aEmulator } from './emulators/Edux1002aEmulator.js';
import type { DeviceOperation, OscilloscopeData, OutputChannel } from './types.js';

export interface OscilloscopeManagerOptions extends DeviceManagerOptions {
  /** Samples kept per channel */
  bufferSize: number;
}

export class OscilloscopeManager extends DeviceManager<Edux1002a> {
  protected readonly operations = new Set<DeviceOperation['kind']>(['autoscale']);
  private readonly buffers: Record<OutputChannel, ChannelBuffer>;

  constructor(options: OscilloscopeManagerOptions) {
    super(
      {
        deviceId: 'edux1002a',
        idn: EDUX1002A_IDN_MATCH,
        createEmulator: () => new Edux1002aEmulator(),
        createDriver: (link) => new Edux1002a(link),
      },
      options
    );
    this.buffers = {
      1: new ChannelBuffer(options.bufferSize),
      2: new ChannelBuffer(options.bufferSize),
    };
  }

  protected perform(driver: Edux1002a, operation: DeviceOperation): Promise<void> {
    switch (operation.kind) {
      case 'autoscale':
        return driver.autoscale();
      default:
        return this.unsupported(operation);
    }
  }

  /**
   * Acquire one waveform from the channel into its buffer.
   * Returns false when the instrument is absent or the read failed.
   */
  async updateBuffer(channel: OutputChannel): Promise<boolean> {
    const result = await this.withDevice('readWaveform', (driver) => driver.readWaveform(channel));
    if (!result.ok) return false;
    this.buffers[channel].push(result.value);
    return true;
  }

  /**
   * Buffered samples for the channel, or null when the instrument is absent.
   */
  async getData(channel: OutputChannel): Promise<OscilloscopeData | null> {
    const handle = await this.getDevice();
    if (!handle) return null;
    return { channel, samples: this.buffers[channel].values() };
  }
}
