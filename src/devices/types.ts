/**
 * Device layer types.
 *
 * Instruments are reached through an InstrumentLink (a raw TCP socket for
 * hardware, an in-process emulator in mock mode). Drivers translate typed
 * operations to SCPI command strings and are written once against the link.
 */

export type DeviceId = 'dg4202' | 'edux1002a';

/**
 * Lifecycle state of a managed instrument.
 */
export type DeviceState =
  | 'uninitialized'
  | 'mock_alive'
  | 'mock_dead'
  | 'hardware_alive'
  | 'hardware_absent';

/**
 * Send-command / read-response transport to one instrument.
 */
export interface InstrumentLink {
  readonly resource: string;
  /** Send a command and wait for a single-line response */
  query(command: string): Promise<string>;
  /** Send a command that produces no response */
  write(command: string): Promise<void>;
  close(): Promise<void>;
}

export type OutputChannel = 1 | 2;

export const WAVEFORM_TYPES = ['SIN', 'SQU', 'RAMP', 'PULSE', 'NOISE', 'USER'] as const;
export type WaveformType = (typeof WAVEFORM_TYPES)[number];

export function isWaveformType(value: unknown): value is WaveformType {
  return typeof value === 'string' && WAVEFORM_TYPES.some((type) => type === value);
}

export interface WaveformSettings {
  type: WaveformType;
  /** Hz */
  frequency: number;
  /** Vpp */
  amplitude: number;
  /** V */
  offset: number;
}

export interface SweepSettings {
  /** Hz */
  fstart: number;
  /** Hz */
  fstop: number;
  /** s */
  time: number;
  /** ms */
  rtime: number;
  /** ms */
  htimeStart: number;
  /** ms */
  htimeStop: number;
}

/**
 * Closed set of operations a task can ask a device manager to carry out.
 */
export type DeviceOperation =
  | { kind: 'toggleOutput'; channel: OutputChannel; on: boolean }
  | { kind: 'setWaveform'; channel: OutputChannel; waveform: WaveformSettings }
  | { kind: 'setSweep'; channel: OutputChannel; sweep: SweepSettings }
  | { kind: 'autoscale' };

export type CallFailureReason = 'device_absent' | 'unsupported' | 'failed';

export type CallResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; reason: CallFailureReason; message: string };

export interface DeviceStatus {
  deviceId: DeviceId;
  idn: string;
  simulated: boolean;
  killed: boolean;
  state: DeviceState;
  alive: boolean;
  /** Epoch ms of the first alive observation since the device was last seen dead */
  lastAlive: number | null;
  uptime: string;
}

export interface ChannelOutput {
  channel: OutputChannel;
  output: boolean;
  waveform: WaveformSettings | null;
  sweepEnabled: boolean;
}

export interface SignalGeneratorData {
  channels: ChannelOutput[];
}

export interface OscilloscopeData {
  channel: OutputChannel;
  samples: number[];
}
