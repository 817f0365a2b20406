/**
 * Device lifecycle management.
 *
 * A manager owns one instrument class. In mock mode it serves a simulated
 * instrument that can be killed and revived; in hardware mode it runs
 * discovery over the configured resources. Either way it records when the
 * instrument was first seen alive under `<IDN>_last_alive` in the state
 * store, and it is the only writer of that key.
 */

import { DeviceOperationError, errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import type { StateStore } from '../store/StateStore.js';
import type { DeviceDetector } from './DeviceDetector.js';
import { formatDuration } from './duration.js';
import { SimulatedLink, type InstrumentEmulator } from './links/SimulatedLink.js';
import type {
  CallResult,
  DeviceId,
  DeviceOperation,
  DeviceState,
  DeviceStatus,
  InstrumentLink,
} from './types.js';

const log = createLogger('device-manager');

export interface DeviceManagerOptions {
  store: StateStore;
  /** Serve the simulated instrument instead of probing hardware */
  hardwareMock: boolean;
  detector: DeviceDetector;
  /** Epoch ms clock (default: Date.now) */
  now?: () => number;
}

/**
 * What a concrete manager contributes: identity and how to build its driver.
 */
export interface DeviceDescriptor<TDriver> {
  deviceId: DeviceId;
  /** Substring of the `*IDN?` reply that identifies the instrument */
  idn: string;
  createEmulator(): InstrumentEmulator;
  createDriver(link: InstrumentLink): TDriver;
}

export interface DeviceHandle<TDriver> {
  driver: TDriver;
  link: InstrumentLink;
  simulated: boolean;
}

export abstract class DeviceManager<TDriver> {
  readonly deviceId: DeviceId;
  readonly idn: string;
  readonly hardwareMock: boolean;
  readonly simulatedLink: SimulatedLink;
  protected readonly store: StateStore;
  protected readonly now: () => number;
  private readonly detector: DeviceDetector;
  private readonly createDriver: (link: InstrumentLink) => TDriver;
  private readonly simulatedHandle: DeviceHandle<TDriver>;
  private hardwareHandle: DeviceHandle<TDriver> | null = null;
  private resolving: Promise<DeviceHandle<TDriver> | null> | null = null;
  private currentState: DeviceState = 'uninitialized';

  /** Operation kinds this instrument class implements */
  protected abstract readonly operations: ReadonlySet<DeviceOperation['kind']>;

  constructor(descriptor: DeviceDescriptor<TDriver>, options: DeviceManagerOptions) {
    this.deviceId = descriptor.deviceId;
    this.idn = descriptor.idn;
    this.hardwareMock = options.hardwareMock;
    this.store = options.store;
    this.detector = options.detector;
    this.now = options.now ?? Date.now;
    this.createDriver = descriptor.createDriver;
    this.simulatedLink = new SimulatedLink(`SIM::${descriptor.idn}`, descriptor.createEmulator());
    this.simulatedHandle = {
      driver: descriptor.createDriver(this.simulatedLink),
      link: this.simulatedLink,
      simulated: true,
    };
  }

  /**
   * Carry out a supported operation on the driver.
   */
  protected abstract perform(driver: TDriver, operation: DeviceOperation): Promise<void>;

  get state(): DeviceState {
    return this.currentState;
  }

  get killed(): boolean {
    return this.simulatedLink.killed;
  }

  get lastAliveKey(): string {
    return `${this.idn}_last_alive`;
  }

  /**
   * Resolve the current instrument and persist its liveness.
   * Returns null when the simulated instrument is killed or no hardware matches.
   */
  async getDevice(): Promise<DeviceHandle<TDriver> | null> {
    const handle = this.hardwareMock ? this.resolveSimulated() : await this.resolveHardware();
    await this.recordLiveness(handle !== null);
    return handle;
  }

  /**
   * Run a device operation. Never throws: absence, an operation this
   * instrument does not implement and I/O failures come back as sentinels.
   */
  async call(operation: DeviceOperation): Promise<CallResult> {
    if (!this.operations.has(operation.kind)) {
      log.error({ deviceId: this.deviceId, operation: operation.kind }, 'Operation not supported');
      return {
        ok: false,
        reason: 'unsupported',
        message: `${this.idn} does not support ${operation.kind}`,
      };
    }
    return this.withDevice(operation.kind, (driver) => this.perform(driver, operation));
  }

  async isAlive(): Promise<boolean> {
    if (this.hardwareMock) {
      return !this.simulatedLink.killed;
    }
    if (!this.hardwareHandle) {
      return false;
    }
    return this.answers(this.hardwareHandle.link);
  }

  /**
   * Probe the instrument and persist the outcome. In hardware mode a failed
   * probe re-runs discovery so a reconnected instrument is picked up.
   */
  async refreshLiveness(): Promise<boolean> {
    const alive = await this.isAlive();
    if (!alive && !this.hardwareMock) {
      return (await this.getDevice()) !== null;
    }
    if (this.hardwareMock) {
      this.currentState = alive ? 'mock_alive' : 'mock_dead';
    } else {
      this.currentState = 'hardware_alive';
    }
    await this.recordLiveness(alive);
    return alive;
  }

  async lastAlive(): Promise<number | null> {
    const value = await this.store.get(this.lastAliveKey);
    return typeof value === 'number' ? value : null;
  }

  async uptime(): Promise<string> {
    return this.formatUptime(await this.lastAlive());
  }

  /**
   * Kill or revive the simulated instrument. Liveness is persisted right
   * away when the simulated instrument is the one in use.
   */
  async setMockKilled(killed: boolean): Promise<void> {
    this.simulatedLink.setKilled(killed);
    log.info({ deviceId: this.deviceId, killed }, 'Simulated instrument state changed');
    if (this.hardwareMock) {
      await this.refreshLiveness();
    }
  }

  async status(): Promise<DeviceStatus> {
    const alive = await this.isAlive();
    const lastAlive = await this.lastAlive();
    return {
      deviceId: this.deviceId,
      idn: this.idn,
      simulated: this.hardwareMock,
      killed: this.simulatedLink.killed,
      state: this.currentState,
      alive,
      lastAlive,
      uptime: this.formatUptime(lastAlive),
    };
  }

  async close(): Promise<void> {
    if (this.resolving) {
      await this.resolving.catch((err: unknown) => {
        log.warn({ deviceId: this.deviceId, err: errorMessage(err) }, 'Discovery failed during close');
        return null;
      });
    }
    await this.dropHardware();
  }

  /**
   * Resolve the device and run `fn` on its driver, folding absence and
   * errors into a CallResult.
   */
  protected async withDevice<T>(action: string, fn: (driver: TDriver) => Promise<T>): Promise<CallResult<T>> {
    const handle = await this.getDevice();
    if (!handle) {
      log.error({ deviceId: this.deviceId, action }, 'No device instance available');
      return { ok: false, reason: 'device_absent', message: `${this.idn} is not available` };
    }
    try {
      return { ok: true, value: await fn(handle.driver) };
    } catch (err) {
      log.error({ deviceId: this.deviceId, action, err: errorMessage(err) }, 'Device operation failed');
      return { ok: false, reason: 'failed', message: errorMessage(err) };
    }
  }

  protected unsupported(operation: DeviceOperation): never {
    throw new DeviceOperationError('unsupported', `${this.idn} does not support ${operation.kind}`);
  }

  private resolveSimulated(): DeviceHandle<TDriver> | null {
    if (this.simulatedLink.killed) {
      this.currentState = 'mock_dead';
      return null;
    }
    this.currentState = 'mock_alive';
    return this.simulatedHandle;
  }

  /**
   * Concurrent callers share one resolution, so only one link is ever open.
   */
  private resolveHardware(): Promise<DeviceHandle<TDriver> | null> {
    if (!this.resolving) {
      this.resolving = this.discoverHardware().finally(() => {
        this.resolving = null;
      });
    }
    return this.resolving;
  }

  private async discoverHardware(): Promise<DeviceHandle<TDriver> | null> {
    if (this.hardwareHandle && (await this.answers(this.hardwareHandle.link))) {
      this.currentState = 'hardware_alive';
      return this.hardwareHandle;
    }
    await this.dropHardware();

    const link = await this.detector.detect(this.idn);
    if (!link) {
      this.currentState = 'hardware_absent';
      return null;
    }
    this.hardwareHandle = { driver: this.createDriver(link), link, simulated: false };
    this.currentState = 'hardware_alive';
    return this.hardwareHandle;
  }

  private async answers(link: InstrumentLink): Promise<boolean> {
    try {
      return (await link.query('*IDN?')).includes(this.idn);
    } catch (err) {
      log.debug({ deviceId: this.deviceId, err: errorMessage(err) }, 'Identification probe failed');
      return false;
    }
  }

  private async dropHardware(): Promise<void> {
    const handle = this.hardwareHandle;
    this.hardwareHandle = null;
    if (!handle) return;
    try {
      await handle.link.close();
    } catch (err) {
      log.warn({ deviceId: this.deviceId, err: errorMessage(err) }, 'Error closing instrument link');
    }
  }

  /**
   * Stamp the first alive observation; clear it when the device is gone.
   */
  private async recordLiveness(alive: boolean): Promise<void> {
    const key = this.lastAliveKey;
    await this.store.update((draft) => {
      if (!alive) {
        draft[key] = null;
      } else if (typeof draft[key] !== 'number') {
        draft[key] = this.now();
      }
    });
  }

  private formatUptime(lastAlive: number | null): string {
    if (lastAlive === null) return 'N/A';
    return formatDuration((this.now() - lastAlive) / 1000);
  }
}
