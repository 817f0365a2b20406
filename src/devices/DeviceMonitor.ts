/**
 * Periodic device probe.
 *
 * Each poll refreshes the liveness of every manager and, when the
 * oscilloscope is up, acquires one waveform per channel into its buffers.
 * A poll that is still running when the next interval fires is skipped.
 */

import { errorMessage } from '../core/errors.js';
import { createLogger } from '../logging/logger.js';
import type { OscilloscopeManager } from './OscilloscopeManager.js';
import type { SignalGeneratorManager } from './SignalGeneratorManager.js';
import type { DeviceId } from './types.js';

const log = createLogger('device-monitor');

export interface DeviceMonitorStatus {
  running: boolean;
  intervalMs: number;
  inFlight: boolean;
  lastRunAt?: string;
  lastRunSummary?: PollSummary;
  errorStreak: number;
  lastError?: string;
}

export interface PollSummary {
  alive: Partial<Record<DeviceId, boolean>>;
  buffered: number;
  skippedBusy?: boolean;
  timestamp: string;
}

export class DeviceMonitor {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<PollSummary> | null = null;
  private intervalMs: number;
  private lastRunAt: string | undefined;
  private lastRunSummary: PollSummary | undefined;
  private errorStreak = 0;
  private lastError: string | undefined;

  constructor(
    private readonly signalGenerator: SignalGeneratorManager,
    private readonly oscilloscope: OscilloscopeManager,
    intervalMs = 1_000
  ) {
    this.intervalMs = intervalMs;
  }

  async pollOnce(): Promise<PollSummary> {
    if (this.inFlight) {
      return { alive: {}, buffered: 0, skippedBusy: true, timestamp: new Date().toISOString() };
    }
    const task = this.pollOnceInternal();
    this.inFlight = task;
    try {
      const summary = await task;
      this.errorStreak = 0;
      this.lastError = undefined;
      return summary;
    } finally {
      this.inFlight = null;
    }
  }

  private async pollOnceInternal(): Promise<PollSummary> {
    const alive: Partial<Record<DeviceId, boolean>> = {};
    alive[this.signalGenerator.deviceId] = await this.signalGenerator.refreshLiveness();
    const scopeAlive = await this.oscilloscope.refreshLiveness();
    alive[this.oscilloscope.deviceId] = scopeAlive;

    let buffered = 0;
    if (scopeAlive) {
      for (const channel of [1, 2] as const) {
        if (await this.oscilloscope.updateBuffer(channel)) buffered += 1;
      }
    }

    const summary: PollSummary = { alive, buffered, timestamp: new Date().toISOString() };
    this.lastRunAt = summary.timestamp;
    this.lastRunSummary = summary;
    return summary;
  }

  start(intervalMs: number = this.intervalMs): DeviceMonitorStatus {
    if (this.timer) {
      return this.status();
    }
    this.intervalMs = intervalMs;
    this.timer = setInterval(() => {
      void this.pollOnce().catch((err: unknown) => {
        this.errorStreak += 1;
        this.lastError = errorMessage(err);
        log.error({ err: this.lastError, errorStreak: this.errorStreak }, 'Device poll failed');
      });
    }, this.intervalMs);
    this.timer.unref();
    log.info({ intervalMs: this.intervalMs }, 'Device monitor started');
    return this.status();
  }

  stop(): DeviceMonitorStatus {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Device monitor stopped');
    }
    return this.status();
  }

  status(): DeviceMonitorStatus {
    return {
      running: this.timer !== null,
      intervalMs: this.intervalMs,
      inFlight: this.inFlight !== null,
      ...(this.lastRunAt ? { lastRunAt: this.lastRunAt } : {}),
      ...(this.lastRunSummary ? { lastRunSummary: this.lastRunSummary } : {}),
      errorStreak: this.errorStreak,
      ...(this.lastError ? { lastError: this.lastError } : {}),
    };
  }
}
