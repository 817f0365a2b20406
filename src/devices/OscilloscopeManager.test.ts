import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import { StateStore } from '../store/StateStore.js';
import { DeviceDetector } from './DeviceDetector.js';
import { OscilloscopeManager } from './OscilloscopeManager.js';
import { SignalGeneratorManager } from './SignalGeneratorManager.js';
import { DeviceMonitor } from './DeviceMonitor.js';

describe('OscilloscopeManager', () => {
  const testDir = resolve(process.cwd(), 'tmp/oscilloscope-manager-test');
  let store: StateStore;
  const detector = new DeviceDetector({
    async listResources() {
      return [];
    },
    async open(resource) {
      throw new Error(`unexpected open of ${resource}`);
    },
  });

  beforeEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    await mkdir(testDir, { recursive: true });
    store = new StateStore(resolve(testDir, 'state.json'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function createScope(bufferSize = 150): OscilloscopeManager {
    return new OscilloscopeManager({ store, hardwareMock: true, detector, bufferSize });
  }

  it('fills the channel buffer up to its capacity', async () => {
    const scope = createScope();

    expect(await scope.updateBuffer(1)).toBe(true);
    expect((await scope.getData(1))?.samples).toHaveLength(100);

    expect(await scope.updateBuffer(1)).toBe(true);
    expect((await scope.getData(1))?.samples).toHaveLength(150);
    expect((await scope.getData(2))?.samples).toEqual([]);
  });

  it('returns null data and skips acquisition when killed', async () => {
    const scope = createScope();
    await scope.setMockKilled(true);

    expect(await scope.updateBuffer(1)).toBe(false);
    expect(await scope.getData(1)).toBeNull();
  });

  it('autoscales', async () => {
    const scope = createScope();
    expect(await scope.call({ kind: 'autoscale' })).toEqual({ ok: true, value: undefined });
    expect(scope.simulatedLink.commands).toContain(':AUToscale');
  });

  it('rejects signal generator operations', async () => {
    const scope = createScope();
    const result = await scope.call({ kind: 'toggleOutput', channel: 1, on: true });
    expect(result).toEqual({ ok: false, reason: 'unsupported', message: 'EDUX1002A does not support toggleOutput' });
  });
});

describe('DeviceMonitor', () => {
  const testDir = resolve(process.cwd(), 'tmp/device-monitor-test');
  let store: StateStore;
  const detector = new DeviceDetector({
    async listResources() {
      return [];
    },
    async open(resource) {
      throw new Error(`unexpected open of ${resource}`);
    },
  });

  beforeEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    await mkdir(testDir, { recursive: true });
    store = new StateStore(resolve(testDir, 'state.json'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('refreshes liveness and buffers both scope channels', async () => {
    const generator = new SignalGeneratorManager({ store, hardwareMock: true, detector, now: () => 42 });
    const scope = new OscilloscopeManager({ store, hardwareMock: true, detector, bufferSize: 64, now: () => 42 });
    const monitor = new DeviceMonitor(generator, scope, 1_000);

    const summary = await monitor.pollOnce();

    expect(summary.alive).toEqual({ dg4202: true, edux1002a: true });
    expect(summary.buffered).toBe(2);
    expect(await store.read()).toEqual({ DG4202_last_alive: 42, EDUX1002A_last_alive: 42 });
    expect((await scope.getData(2))?.samples).toHaveLength(64);
  });

  it('skips buffering while the scope is down', async () => {
    const generator = new SignalGeneratorManager({ store, hardwareMock: true, detector });
    const scope = new OscilloscopeManager({ store, hardwareMock: true, detector, bufferSize: 64 });
    await scope.setMockKilled(true);
    const monitor = new DeviceMonitor(generator, scope);

    const summary = await monitor.pollOnce();

    expect(summary.alive).toEqual({ dg4202: true, edux1002a: false });
    expect(summary.buffered).toBe(0);
  });

  it('skips a poll while another is running', async () => {
    const generator = new SignalGeneratorManager({ store, hardwareMock: true, detector });
    const scope = new OscilloscopeManager({ store, hardwareMock: true, detector, bufferSize: 64 });
    const monitor = new DeviceMonitor(generator, scope);

    const [first, second] = await Promise.all([monitor.pollOnce(), monitor.pollOnce()]);

    expect(first.skippedBusy).toBeUndefined();
    expect(second.skippedBusy).toBe(true);
  });

  it('starts and stops its timer', () => {
    const generator = new SignalGeneratorManager({ store, hardwareMock: true, detector });
    const scope = new OscilloscopeManager({ store, hardwareMock: true, detector, bufferSize: 64 });
    const monitor = new DeviceMonitor(generator, scope, 5_000);

    expect(monitor.start().running).toBe(true);
    expect(monitor.stop()).toMatchObject({ running: false, intervalMs: 5_000, inFlight: false, errorStreak: 0 });
  });
});
