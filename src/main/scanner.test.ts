import { afterEach, describe, expect, it, vi } from 'vitest';
import { ScannerStoppedError } from './errors.js';
import type { DeviceProber } from './prober.js';
import { createScanner, mapWithConcurrency, runCycle, type Scanner } from './scanner.js';
import { initialFleet } from './snapshot.js';
import { createStateStore } from './store.js';
import type { DeviceConfig, DeviceSnapshot, FleetSnapshot } from './types.js';

const configs: DeviceConfig[] = [
  { id: 'a', name: 'A', ip: '10.0.0.1' },
  { id: 'b', name: 'B', ip: '10.0.0.2', mac: 'aa:bb:cc:dd:ee:02' },
  { id: 'c', name: 'C', ip: '10.0.0.3' },
];

const upSnapshot = (config: DeviceConfig): DeviceSnapshot => ({
  id: config.id,
  name: config.name,
  ip: config.ip,
  up: true,
  lastSeen: 1000,
  lastChecked: 1000,
  ips: [config.ip],
});

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const createGate = () => {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
};

describe('mapWithConcurrency', () => {
  it('keeps input order and respects the limit', async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms) => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(ms);
      active -= 1;
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40, 10]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('runCycle', () => {
  it('returns devices in configuration order whatever their finishing order', async () => {
    const probe: DeviceProber = async (config) => {
      await delay(config.id === 'a' ? 30 : 1);
      return upSnapshot(config);
    };
    const fleet = await runCycle(configs, initialFleet(configs, 30, 0), {
      probe,
      concurrency: 3,
      deadlineMs: 1000,
      scanIntervalSeconds: 30,
      now: () => 1000,
    });
    expect(fleet.devices.map((device) => device.id)).toEqual(['a', 'b', 'c']);
    expect(fleet.devices.every((device) => device.up)).toBe(true);
    expect(fleet.generatedAt).toBe(1000);
  });

  it('records devices still unresolved at the deadline as unreachable', async () => {
    let stalledSignal: AbortSignal | undefined;
    const probe: DeviceProber = (config, _previous, signal) => {
      if (config.id !== 'b') return Promise.resolve(upSnapshot(config));
      stalledSignal = signal;
      return new Promise(() => undefined);
    };
    const previous: FleetSnapshot = {
      generatedAt: 500,
      scanIntervalSeconds: 30,
      devices: [
        upSnapshot(configs[0]),
        { ...upSnapshot(configs[1]), lastSeen: 400, hostname: 'b.lan', mac: '11:22:33:44:55:66' },
        upSnapshot(configs[2]),
      ],
    };

    const fleet = await runCycle(configs, previous, {
      probe,
      concurrency: 3,
      deadlineMs: 30,
      scanIntervalSeconds: 30,
      now: () => 2000,
    });

    expect(fleet.devices.map((device) => device.up)).toEqual([true, false, true]);
    expect(fleet.devices[1]).toEqual({
      id: 'b',
      name: 'B',
      ip: '10.0.0.2',
      broadcast: undefined,
      up: false,
      lastSeen: 400,
      lastChecked: 2000,
      mac: '11:22:33:44:55:66',
      hostname: 'b.lan',
      ips: ['10.0.0.2'],
    });
    expect(stalledSignal?.aborted).toBe(true);
  });

  it('keeps generatedAt strictly increasing when the clock does not advance', async () => {
    const fleet = await runCycle(configs, initialFleet(configs, 30, 5000), {
      probe: async (config) => upSnapshot(config),
      concurrency: 1,
      deadlineMs: 1000,
      scanIntervalSeconds: 30,
      now: () => 5000,
    });
    expect(fleet.generatedAt).toBe(5001);
  });

  it('treats a rejecting prober as unreachable', async () => {
    const probe: DeviceProber = async (config) => {
      if (config.id === 'c') throw new Error('boom');
      return upSnapshot(config);
    };
    const fleet = await runCycle(configs, initialFleet(configs, 30, 0), {
      probe,
      concurrency: 2,
      deadlineMs: 1000,
      scanIntervalSeconds: 30,
      now: () => 1000,
    });
    expect(fleet.devices[2].up).toBe(false);
    expect(fleet.devices[2].lastChecked).toBe(1000);
  });
});

describe('createScanner', () => {
  let scanner: Scanner | undefined;

  afterEach(() => {
    scanner?.shutdown();
    scanner = undefined;
  });

  const setup = (probe: DeviceProber) => {
    const store = createStateStore(initialFleet(configs, 30, 0));
    const created = createScanner({ configs, probe, store, scanIntervalSeconds: 30, now: () => 1000 });
    scanner = created;
    return { scanner: created, store };
  };

  it('runs a second cycle for concurrent on-demand triggers', async () => {
    const probe = vi.fn<DeviceProber>(async (config) => upSnapshot(config));
    const { scanner } = setup(probe);

    const first = scanner.triggerScanNow();
    const second = scanner.triggerScanNow();
    const third = scanner.triggerScanNow();

    expect(third).toBe(second);
    const [a, b] = await Promise.all([first, second]);
    expect(a).not.toBe(b);
    expect(a.generatedAt).toBe(1000);
    expect(b.generatedAt).toBe(1001);
    expect(scanner.getCurrentSnapshot()).toBe(b);
    expect(probe).toHaveBeenCalledTimes(configs.length * 2);
  });

  it('attaches an on-demand trigger to the scheduled cycle in flight', async () => {
    const gate = createGate();
    const probe = vi.fn<DeviceProber>(async (config) => {
      await gate.opened;
      return upSnapshot(config);
    });
    const { scanner } = setup(probe);

    scanner.start();
    expect(scanner.isScanning()).toBe(true);
    const first = scanner.triggerScanNow();
    const second = scanner.triggerScanNow();
    expect(second).toBe(first);

    scanner.stop();
    gate.open();
    const snapshot = await first;
    expect(snapshot.devices.every((device) => device.up)).toBe(true);
    expect(probe).toHaveBeenCalledTimes(configs.length);
  });

  it('skips a scheduled tick while a cycle is running', async () => {
    const gate = createGate();
    const probe = vi.fn<DeviceProber>(async (config) => {
      await gate.opened;
      return upSnapshot(config);
    });
    const { scanner } = setup(probe);

    const pending = scanner.triggerScanNow();
    scanner.start();
    expect(scanner.isRunning()).toBe(true);
    scanner.stop();

    gate.open();
    await pending;
    expect(probe).toHaveBeenCalledTimes(configs.length);
    expect(scanner.isScanning()).toBe(false);
  });

  it('notifies snapshot listeners until they unsubscribe', async () => {
    const { scanner } = setup(async (config) => upSnapshot(config));
    const listener = vi.fn();
    const unsubscribe = scanner.onSnapshot(listener);

    const published = await scanner.triggerScanNow();
    unsubscribe();
    await scanner.triggerScanNow();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(published);
  });

  it('rejects triggers after shutdown and keeps serving the last snapshot', async () => {
    const { scanner, store } = setup(async (config) => upSnapshot(config));
    const published = await scanner.triggerScanNow();

    scanner.shutdown();

    await expect(scanner.triggerScanNow()).rejects.toBeInstanceOf(ScannerStoppedError);
    expect(scanner.getCurrentSnapshot()).toBe(published);
    expect(scanner.getCurrentSnapshot()).toBe(store.read());
    expect(scanner.isRunning()).toBe(false);
  });

  it('abandons the cycle in flight on shutdown without publishing', async () => {
    const { scanner, store } = setup(() => new Promise(() => undefined));
    const initial = store.read();

    const pending = scanner.triggerScanNow();
    scanner.shutdown();

    await expect(pending).rejects.toBeInstanceOf(ScannerStoppedError);
    expect(scanner.getCurrentSnapshot()).toBe(initial);
  });
});
