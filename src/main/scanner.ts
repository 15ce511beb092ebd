import { ScannerStoppedError } from './errors.js';
import { logger } from './logger.js';
import type { DeviceProber } from './prober.js';
import { unreachableSnapshot } from './snapshot.js';
import type { StateStore } from './store.js';
import type { DeviceConfig, DeviceSnapshot, FleetSnapshot } from './types.js';

const log = logger.scope('scanner');

type SnapshotListener = (snapshot: FleetSnapshot) => void;

type CycleMode = 'scheduled' | 'on-demand';

export type CycleOptions = {
  probe: DeviceProber;
  concurrency: number;
  deadlineMs: number;
  scanIntervalSeconds: number;
  now?: () => number;
  signal?: AbortSignal;
};

export type ScannerOptions = {
  configs: readonly DeviceConfig[];
  probe: DeviceProber;
  store: StateStore;
  scanIntervalSeconds: number;
  concurrency?: number;
  cycleTimeoutMs?: number;
  now?: () => number;
};

export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> => {
  const results: R[] = new Array(items.length);
  let index = 0;

  const runners = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) break;
      results[current] = await worker(items[current]);
    }
  });

  await Promise.all(runners);
  return results;
};

/**
 * Probes every device once and assembles the next fleet snapshot in
 * configuration order. Devices still unresolved when the deadline passes (or
 * the signal aborts) are recorded as unreachable with their identity carried
 * forward.
 */
export const runCycle = async (
  configs: readonly DeviceConfig[],
  previous: FleetSnapshot,
  { probe, concurrency, deadlineMs, scanIntervalSeconds, now = Date.now, signal }: CycleOptions
): Promise<FleetSnapshot> => {
  const controller = new AbortController();
  const previousById = new Map(previous.devices.map((device) => [device.id, device]));

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<null>((resolve) => {
    const expire = () => {
      controller.abort();
      resolve(null);
    };
    timer = setTimeout(expire, deadlineMs);
    if (signal?.aborted) expire();
    signal?.addEventListener('abort', expire, { once: true });
  });

  const probeOne = async (config: DeviceConfig): Promise<DeviceSnapshot> => {
    const prior = previousById.get(config.id);
    if (controller.signal.aborted) return unreachableSnapshot(config, prior, now());
    const pending = probe(config, prior, controller.signal).catch((error: unknown) => {
      log.warn(`prober rejected for ${config.id}`, error);
      return null;
    });
    const result = await Promise.race([pending, deadline]);
    if (!result) {
      log.debug(`${config.id} unresolved at cycle deadline`);
      return unreachableSnapshot(config, prior, now());
    }
    return result;
  };

  try {
    const devices = await mapWithConcurrency(configs, concurrency, probeOne);
    return {
      generatedAt: Math.max(now(), previous.generatedAt + 1),
      devices,
      scanIntervalSeconds,
    };
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
};

/**
 * Scheduled and on-demand scans over a fixed device set. Only one cycle runs
 * at a time: a scheduled tick is skipped while one is in flight, an on-demand
 * trigger attaches to an in-flight scheduled cycle, and on-demand triggers that
 * arrive during an on-demand cycle share the single cycle queued behind it.
 */
export const createScanner = ({
  configs,
  probe,
  store,
  scanIntervalSeconds,
  concurrency = 16,
  cycleTimeoutMs,
  now = Date.now,
}: ScannerOptions) => {
  const intervalMs = scanIntervalSeconds * 1000;
  const deadlineMs = Math.min(cycleTimeoutMs ?? intervalMs, intervalMs);
  let timer: NodeJS.Timeout | null = null;
  let inFlight: { mode: CycleMode; promise: Promise<FleetSnapshot>; controller: AbortController } | null = null;
  let queued: Promise<FleetSnapshot> | null = null;
  let closed = false;
  const listeners = new Set<SnapshotListener>();

  const emit = (snapshot: FleetSnapshot) => {
    for (const listener of listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.error('snapshot listener failed', error);
      }
    }
  };

  const execute = async (mode: CycleMode, controller: AbortController) => {
    const startedAt = now();
    const next = await runCycle(configs, store.read(), {
      probe,
      concurrency,
      deadlineMs,
      scanIntervalSeconds,
      now,
      signal: controller.signal,
    });
    if (closed) throw new ScannerStoppedError();
    const published = store.publish(next);
    log.info(`${mode} cycle complete`, {
      devices: published.devices.length,
      up: published.devices.filter((device) => device.up).length,
      durationMs: now() - startedAt,
    });
    emit(published);
    return published;
  };

  const launch = (mode: CycleMode): Promise<FleetSnapshot> => {
    if (closed) return Promise.reject(new ScannerStoppedError());
    const controller = new AbortController();
    const promise = execute(mode, controller).finally(() => {
      if (inFlight?.promise === promise) inFlight = null;
    });
    inFlight = { mode, promise, controller };
    return promise;
  };

  const tick = async () => {
    if (inFlight || queued) {
      log.debug('scheduled cycle skipped, previous cycle still running');
      return;
    }
    try {
      await launch('scheduled');
    } catch (error) {
      if (!closed) log.error('scheduled cycle failed', error);
    }
  };

  const triggerScanNow = (): Promise<FleetSnapshot> => {
    if (closed) return Promise.reject(new ScannerStoppedError());
    if (inFlight?.mode === 'scheduled') return inFlight.promise;
    if (inFlight) {
      queued ??= inFlight.promise
        .then(
          () => undefined,
          () => undefined
        )
        .then(() => {
          queued = null;
          return launch('on-demand');
        });
      return queued;
    }
    return launch('on-demand');
  };

  const start = () => {
    if (timer || closed) return;
    void tick();
    timer = setInterval(() => void tick(), intervalMs);
    log.info('scanner started', { devices: configs.length, scanIntervalSeconds, concurrency, deadlineMs });
  };

  const stop = () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
      log.info('scanner stopped');
    }
  };

  const shutdown = () => {
    stop();
    closed = true;
    inFlight?.controller.abort();
  };

  const getCurrentSnapshot = () => store.read();

  const onSnapshot = (listener: SnapshotListener) => {
    listeners.add(listener);
    return () => listeners.delete(listener);
  };

  return {
    start,
    stop,
    shutdown,
    triggerScanNow,
    getCurrentSnapshot,
    onSnapshot,
    isRunning: () => timer !== null,
    isScanning: () => inFlight !== null,
  };
};

export type Scanner = ReturnType<typeof createScanner>;
