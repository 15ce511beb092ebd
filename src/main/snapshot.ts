import type { DeviceConfig, DeviceSnapshot, FleetSnapshot, Gns3Status, SshMetrics } from './types.js';

/** A percentage is kept only when it is a finite number within [0, 100]. */
export const toPercent = (value: unknown): number | undefined => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  if (value < 0 || value > 100) return undefined;
  return value;
};

export const mergeIps = (known: readonly string[], discovered: readonly string[]): string[] => {
  const merged = [...known];
  for (const ip of discovered) {
    if (ip && !merged.includes(ip)) merged.push(ip);
  }
  return merged;
};

export const sanitizeSshMetrics = (metrics: SshMetrics): SshMetrics => {
  const usersActive =
    typeof metrics.usersActive === 'number' && Number.isInteger(metrics.usersActive) && metrics.usersActive >= 0
      ? metrics.usersActive
      : undefined;
  return {
    usersActive,
    cpuPercent: toPercent(metrics.cpuPercent),
    memPercent: toPercent(metrics.memPercent),
    diskPercent: toPercent(metrics.diskPercent),
  };
};

export const sanitizeGns3Status = (status: Gns3Status): Gns3Status => ({
  ...status,
  projectsOpen: Number.isFinite(status.projectsOpen) && status.projectsOpen > 0 ? Math.floor(status.projectsOpen) : 0,
  cpuPercent: toPercent(status.cpuPercent),
  memPercent: toPercent(status.memPercent),
});

/** The snapshot a device has before it was ever probed. */
export const initialSnapshot = (config: DeviceConfig): DeviceSnapshot => ({
  id: config.id,
  name: config.name,
  ip: config.ip,
  broadcast: config.broadcast,
  up: false,
  mac: config.mac,
  ips: [],
});

/**
 * Down snapshot that keeps the identity fields of `previous`. Used both when
 * the echo request fails and when a device is still unresolved at the cycle
 * deadline.
 */
export const unreachableSnapshot = (
  config: DeviceConfig,
  previous: DeviceSnapshot | undefined,
  checkedAt: number
): DeviceSnapshot => {
  const base = previous ?? initialSnapshot(config);
  return {
    id: config.id,
    name: config.name,
    ip: config.ip,
    broadcast: config.broadcast,
    up: false,
    lastSeen: base.lastSeen,
    lastChecked: checkedAt,
    mac: base.mac ?? config.mac,
    hostname: base.hostname,
    ips: [...base.ips],
  };
};

export const initialFleet = (
  configs: readonly DeviceConfig[],
  scanIntervalSeconds: number,
  generatedAt: number
): FleetSnapshot => ({
  generatedAt,
  devices: configs.map(initialSnapshot),
  scanIntervalSeconds,
});

const freezeDevice = (device: DeviceSnapshot): DeviceSnapshot => {
  Object.freeze(device.ips);
  if (device.sshMetrics) Object.freeze(device.sshMetrics);
  if (device.gns3Status) Object.freeze(device.gns3Status);
  return Object.freeze(device);
};

export const freezeFleet = (fleet: FleetSnapshot): FleetSnapshot => {
  fleet.devices.forEach(freezeDevice);
  Object.freeze(fleet.devices);
  return Object.freeze(fleet);
};
