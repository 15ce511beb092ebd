import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { ProbeContext, ProbeSuite } from './probes/index.js';
import {
  initialSnapshot,
  mergeIps,
  sanitizeGns3Status,
  sanitizeSshMetrics,
  unreachableSnapshot,
} from './snapshot.js';
import { failure, type DeviceConfig, type DeviceSnapshot, type ProbeResult } from './types.js';

const log = logger.scope('prober');

export type ProbeTimeouts = {
  pingMs: number;
  neighborMs: number;
  hostnameMs: number;
  sshMs: number;
  gns3Ms: number;
};

export const DEFAULT_PROBE_TIMEOUTS: ProbeTimeouts = {
  pingMs: 1500,
  neighborMs: 1000,
  hostnameMs: 400,
  sshMs: 8000,
  gns3Ms: 4000,
};

export type DeviceProber = (
  config: DeviceConfig,
  previous?: DeviceSnapshot,
  signal?: AbortSignal
) => Promise<DeviceSnapshot>;

type ProberOptions = {
  probes: ProbeSuite;
  timeouts?: Partial<ProbeTimeouts>;
  now?: () => number;
};

const guard = async <T>(label: string, config: DeviceConfig, pending: Promise<ProbeResult<T>>) => {
  try {
    const result = await pending;
    if (!result.ok && result.kind !== 'not_configured') {
      log.debug(`${label} failed for ${config.id} (${config.ip}): ${result.kind}`, result.message);
    }
    return result;
  } catch (error) {
    log.warn(`${label} threw for ${config.id}`, error);
    return failure('probe_error', errorMessage(error));
  }
};

/**
 * Folds every applicable probe for one device into a snapshot. The echo
 * request, neighbor resolution and reverse DNS run in sequence; SSH and GNS3
 * run alongside that chain whatever its outcome. Never rejects.
 */
export const createDeviceProber = ({ probes, timeouts = {}, now = Date.now }: ProberOptions): DeviceProber => {
  const limits: ProbeTimeouts = { ...DEFAULT_PROBE_TIMEOUTS, ...timeouts };

  return async (config, previous, signal) => {
    const base = previous ?? initialSnapshot(config);
    const context = (timeoutMs: number): ProbeContext => ({ timeoutMs, signal });

    const identity = async () => {
      const reach = await guard('reachability', config, probes.reachability(config, context(limits.pingMs)));
      if (!reach.ok) return { reach, neighbor: undefined, hostname: undefined };
      const neighbor = await guard('neighbor', config, probes.neighbor(config, context(limits.neighborMs)));
      const hostname = await guard('hostname', config, probes.hostname(config, context(limits.hostnameMs)));
      return { reach, neighbor, hostname };
    };

    const [chain, ssh, gns3] = await Promise.all([
      identity(),
      config.ssh ? guard('ssh', config, probes.sshMetrics(config, context(limits.sshMs))) : Promise.resolve(undefined),
      guard('gns3', config, probes.gns3Status(config, context(limits.gns3Ms))),
    ]);

    const checkedAt = now();
    const telemetry = {
      sshMetrics: ssh && ssh.ok ? sanitizeSshMetrics(ssh.value.metrics) : undefined,
      gns3Status: gns3.ok ? sanitizeGns3Status(gns3.value) : undefined,
    };

    if (!chain.reach.ok) {
      return { ...unreachableSnapshot(config, previous, checkedAt), ...telemetry };
    }

    const resolvedMac = chain.neighbor && chain.neighbor.ok ? chain.neighbor.value : '';
    const resolvedHostname = chain.hostname && chain.hostname.ok ? chain.hostname.value : '';
    const discovered = ssh && ssh.ok ? ssh.value.addresses : [];

    return {
      id: config.id,
      name: config.name,
      ip: config.ip,
      broadcast: config.broadcast,
      up: true,
      lastSeen: Math.max(checkedAt, base.lastSeen ?? 0),
      lastChecked: checkedAt,
      latencyMs: chain.reach.value.latencyMs,
      mac: resolvedMac || base.mac || config.mac,
      hostname: resolvedHostname || base.hostname,
      ips: mergeIps(base.ips, [config.ip, ...discovered]),
      ...telemetry,
    };
  };
};
