import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigInvalidError, errorMessage, type ConfigIssue } from './errors.js';
import type { LogLevel } from './logger.js';
import { DEFAULT_PROBE_TIMEOUTS, type ProbeTimeouts } from './prober.js';
import type { DeviceConfig } from './types.js';

export type RuntimeConfig = {
  host: string;
  port: number;
  configPath: string;
  scanIntervalSeconds: number;
  concurrency: number;
  cycleTimeoutMs?: number;
  timeouts: ProbeTimeouts;
  logLevel: LogLevel;
};

const MIN_SCAN_INTERVAL_SECONDS = 5;

const timeoutMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const runtimeSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CONFIG_PATH: z.string().min(1).default('config/devices.json'),
  SCAN_INTERVAL: z.coerce.number().int().positive().default(30),
  SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(16),
  CYCLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PING_TIMEOUT_MS: timeoutMs(DEFAULT_PROBE_TIMEOUTS.pingMs),
  NEIGHBOR_TIMEOUT_MS: timeoutMs(DEFAULT_PROBE_TIMEOUTS.neighborMs),
  HOSTNAME_TIMEOUT_MS: timeoutMs(DEFAULT_PROBE_TIMEOUTS.hostnameMs),
  SSH_TIMEOUT_MS: timeoutMs(DEFAULT_PROBE_TIMEOUTS.sshMs),
  GNS3_TIMEOUT_MS: timeoutMs(DEFAULT_PROBE_TIMEOUTS.gns3Ms),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const toIssues = (error: z.ZodError): ConfigIssue[] =>
  error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));

export const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const parsed = runtimeSchema.safeParse(env);
  if (!parsed.success) throw new ConfigInvalidError('environment', toIssues(parsed.error));
  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    configPath: values.CONFIG_PATH,
    scanIntervalSeconds: Math.max(MIN_SCAN_INTERVAL_SECONDS, values.SCAN_INTERVAL),
    concurrency: values.SCAN_CONCURRENCY,
    cycleTimeoutMs: values.CYCLE_TIMEOUT_MS,
    timeouts: {
      pingMs: values.PING_TIMEOUT_MS,
      neighborMs: values.NEIGHBOR_TIMEOUT_MS,
      hostnameMs: values.HOSTNAME_TIMEOUT_MS,
      sshMs: values.SSH_TIMEOUT_MS,
      gns3Ms: values.GNS3_TIMEOUT_MS,
    },
    logLevel: values.LOG_LEVEL,
  };
};

const macPattern = /^([0-9a-f]{2}[:-]){5}[0-9a-f]{2}$/i;
const ipv4 = z.string().ip({ version: 'v4' });
// Empty strings in the device file mean "not set".
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const sshSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).default(22),
    username: z.string().min(1),
    password: z.string().min(1).optional(),
    privateKeyPath: z.string().min(1).optional(),
  })
  .refine((ssh) => ssh.password || ssh.privateKeyPath, { message: 'password or privateKeyPath is required' });

const gns3Schema = z.object({
  url: z.string().url(),
  token: z.string().min(1).optional(),
  tokenType: z.enum(['bearer', 'raw']).default('bearer'),
});

const deviceSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  ip: ipv4,
  mac: optional(z.string().regex(macPattern, 'expected a MAC address like aa:bb:cc:dd:ee:ff')),
  broadcast: optional(ipv4),
  ssh: sshSchema.optional(),
  gns3: gns3Schema.optional(),
});

const deviceFileSchema = z.object({
  devices: z.array(deviceSchema).default([]),
});

type DeviceEntry = z.infer<typeof deviceSchema>;

const readPrivateKey = (keyPath: string, index: number) => {
  try {
    return readFileSync(keyPath, 'utf8');
  } catch (error) {
    throw new ConfigInvalidError(keyPath, [
      { path: `devices.${index}.ssh.privateKeyPath`, message: `unreadable key: ${errorMessage(error)}` },
    ]);
  }
};

const toDeviceConfig = (entry: DeviceEntry, index: number, baseDir: string): DeviceConfig => {
  const ssh = entry.ssh
    ? {
        host: entry.ssh.host,
        port: entry.ssh.port,
        username: entry.ssh.username,
        password: entry.ssh.password,
        privateKey: entry.ssh.privateKeyPath ? readPrivateKey(resolve(baseDir, entry.ssh.privateKeyPath), index) : undefined,
      }
    : undefined;

  return Object.freeze({
    id: entry.id ?? String(index),
    name: entry.name ?? `device-${index}`,
    ip: entry.ip,
    mac: entry.mac || undefined,
    broadcast: entry.broadcast || undefined,
    ssh,
    gns3: entry.gns3,
  });
};

/**
 * Reads the device list. A missing file is an empty fleet; anything malformed
 * is rejected as a whole.
 */
export const loadDeviceConfigs = (filePath: string): DeviceConfig[] => {
  if (!existsSync(filePath)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigInvalidError(filePath, [{ path: '', message: `not valid JSON: ${errorMessage(error)}` }]);
  }

  const parsed = deviceFileSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigInvalidError(filePath, toIssues(parsed.error));

  const seen = new Set<string>();
  const duplicates: ConfigIssue[] = [];
  const baseDir = dirname(filePath);
  const configs = parsed.data.devices.map((entry, index) => {
    const config = toDeviceConfig(entry, index, baseDir);
    if (seen.has(config.id)) {
      duplicates.push({ path: `devices.${index}.id`, message: `duplicate device id "${config.id}"` });
    }
    seen.add(config.id);
    return config;
  });
  if (duplicates.length > 0) throw new ConfigInvalidError(filePath, duplicates);

  return configs;
};
