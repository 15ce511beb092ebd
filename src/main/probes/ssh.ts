import ssh2, { type ClientChannel } from 'ssh2';
import { ProbeTimeoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { failure, success, type ProbeFailure, type SshMetrics } from '../types.js';
import { isTimeoutError, readErrorField, withTimeout, type Probe } from './helper.js';

const log = logger.scope('probe:ssh');

export type SshTarget = {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string;
};

export type SshSession = {
  exec: (command: string, timeoutMs: number) => Promise<string>;
  close: () => void;
};

export type SshConnector = (
  target: SshTarget,
  options: { timeoutMs: number; signal: AbortSignal }
) => Promise<SshSession>;

export type SshReport = {
  metrics: SshMetrics;
  addresses: string[];
};

type SshClient = InstanceType<typeof ssh2.Client>;

const execOnClient = (client: SshClient, command: string, timeoutMs: number) =>
  new Promise<string>((resolve, reject) => {
    let output = '';
    let channel: ClientChannel | undefined;
    const timer = setTimeout(() => {
      channel?.destroy();
      reject(new ProbeTimeoutError(timeoutMs));
    }, timeoutMs);

    client.exec(command, (error, stream) => {
      if (error) {
        clearTimeout(timer);
        reject(error);
        return;
      }
      channel = stream;
      stream.on('data', (chunk: Buffer) => {
        output += chunk.toString('utf8');
      });
      stream.stderr.resume();
      stream.on('close', () => {
        clearTimeout(timer);
        resolve(output);
      });
    });
  });

export const connectSsh: SshConnector = (target, { timeoutMs, signal }) =>
  new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new ProbeTimeoutError(timeoutMs));
      return;
    }
    const client = new ssh2.Client();
    const onAbort = () => {
      client.end();
      reject(new ProbeTimeoutError(timeoutMs));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    client.once('ready', () => {
      signal.removeEventListener('abort', onAbort);
      resolve({
        exec: (command, commandTimeoutMs) => execOnClient(client, command, commandTimeoutMs),
        close: () => client.end(),
      });
    });
    client.once('error', (error) => {
      signal.removeEventListener('abort', onAbort);
      client.end();
      reject(error);
    });

    client.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      password: target.password,
      privateKey: target.privateKey,
      readyTimeout: timeoutMs,
      tryKeyboard: false,
    });
  });

export const classifySshError = (error: unknown): ProbeFailure => {
  const level = readErrorField(error, 'level');
  if (level === 'client-authentication') return failure('auth_failed', errorMessage(error));
  if (level === 'client-timeout' || isTimeoutError(error)) return failure('connect_timeout', errorMessage(error));
  return failure('unreachable', errorMessage(error));
};

/**
 * Counts `who` sessions that do not belong to the monitoring account. Output
 * without any session is undefined so the caller can fall back to `uptime`.
 */
export const parseWhoSessions = (output: string, username: string) => {
  const names = output
    .split(/\r?\n/)
    .map((line) => line.trim().split(/\s+/)[0])
    .filter(Boolean);
  if (names.length === 0) return undefined;
  return names.filter((name) => name !== username).length;
};

export const parseUptimeUsers = (output: string) => {
  const match = output.match(/(\d+)\s+users?/);
  return match ? Number(match[1]) : undefined;
};

const parseCpuLine = (line: string) => {
  const nums = line.trim().split(/\s+/).slice(1).map(Number);
  if (nums.length < 4 || nums.some((value) => !Number.isFinite(value))) return undefined;
  const idle = nums[3] + (nums[4] ?? 0);
  const total = nums.reduce((sum, value) => sum + value, 0);
  return { idle, total };
};

/** CPU busy share between two `/proc/stat` aggregate samples (idle includes iowait). */
export const parseCpuPercent = (output: string) => {
  const samples = output
    .split(/\r?\n/)
    .filter((line) => line.startsWith('cpu '))
    .map(parseCpuLine);
  const [first, second] = samples;
  if (!first || !second) return undefined;
  const deltaIdle = Math.max(0, second.idle - first.idle);
  const deltaTotal = Math.max(1, second.total - first.total);
  return 100 * (1 - deltaIdle / deltaTotal);
};

export const parseMeminfo = (output: string) => {
  const info = new Map<string, number>();
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/^(\w+):\s+(\d+)/);
    if (match) info.set(match[1], Number(match[2]));
  }
  const total = info.get('MemTotal');
  const available = info.get('MemAvailable');
  if (!total || available === undefined) return undefined;
  return 100 * (1 - available / total);
};

export const parseDfUse = (output: string) => {
  const [, row] = output.trim().split(/\r?\n/);
  const use = row?.trim().split(/\s+/)[4];
  if (!use) return undefined;
  const value = Number(use.replace(/%$/, ''));
  return Number.isFinite(value) ? value : undefined;
};

const ipv4 = /^(?:\d{1,3}\.){3}\d{1,3}$/;

/** Global IPv4 addresses from `ip -4 -o addr` or `hostname -I` output. */
export const parseAddresses = (output: string) => {
  const found: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const inet = line.match(/\binet\s+(\d+\.\d+\.\d+\.\d+)/);
    const tokens = inet ? [inet[1]] : line.trim().split(/\s+/);
    for (const token of tokens) {
      if (!ipv4.test(token)) continue;
      if (token.startsWith('127.') || token.startsWith('169.254.')) continue;
      if (!found.includes(token)) found.push(token);
    }
  }
  return found;
};

export const SSH_COMMANDS = {
  who: 'who',
  uptime: 'uptime',
  cpu: "grep '^cpu ' /proc/stat; sleep 0.4; grep '^cpu ' /proc/stat",
  memory: 'cat /proc/meminfo',
  disk: 'df -P /',
  addresses: 'ip -4 -o addr show scope global || hostname -I',
} as const;

type SshProbeOptions = {
  connect?: SshConnector;
  commandTimeoutMs?: number;
};

/**
 * Opens one short-lived session and collects users, CPU, memory, disk and
 * addresses. A failing command only drops its own field.
 */
export const createSshMetricsProbe =
  ({ connect = connectSsh, commandTimeoutMs = 2000 }: SshProbeOptions = {}): Probe<SshReport> =>
  async (config, { timeoutMs, signal }) => {
    const credentials = config.ssh;
    if (!credentials) return failure('not_configured', 'no SSH credentials');
    if (!credentials.password && !credentials.privateKey) {
      return failure('not_configured', 'SSH credentials need a password or a private key');
    }
    const target: SshTarget = {
      host: credentials.host ?? config.ip,
      port: credentials.port,
      username: credentials.username,
      password: credentials.password,
      privateKey: credentials.privateKey,
    };

    let connected = false;
    try {
      return await withTimeout(timeoutMs, signal, async (inner) => {
        let session: SshSession;
        try {
          session = await connect(target, { timeoutMs, signal: inner });
        } catch (error) {
          return classifySshError(error);
        }
        connected = true;
        if (inner.aborted) {
          session.close();
          return failure('timeout', `probe of ${target.host} aborted`);
        }
        inner.addEventListener('abort', () => session.close(), { once: true });

        const run = async (command: string) => {
          try {
            return await session.exec(command, commandTimeoutMs);
          } catch (error) {
            log.debug(`command failed on ${target.host}: ${command}`, error);
            return undefined;
          }
        };

        try {
          const who = await run(SSH_COMMANDS.who);
          let usersActive = who === undefined ? undefined : parseWhoSessions(who, target.username);
          if (usersActive === undefined) {
            const uptime = await run(SSH_COMMANDS.uptime);
            usersActive = uptime === undefined ? undefined : parseUptimeUsers(uptime);
          }
          const cpu = await run(SSH_COMMANDS.cpu);
          const memory = await run(SSH_COMMANDS.memory);
          const disk = await run(SSH_COMMANDS.disk);
          const addresses = await run(SSH_COMMANDS.addresses);

          const metrics: SshMetrics = {
            usersActive,
            cpuPercent: cpu === undefined ? undefined : parseCpuPercent(cpu),
            memPercent: memory === undefined ? undefined : parseMeminfo(memory),
            diskPercent: disk === undefined ? undefined : parseDfUse(disk),
          };
          const parsed = Object.values(metrics).some((value) => value !== undefined);
          if (!parsed) return failure('parse_error', `no metric could be read from ${target.host}`);

          return success({ metrics, addresses: addresses === undefined ? [] : parseAddresses(addresses) });
        } finally {
          session.close();
        }
      });
    } catch (error) {
      if (error instanceof ProbeTimeoutError) {
        return failure(connected ? 'timeout' : 'connect_timeout', errorMessage(error));
      }
      return classifySshError(error);
    }
  };
