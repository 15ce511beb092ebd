import type { DeviceConfig } from '../types.js';
import { success } from '../types.js';
import { classifyCommandError, execCommand, withTimeout, type CommandRunner, type Probe } from './helper.js';

export type Reachability = {
  latencyMs?: number;
};

export const pingArgs = (ip: string, platform: NodeJS.Platform = process.platform) =>
  platform === 'win32'
    ? ['-n', '1', '-w', '1000', ip]
    : ['-c', '1', '-W', platform === 'darwin' ? '1000' : '1', ip];

export const parsePingLatency = (output: string) => {
  const timeMatch = output.match(/time[=<]([\d.]+)\s*ms/i);
  if (!timeMatch) return undefined;
  const value = Number(timeMatch[1]);
  return Number.isFinite(value) ? value : undefined;
};

/** Single ICMP echo request through the system `ping` binary. */
export const createReachabilityProbe =
  (run: CommandRunner = execCommand): Probe<Reachability> =>
  async (config: DeviceConfig, { timeoutMs, signal }) => {
    try {
      const { stdout } = await withTimeout(timeoutMs, signal, (inner) =>
        run('ping', pingArgs(config.ip), { timeoutMs, signal: inner })
      );
      return success({ latencyMs: parsePingLatency(stdout) });
    } catch (error) {
      return classifyCommandError(error);
    }
  };
