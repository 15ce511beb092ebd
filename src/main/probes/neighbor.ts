import { readFile } from 'node:fs/promises';
import { logger } from '../logger.js';
import { failure, success } from '../types.js';
import { execCommand, withTimeout, type CommandRunner, type Probe } from './helper.js';

const log = logger.scope('probe:neighbor');

const ZERO_MAC = '00:00:00:00:00:00';

const neighborPatterns: Array<{ pattern: RegExp; separator?: RegExp }> = [
  // ip neigh: 10.0.0.5 dev eth0 lladdr aa:bb:cc:dd:ee:ff REACHABLE
  { pattern: /^(\d+\.\d+\.\d+\.\d+)\s+dev\s+\S+\s+lladdr\s+([0-9a-f:]{17})/i },
  // arp -a (BSD/macOS): host (10.0.0.5) at aa:bb:cc:dd:ee:ff on en0
  { pattern: /\((\d+\.\d+\.\d+\.\d+)\)\s+at\s+([0-9a-f:]{17})/i },
  // arp -n (net-tools): 10.0.0.5  ether  aa:bb:cc:dd:ee:ff  C  eth0
  { pattern: /^(\d+\.\d+\.\d+\.\d+)\s+ether\s+([0-9a-f:]{17})/i },
  // /proc/net/arp: 10.0.0.5  0x1  0x2  aa:bb:cc:dd:ee:ff  *  eth0
  { pattern: /^(\d+\.\d+\.\d+\.\d+)\s+0x[0-9a-f]+\s+0x[0-9a-f]+\s+([0-9a-f:]{17})/i },
  // arp -a (Windows): 10.0.0.5  aa-bb-cc-dd-ee-ff  dynamic
  { pattern: /^\s*(\d+\.\d+\.\d+\.\d+)\s+([0-9a-f-]{17})\s/i, separator: /-/g },
];

export const parseNeighborOutput = (output: string) => {
  const map = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    for (const { pattern, separator } of neighborPatterns) {
      const match = line.match(pattern);
      if (!match) continue;
      const mac = (separator ? match[2].replace(separator, ':') : match[2]).toLowerCase();
      if (mac !== ZERO_MAC) map.set(match[1], mac);
      break;
    }
  }
  return map;
};

export type TextReader = (path: string) => Promise<string>;

export type NeighborStrategy = {
  name: string;
  lookup: (ip: string, options: { timeoutMs: number; signal: AbortSignal }) => Promise<string>;
};

export const defaultNeighborStrategies = (
  run: CommandRunner = execCommand,
  readText: TextReader = (path) => readFile(path, 'utf8')
): NeighborStrategy[] => [
  {
    name: 'ip-neigh',
    lookup: async (ip, options) => {
      const { stdout } = await run('ip', ['-o', 'neigh', 'show', ip], options);
      return parseNeighborOutput(stdout).get(ip) ?? '';
    },
  },
  {
    name: 'arp',
    lookup: async (ip, options) => {
      const { stdout } = await run('arp', ['-n', ip], options);
      return parseNeighborOutput(stdout).get(ip) ?? '';
    },
  },
  {
    name: 'proc-net-arp',
    lookup: async (ip) => parseNeighborOutput(await readText('/proc/net/arp')).get(ip) ?? '',
  },
];

/**
 * Resolves the current hardware address by trying each strategy in order
 * until one yields a MAC. Every strategy gets its own timeout. An empty
 * string is a valid answer.
 */
export const createNeighborProbe =
  (strategies: NeighborStrategy[] = defaultNeighborStrategies()): Probe<string> =>
  async (config, { timeoutMs, signal }) => {
    for (const strategy of strategies) {
      if (signal?.aborted) return failure('timeout', 'neighbor resolution aborted');
      try {
        const mac = await withTimeout(timeoutMs, signal, (inner) =>
          strategy.lookup(config.ip, { timeoutMs, signal: inner })
        );
        if (mac) return success(mac);
      } catch (error) {
        log.debug(`${strategy.name} failed for ${config.ip}`, error);
      }
    }
    return success('');
  };
