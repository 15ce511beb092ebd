import { describe, expect, it, vi } from 'vitest';
import type { DeviceConfig } from '../types.js';
import {
  SSH_COMMANDS,
  classifySshError,
  createSshMetricsProbe,
  parseAddresses,
  parseCpuPercent,
  parseDfUse,
  parseMeminfo,
  parseUptimeUsers,
  parseWhoSessions,
  type SshConnector,
  type SshSession,
} from './ssh.js';

const CPU_OUTPUT = 'cpu  100 0 100 700 100 0 0 0 0 0\ncpu  150 0 150 750 150 0 0 0 0 0\n';
const MEMINFO_OUTPUT = 'MemTotal:        1000 kB\nMemFree:          100 kB\nMemAvailable:     250 kB\n';
const DF_OUTPUT = 'Filesystem     1024-blocks  Used Available Capacity Mounted on\n/dev/sda1          100    42        58      42% /\n';
const WHO_OUTPUT = 'monitor  pts/0  2024-01-01 10:00 (10.0.0.2)\nalice    pts/1  2024-01-01 09:00\nbob      tty1   2024-01-01 08:00\n';
const ADDR_OUTPUT = '2: eth0    inet 10.0.0.5/24 brd 10.0.0.255 scope global eth0\n3: wlan0    inet 192.168.1.5/24 scope global wlan0\n';

const device: DeviceConfig = {
  id: 'srv1',
  name: 'Server 1',
  ip: '10.0.0.5',
  ssh: { port: 22, username: 'monitor', password: 'test-secret' },
};

const fakeSession = (outputs: Partial<Record<string, string>>) => {
  const close = vi.fn();
  const exec = vi.fn(async (command: string) => {
    const output = outputs[command];
    if (output === undefined) throw new Error(`command not found: ${command}`);
    return output;
  });
  const session: SshSession = { exec, close };
  return { session, exec, close };
};

describe('SSH output parsers', () => {
  it('counts sessions of other users', () => {
    expect(parseWhoSessions(WHO_OUTPUT, 'monitor')).toBe(2);
    expect(parseWhoSessions('monitor  pts/0  2024-01-01 10:00\n', 'monitor')).toBe(0);
    expect(parseWhoSessions('\n', 'monitor')).toBeUndefined();
  });

  it('reads the user count from uptime', () => {
    expect(parseUptimeUsers(' 10:00:00 up 3 days,  3 users,  load average: 0.00, 0.01, 0.05')).toBe(3);
    expect(parseUptimeUsers(' 10:00:00 up 1 min,  1 user,  load average: 0.10')).toBe(1);
    expect(parseUptimeUsers('garbage')).toBeUndefined();
  });

  it('computes CPU busy share between two samples', () => {
    expect(parseCpuPercent(CPU_OUTPUT)).toBe(50);
    expect(parseCpuPercent('cpu  1 2 3 4')).toBeUndefined();
  });

  it('computes memory in use from MemAvailable', () => {
    expect(parseMeminfo(MEMINFO_OUTPUT)).toBe(75);
    expect(parseMeminfo('MemTotal: 1000 kB\n')).toBeUndefined();
  });

  it('reads the root filesystem usage', () => {
    expect(parseDfUse(DF_OUTPUT)).toBe(42);
    expect(parseDfUse('Filesystem\n')).toBeUndefined();
  });

  it('collects global IPv4 addresses', () => {
    expect(parseAddresses(ADDR_OUTPUT)).toEqual(['10.0.0.5', '192.168.1.5']);
    expect(parseAddresses('10.0.0.5 172.17.0.1 169.254.3.3 127.0.0.1 fe80::1\n')).toEqual(['10.0.0.5', '172.17.0.1']);
  });
});

describe('classifySshError', () => {
  it('separates authentication, timeout and connection failures', () => {
    expect(classifySshError(Object.assign(new Error('auth'), { level: 'client-authentication' })).kind).toBe('auth_failed');
    expect(classifySshError(Object.assign(new Error('slow'), { level: 'client-timeout' })).kind).toBe('connect_timeout');
    expect(classifySshError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' })).kind).toBe('unreachable');
  });
});

describe('createSshMetricsProbe', () => {
  it('is not configured without credentials', async () => {
    const connect = vi.fn<SshConnector>();
    const probe = createSshMetricsProbe({ connect });
    const result = await probe({ id: 'x', name: 'x', ip: '10.0.0.9' }, { timeoutMs: 1000 });
    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.kind).toBe('not_configured');
    expect(connect).not.toHaveBeenCalled();
  });

  it('collects every metric over one session', async () => {
    const { session, exec, close } = fakeSession({
      [SSH_COMMANDS.who]: WHO_OUTPUT,
      [SSH_COMMANDS.cpu]: CPU_OUTPUT,
      [SSH_COMMANDS.memory]: MEMINFO_OUTPUT,
      [SSH_COMMANDS.disk]: DF_OUTPUT,
      [SSH_COMMANDS.addresses]: ADDR_OUTPUT,
    });
    const connect = vi.fn<SshConnector>().mockResolvedValue(session);

    const result = await createSshMetricsProbe({ connect })(device, { timeoutMs: 1000 });

    expect(result).toEqual({
      ok: true,
      value: {
        metrics: { usersActive: 2, cpuPercent: 50, memPercent: 75, diskPercent: 42 },
        addresses: ['10.0.0.5', '192.168.1.5'],
      },
    });
    expect(connect).toHaveBeenCalledWith(
      { host: '10.0.0.5', port: 22, username: 'monitor', password: 'test-secret', privateKey: undefined },
      expect.objectContaining({ timeoutMs: 1000 })
    );
    expect(exec.mock.calls.map(([command]) => command)).not.toContain(SSH_COMMANDS.uptime);
    expect(close).toHaveBeenCalled();
  });

  it('falls back to uptime and drops fields whose command failed', async () => {
    const { session } = fakeSession({
      [SSH_COMMANDS.uptime]: ' 10:00:00 up 3 days,  3 users,  load average: 0.00',
      [SSH_COMMANDS.memory]: MEMINFO_OUTPUT,
    });
    const result = await createSshMetricsProbe({ connect: async () => session })(device, { timeoutMs: 1000 });
    expect(result).toEqual({
      ok: true,
      value: {
        metrics: { usersActive: 3, cpuPercent: undefined, memPercent: 75, diskPercent: undefined },
        addresses: [],
      },
    });
  });

  it('falls back to uptime when who lists no sessions', async () => {
    const { session, exec } = fakeSession({
      [SSH_COMMANDS.who]: '',
      [SSH_COMMANDS.uptime]: ' 10:00:00 up 3 days,  3 users,  load average: 0.00',
    });
    const result = await createSshMetricsProbe({ connect: async () => session })(device, { timeoutMs: 1000 });
    expect(result.ok ? result.value.metrics.usersActive : undefined).toBe(3);
    expect(exec.mock.calls.map(([command]) => command)).toContain(SSH_COMMANDS.uptime);
  });

  it('does not connect once the cycle is cancelled', async () => {
    const connect = vi.fn<SshConnector>();
    const controller = new AbortController();
    controller.abort();
    const result = await createSshMetricsProbe({ connect })(device, { timeoutMs: 1000, signal: controller.signal });
    expect(result).toEqual({ ok: false, kind: 'connect_timeout', message: 'timed out after 1000ms' });
    expect(connect).not.toHaveBeenCalled();
  });

  it('reports parse_error when nothing could be read', async () => {
    const { session, close } = fakeSession({});
    const result = await createSshMetricsProbe({ connect: async () => session })(device, { timeoutMs: 1000 });
    expect(result.ok ? undefined : result.kind).toBe('parse_error');
    expect(close).toHaveBeenCalled();
  });

  it('reports rejected credentials as auth_failed', async () => {
    const connect = vi
      .fn<SshConnector>()
      .mockRejectedValue(Object.assign(new Error('All configured authentication methods failed'), { level: 'client-authentication' }));
    const result = await createSshMetricsProbe({ connect })(device, { timeoutMs: 1000 });
    expect(result).toEqual({ ok: false, kind: 'auth_failed', message: 'All configured authentication methods failed' });
  });

  it('times out a stalled handshake', async () => {
    const connect: SshConnector = () => new Promise(() => undefined);
    const result = await createSshMetricsProbe({ connect })(device, { timeoutMs: 20 });
    expect(result).toEqual({ ok: false, kind: 'connect_timeout', message: 'timed out after 20ms' });
  });

  it('reports a deadline after the handshake as timeout and closes the session', async () => {
    const close = vi.fn();
    const session: SshSession = { exec: () => new Promise(() => undefined), close };
    const result = await createSshMetricsProbe({ connect: async () => session, commandTimeoutMs: 1000 })(device, {
      timeoutMs: 20,
    });
    expect(result).toEqual({ ok: false, kind: 'timeout', message: 'timed out after 20ms' });
    expect(close).toHaveBeenCalled();
  });

  it('connects to the configured SSH host when it differs from the device address', async () => {
    const { session } = fakeSession({ [SSH_COMMANDS.disk]: DF_OUTPUT });
    const connect = vi.fn<SshConnector>().mockResolvedValue(session);
    const config: DeviceConfig = {
      ...device,
      ssh: { host: 'jump.lan', port: 2222, username: 'monitor', privateKey: 'test-key' },
    };
    await createSshMetricsProbe({ connect })(config, { timeoutMs: 1000 });
    expect(connect.mock.calls[0][0]).toEqual({
      host: 'jump.lan',
      port: 2222,
      username: 'monitor',
      password: undefined,
      privateKey: 'test-key',
    });
  });
});
