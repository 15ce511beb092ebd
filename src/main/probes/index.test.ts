import { describe, expect, it, vi } from 'vitest';
import type { CommandRunner } from './helper.js';
import { createProbeSuite } from './index.js';

const device = { id: 'srv1', name: 'Server 1', ip: '10.0.0.5' };

describe('createProbeSuite', () => {
  it('routes every probe through the given primitives', async () => {
    const run = vi.fn<CommandRunner>(async (file) =>
      file === 'ping'
        ? { stdout: '64 bytes from 10.0.0.5: icmp_seq=1 ttl=64 time=2.5 ms', stderr: '' }
        : { stdout: '10.0.0.5 dev eth0 lladdr aa:bb:cc:dd:ee:ff REACHABLE', stderr: '' }
    );
    const suite = createProbeSuite({
      run,
      reverse: async () => ['srv1.lan'],
      checkPort: async () => false,
    });
    const context = { timeoutMs: 500 };

    await expect(suite.reachability(device, context)).resolves.toEqual({ ok: true, value: { latencyMs: 2.5 } });
    await expect(suite.neighbor(device, context)).resolves.toEqual({ ok: true, value: 'aa:bb:cc:dd:ee:ff' });
    await expect(suite.hostname(device, context)).resolves.toEqual({ ok: true, value: 'srv1.lan' });
    await expect(suite.sshMetrics(device, context)).resolves.toEqual({
      ok: false,
      kind: 'not_configured',
      message: 'no SSH credentials',
    });
    await expect(suite.gns3Status(device, context)).resolves.toEqual({
      ok: false,
      kind: 'unreachable',
      message: 'no GNS3 port open on 10.0.0.5',
    });
  });
});
