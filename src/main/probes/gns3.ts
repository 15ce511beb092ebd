import { Socket } from 'node:net';
import { errorMessage } from '../errors.js';
import { failure, success, type Gns3Endpoint, type Gns3Status, type ProbeFailure, type ProbeResult } from '../types.js';
import { isRecord, isTimeoutError, withTimeout, type Probe } from './helper.js';

export const GNS3_PORTS = [3080, 3443, 80, 443] as const;

export type PortChecker = (host: string, port: number, timeoutMs: number, signal?: AbortSignal) => Promise<boolean>;

export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

export const checkTcpPort: PortChecker = (host, port, timeoutMs, signal) =>
  new Promise((resolve) => {
    const socket = new Socket();
    let settled = false;

    const finish = (open: boolean) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(open);
    };
    const onAbort = () => finish(false);

    if (signal?.aborted) {
      finish(false);
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });

const isOpenState = (item: unknown) => {
  if (!isRecord(item)) return false;
  const state = String(item.state ?? item.status ?? '').toLowerCase();
  return state === 'open' || state === 'opened';
};

// Some servers ignore the state filter, so projects are always counted here.
export const countOpenProjects = (items: unknown) => (Array.isArray(items) ? items.filter(isOpenState).length : 0);

const firstNumber = (stats: Record<string, unknown>, keys: string[]) => {
  for (const key of keys) {
    const value = stats[key];
    if (typeof value === 'number') return value;
  }
  return undefined;
};

export const parseGns3Statistics = (stats: Record<string, unknown>) => {
  const cpuPercent = firstNumber(stats, ['cpu_percent', 'cpu_usage_percent', 'system_cpu_percent', 'cpu_usage']);
  let memPercent = firstNumber(stats, ['memory_percent', 'mem_percent', 'system_memory_percent']);
  if (memPercent === undefined) {
    const used = firstNumber(stats, ['memory_used', 'mem_used', 'system_memory_used']);
    const total = firstNumber(stats, ['memory_total', 'mem_total', 'system_memory_total']);
    if (used !== undefined && total) memPercent = (used / total) * 100;
  }
  return { cpuPercent, memPercent };
};

const statisticsPaths: Record<string, string[]> = {
  '/v3': ['/v3/system/statistics', '/v3/statistics', '/v3/compute/statistics'],
  '/v2': ['/v2/compute/statistics', '/v2/statistics', '/v2/compute/stats', '/v2/system/statistics'],
};

type Gns3ApiReport = {
  projectsOpen: number;
  cpuPercent?: number;
  memPercent?: number;
};

export const authorizationHeader = (endpoint: Gns3Endpoint) =>
  endpoint.tokenType === 'bearer' ? `Bearer ${endpoint.token ?? ''}` : endpoint.token ?? '';

/**
 * Queries the controller API: version (v3, then v2), open projects and load
 * statistics. Only the version call decides success; the rest is best effort.
 */
export const queryGns3Api = async (
  endpoint: Gns3Endpoint,
  fetchImpl: HttpFetch,
  signal: AbortSignal
): Promise<ProbeResult<Gns3ApiReport>> => {
  const base = endpoint.url.replace(/\/+$/, '');
  const headers = { authorization: authorizationHeader(endpoint), accept: 'application/json' };
  const get = (path: string) => fetchImpl(base + path, { headers, signal });

  const getJson = async (path: string): Promise<unknown> => {
    try {
      const response = await get(path);
      if (!response.ok) return undefined;
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      if (signal.aborted) throw error;
      return undefined;
    }
  };

  let root: string | undefined;
  let lastFailure: ProbeResult<Gns3ApiReport> = failure('api_unreachable', `no answer from ${base}`);
  for (const candidate of ['/v3', '/v2']) {
    try {
      const response = await get(`${candidate}/version`);
      if (response.ok) {
        root = candidate;
        break;
      }
      if (response.status === 401 || response.status === 403) {
        return failure('api_unauthorized', `${base} answered HTTP ${response.status}`);
      }
      lastFailure = failure('api_error', `${base}${candidate}/version answered HTTP ${response.status}`);
    } catch (error) {
      if (signal.aborted) throw error;
      lastFailure = failure('api_unreachable', errorMessage(error));
    }
  }
  if (!root) return lastFailure;

  let projectsOpen = countOpenProjects(
    (await getJson(`${root}/projects?state=opened`)) ?? (await getJson(`${root}/projects?status=opened`))
  );
  if (projectsOpen === 0) {
    projectsOpen = countOpenProjects(await getJson(`${root}/projects`));
  }

  for (const path of statisticsPaths[root]) {
    const stats = await getJson(path);
    if (isRecord(stats)) return success({ projectsOpen, ...parseGns3Statistics(stats) });
  }
  return success({ projectsOpen });
};

export const gns3UrlForPort = (ip: string, port: number) =>
  `${port === 443 || port === 3443 ? 'https' : 'http'}://${ip}:${port}`;

// The API query ends before the probe deadline so an open port still counts.
const apiTimeoutMs = (timeoutMs: number) => Math.max(1, Math.floor(timeoutMs * 0.9));

type Gns3ProbeOptions = {
  fetchImpl?: HttpFetch;
  checkPort?: PortChecker;
  portTimeoutMs?: number;
};

/**
 * Port reachability on the well-known GNS3 ports for every device, plus an
 * authenticated API query when an endpoint with a token is configured. An
 * open port with a failing API still reports `active` with `apiOk=false`.
 */
export const createGns3Probe =
  ({ fetchImpl = fetch, checkPort = checkTcpPort, portTimeoutMs = 400 }: Gns3ProbeOptions = {}): Probe<Gns3Status> =>
  async (config, { timeoutMs, signal }) => {
    const endpoint = config.gns3;
    // A stalled API must not take the port results down with it.
    const queryWithDeadline = (target: Gns3Endpoint, deadlineMs: number, parent: AbortSignal) =>
      withTimeout(deadlineMs, parent, (apiSignal) => queryGns3Api(target, fetchImpl, apiSignal)).catch(
        (error: unknown): ProbeFailure =>
          isTimeoutError(error)
            ? failure('timeout', `GNS3 API at ${target.url} did not answer within ${deadlineMs}ms`)
            : failure('api_unreachable', errorMessage(error))
      );
    try {
      return await withTimeout(timeoutMs, signal, async (inner) => {
        const [openPorts, api] = await Promise.all([
          Promise.all(GNS3_PORTS.map((port) => checkPort(config.ip, port, portTimeoutMs, inner))),
          endpoint?.token ? queryWithDeadline(endpoint, apiTimeoutMs(timeoutMs), inner) : Promise.resolve(undefined),
        ]);
        const port = GNS3_PORTS.find((_, index) => openPorts[index]);
        const url = endpoint?.url ?? (port === undefined ? '' : gns3UrlForPort(config.ip, port));

        if (api && api.ok) {
          return success<Gns3Status>({ active: true, apiOk: true, url, port, ...api.value });
        }
        if (port !== undefined) {
          return success<Gns3Status>({ active: true, apiOk: false, projectsOpen: 0, url, port });
        }
        if (api && !api.ok) return api;
        return failure('unreachable', `no GNS3 port open on ${config.ip}`);
      });
    } catch (error) {
      return failure('timeout', errorMessage(error));
    }
  };
