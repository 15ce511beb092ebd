import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { ScannerStoppedError, errorMessage } from './errors.js';
import type { LocalGns3Install } from './gns3-local.js';
import { logger } from './logger.js';
import { isRecord } from './probes/helper.js';
import type { Scanner } from './scanner.js';
import type { DeviceConfig } from './types.js';
import type { WakeResult } from './wol.js';

const log = logger.scope('web');

export type WebDependencies = {
  scanner: Pick<Scanner, 'getCurrentSnapshot' | 'triggerScanNow' | 'isRunning'>;
  configs: readonly DeviceConfig[];
  wake: (mac: string, broadcast?: string) => Promise<WakeResult>;
  localGns3: () => Promise<LocalGns3Install>;
};

const writeJson = (response: ServerResponse, status: number, body: unknown) => {
  response.writeHead(status, {
    'content-type': 'application/json; charset=utf-8',
    'cache-control': 'no-store',
  });
  response.end(JSON.stringify(body));
};

const parseJsonBody = async (request: IncomingMessage): Promise<Record<string, unknown>> => {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  const raw = Buffer.concat(chunks).toString('utf8').trim();
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

const readString = (body: Record<string, unknown>, key: string) => {
  const value = body[key];
  return typeof value === 'string' ? value.trim() : '';
};

const toSeconds = (ms: number) => Math.floor(ms / 1000);

export const createRequestHandler = ({ scanner, configs, wake, localGns3 }: WebDependencies) => {
  const configById = new Map(configs.map((config) => [config.id, config]));

  const handleWake = async (request: IncomingMessage, response: ServerResponse) => {
    const body = await parseJsonBody(request);
    const id = readString(body, 'id');
    let mac = readString(body, 'mac').toLowerCase();
    let broadcast = readString(body, 'broadcast');

    if (id) {
      const config = configById.get(id);
      if (!config) {
        writeJson(response, 404, { ok: false, error: 'device not found' });
        return;
      }
      const snapshot = scanner.getCurrentSnapshot().devices.find((device) => device.id === id);
      mac = mac || (snapshot?.mac ?? config.mac ?? '');
      broadcast = broadcast || (config.broadcast ?? '');
    }
    if (!mac) {
      writeJson(response, 400, { ok: false, error: 'mac required' });
      return;
    }

    const result = await wake(mac, broadcast || undefined);
    if (result.ok) {
      log.info(`wake-on-lan sent to ${mac}`);
      writeJson(response, 200, { ok: true });
    } else {
      writeJson(response, 500, { ok: false, error: result.error });
    }
  };

  return async (request: IncomingMessage, response: ServerResponse) => {
    const url = new URL(request.url ?? '/', 'http://localhost');

    if (request.method === 'GET' && url.pathname === '/api/health') {
      const snapshot = scanner.getCurrentSnapshot();
      writeJson(response, 200, {
        ok: true,
        generatedAt: snapshot.generatedAt,
        scannerRunning: scanner.isRunning(),
        deviceCount: snapshot.devices.length,
      });
      return;
    }

    if (request.method === 'GET' && url.pathname === '/api/status') {
      const snapshot = scanner.getCurrentSnapshot();
      writeJson(response, 200, {
        devices: snapshot.devices,
        gns3: await localGns3(),
        scanInterval: snapshot.scanIntervalSeconds,
        generated: toSeconds(snapshot.generatedAt),
      });
      return;
    }

    if (request.method === 'POST' && url.pathname === '/api/scan-now') {
      try {
        const snapshot = await scanner.triggerScanNow();
        writeJson(response, 200, { ok: true, devices: snapshot.devices, generated: toSeconds(snapshot.generatedAt) });
      } catch (error) {
        const status = error instanceof ScannerStoppedError ? 503 : 500;
        writeJson(response, status, { ok: false, error: errorMessage(error) });
      }
      return;
    }

    if (request.method === 'POST' && url.pathname === '/api/wol') {
      await handleWake(request, response);
      return;
    }

    writeJson(response, 404, { ok: false, error: 'not_found' });
  };
};

export const createWebServer = (dependencies: WebDependencies) => {
  const handle = createRequestHandler(dependencies);
  return createServer((request, response) => {
    handle(request, response).catch((error: unknown) => {
      log.error(`${request.method ?? 'GET'} ${request.url ?? '/'} failed`, error);
      if (!response.headersSent) writeJson(response, 500, { ok: false, error: 'internal_error' });
    });
  });
};
