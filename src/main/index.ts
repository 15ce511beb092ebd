#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadDeviceConfigs, loadRuntimeConfig } from './config.js';
import { createLocalGns3Check } from './gns3-local.js';
import { logger, setLogLevel } from './logger.js';
import { createDeviceProber } from './prober.js';
import { createProbeSuite } from './probes/index.js';
import { createScanner } from './scanner.js';
import { initialFleet } from './snapshot.js';
import { createStateStore } from './store.js';
import { createWebServer } from './web.js';
import { sendWakeOnLan } from './wol.js';

dotenv.config();

const log = logger.scope('netwatch');

const main = () => {
  const runtime = loadRuntimeConfig();
  setLogLevel(runtime.logLevel);

  const configs = loadDeviceConfigs(runtime.configPath);
  if (configs.length === 0) {
    log.warn(`no devices configured (looked in ${runtime.configPath})`);
  }

  const store = createStateStore(initialFleet(configs, runtime.scanIntervalSeconds, Date.now()));
  const probe = createDeviceProber({ probes: createProbeSuite(), timeouts: runtime.timeouts });
  const scanner = createScanner({
    configs,
    probe,
    store,
    scanIntervalSeconds: runtime.scanIntervalSeconds,
    concurrency: runtime.concurrency,
    cycleTimeoutMs: runtime.cycleTimeoutMs,
  });

  const server = createWebServer({
    scanner,
    configs,
    wake: sendWakeOnLan,
    localGns3: createLocalGns3Check(),
  });

  scanner.onSnapshot((snapshot) => {
    const down = snapshot.devices.filter((device) => !device.up).map((device) => device.id);
    if (down.length > 0) log.debug('devices down', down);
  });

  server.on('error', (error) => {
    log.error('http server error', error);
    scanner.shutdown();
    process.exitCode = 1;
  });

  scanner.start();
  server.listen(runtime.port, runtime.host, () => {
    log.info(`listening on http://${runtime.host}:${runtime.port}`, { devices: configs.length });
  });

  const shutdown = () => {
    scanner.shutdown();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

try {
  main();
} catch (error) {
  log.error('failed to start', error);
  process.exitCode = 1;
}
