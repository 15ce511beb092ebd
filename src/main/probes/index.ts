import type { Gns3Status } from '../types.js';
import { createGns3Probe, type HttpFetch, type PortChecker } from './gns3.js';
import { execCommand, type CommandRunner, type Probe } from './helper.js';
import { createHostnameProbe, type ReverseLookup } from './hostname.js';
import { createNeighborProbe, defaultNeighborStrategies, type TextReader } from './neighbor.js';
import { createReachabilityProbe, type Reachability } from './reachability.js';
import { createSshMetricsProbe, type SshConnector, type SshReport } from './ssh.js';

export type ProbeSuite = {
  reachability: Probe<Reachability>;
  neighbor: Probe<string>;
  hostname: Probe<string>;
  sshMetrics: Probe<SshReport>;
  gns3Status: Probe<Gns3Status>;
};

export type ProbePrimitives = {
  run?: CommandRunner;
  readText?: TextReader;
  reverse?: ReverseLookup;
  connectSsh?: SshConnector;
  fetchImpl?: HttpFetch;
  checkPort?: PortChecker;
};

/** Wires every probe to the host's primitives, or to the ones given. */
export const createProbeSuite = (primitives: ProbePrimitives = {}): ProbeSuite => {
  const run = primitives.run ?? execCommand;
  return {
    reachability: createReachabilityProbe(run),
    neighbor: createNeighborProbe(defaultNeighborStrategies(run, primitives.readText)),
    hostname: createHostnameProbe(primitives.reverse),
    sshMetrics: createSshMetricsProbe({ connect: primitives.connectSsh }),
    gns3Status: createGns3Probe({ fetchImpl: primitives.fetchImpl, checkPort: primitives.checkPort }),
  };
};

export type { Probe, ProbeContext } from './helper.js';
export type { Reachability } from './reachability.js';
export type { SshReport } from './ssh.js';
