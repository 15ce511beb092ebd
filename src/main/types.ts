export type SshCredentials = {
  host?: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string;
};

export type Gns3Endpoint = {
  url: string;
  token?: string;
  tokenType: 'bearer' | 'raw';
};

export type DeviceConfig = {
  id: string;
  name: string;
  ip: string;
  mac?: string;
  broadcast?: string;
  ssh?: SshCredentials;
  gns3?: Gns3Endpoint;
};

export type ProbeFailureKind =
  | 'timeout'
  | 'unreachable'
  | 'probe_error'
  | 'auth_failed'
  | 'connect_timeout'
  | 'parse_error'
  | 'api_unauthorized'
  | 'api_unreachable'
  | 'api_error'
  | 'not_configured';

export type ProbeSuccess<T> = { ok: true; value: T };
export type ProbeFailure = { ok: false; kind: ProbeFailureKind; message: string };
export type ProbeResult<T> = ProbeSuccess<T> | ProbeFailure;

export const success = <T>(value: T): ProbeSuccess<T> => ({ ok: true, value });

export const failure = (kind: ProbeFailureKind, message: string): ProbeFailure => ({
  ok: false,
  kind,
  message,
});

export type SshMetrics = {
  usersActive?: number;
  cpuPercent?: number;
  memPercent?: number;
  diskPercent?: number;
};

export type Gns3Status = {
  active: boolean;
  apiOk: boolean;
  projectsOpen: number;
  cpuPercent?: number;
  memPercent?: number;
  url: string;
  port?: number;
};

export type DeviceSnapshot = {
  id: string;
  name: string;
  ip: string;
  broadcast?: string;
  up: boolean;
  lastSeen?: number;
  lastChecked?: number;
  latencyMs?: number;
  mac?: string;
  hostname?: string;
  ips: readonly string[];
  sshMetrics?: SshMetrics;
  gns3Status?: Gns3Status;
};

export type FleetSnapshot = {
  generatedAt: number;
  devices: readonly DeviceSnapshot[];
  scanIntervalSeconds: number;
};
