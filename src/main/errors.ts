export type ConfigIssue = {
  path: string;
  message: string;
};

export class ConfigInvalidError extends Error {
  readonly issues: ConfigIssue[];

  constructor(source: string, issues: ConfigIssue[]) {
    const detail = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    super(`invalid configuration in ${source}: ${detail}`);
    this.name = 'ConfigInvalidError';
    this.issues = issues;
  }
}

export class ScannerStoppedError extends Error {
  readonly code = 'ScanAlreadyFailedFatally';

  constructor() {
    super('scanner has been shut down');
    this.name = 'ScannerStoppedError';
  }
}

export class ProbeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
