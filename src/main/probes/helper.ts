import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ProbeTimeoutError, errorMessage } from '../errors.js';
import { failure, type DeviceConfig, type ProbeFailure, type ProbeResult } from '../types.js';

export type ProbeContext = {
  timeoutMs: number;
  signal?: AbortSignal;
};

export type Probe<T> = (config: DeviceConfig, context: ProbeContext) => Promise<ProbeResult<T>>;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number; signal?: AbortSignal }
) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const execCommand: CommandRunner = async (file, args, { timeoutMs, signal }) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: timeoutMs,
    signal,
    encoding: 'utf8',
    windowsHide: true,
  });
  return { stdout, stderr };
};

/**
 * Runs `task` with its own abort signal that fires after `timeoutMs` or when
 * `parent` aborts, whichever comes first. The returned promise settles no
 * later than that, even if the task ignores the signal. A parent that has
 * already aborted rejects without starting the task.
 */
export const withTimeout = <T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  // A cancelled cycle never starts new work.
  if (parent?.aborted) return Promise.reject(new ProbeTimeoutError(timeoutMs));

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(new ProbeTimeoutError(timeoutMs)), { once: true });
  });
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  return Promise.race([task(controller.signal), aborted]).finally(() => {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
    controller.abort();
  });
};

export const readErrorField = (error: unknown, key: string): unknown => {
  if (typeof error !== 'object' || error === null) return undefined;
  const value: unknown = Reflect.get(error, key);
  return value;
};

export const isTimeoutError = (error: unknown) =>
  error instanceof ProbeTimeoutError ||
  readErrorField(error, 'name') === 'AbortError' ||
  readErrorField(error, 'killed') === true;

// execFile rejects with a numeric `code` for a non-zero exit status and a
// string errno code when the binary could not be spawned.
export const classifyCommandError = (error: unknown): ProbeFailure => {
  if (isTimeoutError(error)) return failure('timeout', errorMessage(error));
  const code = readErrorField(error, 'code');
  if (typeof code === 'number') return failure('unreachable', `exit status ${code}`);
  return failure('probe_error', errorMessage(error));
};
