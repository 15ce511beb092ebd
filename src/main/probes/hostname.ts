import { reverse as reverseLookup } from 'node:dns/promises';
import { errorMessage } from '../errors.js';
import { failure, success } from '../types.js';
import { isTimeoutError, readErrorField, withTimeout, type Probe } from './helper.js';

export type ReverseLookup = (ip: string) => Promise<string[]>;

export const createHostnameProbe =
  (reverse: ReverseLookup = (ip) => reverseLookup(ip)): Probe<string> =>
  async (config, { timeoutMs, signal }) => {
    try {
      const names = await withTimeout(timeoutMs, signal, () => reverse(config.ip));
      return success(names[0] ?? '');
    } catch (error) {
      if (isTimeoutError(error)) return failure('timeout', errorMessage(error));
      // No PTR record for the address.
      if (readErrorField(error, 'code') === 'ENOTFOUND') return success('');
      return failure('probe_error', errorMessage(error));
    }
  };
