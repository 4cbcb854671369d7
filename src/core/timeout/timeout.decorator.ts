import { SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'timeout';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Upper bound for a handler (or every handler of a controller) in milliseconds
 */
export const Timeout = (timeoutMs: number) =>
  SetMetadata(TIMEOUT_KEY, timeoutMs);
