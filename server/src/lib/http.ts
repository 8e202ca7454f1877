import axios from 'axios';
import { ENV } from './env';

/**
 * Shared axios instance for the NWS API. Every status resolves so callers can
 * inspect error payloads; retrying is left to `retryRequest`.
 */
export const http = axios.create({
  timeout: ENV.REQUEST_TIMEOUT_MS,
  headers: {
    'User-Agent': ENV.NWS_USER_AGENT,
    Accept: 'application/geo+json',
  },
  validateStatus: () => true,
});

export function isOkStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function joinUrl(base: string, path: string) {
  const trimmedBase = base.replace(/\/+$/, '');
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${trimmedBase}${normalizedPath}`;
}
