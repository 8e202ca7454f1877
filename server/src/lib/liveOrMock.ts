// server/src/lib/liveOrMock.ts
import { ENV } from './env';

export type AdapterName = 'nws';
export type Mode = 'live' | 'mock';

// the NWS API is keyless; it only asks for an identifying User-Agent
function isConfigured(adapter: AdapterName): boolean {
  switch (adapter) {
    case 'nws':
      return !!ENV.NWS_BASE_URL && !!ENV.NWS_USER_AGENT;
  }
}

export function liveOrMock(adapter: AdapterName): Mode {
  if (ENV.MOCK === 1) return 'mock';
  return isConfigured(adapter) ? 'live' : 'mock';
}
