import NodeCache from 'node-cache';
import { ENV } from './env';

// checkperiod 0: expired entries are dropped on read, no background timer
export const cache = new NodeCache({ stdTTL: ENV.CACHE_TTL_SEC, checkperiod: 0, useClones: false });

export async function cached<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const hit = cache.get<T>(key);
  if (hit !== undefined) return hit;
  const v = await fn();
  cache.set(key, v);
  return v;
}
