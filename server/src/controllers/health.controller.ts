/**
 * Health controller: liveness plus whether the station catalog can be loaded.
 * IMPLEMENTATION STATUS: OK (mirrors the Express and Lambda routes)
 */

import { logger } from '../lib/logger';
import { liveOrMock } from '../lib/liveOrMock';
import { stationRepository } from '../repositories/station.repository';
import type { ControllerResult } from './types';

export async function healthCheckController(requestId?: string): Promise<ControllerResult> {
  logger.info({ reqId: requestId }, 'Health check request received');

  let catalog: { ok: boolean; stations?: number; error?: string };
  try {
    const stations = await stationRepository.getStations();
    catalog = { ok: true, stations: stations.length };
  } catch (error) {
    logger.error(
      { reqId: requestId, error: error instanceof Error ? error.message : String(error) },
      'Health check could not load the station catalog'
    );
    catalog = { ok: false, error: 'catalog_unavailable' };
  }

  const healthData = {
    ok: catalog.ok,
    time: new Date().toISOString(),
    uptime: process.uptime(),
    version: process.env['npm_package_version'] || '1.0.0',
    environment: process.env['NODE_ENV'] || 'development',
    nws: liveOrMock('nws'),
    catalog,
  };

  logger.info({ reqId: requestId, ok: healthData.ok, uptime: healthData.uptime }, 'Health check completed');

  return { statusCode: healthData.ok ? 200 : 503, body: healthData };
}
