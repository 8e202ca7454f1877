/**
 * Server entry point
 */

import 'dotenv/config';
import app from './app';
import { logger } from './lib/logger';
import { ENV } from './lib/env';
import { liveOrMock } from './lib/liveOrMock';
import { stationRepository } from './repositories/station.repository';

const PORT = Number(process.env['PORT'] ?? 8787);
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const shouldStart = !process.env['JEST_WORKER_ID'];

if (shouldStart) {
  const mode = liveOrMock('nws');
  logger.info(
    {
      mock: ENV.MOCK,
      nws: mode,
      catalog: ENV.STATION_CATALOG_PATH,
      archive: ENV.ARCHIVE_DIR,
      retry: { attempts: ENV.NWS_RETRY_ATTEMPTS, delayMs: ENV.NWS_RETRY_DELAY_MS },
    },
    `Booting server with MOCK=${ENV.MOCK}`
  );

  if (mode === 'mock') {
    logger.info({ adapter: 'nws', mode }, `NWS adapter answering from fixtures (MOCK=${ENV.MOCK}).`);
  } else {
    logger.info({ adapter: 'nws', mode, baseUrl: ENV.NWS_BASE_URL }, 'NWS adapter running live.');
  }
}

// first request would otherwise pay for parsing the catalog
async function warmCatalog(): Promise<void> {
  try {
    const stations = await stationRepository.getStations();
    logger.info({ stations: stations.length }, 'Station catalog ready');
  } catch (error) {
    logger.warn(
      { catalog: ENV.STATION_CATALOG_PATH, error: error instanceof Error ? error.message : String(error) },
      'Station catalog unavailable at boot; annual requests will answer 503 until it loads'
    );
  }
}

let server: ReturnType<typeof app.listen> | undefined;

if (shouldStart) {
  server = app.listen(PORT, () => {
    logger.info(
      {
        port: PORT,
        environment: NODE_ENV,
        nodeVersion: process.version,
        pid: process.pid,
      },
      'Server started successfully'
    );
    void warmCatalog();
  });
}

const gracefulShutdown = (signal: string) => {
  logger.info({ signal }, 'Received shutdown signal');

  server?.close(() => {
    logger.info('Server closed successfully');
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

if (shouldStart) {
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });
}

export default server;
