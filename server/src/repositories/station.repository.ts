/**
 * Station catalog: read-only JSON table produced by the catalog extraction step.
 * One row per station, keyed by (usaf, wban).
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { cached } from '../lib/cache';
import { ENV } from '../lib/env';
import { DataUnavailableError, describeIssues } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Station } from '../types';

const StationRowSchema = z.object({
  usaf: z.number().int(),
  wban: z.number().int(),
  station_name: z.string(),
  st: z.string(),
  call: z.string().nullable().optional(),
  lat: z.number(),
  lon: z.number(),
  elev_m: z.number(),
});

type StationRow = z.infer<typeof StationRowSchema>;

function fromRow(row: StationRow): Station {
  return {
    usaf: row.usaf,
    wban: row.wban,
    name: row.station_name.trim(),
    state: row.st.trim(),
    call: row.call?.trim() || null,
    lat: row.lat,
    lon: row.lon,
    elevationMeters: row.elev_m,
  };
}

export function parseStationCatalog(raw: unknown, source: string): Station[] {
  const parsed = z.array(StationRowSchema).safeParse(raw);
  if (!parsed.success) {
    throw new DataUnavailableError(`Station catalog is malformed: ${describeIssues(parsed.error.issues)}`, source);
  }
  if (parsed.data.length === 0) {
    throw new DataUnavailableError('Station catalog is empty', source);
  }
  return parsed.data.map(fromRow);
}

async function readCatalog(filePath: string): Promise<Station[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    logger.error(
      { catalog: filePath, error: error instanceof Error ? error.message : String(error) },
      'Station catalog could not be read'
    );
    throw new DataUnavailableError('Station catalog is unavailable', filePath);
  }

  const stations = parseStationCatalog(raw, filePath);
  logger.info({ catalog: filePath, stations: stations.length }, 'Station catalog loaded');
  return stations;
}

export type StationSource = {
  getStations(): Promise<ReadonlyArray<Station>>;
};

export function createStationRepository(filePath: string = ENV.STATION_CATALOG_PATH): StationSource {
  return {
    getStations: () => cached(`catalog:${filePath}`, () => readCatalog(filePath)),
  };
}

export const stationRepository = createStationRepository();
