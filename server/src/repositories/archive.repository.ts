/**
 * Archived ISD-Lite temperatures, one JSON file per station named
 * `<usaf>-<wban>.json` (ids zero-padded to 6 and 5 digits), each holding
 * `{ timestamp, temperature }` rows sorted by timestamp.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { cached } from '../lib/cache';
import { ENV } from '../lib/env';
import { DataUnavailableError, describeIssues } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Station, TemperatureRecord } from '../types';

// ISD-Lite marker for a missing observation
export const MISSING_TEMPERATURE = -9999;

const ArchiveRowSchema = z.object({
  timestamp: z.string().min(1),
  temperature: z.number().int(),
});

type ArchiveRow = z.infer<typeof ArchiveRowSchema>;

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

// archive timestamps are UTC, usually written without a zone designator
export function parseArchiveTimestamp(value: string): Date {
  const trimmed = value.trim();
  return new Date(HAS_ZONE.test(trimmed) ? trimmed : `${trimmed}Z`);
}

export function archiveFileName(station: Pick<Station, 'usaf' | 'wban'>): string {
  const usaf = String(station.usaf).padStart(6, '0');
  const wban = String(station.wban).padStart(5, '0');
  return `${usaf}-${wban}.json`;
}

function fromRow(row: ArchiveRow): TemperatureRecord {
  return { timestamp: parseArchiveTimestamp(row.timestamp), temperature: row.temperature };
}

export function parseArchive(raw: unknown, source: string): TemperatureRecord[] {
  const parsed = z.array(ArchiveRowSchema).safeParse(raw);
  if (!parsed.success) {
    throw new DataUnavailableError(`Temperature archive is malformed: ${describeIssues(parsed.error.issues)}`, source);
  }

  const records = parsed.data
    .filter((row) => row.temperature !== MISSING_TEMPERATURE)
    .map(fromRow);

  const invalid = records.findIndex((record) => Number.isNaN(record.timestamp.getTime()));
  if (invalid >= 0) {
    throw new DataUnavailableError(`Temperature archive has an invalid timestamp at record ${invalid}`, source);
  }
  if (records.length === 0) {
    throw new DataUnavailableError('Temperature archive has no observations', source);
  }
  return records;
}

async function readArchive(filePath: string): Promise<TemperatureRecord[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    logger.error(
      { archive: filePath, error: error instanceof Error ? error.message : String(error) },
      'Temperature archive could not be read'
    );
    throw new DataUnavailableError('Temperature archive is unavailable', filePath);
  }
  return parseArchive(raw, filePath);
}

export type ArchiveSource = {
  getSeries(station: Station): Promise<ReadonlyArray<TemperatureRecord>>;
};

export function createArchiveRepository(directory: string = ENV.ARCHIVE_DIR): ArchiveSource {
  return {
    getSeries: (station) => {
      const filePath = path.join(directory, archiveFileName(station));
      return cached(`archive:${filePath}`, () => readArchive(filePath));
    },
  };
}

export const archiveRepository = createArchiveRepository();
