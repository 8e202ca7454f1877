import { promises as fs } from 'node:fs';
import path from 'node:path';
import axios from 'axios';
import { ENV } from '../lib/env';
import { http, isOkStatus, joinUrl } from '../lib/http';
import { liveOrMock } from '../lib/liveOrMock';
import { logger } from '../lib/logger';
import type { Coordinates } from '../types';

const FIXTURE_DIR = path.resolve(process.cwd(), 'fixtures');
const POINTS_FIXTURE = path.join(FIXTURE_DIR, 'nws_points.sample.json');
const FORECAST_FIXTURE = path.join(FIXTURE_DIR, 'nws_forecast.sample.json');

/**
 * Outcome of one NWS call. Non-2xx answers and transport failures are values,
 * not exceptions; `status` is 0 when no response arrived.
 */
export type NwsResponse = {
  ok: boolean;
  status: number;
  url: string;
  data: unknown;
};

export type NwsRequestOptions = {
  signal?: AbortSignal;
};

const readFixture = async (filePath: string): Promise<unknown> => {
  const raw = await fs.readFile(filePath, 'utf8');
  return JSON.parse(raw);
};

// /points accepts at most four decimal places
export function formatPoint(coordinates: Coordinates): string {
  const lat = Number(coordinates.lat.toFixed(4));
  const lon = Number(coordinates.lon.toFixed(4));
  return `${lat},${lon}`;
}

export class NwsAdapter {
  /**
   * Point metadata: forecast URL, relative location (city/state) and radar station.
   */
  async requestStationInformation(
    coordinates: Coordinates,
    options: NwsRequestOptions = {}
  ): Promise<NwsResponse> {
    const url = joinUrl(ENV.NWS_BASE_URL, `/points/${formatPoint(coordinates)}`);
    if (liveOrMock('nws') === 'mock') {
      return this.loadMock(url, POINTS_FIXTURE);
    }
    return this.get(url, options.signal);
  }

  async requestForecast(forecastUrl: string, options: NwsRequestOptions = {}): Promise<NwsResponse> {
    if (liveOrMock('nws') === 'mock') {
      return this.loadMock(forecastUrl, FORECAST_FIXTURE);
    }
    return this.get(forecastUrl, options.signal);
  }

  private async loadMock(url: string, fixture: string): Promise<NwsResponse> {
    logger.debug({ adapter: 'nws', url, fixture: path.basename(fixture) }, 'MOCK=1: returning fixture NWS data.');
    return { ok: true, status: 200, url, data: await readFixture(fixture) };
  }

  private async get(url: string, signal?: AbortSignal): Promise<NwsResponse> {
    try {
      const response = await http.get<unknown>(url, signal ? { signal } : {});
      if (!isOkStatus(response.status)) {
        logger.warn({ adapter: 'nws', url, status: response.status }, 'NWS responded with an error status');
      }
      return { ok: isOkStatus(response.status), status: response.status, url, data: response.data };
    } catch (error) {
      logger.warn(
        {
          adapter: 'nws',
          url,
          canceled: axios.isCancel(error),
          error: error instanceof Error ? error.message : String(error),
        },
        'NWS request failed before a response was received'
      );
      return { ok: false, status: 0, url, data: undefined };
    }
  }
}

export const nwsAdapter = new NwsAdapter();
