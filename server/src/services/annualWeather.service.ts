/**
 * Current temperature plus every archived observation made on today's
 * calendar day in earlier years, for the station nearest to a coordinate.
 */

import { logger } from '../lib/logger';
import { PreconditionError } from '../lib/errors';
import { identifyClosestStation } from '../lib/geo.util';
import { dayOfYear, extractDayWindow } from '../lib/history.util';
import { tenthsToCelsius } from '../lib/util';
import { archiveRepository } from '../repositories/archive.repository';
import type { ArchiveSource } from '../repositories/archive.repository';
import { stationRepository } from '../repositories/station.repository';
import type { StationSource } from '../repositories/station.repository';
import { buildAnnualWeather, createCoordinates } from '../types';
import type { AnnualWeather, Coordinates } from '../types';
import { currentWeatherService } from './currentWeather.service';
import type { CurrentWeatherService, FetchOptions } from './currentWeather.service';

export type AnnualWeatherDependencies = {
  stations: StationSource;
  archive: ArchiveSource;
  currentWeather: Pick<CurrentWeatherService, 'fetch'>;
  clock: () => Date;
};

export type AssembleOptions = FetchOptions & {
  /** Day whose history is returned; defaults to the injected clock. */
  now?: Date;
};

export class AnnualWeatherService {
  private readonly deps: AnnualWeatherDependencies;

  constructor(deps: Partial<AnnualWeatherDependencies> = {}) {
    this.deps = {
      stations: deps.stations ?? stationRepository,
      archive: deps.archive ?? archiveRepository,
      currentWeather: deps.currentWeather ?? currentWeatherService,
      clock: deps.clock ?? (() => new Date()),
    };
  }

  async assemble(coordinates: Coordinates, options: AssembleOptions = {}): Promise<AnnualWeather> {
    const stations = await this.deps.stations.getStations();
    const { index, distanceKm } = identifyClosestStation(coordinates, stations);
    const station = stations[index];
    if (!station) {
      throw new PreconditionError(`nearest station index ${index} is outside the catalog`);
    }

    logger.debug(
      { coordinates, usaf: station.usaf, wban: station.wban, distanceKm },
      'Nearest station resolved'
    );

    const series = await this.deps.archive.getSeries(station);
    const target = dayOfYear(options.now ?? this.deps.clock());
    const window = extractDayWindow(series, target);

    // the live lookup uses the station's own location, not the query point
    const stationCoordinates = createCoordinates(station.lat, station.lon);
    const current = await this.deps.currentWeather.fetch(
      stationCoordinates,
      options.signal ? { signal: options.signal } : {}
    );

    return buildAnnualWeather({
      current_temperature_celsius: current.temperature_celsius,
      current_station: current.radar_station,
      current_city: current.coordinates_city,
      current_state: current.coordinates_state,
      current_error_message: current.error_message,
      distance_to_station_kilometers: distanceKm,
      annual_timestamp: window.map((record) => record.timestamp.toISOString()),
      annual_temperature_celsius: window.map((record) => tenthsToCelsius(record.temperature)),
      annual_usaf_station_id: station.usaf,
      annual_wban_station_id: station.wban,
      annual_station_name: station.name,
      annual_station_state: station.state,
      annual_station_call: station.call ?? '',
      annual_station_latitude: station.lat,
      annual_station_longitude: station.lon,
      annual_station_elevation_meters: station.elevationMeters,
    });
  }
}

export const annualWeatherService = new AnnualWeatherService();
