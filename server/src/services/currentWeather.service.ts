/**
 * Current conditions from the National Weather Service, in two steps:
 *   1) /points/{lat},{lon} gives the forecast URL plus the nearby city, state
 *      and radar station;
 *   2) the forecast URL gives the forecast periods, the first of which holds
 *      the current temperature.
 * Expected failures come back as a CurrentWeather carrying one of five error
 * categories, never as exceptions.
 */

import { NwsAdapter, nwsAdapter } from '../adapters/nws.adapter';
import type { NwsResponse } from '../adapters/nws.adapter';
import { ENV } from '../lib/env';
import { logger } from '../lib/logger';
import { retryRequest } from '../lib/retry';
import type { Sleep } from '../lib/retry';
import { dig, fahrenheitToCelsius, toNonEmptyString } from '../lib/util';
import { buildCurrentWeather, isPlausibleCelsius } from '../types';
import type { Coordinates, CurrentWeather, CurrentWeatherErrorCode } from '../types';

export const CURRENT_WEATHER_ERROR_MESSAGES: Readonly<Record<CurrentWeatherErrorCode, string>> = {
  forecast_url_missing:
    'Valid response from current weather API, but forecast URL not in expected place in response.',
  invalid_input_coordinates:
    'Invalid input coordinates.  The first coordinate should be latitude; ' +
    'the second should be longitude.  Ensure that the coordinates are within the United States.',
  invalid_weather_api_response: 'Invalid response from current weather API.',
  temperature_missing:
    'Valid response from current weather API, but temperature not in expected place in response.',
  location_missing: 'Valid response from current weather API, but location information is incomplete.',
};

export function provideResponseErrorMessages(): Readonly<Record<CurrentWeatherErrorCode, string>> {
  return CURRENT_WEATHER_ERROR_MESSAGES;
}

export type RetryPolicy = {
  attempts: number;
  delayMs: number;
  sleep?: Sleep;
};

export type FetchOptions = {
  signal?: AbortSignal;
};

type PointLocation = {
  city: string;
  state: string;
  radarStation: string;
};

const failure = (code: CurrentWeatherErrorCode, validResponse: boolean): CurrentWeather =>
  buildCurrentWeather({
    valid_response: validResponse,
    error_code: code,
    error_message: CURRENT_WEATHER_ERROR_MESSAGES[code],
  });

function classifyStationFailure(response: NwsResponse | undefined): CurrentWeatherErrorCode {
  const type = dig(response?.data, ['type']);
  if (typeof type === 'string' && type.toLowerCase().includes('invalidpoint')) {
    return 'invalid_input_coordinates';
  }
  return 'invalid_weather_api_response';
}

function extractForecastUrl(payload: unknown): string | undefined {
  return toNonEmptyString(dig(payload, ['properties', 'forecast']));
}

function extractCelsius(payload: unknown): number | undefined {
  const temperature = dig(payload, ['properties', 'periods', 0, 'temperature']);
  if (typeof temperature !== 'number' || !Number.isFinite(temperature)) return undefined;

  const unit = dig(payload, ['properties', 'periods', 0, 'temperatureUnit']);
  const celsius = unit === 'C' ? temperature : fahrenheitToCelsius(temperature);
  return isPlausibleCelsius(celsius) ? celsius : undefined;
}

function extractLocation(payload: unknown): PointLocation | undefined {
  const city = toNonEmptyString(dig(payload, ['properties', 'relativeLocation', 'properties', 'city']));
  const state = toNonEmptyString(dig(payload, ['properties', 'relativeLocation', 'properties', 'state']));
  const radarStation = toNonEmptyString(dig(payload, ['properties', 'radarStation']));

  if (!city || city.length > 50) return undefined;
  if (!state || state.length !== 2) return undefined;
  if (!radarStation || radarStation.length < 2 || radarStation.length > 4) return undefined;
  return { city, state, radarStation };
}

export class CurrentWeatherService {
  private readonly adapter: NwsAdapter;
  private readonly policy: RetryPolicy;

  constructor(
    adapter: NwsAdapter = nwsAdapter,
    policy: RetryPolicy = { attempts: ENV.NWS_RETRY_ATTEMPTS, delayMs: ENV.NWS_RETRY_DELAY_MS }
  ) {
    this.adapter = adapter;
    this.policy = policy;
  }

  async fetch(coordinates: Coordinates, options: FetchOptions = {}): Promise<CurrentWeather> {
    const requestOptions = options.signal ? { signal: options.signal } : {};

    const station = await this.withRetry(
      () => this.adapter.requestStationInformation(coordinates, requestOptions),
      options
    );

    if (!station.response?.ok) {
      const code = classifyStationFailure(station.response);
      logger.warn(
        { coordinates, attempts: station.attempts, aborted: station.aborted, status: station.response?.status, code },
        'NWS station lookup failed'
      );
      return failure(code, false);
    }

    const stationPayload = station.response.data;
    const forecastUrl = extractForecastUrl(stationPayload);
    if (!forecastUrl) {
      logger.warn({ coordinates, url: station.response.url }, 'NWS station lookup has no forecast URL');
      return failure('forecast_url_missing', false);
    }

    const forecast = await this.withRetry(
      () => this.adapter.requestForecast(forecastUrl, requestOptions),
      options
    );

    if (!forecast.response?.ok) {
      // no category fits a failed forecast call; kept as an empty message
      logger.warn(
        { coordinates, forecastUrl, attempts: forecast.attempts, aborted: forecast.aborted },
        'NWS forecast lookup failed'
      );
      return buildCurrentWeather({ valid_response: false });
    }

    const temperatureCelsius = extractCelsius(forecast.response.data);
    if (temperatureCelsius === undefined) {
      return failure('temperature_missing', true);
    }

    const location = extractLocation(stationPayload);
    if (!location) {
      return buildCurrentWeather({
        valid_response: true,
        temperature_celsius: temperatureCelsius,
        error_code: 'location_missing',
        error_message: CURRENT_WEATHER_ERROR_MESSAGES.location_missing,
      });
    }

    logger.debug({ coordinates, temperatureCelsius, radarStation: location.radarStation }, 'NWS current weather retrieved');

    return buildCurrentWeather({
      valid_response: true,
      temperature_celsius: temperatureCelsius,
      radar_station: location.radarStation,
      coordinates_city: location.city,
      coordinates_state: location.state,
    });
  }

  private withRetry(request: () => Promise<NwsResponse>, options: FetchOptions) {
    return retryRequest(this.policy.attempts, this.policy.delayMs, request, {
      ...(options.signal ? { signal: options.signal } : {}),
      ...(this.policy.sleep ? { sleep: this.policy.sleep } : {}),
    });
  }
}

export const currentWeatherService = new CurrentWeatherService();
