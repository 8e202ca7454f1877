import { NwsAdapter } from '../src/adapters/nws.adapter';
import type { NwsResponse } from '../src/adapters/nws.adapter';
import { fahrenheitToCelsius } from '../src/lib/util';
import {
  CURRENT_WEATHER_ERROR_MESSAGES,
  CurrentWeatherService,
  provideResponseErrorMessages,
} from '../src/services/currentWeather.service';
import { ValidationError } from '../src/lib/errors';
import { buildCurrentWeather, createCoordinates } from '../src/types';

const FORECAST_URL = 'https://api.weather.gov/gridpoints/ILX/95,71/forecast';

const ok = (data: unknown, url = 'https://api.weather.gov/points/40.053,-88.373'): NwsResponse => ({
  ok: true,
  status: 200,
  url,
  data,
});

const failed = (status: number, data: unknown = undefined): NwsResponse => ({
  ok: false,
  status,
  url: 'https://api.weather.gov/points/40.053,-88.373',
  data,
});

const pointPayload = (overrides: { city?: string; state?: string; radarStation?: string; forecast?: string } = {}) => ({
  properties: {
    forecast: overrides.forecast ?? FORECAST_URL,
    radarStation: overrides.radarStation ?? 'KILX',
    relativeLocation: {
      properties: {
        city: overrides.city ?? 'Bondville',
        state: overrides.state ?? 'IL',
      },
    },
  },
});

const forecastPayload = (temperature: unknown, temperatureUnit = 'F') => ({
  properties: { periods: [{ number: 1, temperature, temperatureUnit }] },
});

function setup(attempts = 3) {
  const adapter = new NwsAdapter();
  const station = jest.spyOn(adapter, 'requestStationInformation');
  const forecast = jest.spyOn(adapter, 'requestForecast');
  const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
  const service = new CurrentWeatherService(adapter, { attempts, delayMs: 4000, sleep });
  return { service, station, forecast, sleep };
}

const champaign = createCoordinates(40.053, -88.373);

describe('CurrentWeatherService.fetch', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the converted temperature and location on success', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(pointPayload()));
    forecast.mockResolvedValue(ok(forecastPayload(23), FORECAST_URL));

    const result = await service.fetch(champaign);

    expect(result).toEqual({
      valid_response: true,
      temperature_celsius: fahrenheitToCelsius(23),
      radar_station: 'KILX',
      coordinates_city: 'Bondville',
      coordinates_state: 'IL',
      error_code: null,
      error_message: '',
    });
    expect(result.temperature_celsius).toBe(-5);
    expect(forecast).toHaveBeenCalledWith(FORECAST_URL, {});
  });

  it('passes the deadline signal to both lookups', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(pointPayload()));
    forecast.mockResolvedValue(ok(forecastPayload(23), FORECAST_URL));
    const controller = new AbortController();

    await service.fetch(champaign, { signal: controller.signal });

    expect(station).toHaveBeenCalledWith(champaign, { signal: controller.signal });
    expect(forecast).toHaveBeenCalledWith(FORECAST_URL, { signal: controller.signal });
  });

  it('keeps Celsius temperatures as reported', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(pointPayload()));
    forecast.mockResolvedValue(ok(forecastPayload(-3, 'C'), FORECAST_URL));

    const result = await service.fetch(champaign);

    expect(result.temperature_celsius).toBe(-3);
    expect(result.error_code).toBeNull();
  });

  it('recovers when a retry succeeds', async () => {
    const { service, station, forecast, sleep } = setup();
    station.mockResolvedValueOnce(failed(500)).mockResolvedValueOnce(ok(pointPayload()));
    forecast.mockResolvedValue(ok(forecastPayload(50), FORECAST_URL));

    const result = await service.fetch(champaign);

    expect(result.valid_response).toBe(true);
    expect(result.temperature_celsius).toBe(10);
    expect(station).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(4000, undefined);
  });

  it('reports invalid coordinates when NWS rejects the point', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(
      failed(404, { type: 'https://api.weather.gov/problems/InvalidPoint', title: 'Invalid Point' })
    );

    const result = await service.fetch(createCoordinates(51.5, -0.12));

    expect(result).toEqual({
      valid_response: false,
      temperature_celsius: -9999,
      radar_station: '',
      coordinates_city: '',
      coordinates_state: '',
      error_code: 'invalid_input_coordinates',
      error_message: CURRENT_WEATHER_ERROR_MESSAGES.invalid_input_coordinates,
    });
    expect(station).toHaveBeenCalledTimes(3);
    expect(forecast).not.toHaveBeenCalled();
  });

  it('reports an invalid API response when every station lookup fails', async () => {
    const { service, station, forecast, sleep } = setup();
    station.mockResolvedValue(failed(0));

    const result = await service.fetch(champaign);

    expect(result.valid_response).toBe(false);
    expect(result.error_code).toBe('invalid_weather_api_response');
    expect(result.error_message).toBe('Invalid response from current weather API.');
    expect(station).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(forecast).not.toHaveBeenCalled();
  });

  it('reports a missing forecast URL', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok({ properties: { radarStation: 'KILX' } }));

    const result = await service.fetch(champaign);

    expect(result.valid_response).toBe(false);
    expect(result.error_code).toBe('forecast_url_missing');
    expect(result.error_message).toBe(CURRENT_WEATHER_ERROR_MESSAGES.forecast_url_missing);
    expect(forecast).not.toHaveBeenCalled();
  });

  it('returns an invalid response without a category when the forecast lookup fails', async () => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(pointPayload()));
    forecast.mockResolvedValue(failed(503));

    const result = await service.fetch(champaign);

    expect(result).toEqual({
      valid_response: false,
      temperature_celsius: -9999,
      radar_station: '',
      coordinates_city: '',
      coordinates_state: '',
      error_code: null,
      error_message: '',
    });
    expect(forecast).toHaveBeenCalledTimes(3);
  });

  it.each([
    ['no periods', { properties: { periods: [] } }],
    ['a non-numeric temperature', forecastPayload('23')],
    ['an implausible temperature', forecastPayload(500)],
  ])('reports a missing temperature for %s', async (_label, payload) => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(pointPayload()));
    forecast.mockResolvedValue(ok(payload, FORECAST_URL));

    const result = await service.fetch(champaign);

    expect(result.valid_response).toBe(true);
    expect(result.temperature_celsius).toBe(-9999);
    expect(result.error_code).toBe('temperature_missing');
    expect(result.error_message).toBe(CURRENT_WEATHER_ERROR_MESSAGES.temperature_missing);
  });

  it.each([
    ['a missing city', pointPayload({ city: '' })],
    ['a long state name', pointPayload({ state: 'Illinois' })],
    ['a long radar station id', pointPayload({ radarStation: 'KILXX' })],
    ['a one-letter radar station id', pointPayload({ radarStation: 'K' })],
  ])('keeps the temperature but reports incomplete location for %s', async (_label, payload) => {
    const { service, station, forecast } = setup();
    station.mockResolvedValue(ok(payload));
    forecast.mockResolvedValue(ok(forecastPayload(23), FORECAST_URL));

    const result = await service.fetch(champaign);

    expect(result).toEqual({
      valid_response: true,
      temperature_celsius: -5,
      radar_station: '',
      coordinates_city: '',
      coordinates_state: '',
      error_code: 'location_missing',
      error_message: CURRENT_WEATHER_ERROR_MESSAGES.location_missing,
    });
  });

  it('makes no request when retries are disabled', async () => {
    const { service, station, forecast } = setup(0);

    const result = await service.fetch(champaign);

    expect(result.error_code).toBe('invalid_weather_api_response');
    expect(station).not.toHaveBeenCalled();
    expect(forecast).not.toHaveBeenCalled();
  });
});

describe('provideResponseErrorMessages', () => {
  it('has one message per error category', () => {
    expect(Object.keys(provideResponseErrorMessages()).sort()).toEqual([
      'forecast_url_missing',
      'invalid_input_coordinates',
      'invalid_weather_api_response',
      'location_missing',
      'temperature_missing',
    ]);
  });
});

describe('buildCurrentWeather', () => {
  it('accepts an empty or 2 to 4 character radar station', () => {
    expect(buildCurrentWeather({ valid_response: true }).radar_station).toBe('');
    expect(buildCurrentWeather({ valid_response: true, radar_station: 'KILX' }).radar_station).toBe('KILX');
  });

  it('rejects a one-character radar station', () => {
    expect(() => buildCurrentWeather({ valid_response: true, radar_station: 'K' })).toThrow(ValidationError);
  });
});
