import { z } from 'zod';
import { ValidationError, describeIssues } from '../lib/errors';

/**
 * WGS84 coordinate pair, frozen once constructed.
 */
export type Coordinates = Readonly<{
  lat: number;
  lon: number;
}>;

export const CoordinatesInputSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
});

export type CoordinatesInput = z.infer<typeof CoordinatesInputSchema>;

export function createCoordinates(lat: number, lon: number): Coordinates {
  const parsed = CoordinatesInputSchema.safeParse({ latitude: lat, longitude: lon });
  if (!parsed.success) {
    throw new ValidationError(`Invalid coordinates: ${describeIssues(parsed.error.issues)}`, parsed.error.issues);
  }
  return Object.freeze({ lat: parsed.data.latitude, lon: parsed.data.longitude });
}

export type Station = {
  usaf: number;
  wban: number;
  name: string;
  state: string;
  call: string | null;
  lat: number;
  lon: number;
  elevationMeters: number;
};

export type TemperatureRecord = {
  timestamp: Date;
  temperature: number; // tenths of a degree Celsius
};

export type MonthDay = {
  month: number; // 1..12
  day: number;
};

export const TEMPERATURE_SENTINEL = -9999;

export const CURRENT_WEATHER_ERROR_CODES = [
  'forecast_url_missing',
  'invalid_input_coordinates',
  'invalid_weather_api_response',
  'temperature_missing',
  'location_missing',
] as const;

export type CurrentWeatherErrorCode = (typeof CURRENT_WEATHER_ERROR_CODES)[number];

// somewhat beyond the highest and lowest temperatures ever recorded
export const isPlausibleCelsius = (value: number): boolean => value >= -150 && value <= 150;

export const CurrentWeatherSchema = z.object({
  valid_response: z.boolean(),
  temperature_celsius: z
    .number()
    .refine((v) => v === TEMPERATURE_SENTINEL || isPlausibleCelsius(v), {
      message: 'temperature must be within [-150, 150] or the missing-value sentinel',
    })
    .default(TEMPERATURE_SENTINEL),
  radar_station: z
    .string()
    .max(4)
    .refine((v) => v === '' || v.length >= 2, { message: 'radar station id must be 2 to 4 characters' })
    .default(''),
  coordinates_city: z.string().max(50).default(''),
  coordinates_state: z
    .string()
    .refine((v) => v === '' || v.length === 2, { message: 'state must be a 2-letter code' })
    .default(''),
  error_code: z.enum(CURRENT_WEATHER_ERROR_CODES).nullable().default(null),
  error_message: z.string().default(''),
});

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type CurrentWeatherInit = z.input<typeof CurrentWeatherSchema>;

export function buildCurrentWeather(init: CurrentWeatherInit): CurrentWeather {
  const parsed = CurrentWeatherSchema.safeParse(init);
  if (!parsed.success) {
    throw new ValidationError(`Invalid current weather: ${describeIssues(parsed.error.issues)}`, parsed.error.issues);
  }
  return parsed.data;
}

// current_* fields are copied from CurrentWeather as-is; the sentinel must survive
export const AnnualWeatherSchema = z
  .object({
    current_temperature_celsius: z.number(),
    current_station: z.string(),
    current_city: z.string(),
    current_state: z.string(),
    current_error_message: z.string().default(''),

    distance_to_station_kilometers: z.number().min(0).max(21_000),
    annual_timestamp: z.array(z.string().datetime()),
    annual_temperature_celsius: z.array(z.number()),
    annual_usaf_station_id: z.number().int().min(0).lt(1_000_000),
    annual_wban_station_id: z.number().int().min(0).lt(100_000),
    annual_station_name: z.string().max(100),
    annual_station_state: z.string().length(2),
    annual_station_call: z.string().max(4),
    annual_station_latitude: z.number().min(-90).max(90),
    annual_station_longitude: z.number().min(-180).max(180),
    // Dead Sea shore to a little above Everest
    annual_station_elevation_meters: z.number().min(-440).max(8850),
  })
  .refine((v) => v.annual_timestamp.length === v.annual_temperature_celsius.length, {
    message: 'annual_timestamp and annual_temperature_celsius must have the same length',
    path: ['annual_temperature_celsius'],
  });

export type AnnualWeather = z.infer<typeof AnnualWeatherSchema>;
export type AnnualWeatherInit = z.input<typeof AnnualWeatherSchema>;

export function buildAnnualWeather(init: AnnualWeatherInit): AnnualWeather {
  const parsed = AnnualWeatherSchema.safeParse(init);
  if (!parsed.success) {
    throw new ValidationError(`Invalid annual weather: ${describeIssues(parsed.error.issues)}`, parsed.error.issues);
  }
  return parsed.data;
}
