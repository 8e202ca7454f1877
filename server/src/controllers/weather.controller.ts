/**
 * Weather controllers: current temperature and same-day history for a coordinate.
 * IMPLEMENTATION STATUS: OK (validation + service orchestration; NWS failures come back inside the body)
 */

import { z } from 'zod';
import { annualWeatherService } from '../services/annualWeather.service';
import { currentWeatherService } from '../services/currentWeather.service';
import { ENV } from '../lib/env';
import { logger } from '../lib/logger';
import {
  DataUnavailableError,
  PreconditionError,
  ValidationError,
  describeIssues,
} from '../lib/errors';
import { createCoordinates } from '../types';
import type { Coordinates } from '../types';
import type { ControllerResult, ErrorBody } from './types';

// numbers or numeric strings only
const CoordinateValueSchema = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

const CoordinatesBodySchema = z.object({
  latitude: CoordinateValueSchema,
  longitude: CoordinateValueSchema,
});

export type WeatherRequest = {
  body: unknown;
  requestId?: string;
};

type ParsedCoordinates = { coordinates: Coordinates } | { error: ControllerResult<ErrorBody> };

function parseCoordinatesBody(body: unknown): ParsedCoordinates {
  const shape = CoordinatesBodySchema.safeParse(body ?? {});
  if (!shape.success) {
    return {
      error: {
        statusCode: 400,
        body: {
          error: 'invalid_coordinates',
          message: `Body must be { latitude, longitude }: ${describeIssues(shape.error.issues)}`,
          details: shape.error.issues,
        },
      },
    };
  }

  try {
    return { coordinates: createCoordinates(shape.data.latitude, shape.data.longitude) };
  } catch (error) {
    if (error instanceof ValidationError) {
      return {
        error: {
          statusCode: 400,
          body: { error: 'invalid_coordinates', message: error.message, details: error.issues },
        },
      };
    }
    throw error;
  }
}

function requestDeadline(): AbortSignal | undefined {
  return ENV.REQUEST_DEADLINE_MS > 0 ? AbortSignal.timeout(ENV.REQUEST_DEADLINE_MS) : undefined;
}

function toErrorResult(error: unknown, reqId: string | undefined): ControllerResult<ErrorBody> {
  const withId = (body: ErrorBody): ErrorBody => (reqId ? { ...body, requestId: reqId } : body);

  if (error instanceof DataUnavailableError) {
    return {
      statusCode: 503,
      body: withId({ error: 'data_unavailable', message: error.message }),
    };
  }

  if (error instanceof ValidationError) {
    return {
      statusCode: 500,
      body: withId({ error: 'response_validation_failed', message: error.message, details: error.issues }),
    };
  }

  if (error instanceof PreconditionError) {
    return {
      statusCode: 500,
      body: withId({ error: 'precondition_failed', message: error.message }),
    };
  }

  return {
    statusCode: 500,
    body: withId({ error: 'internal_error', message: 'Internal server error' }),
  };
}

function logFailure(reqId: string | undefined, error: unknown, message: string) {
  logger.error(
    {
      reqId,
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined,
    },
    message
  );
}

export async function currentTemperatureController(request: WeatherRequest): Promise<ControllerResult> {
  const reqId = request.requestId;

  try {
    logger.info({ reqId, body: request.body }, 'Current temperature request received');

    const parsed = parseCoordinatesBody(request.body);
    if ('error' in parsed) {
      logger.warn({ reqId, error: parsed.error.body.message }, 'Invalid request parameters');
      return parsed.error;
    }

    const signal = requestDeadline();
    const currentWeather = await currentWeatherService.fetch(parsed.coordinates, signal ? { signal } : {});

    logger.info(
      {
        reqId,
        valid: currentWeather.valid_response,
        temperature_celsius: currentWeather.temperature_celsius,
        error_code: currentWeather.error_code,
      },
      'Current temperature retrieved'
    );

    return { statusCode: 200, body: currentWeather };
  } catch (error) {
    logFailure(reqId, error, 'Current temperature request failed');
    return toErrorResult(error, reqId);
  }
}

export async function annualTemperatureController(request: WeatherRequest): Promise<ControllerResult> {
  const reqId = request.requestId;

  try {
    logger.info({ reqId, body: request.body }, 'Annual temperature request received');

    const parsed = parseCoordinatesBody(request.body);
    if ('error' in parsed) {
      logger.warn({ reqId, error: parsed.error.body.message }, 'Invalid request parameters');
      return parsed.error;
    }

    const signal = requestDeadline();
    const annualWeather = await annualWeatherService.assemble(parsed.coordinates, signal ? { signal } : {});

    logger.info(
      {
        reqId,
        usaf: annualWeather.annual_usaf_station_id,
        wban: annualWeather.annual_wban_station_id,
        distance_km: annualWeather.distance_to_station_kilometers,
        observations: annualWeather.annual_timestamp.length,
        current_error: annualWeather.current_error_message || undefined,
      },
      'Annual temperature assembled'
    );

    return { statusCode: 200, body: annualWeather };
  } catch (error) {
    logFailure(reqId, error, 'Annual temperature request failed');
    return toErrorResult(error, reqId);
  }
}
