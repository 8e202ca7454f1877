/**
 * Lambda entry points: POST /api/v1/current-temperature, POST /api/v1/annual-temperature
 * IMPLEMENTATION STATUS: OK (route dispatch + controller wiring + CORS)
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import {
  annualTemperatureController,
  currentTemperatureController,
} from '../controllers/weather.controller';
import type { WeatherRequest } from '../controllers/weather.controller';
import { logger } from '../lib/logger';
import {
  InvalidJsonBodyError,
  isOptions,
  parseJsonBody,
  requestIdOf,
  toErrorResponse,
  toLambdaResponse,
  withCors,
} from './http';

type WeatherRoute = 'current' | 'annual';

function detectRoute(event: APIGatewayProxyEventV2): WeatherRoute | undefined {
  const path = (event.rawPath || event.requestContext?.http?.path || '').toLowerCase();
  const routeKey = (event.routeKey || '').toLowerCase();
  const target = routeKey || path;

  if (target.includes('annual-temperature')) return 'annual';
  if (target.includes('current-temperature')) return 'current';
  return undefined;
}

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isOptions(event)) {
    return { statusCode: 200, headers: withCors(), body: '' };
  }

  const route = detectRoute(event);
  if (!route) {
    return toErrorResponse(404, { error: 'not_found', message: 'Unsupported weather route' });
  }

  try {
    const request: WeatherRequest = { body: parseJsonBody(event) };
    const requestId = requestIdOf(event);
    if (requestId) request.requestId = requestId;

    const result = route === 'annual'
      ? await annualTemperatureController(request)
      : await currentTemperatureController(request);

    return toLambdaResponse(result);
  } catch (error) {
    if (error instanceof InvalidJsonBodyError) {
      return toErrorResponse(400, { error: 'bad_request', message: error.message });
    }
    logger.error({ err: error, route }, 'Error in weather Lambda');
    return toErrorResponse();
  }
}
