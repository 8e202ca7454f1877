/**
 * Lambda entry point: GET /api/v1/healthz
 * IMPLEMENTATION STATUS: OK (controller wiring)
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { healthCheckController } from '../controllers/health.controller';
import { logger } from '../lib/logger';
import { isOptions, requestIdOf, toErrorResponse, toLambdaResponse, withCors } from './http';

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isOptions(event)) {
    return { statusCode: 200, headers: withCors(), body: '' };
  }

  try {
    const result = await healthCheckController(requestIdOf(event));
    return toLambdaResponse(result);
  } catch (error) {
    logger.error({ err: error }, 'Error in health Lambda');
    return toErrorResponse();
  }
}
