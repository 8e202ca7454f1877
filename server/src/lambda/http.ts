/**
 * Shared Lambda HTTP helpers: CORS headers and controller result conversion.
 * IMPLEMENTATION STATUS: OK (API Gateway v2 proxy integration)
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import type { ControllerResult } from '../controllers/types';

const defaultHeaders = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Request-ID',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

export function withCors(headers?: Record<string, string>): Record<string, string> {
  return { ...defaultHeaders, ...(headers ?? {}) };
}

export function toLambdaResponse(result: ControllerResult): APIGatewayProxyResultV2 {
  return {
    statusCode: result.statusCode,
    headers: withCors(result.headers),
    body: JSON.stringify(result.body),
  };
}

export function toErrorResponse(
  statusCode = 500,
  body: Record<string, unknown> = {
    error: 'internal_error',
    message: 'Unexpected error in Lambda handler',
  }
): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: withCors(),
    body: JSON.stringify(body),
  };
}

export function isOptions(event: APIGatewayProxyEventV2): boolean {
  return event.requestContext?.http?.method?.toUpperCase() === 'OPTIONS';
}

export function requestIdOf(event: APIGatewayProxyEventV2): string | undefined {
  return event.headers?.['x-request-id'] ?? event.headers?.['X-Request-Id'] ?? event.requestContext?.requestId;
}

export class InvalidJsonBodyError extends Error {
  constructor() {
    super('Request body is not valid JSON');
    this.name = 'InvalidJsonBodyError';
  }
}

export function parseJsonBody(event: APIGatewayProxyEventV2): unknown {
  if (!event.body) return undefined;
  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonBodyError();
  }
}
