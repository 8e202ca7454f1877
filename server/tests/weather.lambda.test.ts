import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { handler as healthHandler } from '../src/lambda/health.lambda';
import { handler as weatherHandler } from '../src/lambda/weather.lambda';

function event(method: string, path: string, body?: string): APIGatewayProxyEventV2 {
  const base: APIGatewayProxyEventV2 = {
    version: '2.0',
    routeKey: `${method} ${path}`,
    rawPath: path,
    rawQueryString: '',
    headers: { 'content-type': 'application/json', 'x-request-id': 'test-lambda-1' },
    isBase64Encoded: false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'test-api.example.com',
      domainPrefix: 'test-api',
      http: { method, path, protocol: 'HTTP/1.1', sourceIp: '127.0.0.1', userAgent: 'jest' },
      requestId: 'test-context-1',
      routeKey: `${method} ${path}`,
      stage: '$default',
      time: '01/Jan/2024:00:00:00 +0000',
      timeEpoch: 1704067200000,
    },
  };
  return body === undefined ? base : { ...base, body };
}

function parse(result: APIGatewayProxyResultV2) {
  if (typeof result === 'string') throw new Error('expected a structured result');
  return { statusCode: result.statusCode, headers: result.headers, body: JSON.parse(result.body ?? 'null') };
}

describe('weather Lambda', () => {
  it('answers CORS preflight', async () => {
    const result = parse(await weatherHandler(event('OPTIONS', '/api/v1/current-temperature')));

    expect(result.statusCode).toBe(200);
    expect(result.headers).toMatchObject({ 'Access-Control-Allow-Methods': 'GET,POST,OPTIONS' });
  });

  it('returns current weather', async () => {
    const result = parse(
      await weatherHandler(event('POST', '/api/v1/current-temperature', JSON.stringify({ latitude: 40, longitude: -88 })))
    );

    expect(result.statusCode).toBe(200);
    expect(result.body).toMatchObject({ valid_response: true, temperature_celsius: -5, coordinates_city: 'Bondville' });
  });

  it('decodes base64 bodies', async () => {
    const body = Buffer.from(JSON.stringify({ latitude: 40, longitude: -88 })).toString('base64');
    const result = parse(
      await weatherHandler({ ...event('POST', '/api/v1/annual-temperature', body), isBase64Encoded: true })
    );

    expect(result.statusCode).toBe(200);
    expect(result.body).toMatchObject({ annual_usaf_station_id: 999999, annual_wban_station_id: 54808 });
  });

  it('rejects invalid coordinates', async () => {
    const result = parse(
      await weatherHandler(event('POST', '/api/v1/annual-temperature', JSON.stringify({ latitude: 0, longitude: 200 })))
    );

    expect(result.statusCode).toBe(400);
    expect(result.body).toHaveProperty('error', 'invalid_coordinates');
  });

  it('rejects malformed JSON', async () => {
    const result = parse(await weatherHandler(event('POST', '/api/v1/current-temperature', '{"latitude":')));

    expect(result.statusCode).toBe(400);
    expect(result.body).toEqual({ error: 'bad_request', message: 'Request body is not valid JSON' });
  });

  it('rejects unknown routes', async () => {
    const result = parse(await weatherHandler(event('POST', '/api/v1/forecast', '{}')));

    expect(result.statusCode).toBe(404);
    expect(result.body).toHaveProperty('error', 'not_found');
  });
});

describe('health Lambda', () => {
  it('reports the bundled catalog', async () => {
    const result = parse(await healthHandler(event('GET', '/api/v1/healthz')));

    expect(result.statusCode).toBe(200);
    expect(result.body).toMatchObject({ ok: true, catalog: { ok: true, stations: 5 } });
  });
});
