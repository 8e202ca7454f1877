import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import { NwsAdapter, formatPoint } from '../src/adapters/nws.adapter';
import { ENV } from '../src/lib/env';
import { http } from '../src/lib/http';
import { createCoordinates } from '../src/types';

const response = (status: number, data: unknown): AxiosResponse<unknown> => ({
  data,
  status,
  statusText: String(status),
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('NwsAdapter (live)', () => {
  const original = { MOCK: ENV.MOCK, NWS_BASE_URL: ENV.NWS_BASE_URL };

  beforeEach(() => {
    ENV.MOCK = 0;
    ENV.NWS_BASE_URL = 'https://api.weather.gov';
  });

  afterEach(() => {
    ENV.MOCK = original.MOCK;
    ENV.NWS_BASE_URL = original.NWS_BASE_URL;
    jest.restoreAllMocks();
  });

  it('requests the point rounded to four decimals', async () => {
    const get = jest.spyOn(http, 'get').mockResolvedValue(response(200, { properties: {} }));

    const result = await new NwsAdapter().requestStationInformation(createCoordinates(40.05312345, -88.37398765));

    expect(get).toHaveBeenCalledWith('https://api.weather.gov/points/40.0531,-88.374', {});
    expect(result).toEqual({
      ok: true,
      status: 200,
      url: 'https://api.weather.gov/points/40.0531,-88.374',
      data: { properties: {} },
    });
  });

  it('keeps the payload of an error status', async () => {
    const problem = { type: 'https://api.weather.gov/problems/InvalidPoint', title: 'Invalid Point', status: 404 };
    jest.spyOn(http, 'get').mockResolvedValue(response(404, problem));

    const result = await new NwsAdapter().requestStationInformation(createCoordinates(51.5, -0.12));

    expect(result).toEqual({
      ok: false,
      status: 404,
      url: 'https://api.weather.gov/points/51.5,-0.12',
      data: problem,
    });
  });

  it('reports a request that never got a response as status 0', async () => {
    jest.spyOn(http, 'get').mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:443'));
    const url = 'https://api.weather.gov/gridpoints/ILX/95,71/forecast';

    const result = await new NwsAdapter().requestForecast(url);

    expect(result).toEqual({ ok: false, status: 0, url, data: undefined });
  });

  it('passes the deadline signal to axios', async () => {
    const get = jest.spyOn(http, 'get').mockResolvedValue(response(200, {}));
    const controller = new AbortController();
    const url = 'https://api.weather.gov/gridpoints/ILX/95,71/forecast';

    await new NwsAdapter().requestForecast(url, { signal: controller.signal });

    expect(get).toHaveBeenCalledWith(url, { signal: controller.signal });
  });
});

describe('NwsAdapter (mock)', () => {
  it('answers from fixtures without calling the API', async () => {
    const get = jest.spyOn(http, 'get');

    const result = await new NwsAdapter().requestStationInformation(createCoordinates(40.053, -88.373));

    expect(get).not.toHaveBeenCalled();
    expect(result.ok).toBe(true);
    expect(result.url).toBe(`${ENV.NWS_BASE_URL}/points/40.053,-88.373`);
    get.mockRestore();
  });
});

describe('formatPoint', () => {
  it('drops trailing zeros after rounding', () => {
    expect(formatPoint(createCoordinates(39.7456, -97.0892))).toBe('39.7456,-97.0892');
    expect(formatPoint(createCoordinates(40.00004, -88.5))).toBe('40,-88.5');
  });
});
