/**
 * Provider Tests
 * Request shapes and response conversion, against a stubbed fetch
 */

import {
  MarineProvider,
  MoonPhaseProvider,
  OpenWeatherProvider,
  SunriseSunsetProvider,
  UpstreamClient,
  WorldTidesProvider,
} from '..';
import { UpstreamErrorType } from '../../errors';
import { jsonResponse, mockFetch, requestedUrls } from '../../../__tests__/helpers/http';
import { T0 } from '../../../__tests__/helpers/fixtures';

const SITE = { latitude: 53.28, longitude: -3.83 };
const unix = (iso: string): number => Date.parse(iso) / 1000;

describe('providers', () => {
  let client: UpstreamClient;

  beforeEach(() => {
    client = new UpstreamClient({ name: 'provider', baseUrl: 'https://provider.test', timeoutMs: 1000 });
  });

  afterEach(() => {
    client.shutdown();
    jest.restoreAllMocks();
  });

  describe('WorldTidesProvider', () => {
    const provider = (apiKey?: string): WorldTidesProvider =>
      new WorldTidesProvider(client, { ...SITE, apiKey, now: () => new Date(T0) });

    it('should request heights against chart datum from today', async () => {
      const fetchSpy = mockFetch(() =>
        jsonResponse({
          status: 200,
          heights: [
            { dt: unix('2025-06-01T10:00:00Z'), height: 3.1 },
            { dt: unix('2025-06-01T09:30:00Z'), height: 2.5 },
            { dt: unix('2025-06-01T10:00:00Z'), height: 9.9 },
          ],
        })
      );

      const samples = await provider('test-secret').fetchTideHeights(2);

      const [url] = requestedUrls(fetchSpy);
      expect(url.pathname).toBe('/api/v3');
      expect(Object.fromEntries(url.searchParams)).toEqual({
        heights: '',
        date: '2025-06-01',
        days: '2',
        datum: 'CD',
        lat: '53.28',
        lon: '-3.83',
        key: 'test-secret',
      });
      expect(samples).toEqual([
        { timestamp: new Date('2025-06-01T09:30:00Z'), height: 2.5 },
        { timestamp: new Date('2025-06-01T10:00:00Z'), height: 3.1 },
      ]);
    });

    it('should fetch extremes in weekly chunks', async () => {
      const fetchSpy = mockFetch((url) =>
        jsonResponse({
          extremes: [
            {
              dt: unix(`${url.searchParams.get('date')}T12:00:00Z`),
              height: url.searchParams.get('days') === '7' ? 5.2 : 0.8,
              type: url.searchParams.get('days') === '7' ? 'High' : 'Low',
            },
          ],
        })
      );

      const extremes = await provider('test-secret').fetchTideExtremes(10);

      const urls = requestedUrls(fetchSpy);
      expect(urls.map((url) => [url.searchParams.get('date'), url.searchParams.get('days')])).toEqual([
        ['2025-06-01', '7'],
        ['2025-06-08', '3'],
      ]);
      expect(extremes).toEqual([
        { timestamp: new Date('2025-06-01T12:00:00Z'), height: 5.2, type: 'High' },
        { timestamp: new Date('2025-06-08T12:00:00Z'), height: 0.8, type: 'Low' },
      ]);
    });

    it('should fail without an API key and without calling out', async () => {
      const fetchSpy = mockFetch(() => jsonResponse({}));

      await expect(provider().fetchTideHeights(1)).rejects.toMatchObject({
        type: UpstreamErrorType.NOT_CONFIGURED,
        message: 'WORLDTIDES_KEY not set',
      });
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    it('should surface an error body', async () => {
      mockFetch(() => jsonResponse({ status: 400, error: 'Unknown key' }));

      await expect(provider('test-secret').fetchTideHeights(1)).rejects.toMatchObject({
        type: UpstreamErrorType.UNKNOWN,
        message: 'WorldTides: Unknown key',
        statusCode: 400,
      });
    });
  });

  describe('OpenWeatherProvider', () => {
    const day = {
      dt: unix('2025-06-01T11:00:00Z'),
      sunrise: unix('2025-06-01T03:50:00Z'),
      sunset: unix('2025-06-01T20:30:00Z'),
      temp: { day: 18, min: 11, max: 20, night: 12, eve: 17, morn: 13 },
      feels_like: { day: 17.5, night: 11, eve: 16, morn: 12 },
      pressure: 1018,
      humidity: 62,
      dew_point: 10.4,
      wind_speed: 6.1,
      wind_gust: 11.2,
      wind_deg: 240,
      weather: [{ id: 800, main: 'Clear', description: 'clear sky', icon: '01d' }],
      clouds: 5,
      pop: 0,
      uvi: 6.2,
    };

    it('should convert timestamps and add Beaufort forces', async () => {
      const fetchSpy = mockFetch(() => jsonResponse({ daily: [day] }));

      const [forecast] = await new OpenWeatherProvider(client, { ...SITE, apiKey: 'test-secret' }).fetchDailyForecast();

      const [url] = requestedUrls(fetchSpy);
      expect(url.pathname).toBe('/data/3.0/onecall');
      expect(url.searchParams.get('units')).toBe('metric');
      expect(url.searchParams.get('appid')).toBe('test-secret');
      expect(forecast.dt).toEqual(new Date('2025-06-01T11:00:00Z'));
      expect(forecast.sunrise).toEqual(new Date('2025-06-01T03:50:00Z'));
      expect(forecast.moonrise).toBeUndefined();
      expect(forecast.wind_speed_beaufort).toBe(4);
      expect(forecast.wind_gust_beaufort).toBe(6);
    });

    it('should fail without an API key', async () => {
      await expect(new OpenWeatherProvider(client, SITE).fetchDailyForecast()).rejects.toMatchObject({
        type: UpstreamErrorType.NOT_CONFIGURED,
      });
    });
  });

  describe('SunriseSunsetProvider', () => {
    it('should return the results with the site time zone', async () => {
      const fetchSpy = mockFetch(() =>
        jsonResponse({ results: { sunrise: '2025-06-01T03:50:12+00:00', day_length: 60000 }, status: 'OK' })
      );

      const result = await new SunriseSunsetProvider(client, 'Europe/London').fetchDay({
        date: '2025-06-01',
        ...SITE,
      });

      expect(Object.fromEntries(requestedUrls(fetchSpy)[0].searchParams)).toEqual({
        lat: '53.28',
        lng: '-3.83',
        date: '2025-06-01',
        formatted: '0',
      });
      expect(result).toEqual({
        results: { sunrise: '2025-06-01T03:50:12+00:00', day_length: 60000 },
        status: 'OK',
        tzid: 'Europe/London',
      });
    });

    it('should reject a non-OK status', async () => {
      mockFetch(() => jsonResponse({ results: {}, status: 'INVALID_DATE' }));

      await expect(
        new SunriseSunsetProvider(client, 'Europe/London').fetchDay({ date: '2025-06-01', ...SITE })
      ).rejects.toMatchObject({ message: 'sunrise-sunset: status INVALID_DATE' });
    });
  });

  describe('MoonPhaseProvider', () => {
    it('should unwrap a single-element list', async () => {
      const fetchSpy = mockFetch(() => jsonResponse([{ Phase: 'Waxing Crescent', Illumination: 0.31 }]));

      const phase = await new MoonPhaseProvider(client).fetchPhase(1748736000);

      expect(requestedUrls(fetchSpy)[0].searchParams.get('d')).toBe('1748736000');
      expect(phase).toEqual({ Phase: 'Waxing Crescent', Illumination: 0.31 });
    });
  });

  describe('MarineProvider', () => {
    it('should pass the query through', async () => {
      const body = { latitude: 53.25, longitude: -3.75, hourly: { time: [1748736000], sea_level_height_msl: [1.2] } };
      const fetchSpy = mockFetch(() => jsonResponse(body));

      const forecast = await new MarineProvider(client).fetchForecast({
        ...SITE,
        hourly: 'sea_level_height_msl',
        timeformat: 'unixtime',
        forecastHours: 24,
      });

      const [url] = requestedUrls(fetchSpy);
      expect(url.pathname).toBe('/v1/marine');
      expect(url.searchParams.get('forecast_hours')).toBe('24');
      expect(forecast).toEqual(body);
    });
  });
});
