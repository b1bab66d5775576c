/**
 * Service Container
 * Builds the cache, upstream clients, providers and services from config
 */

import { EnvConfig } from './config/env';
import { DatasetCacheManager, RefreshScheduler } from './lib/cache';
import { CircuitBreakerConfig } from './lib/circuit-breaker';
import {
  FARMSENSE_BASE_URL,
  MarineProvider,
  MoonPhaseProvider,
  OPEN_METEO_MARINE_BASE_URL,
  OPENWEATHER_BASE_URL,
  OpenWeatherProvider,
  SUNRISE_SUNSET_BASE_URL,
  SunriseSunsetProvider,
  UpstreamClient,
  WORLDTIDES_BASE_URL,
  WorldTidesProvider,
} from './lib/providers';
import { TideService, TideSource } from './modules/tides/tides.service';
import { ConditionsService, ConditionsSources } from './modules/conditions';

export interface Services {
  cache: DatasetCacheManager;
  scheduler: RefreshScheduler;
  tideService: TideService;
  conditionsService: ConditionsService;
  clients: UpstreamClient[];
}

/**
 * Provider overrides, used by tests to run without the network
 */
export interface ServiceOverrides {
  tideSource?: TideSource;
  conditionsSources?: ConditionsSources;
  now?: () => number;
}

export function createServices(config: EnvConfig, overrides: ServiceOverrides = {}): Services {
  const breaker: CircuitBreakerConfig = {
    timeout: config.CIRCUIT_BREAKER_TIMEOUT,
    errorThresholdPercentage: config.CIRCUIT_BREAKER_ERROR_THRESHOLD,
    resetTimeout: config.CIRCUIT_BREAKER_RESET_TIMEOUT,
    minimumRequests: config.CIRCUIT_BREAKER_MIN_REQUESTS,
  };

  const client = (name: string, baseUrl: string): UpstreamClient =>
    new UpstreamClient({ name, baseUrl, timeoutMs: config.UPSTREAM_TIMEOUT, breaker });

  const clients = {
    worldTides: client('worldtides', WORLDTIDES_BASE_URL),
    openWeather: client('openweather', OPENWEATHER_BASE_URL),
    sunriseSunset: client('sunrise-sunset', SUNRISE_SUNSET_BASE_URL),
    moonPhase: client('farmsense', FARMSENSE_BASE_URL),
    marine: client('open-meteo-marine', OPEN_METEO_MARINE_BASE_URL),
  };

  const site = { latitude: config.SITE_LATITUDE, longitude: config.SITE_LONGITUDE };

  const tideSource =
    overrides.tideSource ?? new WorldTidesProvider(clients.worldTides, { ...site, apiKey: config.WORLDTIDES_KEY });

  const conditionsSources: ConditionsSources = overrides.conditionsSources ?? {
    weather: new OpenWeatherProvider(clients.openWeather, { ...site, apiKey: config.OPENWEATHER_KEY }),
    sunriseSunset: new SunriseSunsetProvider(clients.sunriseSunset, config.SITE_TIMEZONE),
    moonPhase: new MoonPhaseProvider(clients.moonPhase),
    marine: new MarineProvider(clients.marine),
  };

  const cache = new DatasetCacheManager({ fetchTimeoutMs: config.DATASET_FETCH_TIMEOUT, now: overrides.now });

  const tideService = new TideService(
    cache,
    tideSource,
    {
      threshold: config.GATE_OPEN_HEIGHT,
      tideHeightsDays: config.TIDE_HEIGHTS_DAYS,
      tideExtremesDays: config.TIDE_EXTREMES_DAYS,
      tideHeightsTtlMs: config.TIDE_HEIGHTS_TTL,
      tideExtremesTtlMs: config.TIDE_EXTREMES_TTL,
      gateTimesTtlMs: config.GATE_TIMES_TTL,
    },
    overrides.now
  );

  const conditionsService = new ConditionsService(cache, conditionsSources, {
    weatherTtlMs: config.WEATHER_TTL,
    sunMoonTtlMs: config.SUN_MOON_TTL,
    marineTtlMs: config.MARINE_TTL,
    keyedLimit: config.KEYED_DATASET_LIMIT,
  });

  const scheduler = new RefreshScheduler(cache, { tickMs: config.SCHEDULER_TICK_MS, now: overrides.now });
  for (const { name, intervalMs } of [...tideService.refreshIntervals(), ...conditionsService.refreshIntervals()]) {
    scheduler.schedule(name, intervalMs);
  }

  return { cache, scheduler, tideService, conditionsService, clients: Object.values(clients) };
}

/**
 * Stop background work and release breaker timers
 */
export function shutdownServices(services: Services): void {
  services.scheduler.stop();
  for (const client of services.clients) {
    client.shutdown();
  }
}
