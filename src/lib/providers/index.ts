/**
 * Upstream Providers
 * Main export file for provider clients
 */

export * from './provider.types';
export * from './upstream.client';
export * from './beaufort';
export * from './worldtides.provider';
export * from './openweather.provider';
export * from './astronomy.provider';
export * from './marine.provider';
