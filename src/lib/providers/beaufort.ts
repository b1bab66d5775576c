// Upper bounds (m/s) of Beaufort forces 0-11
const BEAUFORT_THRESHOLDS = [0.5, 1.5, 3.3, 5.5, 7.9, 10.7, 13.8, 17.1, 20.7, 24.4, 28.4, 32.6];

/**
 * Convert a wind speed in metres per second to the Beaufort scale
 */
export function beaufort(speed: number): number {
  const force = BEAUFORT_THRESHOLDS.findIndex((threshold) => speed < threshold);
  return force === -1 ? 12 : force;
}
