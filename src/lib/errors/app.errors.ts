/**
 * Service Errors
 * Failures that are not caused by an upstream provider
 */

/**
 * Missing or invalid configuration at startup. Fatal: the server must not
 * start serving.
 */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * The gate predictor was handed a series with no samples.
 */
export class EmptySeriesError extends Error {
  constructor(message: string = 'Tide-height series is empty') {
    super(message);
    this.name = 'EmptySeriesError';
  }
}

/**
 * Lookup of a dataset name that was never registered
 */
export class UnknownDatasetError extends Error {
  readonly dataset: string;

  constructor(dataset: string) {
    super(`Unknown dataset "${dataset}"`);
    this.name = 'UnknownDatasetError';
    this.dataset = dataset;
  }
}
