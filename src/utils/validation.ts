/**
 * Input validation utilities and the error taxonomy of the raster transform
 * @module utils/validation
 */

export type HeatmapErrorCode =
  | 'INVALID_RANGE'
  | 'INVALID_WINDOW'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_DURATION_ENTRY'
  | 'LABEL_NOT_FOUND'
  | 'INVALID_OPTION';

/**
 * Validation error with details
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown,
    public code: HeatmapErrorCode = 'INVALID_OPTION'
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Percentile bounds are malformed, or there is nothing to take percentiles of
 */
export class InvalidRangeError extends ValidationError {
  constructor(message: string, field: string, value: unknown) {
    super(message, field, value, 'INVALID_RANGE');
    this.name = 'InvalidRangeError';
  }
}

/**
 * Samples-per-window is not a positive integer
 */
export class InvalidWindowError extends ValidationError {
  constructor(message: string, field: string, value: unknown) {
    super(message, field, value, 'INVALID_WINDOW');
    this.name = 'InvalidWindowError';
  }
}

export class IndexOutOfRangeError extends ValidationError {
  constructor(index: unknown, count: number) {
    super(`Duration index ${String(index)} is outside [1, ${count}]`, 'durationIndex', index, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Defect in the duration table itself
 */
export class InvalidDurationEntryError extends ValidationError {
  constructor(message: string, value: unknown) {
    super(message, 'durationEntry', value, 'INVALID_DURATION_ENTRY');
    this.name = 'InvalidDurationEntryError';
  }
}

export class LabelNotFoundError extends ValidationError {
  constructor(
    public label: string,
    public available: readonly string[]
  ) {
    super(
      `Signal "${label}" not found (available: ${available.join(', ') || 'none'})`,
      'signalLabels',
      label,
      'LABEL_NOT_FOUND'
    );
    this.name = 'LabelNotFoundError';
  }
}

/**
 * Validate a `[low, high]` percentile pair
 */
export function validatePercentileRange(range: readonly number[]): readonly [number, number] {
  if (range.length !== 2) {
    throw new InvalidRangeError('Percentile range must have exactly two bounds', 'percentileRange', range);
  }

  const [low, high] = range;

  if (!Number.isFinite(low) || !Number.isFinite(high)) {
    throw new InvalidRangeError('Percentile bounds must be finite numbers', 'percentileRange', range);
  }

  if (low < 0 || high > 100) {
    throw new InvalidRangeError(`Percentile bounds [${low}, ${high}] must lie within [0, 100]`, 'percentileRange', range);
  }

  if (low >= high) {
    throw new InvalidRangeError(`Lower percentile (${low}) must be below upper percentile (${high})`, 'percentileRange', range);
  }

  return [low, high];
}

/**
 * Validate that a window length is a whole number of samples
 */
export function validateWindowSize(samplesPerWindow: number, field = 'samplesPerWindow'): number {
  if (!Number.isInteger(samplesPerWindow) || samplesPerWindow < 1) {
    throw new InvalidWindowError(
      `Window must be a positive whole number of samples, got ${samplesPerWindow}`,
      field,
      samplesPerWindow
    );
  }

  return samplesPerWindow;
}

/**
 * Validate a positive integer option
 */
export function validatePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`Must be a positive integer, got ${value}`, field, value);
  }

  return value;
}
