/**
 * Base class for every failure the aggregation engine reports.
 */
export class AggregationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or incomplete alert. Dropped, never retried. */
export class ValidationError extends AggregationError {}

/** Reverse geocoding failed or timed out. Dropped, never retried. */
export class GeocodeError extends AggregationError {}

/**
 * The backing store could not be reached or did not answer in time.
 * Surfaced to the trigger so its own retry policy applies.
 */
export class StoreUnavailableError extends AggregationError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
