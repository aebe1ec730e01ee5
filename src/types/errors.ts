/**
 * Error kinds raised across the report pipeline.
 *
 * Configuration and missing-fixture errors end the fetch phase. Client
 * and transport errors are scoped to a single search combination unless
 * they surface outside the aggregation loop.
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.length === 1 ? list[0] : `Invalid configuration:\n  - ${list.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.issues = list;
  }
}

export class FixtureNotFoundError extends Error {
  readonly fixturePath: string;

  constructor(fixturePath: string) {
    super(
      `Mock mode is on but no fixture found: ${fixturePath}\n` +
        'Run once with SAVE_FIXTURES=1 to capture real responses.'
    );
    this.name = 'FixtureNotFoundError';
    this.fixturePath = fixturePath;
  }
}

/** SerpApi answered 400/404 for a route/date it cannot serve. */
export class ClientRequestError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, route: string, detail: string) {
    super(`API ${status} for ${route}: ${detail}`);
    this.name = 'ClientRequestError';
    this.status = status;
    this.detail = detail;
  }
}

export class TransportError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.status = status;
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliveryError';
  }
}

/**
 * Errors that must stop the whole fetch phase instead of being recorded
 * as an empty result for one combination.
 */
export function isFatalFetchError(e: Error): boolean {
  return e instanceof ConfigurationError || e instanceof FixtureNotFoundError;
}
