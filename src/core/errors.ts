/**
 * Error types raised by the lake pipelines.
 *
 * Object-level failures (a bad payload, a missing blob) are caught and logged
 * by the orchestrators; invocation-level failures (corrupt manifest, nothing
 * to query) propagate to the entry scripts.
 */

export class BlobNotFoundError extends Error {
  readonly name = 'BlobNotFoundError';

  constructor(readonly key: string, readonly location?: string) {
    super(`Blob not found: ${location ?? key}`);
  }
}

export class InvalidPayloadError extends Error {
  readonly name = 'InvalidPayloadError';

  constructor(readonly key: string, readonly contentType: string, reason: string) {
    super(`Invalid ${contentType} payload in ${key}: ${reason}`);
  }
}

export class ManifestCorruptError extends Error {
  readonly name = 'ManifestCorruptError';

  constructor(readonly key: string, reason: string) {
    super(`Manifest ${key} is unreadable: ${reason}`);
  }
}

export class HttpStatusError extends Error {
  readonly name = 'HttpStatusError';

  constructor(readonly url: string, readonly status: number, body: string) {
    super(`HTTP ${status} from ${url}: ${body.slice(0, 200)}`);
  }

  /** Rate limiting and server errors are worth another attempt. */
  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class NoDatasetsError extends Error {
  readonly name = 'NoDatasetsError';

  constructor(readonly location: string) {
    super(`No clean datasets found under ${location}`);
  }
}

export class QueryFailedError extends Error {
  readonly name = 'QueryFailedError';

  constructor(
    readonly queryId: string,
    readonly state: string,
    reason: string | undefined
  ) {
    super(`Query ${queryId} ${state}: ${reason ?? 'no reason given'}`);
  }
}

export class AthenaTimeoutError extends Error {
  readonly name = 'AthenaTimeoutError';

  constructor(readonly queryId: string, readonly waitedMs: number) {
    super(`Athena query ${queryId} did not finish within ${waitedMs}ms`);
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}
