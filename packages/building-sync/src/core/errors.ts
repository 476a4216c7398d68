/**
 * Building Sync Error Types
 *
 * Typed errors for the conditions that abort a fetch cycle or a
 * configuration load. Per-record problems are not errors: they surface as
 * SyncWarning values on the cycle report and never abort a cycle.
 *
 * RECOVERY:
 * - MalformedPayloadError: cache untouched, counted as a quiet cycle
 * - TransportFailureError: cache and polling state untouched, retried on
 *   the existing schedule
 * - ConfigurationError: fix the config file, env or overrides
 */

/**
 * Whole payload could not be interpreted as a record list
 */
export class MalformedPayloadError extends Error {
  public readonly name = 'MalformedPayloadError' as const;

  constructor(
    message: string,
    public readonly payloadType: string,
    public readonly cause?: unknown
  ) {
    super(message);
    Object.setPrototypeOf(this, MalformedPayloadError.prototype);
  }
}

/**
 * Single record could not be used. Thrown by the record parser and caught
 * by the differencer, which turns it into a `record_skipped` warning.
 */
export class MalformedRecordError extends Error {
  public readonly name = 'MalformedRecordError' as const;

  constructor(
    message: string,
    public readonly index: number
  ) {
    super(message);
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}

/**
 * Fetch failed before a payload was available
 */
export class TransportFailureError extends Error {
  public readonly name = 'TransportFailureError' as const;

  constructor(
    message: string,
    public readonly details: {
      readonly status?: number;
      readonly credentialExpired: boolean;
      readonly cause?: unknown;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, TransportFailureError.prototype);
  }

  get status(): number | undefined {
    return this.details.status;
  }

  get credentialExpired(): boolean {
    return this.details.credentialExpired;
  }
}

/**
 * Invalid engine configuration
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  toLogString(): string {
    if (this.issues.length === 0) {
      return `ConfigurationError: ${this.message}`;
    }
    return [`ConfigurationError: ${this.message}`, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

export function isMalformedPayloadError(error: unknown): error is MalformedPayloadError {
  return error instanceof MalformedPayloadError;
}

export function isMalformedRecordError(error: unknown): error is MalformedRecordError {
  return error instanceof MalformedRecordError;
}

export function isTransportFailureError(error: unknown): error is TransportFailureError {
  return error instanceof TransportFailureError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Message text from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
