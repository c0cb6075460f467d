/**
 * Error taxonomy for the notification path
 *
 * None of these escape the dispatcher: destinations turn them into
 * DestinationResult values.
 */

export { ContextDetectionFailure } from "@alertline/core";

abstract class AlertlineError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid settings. Makes the affected destination inert.
 */
export class ConfigurationError extends AlertlineError {
  readonly code = "CONFIGURATION_ERROR";
}

/**
 * Network error, timeout, rate limit or 5xx. Retried up to the attempt limit.
 */
export class TransientDeliveryError extends AlertlineError {
  readonly code = "TRANSIENT_DELIVERY_ERROR";

  constructor(
    message: string,
    cause?: unknown,
    /** Server-suggested delay (Retry-After), in ms */
    public readonly retryAfterMs?: number
  ) {
    super(message, cause);
  }
}

/**
 * Authentication or validation failure. Never retried.
 */
export class PermanentDeliveryError extends AlertlineError {
  readonly code = "PERMANENT_DELIVERY_ERROR";
}
