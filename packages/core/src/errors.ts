/**
 * Raised internally when the invocation envelope cannot be classified.
 * Detection catches it and degrades to a generic context; it never leaves
 * `detectRuntimeContext`.
 */
export class ContextDetectionFailure extends Error {
  public readonly code = "CONTEXT_DETECTION_FAILURE";

  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ContextDetectionFailure";
  }
}
