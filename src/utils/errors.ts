import type { FailureStatus } from "../types/actions.js";

/**
 * Base class for failures the action router turns into a failure envelope
 */
export class StudyAidError extends Error {
  constructor(
    message: string,
    public readonly statusCode: FailureStatus,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "StudyAidError";
  }
}

/**
 * The action tag is not one of the supported actions
 */
export class InvalidActionError extends StudyAidError {
  constructor(
    public readonly action: string,
    public readonly supported: readonly string[]
  ) {
    super(
      `Invalid action: ${action}. Supported actions: ${supported.join(", ")}`,
      400
    );
    this.name = "InvalidActionError";
  }
}

/**
 * Required text (document text or document data) is absent or blank
 */
export class EmptyInputError extends StudyAidError {
  constructor(message: string) {
    super(message, 400);
    this.name = "EmptyInputError";
  }
}

/**
 * One or more payload fields required by the action are absent or blank
 */
export class MissingFieldError extends StudyAidError {
  constructor(message: string, public readonly fields: readonly string[]) {
    super(message, 400);
    this.name = "MissingFieldError";
  }
}

/**
 * Document could not be decoded or yielded no text
 */
export class ExtractionError extends StudyAidError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options);
    this.name = "ExtractionError";
  }
}

/**
 * Transport failure, timeout or malformed completion from the model endpoint
 */
export class ModelInvocationError extends StudyAidError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options);
    this.name = "ModelInvocationError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
