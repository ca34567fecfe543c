export type AssessmentErrorCode =
  | "INVALID_CATEGORY"
  | "MISSING_REQUIRED_FIELD"
  | "INVALID_NUMBER"
  | "INVALID_PAYLOAD"
  | "INVALID_JSON"
  | "MODEL_UNAVAILABLE";

/**
 * Base class for every error the engine raises on purpose.
 *
 * The `code` is what boundary layers switch on; `httpStatus` is the status the
 * HTTP layer answers with.
 */
export class AssessmentError extends Error {
  public readonly code: AssessmentErrorCode;
  public readonly httpStatus: number;
  public readonly field?: string;

  constructor(
    message: string,
    code: AssessmentErrorCode,
    httpStatus: number,
    options: { field?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "AssessmentError";
    this.code = code;
    this.httpStatus = httpStatus;
    this.field = options.field;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCategoryError extends AssessmentError {
  public readonly value: string;

  constructor(field: string, value: unknown) {
    const shown = String(value);
    super(`Invalid value for ${field}: "${shown}"`, "INVALID_CATEGORY", 400, {
      field,
    });
    this.name = "InvalidCategoryError";
    this.value = shown;
  }
}

export class MissingRequiredFieldError extends AssessmentError {
  constructor(field: string) {
    super(`Missing required field: ${field}`, "MISSING_REQUIRED_FIELD", 400, {
      field,
    });
    this.name = "MissingRequiredFieldError";
  }
}

export class InvalidNumberError extends AssessmentError {
  constructor(field: string, value: unknown) {
    super(`Expected a number for ${field}, got "${String(value)}"`, "INVALID_NUMBER", 400, {
      field,
    });
    this.name = "InvalidNumberError";
  }
}

export class InvalidPayloadError extends AssessmentError {
  constructor(received: string) {
    super(`Expected an object payload, got ${received}`, "INVALID_PAYLOAD", 400);
    this.name = "InvalidPayloadError";
  }
}

export class InvalidJsonError extends AssessmentError {
  constructor(cause?: unknown) {
    super("Request body is not valid JSON", "INVALID_JSON", 400, { cause });
    this.name = "InvalidJsonError";
  }
}

export class ModelUnavailableError extends AssessmentError {
  constructor(message: string, cause?: unknown) {
    super(`Model unavailable: ${message}`, "MODEL_UNAVAILABLE", 503, { cause });
    this.name = "ModelUnavailableError";
  }
}

export function isAssessmentError(err: unknown): err is AssessmentError {
  return err instanceof AssessmentError;
}

export type ErrorBody = { error: string; code: string; field?: string };

/**
 * Maps an error to a status and JSON body.
 *
 * Typed errors keep their code so clients can switch on it; anything else is
 * reported as a generic 500 without its message.
 */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (isAssessmentError(err)) {
    const body: ErrorBody = { error: err.message, code: err.code };
    if (err.field) body.field = err.field;
    return { status: err.httpStatus, body };
  }

  return {
    status: 500,
    body: { error: "Internal server error", code: "INTERNAL" },
  };
}
