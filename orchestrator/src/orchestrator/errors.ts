import { AppError } from "@mention-pulse/ingestor";

export { AppError };

export class ValidationError extends AppError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404);
  }
}

/** The sentiment model could not be reached; the classifier retries these. */
export class ClassifierUnavailableError extends AppError {
  constructor(message = "Classifier unavailable") {
    super(message, 503);
  }
}

/** A report failed its own consistency checks. Fatal for the run. */
export class SynthesisDefectError extends AppError {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message, 500);
  }
}

export class RunCancelledError extends AppError {
  constructor(message = "Run cancelled") {
    super(message, 409);
  }
}

export class QueueClosedError extends AppError {
  constructor(message = "Mention queue is closed") {
    super(message, 503);
  }
}

export class QueueFullError extends AppError {
  constructor(public readonly capacity: number) {
    super(`Mention queue is full (capacity ${capacity})`, 503);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class RuleSetError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}
