export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export type MalformedReason = "missing_text" | "missing_source" | "not_an_object";

export class MalformedRecordError extends AppError {
  constructor(
    public readonly reason: MalformedReason,
    public readonly sourceName: string,
  ) {
    super(`Malformed record from ${sourceName}: ${reason}`, 422);
  }
}
