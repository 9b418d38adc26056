export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
  }
}

export type CalibrationFailureReason =
  | "unreachable"
  | "bad_status"
  | "malformed_payload"
  | "unknown_session"
  | "unknown_driver"
  | "no_timed_laps";

export class CalibrationUnavailableError extends Error {
  constructor(
    public readonly reason: CalibrationFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CalibrationUnavailableError";
  }
}
