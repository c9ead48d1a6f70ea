export type ScreeningErrorCode =
  | "missing_configuration"
  | "session_not_found"
  | "session_busy"
  | "conversation_ended"
  | "export_unavailable"
  | "invalid_request"
  | "rate_limited";

export class ScreeningError extends Error {
  constructor(
    readonly code: ScreeningErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ScreeningError";
  }
}

export function isScreeningError(error: unknown): error is ScreeningError {
  return error instanceof ScreeningError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
