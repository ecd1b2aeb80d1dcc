import { Response } from "express";
import { Logger } from "../config/logger";
import { MatchingError, ValidationError, errorMessage } from "../shared/errors";

const STATUS_BY_CODE: Record<MatchingError["code"], number> = {
  validation_error: 400,
  not_found: 404,
  unavailable: 503,
};

export function sendError(response: Response, error: unknown, logger: Logger, route: string): void {
  if (error instanceof MatchingError) {
    const status = STATUS_BY_CODE[error.code];
    logger.warn("Request rejected", {
      route,
      status_code: status,
      error_code: error.code,
      error: error.message,
    });
    const body: Record<string, unknown> = { ok: false, error: error.message };
    if (error instanceof ValidationError && error.details.length > 0) {
      body.details = error.details;
    }
    response.status(status).json(body);
    return;
  }

  logger.error("Request failed", {
    route,
    status_code: 500,
    error: errorMessage(error),
  });
  response.status(500).json({ ok: false, error: "Internal server error" });
}
