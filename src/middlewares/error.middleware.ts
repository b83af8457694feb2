import { Request, Response, NextFunction } from "express";
import { AppError, ValidationError } from "../common/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

// body-parser and friends attach an HTTP status to the errors they raise
const httpStatusOf = (err: unknown): number | undefined => {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
};

export function notFoundHandler(req: Request, res: Response) {
  sendError(res, `Route ${req.method} ${req.path} not found`, 404);
}

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ValidationError) {
    return sendError(res, err.message, err.status, undefined, err.issues);
  }
  if (err instanceof AppError) {
    return sendError(res, err.message, err.status);
  }

  const status = httpStatusOf(err);
  if (status !== undefined && status < 500 && err instanceof Error) {
    return sendError(res, err.message, status);
  }

  logger.error({ err }, "Unhandled error");
  return sendError(res, "Internal Server Error", status ?? 500);
}
