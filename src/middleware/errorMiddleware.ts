import { Request, Response, NextFunction } from "express";
import { AppError, NotFoundError, RequestAbortedError, isAppError } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import { AuthRequest } from "./authMiddleware.js";

// Body-parser and friends attach an HTTP status to their errors.
const statusOf = (err: unknown): number => {
  if (isAppError(err)) return err.statusCode;
  if (typeof err === "object" && err !== null) {
    const status =
      "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
};

const codeOf = (err: unknown, statusCode: number): string => {
  if (isAppError(err)) return err.code;
  return statusCode >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST";
};

// Single translation step from the error taxonomy to HTTP
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const authReq = req as AuthRequest;

  if (err instanceof RequestAbortedError) {
    Logger.info("Client disconnected, operation aborted", {
      method: req.method,
      endpoint: req.originalUrl,
    });
    return;
  }
  if (res.headersSent) return next(err);

  const statusCode = statusOf(err);
  const code = codeOf(err, statusCode);
  const context = {
    method: req.method,
    endpoint: req.originalUrl,
    statusCode,
    userId: authReq.user?.userId,
  };

  if (statusCode >= 500) {
    Logger.error(`${req.method} ${req.originalUrl} failed`, err, context);
  } else {
    Logger.warn(`${req.method} ${req.originalUrl} rejected: ${code}`, context);
  }

  const message = err instanceof Error ? err.message : "An error occurred";
  const hideDetails = process.env.NODE_ENV === "production" && statusCode >= 500;

  res.status(statusCode).json({
    success: false,
    code,
    message: hideDetails ? "An error occurred" : message,
    ...(!hideDetails && err instanceof AppError && err.details !== undefined && {
      details: err.details,
    }),
  });
};

// Async handler wrapper to catch errors
export const asyncHandler = (
  fn: (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

export const notFoundHandler = (req: Request, res: Response, next: NextFunction) => {
  next(new NotFoundError(`Route ${req.method} ${req.originalUrl}`));
};
