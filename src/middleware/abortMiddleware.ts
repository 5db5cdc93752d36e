import { Request, Response, NextFunction } from "express";
import type { OperationOptions } from "../config/db.js";
import type { AuthRequest } from "./authMiddleware.js";

/**
 * Give every request an AbortSignal that fires if the client goes away
 * before the response is finished. Repository calls pass it down so the
 * in-flight transaction is rolled back instead of completing silently.
 */
export const abortOnDisconnect = (req: Request, res: Response, next: NextFunction) => {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  (req as AuthRequest).abortSignal = controller.signal;
  next();
};

export const operationOptions = (req: AuthRequest): OperationOptions => ({
  signal: req.abortSignal,
});
