import { Request, Response, NextFunction, RequestHandler } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { Actor } from "../models/User.js";
import { AuthenticationError } from "../utils/errors.js";

export interface AuthRequest extends Request {
  user?: Actor;
  /** Fires when the client disconnects before the response is sent. */
  abortSignal?: AbortSignal;
}

// Tokens are issued by the account service; only the claims below are read.
const TokenClaimsSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(["member", "moderator"]).default("member"),
});

export const createRequireAuth = (jwtSecret: string): RequestHandler => {
  if (!jwtSecret) throw new Error("JWT secret must not be empty");

  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      return next(new AuthenticationError("Unauthorized: No token"));
    }

    const [scheme, token] = authHeader.split(" "); // Bearer <token>
    if (scheme !== "Bearer" || !token) {
      return next(new AuthenticationError("Unauthorized: Invalid token"));
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, jwtSecret);
    } catch {
      return next(new AuthenticationError("Unauthorized: Invalid token"));
    }

    const claims = TokenClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      return next(new AuthenticationError("Unauthorized: Invalid token"));
    }

    (req as AuthRequest).user = { userId: claims.data.userId, role: claims.data.role };
    next();
  };
};
