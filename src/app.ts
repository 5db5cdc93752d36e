import express, { Express, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { OperationOptions } from "./config/db.js";
import type { PostRepository } from "./repositories/postRepository.js";
import type { CommentRepository } from "./repositories/commentRepository.js";
import { createRequireAuth } from "./middleware/authMiddleware.js";
import { abortOnDisconnect } from "./middleware/abortMiddleware.js";
import { asyncHandler, errorHandler, notFoundHandler } from "./middleware/errorMiddleware.js";
import { createPostRoutes } from "./routes/postRoutes.js";
import { createCommentRoutes } from "./routes/commentRoutes.js";
import { ConnectionError } from "./utils/errors.js";

export interface HealthProbe {
  ping(options?: OperationOptions): Promise<void>;
}

export interface AppDependencies {
  posts: PostRepository;
  comments: CommentRepository;
  database: HealthProbe;
  jwtSecret: string;
  allowedOrigins?: string[];
  production?: boolean;
}

export const createApp = ({
  posts,
  comments,
  database,
  jwtSecret,
  allowedOrigins = [],
  production = false,
}: AppDependencies): Express => {
  const app = express();
  const requireAuth = createRequireAuth(jwtSecret);

  // Behind a reverse proxy in deployment; needed for per-IP rate limits
  app.set("trust proxy", 1);

  app.use(helmet());

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      limit: 1000,
      message: { success: false, message: "Too many requests, please try again later." },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(
    cors({
      origin: production ? allowedOrigins : "*",
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );

  app.use(express.json({ limit: "1mb" }));
  app.use(abortOnDisconnect);

  app.use("/api/posts", createPostRoutes(posts, comments, requireAuth));
  app.use("/api/comments", createCommentRoutes(comments, requireAuth));

  // Health check endpoint
  app.get(
    "/health",
    asyncHandler(async (req, res: Response) => {
      try {
        await database.ping({ signal: req.abortSignal });
      } catch (error) {
        if (!(error instanceof ConnectionError)) throw error;
        res.status(503).json({ status: "degraded", database: error.reason });
        return;
      }
      res.status(200).json({ status: "ok", database: "up", timestamp: new Date().toISOString() });
    })
  );

  // Error handling (must be after routes)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
