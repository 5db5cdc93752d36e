import dotenv from "dotenv";
dotenv.config();
import { createServer } from "http";
import { loadConfig } from "./config/env.js";
import { ConnectionManager } from "./config/db.js";
import { createApp } from "./app.js";
import { MysqlPostRepository } from "./repositories/postRepository.js";
import { MysqlCommentRepository } from "./repositories/commentRepository.js";
import { Logger } from "./utils/logger.js";

// ==========================================
// UNCAUGHT EXCEPTION HANDLERS
// ==========================================
process.on("uncaughtException", (error) => {
  Logger.error("UNCAUGHT EXCEPTION", error);
  // Give time for logging before exit
  setTimeout(() => process.exit(1), 1000);
});

process.on("unhandledRejection", (reason) => {
  Logger.error("UNHANDLED REJECTION", reason);
});

const start = async (): Promise<void> => {
  // Configuration problems (missing variables, USE_SSL without a certificate)
  // throw here, before anything listens.
  const config = loadConfig();
  const database = await ConnectionManager.connect(config.database);

  const app = createApp({
    posts: new MysqlPostRepository(database),
    comments: new MysqlCommentRepository(database),
    database,
    jwtSecret: config.jwtSecret,
    allowedOrigins: config.allowedOrigins,
    production: config.nodeEnv === "production",
  });

  const httpServer = createServer(app);
  httpServer.listen(config.port, "0.0.0.0", () => {
    Logger.info(`Server running on port ${config.port}`, {
      environment: config.nodeEnv,
      transport: config.database.transport.kind,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    Logger.info(`${signal} received, shutting down`);

    httpServer.close((serverError) => {
      if (serverError) Logger.error("HTTP server did not close cleanly", serverError);
      database.close().then(
        () => process.exit(serverError ? 1 : 0),
        (poolError: unknown) => {
          Logger.error("Failed to close database pool", poolError);
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

start().catch((error: unknown) => {
  Logger.error("FATAL: server failed to start", error);
  process.exit(1);
});
