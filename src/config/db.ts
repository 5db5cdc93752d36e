import mysql from "mysql2/promise";
import type {
  Pool,
  PoolConnection,
  PoolOptions,
  ResultSetHeader,
  RowDataPacket,
} from "mysql2/promise";
import type { DatabaseConfig } from "./env.js";
import {
  AppError,
  ConflictError,
  ConnectionError,
  RequestAbortedError,
  type ConnectionFailure,
} from "../utils/errors.js";
import { Logger } from "../utils/logger.js";

// ==========================================
// DATABASE CONNECTION MANAGER
// ==========================================
// One pool per process, built at startup and closed at shutdown.
// Every logical operation borrows its own connection through
// withSession()/transaction() and hands it back on every exit path.
// No retries here: a failed attempt surfaces to the caller.
// ==========================================

export type SqlValue = string | number | boolean | Date | null;

export interface StatementResult {
  affectedRows: number;
}

/** A borrowed connection, valid only inside the callback it was passed to. */
export interface Session {
  rows(sql: string, params?: readonly SqlValue[]): Promise<unknown[]>;
  run(sql: string, params?: readonly SqlValue[]): Promise<StatementResult>;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface Database {
  withSession<T>(
    work: (session: Session) => Promise<T>,
    options?: OperationOptions
  ): Promise<T>;
  transaction<T>(
    work: (session: Session) => Promise<T>,
    options?: OperationOptions
  ): Promise<T>;
}

const DRIVER_FAILURES: Record<string, ConnectionFailure> = {
  ER_ACCESS_DENIED_ERROR: "authentication",
  ER_DBACCESS_DENIED_ERROR: "authentication",
  ER_NOT_SUPPORTED_AUTH_MODE: "authentication",

  ECONNREFUSED: "network",
  ENOTFOUND: "network",
  EHOSTUNREACH: "network",
  ENETUNREACH: "network",
  ECONNRESET: "network",
  EPIPE: "network",
  ETIMEDOUT: "network",
  EAI_AGAIN: "network",
  PROTOCOL_CONNECTION_LOST: "network",

  HANDSHAKE_SSL_ERROR: "certificate",
  HANDSHAKE_NO_SSL_SUPPORT: "certificate",
  DEPTH_ZERO_SELF_SIGNED_CERT: "certificate",
  SELF_SIGNED_CERT_IN_CHAIN: "certificate",
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: "certificate",
  UNABLE_TO_GET_ISSUER_CERT_LOCALLY: "certificate",
  CERT_HAS_EXPIRED: "certificate",
  ERR_TLS_CERT_ALTNAME_INVALID: "certificate",

  PROTOCOL_SEQUENCE_TIMEOUT: "timeout",
};

const LOCK_CONFLICTS = new Set(["ER_LOCK_DEADLOCK", "ER_LOCK_WAIT_TIMEOUT"]);

const driverCode = (error: unknown): string | undefined =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string"
    ? error.code
    : undefined;

/**
 * Map a mysql2 failure onto the application taxonomy. Errors already in the
 * taxonomy, and driver errors with no recognized code, come back unchanged.
 */
export const translateDriverError = (error: unknown): unknown => {
  if (error instanceof AppError) return error;

  const code = driverCode(error);
  if (!code) return error;

  const failure = Object.hasOwn(DRIVER_FAILURES, code) ? DRIVER_FAILURES[code] : undefined;
  if (failure) {
    const detail = error instanceof Error ? error.message : code;
    return new ConnectionError(failure, `Database ${failure} failure: ${detail}`, {
      cause: error,
    });
  }
  if (LOCK_CONFLICTS.has(code)) {
    return new ConflictError(
      "The operation conflicted with a concurrent change, try again",
      { code },
      { cause: error }
    );
  }
  return error;
};

export const buildPoolOptions = (config: DatabaseConfig): PoolOptions => ({
  host: config.host,
  port: config.port,
  user: config.user,
  password: config.password,
  database: config.database,
  connectionLimit: config.poolSize,
  waitForConnections: true,
  queueLimit: 0,
  connectTimeout: config.connectTimeoutMs,
  timezone: "Z",
  dateStrings: false,
  ...(config.transport.kind === "encrypted" && {
    ssl: {
      ca: config.transport.certificate.pem,
      rejectUnauthorized: true,
    },
  }),
});

const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new RequestAbortedError();
};

class PooledSession implements Session {
  constructor(
    private readonly connection: PoolConnection,
    private readonly statementTimeoutMs: number,
    private readonly signal?: AbortSignal
  ) {}

  async rows(sql: string, params: readonly SqlValue[] = []): Promise<unknown[]> {
    throwIfAborted(this.signal);
    const [rows] = await this.connection.query<RowDataPacket[]>({
      sql,
      values: [...params],
      timeout: this.statementTimeoutMs,
    });
    return rows;
  }

  async run(sql: string, params: readonly SqlValue[] = []): Promise<StatementResult> {
    throwIfAborted(this.signal);
    const [result] = await this.connection.query<ResultSetHeader>({
      sql,
      values: [...params],
      timeout: this.statementTimeoutMs,
    });
    return { affectedRows: result.affectedRows };
  }
}

interface PoolSettings {
  acquireTimeoutMs: number;
  statementTimeoutMs: number;
  label: string;
}

export class ConnectionManager implements Database {
  private closed = false;

  private constructor(
    private readonly pool: Pool,
    private readonly settings: PoolSettings
  ) {}

  /**
   * Create the pool and prove it works with a single ping.
   * Rejects with ConnectionError (authentication, network, certificate,
   * timeout) and leaves no pool behind.
   */
  static async connect(config: DatabaseConfig): Promise<ConnectionManager> {
    const pool = mysql.createPool(buildPoolOptions(config));
    const manager = new ConnectionManager(pool, {
      acquireTimeoutMs: config.acquireTimeoutMs,
      statementTimeoutMs: config.statementTimeoutMs,
      label: `${config.host}:${config.port}/${config.database}`,
    });

    try {
      await manager.ping();
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        Logger.warn("Failed to close pool after unsuccessful connect", {
          error: String(endError),
        });
      });
      throw error instanceof ConnectionError
        ? error
        : new ConnectionError(
            "unavailable",
            `Could not connect to ${manager.settings.label}`,
            { cause: error }
          );
    }

    Logger.info(`MySQL connected: ${manager.settings.label}`, {
      transport: config.transport.kind,
    });
    return manager;
  }

  withSession<T>(
    work: (session: Session) => Promise<T>,
    options: OperationOptions = {}
  ): Promise<T> {
    return this.borrow(work, options, false);
  }

  /**
   * Run `work` inside BEGIN/COMMIT. Any failure rolls back and the original
   * error is rethrown.
   */
  transaction<T>(
    work: (session: Session) => Promise<T>,
    options: OperationOptions = {}
  ): Promise<T> {
    return this.borrow(work, options, true);
  }

  async ping(options: OperationOptions = {}): Promise<void> {
    await this.withSession((session) => session.rows("SELECT 1"), options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
    Logger.info(`MySQL pool closed: ${this.settings.label}`);
  }

  private acquire(signal?: AbortSignal): Promise<PoolConnection> {
    return new Promise<PoolConnection>((resolve, reject) => {
      let settled = false;

      const finish = () => {
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const onAbort = () => {
        if (settled) return;
        finish();
        reject(new RequestAbortedError());
      };

      const timer = setTimeout(() => {
        if (settled) return;
        finish();
        reject(
          new ConnectionError(
            "timeout",
            `No database connection available within ${this.settings.acquireTimeoutMs}ms`
          )
        );
      }, this.settings.acquireTimeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });

      this.pool.getConnection().then(
        (connection) => {
          if (settled) {
            // Arrived after the caller gave up.
            connection.release();
            return;
          }
          finish();
          resolve(connection);
        },
        (error: unknown) => {
          if (settled) return;
          finish();
          reject(translateDriverError(error));
        }
      );
    });
  }

  private async borrow<T>(
    work: (session: Session) => Promise<T>,
    { signal }: OperationOptions,
    transactional: boolean
  ): Promise<T> {
    throwIfAborted(signal);
    const connection = await this.acquire(signal);

    let destroyed = false;
    const discard = () => {
      if (destroyed) return;
      destroyed = true;
      connection.destroy();
    };
    // Dropping the connection makes the server roll back whatever was open.
    const onAbort = () => discard();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      if (transactional) await connection.beginTransaction();
      const result = await work(
        new PooledSession(connection, this.settings.statementTimeoutMs, signal)
      );
      if (transactional) await connection.commit();
      return result;
    } catch (error) {
      const translated = signal?.aborted ? new RequestAbortedError() : translateDriverError(error);

      // A timed-out statement may still be running, and ROLLBACK would queue
      // behind it. Dropping the connection rolls back on the server instead.
      if (translated instanceof ConnectionError || translated instanceof RequestAbortedError) {
        discard();
      } else if (transactional && !destroyed) {
        try {
          await connection.rollback();
        } catch (rollbackError) {
          Logger.error("Rollback failed, discarding connection", rollbackError);
          discard();
        }
      }
      throw translated;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!destroyed) connection.release();
    }
  }
}
