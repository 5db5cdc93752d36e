import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConnectionManager, buildPoolOptions, translateDriverError } from "./db.js";
import type { DatabaseConfig } from "./env.js";
import {
  ConflictError,
  ConnectionError,
  NotFoundError,
  RequestAbortedError,
} from "../utils/errors.js";

const { createPool } = vi.hoisted(() => ({ createPool: vi.fn() }));

vi.mock("mysql2/promise", () => ({ default: { createPool } }));

const PEM = "-----BEGIN CERTIFICATE-----\nMIIBtest\n-----END CERTIFICATE-----\n";

const config: DatabaseConfig = {
  host: "db.internal",
  port: 3306,
  user: "app",
  password: "test-password",
  database: "community",
  transport: { kind: "plain" },
  poolSize: 4,
  connectTimeoutMs: 1_000,
  acquireTimeoutMs: 50,
  statementTimeoutMs: 200,
};

const driverError = (code: string, message: string = code) =>
  Object.assign(new Error(message), { code });

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

interface QueryOptions {
  sql: string;
  values: unknown[];
  timeout: number;
}

const makeConnection = () => ({
  query: vi.fn(async (_options: QueryOptions): Promise<unknown> => [[], []]),
  beginTransaction: vi.fn(async () => undefined),
  commit: vi.fn(async () => undefined),
  rollback: vi.fn(async () => undefined),
  release: vi.fn(),
  destroy: vi.fn(),
});

const makePool = (connection: ReturnType<typeof makeConnection>) => ({
  getConnection: vi.fn(async (): Promise<unknown> => connection),
  end: vi.fn(async () => undefined),
});

describe("buildPoolOptions", () => {
  it("maps the plain transport without TLS settings", () => {
    expect(buildPoolOptions(config)).toEqual({
      host: "db.internal",
      port: 3306,
      user: "app",
      password: "test-password",
      database: "community",
      connectionLimit: 4,
      waitForConnections: true,
      queueLimit: 0,
      connectTimeout: 1_000,
      timezone: "Z",
      dateStrings: false,
    });
  });

  it("verifies the server against the configured bundle when encrypted", () => {
    const options = buildPoolOptions({
      ...config,
      transport: { kind: "encrypted", certificate: { path: "/etc/ssl/ca.pem", pem: PEM } },
    });

    expect(options.ssl).toEqual({ ca: PEM, rejectUnauthorized: true });
  });
});

describe("translateDriverError", () => {
  it.each([
    ["ER_ACCESS_DENIED_ERROR", "authentication"],
    ["ECONNREFUSED", "network"],
    ["HANDSHAKE_SSL_ERROR", "certificate"],
    ["PROTOCOL_SEQUENCE_TIMEOUT", "timeout"],
  ])("reports %s as a %s failure", (code, reason) => {
    const translated = translateDriverError(driverError(code));

    expect(translated).toBeInstanceOf(ConnectionError);
    expect(translated).toMatchObject({ reason, statusCode: 503 });
  });

  it("reports lock waits and deadlocks as conflicts", () => {
    expect(translateDriverError(driverError("ER_LOCK_DEADLOCK"))).toBeInstanceOf(ConflictError);
    expect(translateDriverError(driverError("ER_LOCK_WAIT_TIMEOUT"))).toBeInstanceOf(ConflictError);
  });

  it("leaves application errors and unknown codes alone", () => {
    const notFound = new NotFoundError("Post", "p1");
    const duplicate = driverError("ER_DUP_ENTRY");

    expect(translateDriverError(notFound)).toBe(notFound);
    expect(translateDriverError(duplicate)).toBe(duplicate);
  });
});

describe("ConnectionManager", () => {
  let connection: ReturnType<typeof makeConnection>;
  let pool: ReturnType<typeof makePool>;

  const connected = async () => {
    const manager = await ConnectionManager.connect(config);
    vi.clearAllMocks();
    return manager;
  };

  beforeEach(() => {
    connection = makeConnection();
    pool = makePool(connection);
    createPool.mockReturnValue(pool);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("connect", () => {
    it("pings through a borrowed connection and hands it back", async () => {
      await ConnectionManager.connect(config);

      expect(createPool).toHaveBeenCalledWith(buildPoolOptions(config));
      expect(connection.query).toHaveBeenCalledWith({ sql: "SELECT 1", values: [], timeout: 200 });
      expect(connection.beginTransaction).not.toHaveBeenCalled();
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it.each([
      ["ER_ACCESS_DENIED_ERROR", "authentication"],
      ["ECONNREFUSED", "network"],
      ["HANDSHAKE_SSL_ERROR", "certificate"],
    ])("fails with a %s error as %s and closes the pool", async (code, reason) => {
      pool.getConnection.mockRejectedValueOnce(driverError(code));

      await expect(ConnectionManager.connect(config)).rejects.toMatchObject({ reason });
      expect(pool.end).toHaveBeenCalledTimes(1);
    });

    it("wraps unrecognized failures as an unavailable database", async () => {
      pool.getConnection.mockRejectedValueOnce(new Error("something odd"));

      await expect(ConnectionManager.connect(config)).rejects.toMatchObject({
        reason: "unavailable",
        message: "Could not connect to db.internal:3306/community",
      });
    });
  });

  describe("transaction", () => {
    it("commits and releases on success", async () => {
      const manager = await connected();
      connection.query.mockResolvedValueOnce([{ affectedRows: 2 }, undefined]);

      const result = await manager.transaction((session) =>
        session.run("UPDATE `post` SET likes = ? WHERE post_id = ?", [3, "p1"])
      );

      expect(result).toEqual({ affectedRows: 2 });
      expect(connection.query).toHaveBeenCalledWith({
        sql: "UPDATE `post` SET likes = ? WHERE post_id = ?",
        values: [3, "p1"],
        timeout: 200,
      });
      expect(connection.beginTransaction).toHaveBeenCalledTimes(1);
      expect(connection.commit).toHaveBeenCalledTimes(1);
      expect(connection.rollback).not.toHaveBeenCalled();
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it("rolls back and rethrows the original error", async () => {
      const manager = await connected();
      const failure = new NotFoundError("Post", "p1");

      await expect(
        manager.transaction(async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(connection.commit).not.toHaveBeenCalled();
      expect(connection.rollback).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it("discards the connection when the rollback itself fails", async () => {
      const manager = await connected();
      const failure = new Error("statement failed");
      connection.rollback.mockRejectedValueOnce(driverError("PROTOCOL_CONNECTION_LOST"));

      await expect(
        manager.transaction(async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(connection.destroy).toHaveBeenCalledTimes(1);
      expect(connection.release).not.toHaveBeenCalled();
    });

    it("turns a deadlock into a conflict and keeps the connection", async () => {
      const manager = await connected();
      connection.query.mockRejectedValueOnce(driverError("ER_LOCK_DEADLOCK"));

      await expect(
        manager.transaction((session) => session.rows("SELECT 1 FOR UPDATE"))
      ).rejects.toBeInstanceOf(ConflictError);
      expect(connection.rollback).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledTimes(1);
    });
    it("drops the connection instead of rolling back after a statement timeout", async () => {
      const manager = await connected();
      connection.query.mockRejectedValueOnce(
        driverError("PROTOCOL_SEQUENCE_TIMEOUT", "Query inactivity timeout")
      );
      connection.rollback.mockReturnValueOnce(new Promise<undefined>(() => undefined));

      await expect(
        manager.transaction((session) => session.rows("SELECT SLEEP(60)"))
      ).rejects.toMatchObject({ reason: "timeout" });
      expect(connection.rollback).not.toHaveBeenCalled();
      expect(connection.destroy).toHaveBeenCalledTimes(1);
      expect(connection.release).not.toHaveBeenCalled();
    });
  });

  describe("withSession", () => {
    it("runs without a transaction", async () => {
      const manager = await connected();
      connection.query.mockResolvedValueOnce([[{ post_id: "p1" }], []]);

      const rows = await manager.withSession((session) => session.rows("SELECT post_id FROM `post`"));

      expect(rows).toEqual([{ post_id: "p1" }]);
      expect(connection.beginTransaction).not.toHaveBeenCalled();
      expect(connection.release).toHaveBeenCalledTimes(1);
    });

    it("drops a connection whose statement timed out", async () => {
      const manager = await connected();
      connection.query.mockRejectedValueOnce(
        driverError("PROTOCOL_SEQUENCE_TIMEOUT", "Query inactivity timeout")
      );

      await expect(
        manager.withSession((session) => session.rows("SELECT SLEEP(1)"))
      ).rejects.toMatchObject({ reason: "timeout" });
      expect(connection.destroy).toHaveBeenCalledTimes(1);
      expect(connection.release).not.toHaveBeenCalled();
    });

    it("reports an unreachable server as a network failure", async () => {
      const manager = await connected();
      pool.getConnection.mockRejectedValueOnce(driverError("ECONNREFUSED"));

      await expect(manager.withSession(async () => "unused")).rejects.toMatchObject({
        reason: "network",
      });
    });
  });

  describe("acquire timeout", () => {
    it("gives up after the acquire timeout and returns a late connection", async () => {
      const manager = await connected();
      vi.useFakeTimers();
      const late = deferred<unknown>();
      pool.getConnection.mockReturnValueOnce(late.promise);

      const pending = manager.withSession(async () => "unused");
      const assertion = expect(pending).rejects.toMatchObject({
        reason: "timeout",
        message: "No database connection available within 50ms",
      });
      await vi.advanceTimersByTimeAsync(50);
      await assertion;

      late.resolve(connection);

      await vi.waitFor(() => expect(connection.release).toHaveBeenCalledTimes(1));
      expect(connection.query).not.toHaveBeenCalled();
    });
  });

  describe("cancellation", () => {
    it("refuses to start when the signal is already aborted", async () => {
      const manager = await connected();
      const controller = new AbortController();
      controller.abort();

      await expect(
        manager.withSession(async () => "unused", { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestAbortedError);
      expect(pool.getConnection).not.toHaveBeenCalled();
    });

    it("stops waiting for a connection when aborted", async () => {
      const manager = await connected();
      const late = deferred<unknown>();
      pool.getConnection.mockReturnValueOnce(late.promise);
      const controller = new AbortController();

      const pending = manager.withSession(async () => "unused", { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
      late.resolve(connection);
      await vi.waitFor(() => expect(connection.release).toHaveBeenCalledTimes(1));
    });

    it("destroys the connection mid-statement instead of returning it", async () => {
      const manager = await connected();
      const statement = deferred<unknown>();
      connection.query.mockReturnValueOnce(statement.promise);
      connection.destroy.mockImplementationOnce(() =>
        statement.reject(driverError("PROTOCOL_CONNECTION_LOST", "Connection lost"))
      );
      const controller = new AbortController();

      const pending = manager.transaction((session) => session.rows("SELECT SLEEP(10)"), {
        signal: controller.signal,
      });
      await vi.waitFor(() => expect(connection.query).toHaveBeenCalled());
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
      expect(connection.destroy).toHaveBeenCalledTimes(1);
      expect(connection.rollback).not.toHaveBeenCalled();
      expect(connection.release).not.toHaveBeenCalled();
    });
  });

  describe("close", () => {
    it("ends the pool once however often it is called", async () => {
      const manager = await connected();

      await manager.close();
      await manager.close();

      expect(pool.end).toHaveBeenCalledTimes(1);
    });
  });
});
