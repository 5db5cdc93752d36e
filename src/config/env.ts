import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

export const DEFAULT_CERT_PATH = "./cert/DigiCertGlobalRootCA.crt.pem";

export interface CertificateBundle {
  path: string;
  pem: string;
}

/**
 * How the service talks to the database. An encrypted transport cannot exist
 * without the certificate it verifies the server against.
 */
export type DatabaseTransport =
  | { kind: "plain" }
  | { kind: "encrypted"; certificate: CertificateBundle };

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  transport: DatabaseTransport;
  poolSize: number;
  connectTimeoutMs: number;
  acquireTimeoutMs: number;
  statementTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  jwtSecret: string;
  allowedOrigins: string[];
  database: DatabaseConfig;
}

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().min(1);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  APP_PORT: port.default(8080),

  DB_SERVER: z.string().default("localhost"),
  DB_PORT: port.default(3306),
  DB_USER: z.string(),
  DB_PASSWD: z.string(),
  DB_DATABASE: z.string(),
  USE_SSL: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  DB_CERT_PATH: z.string().default(DEFAULT_CERT_PATH),
  DB_POOL_SIZE: z.coerce.number().int().min(1).max(1000).default(10),
  DB_CONNECT_TIMEOUT_MS: millis.default(10_000),
  DB_ACQUIRE_TIMEOUT_MS: millis.default(5_000),
  DB_STATEMENT_TIMEOUT_MS: millis.default(10_000),

  JWT_SECRET: z.string(),
  ALLOWED_ORIGINS: z.string().optional(),
});

const DEV_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

export type CertificateReader = (filePath: string) => string;

const readFromDisk: CertificateReader = (filePath) =>
  fs.readFileSync(filePath, "utf8");

const loadCertificate = (
  configuredPath: string,
  read: CertificateReader
): CertificateBundle => {
  const resolved = path.resolve(configuredPath);
  let pem: string;
  try {
    pem = read(resolved);
  } catch (error) {
    throw new ConfigurationError(
      `USE_SSL is true but the certificate bundle at ${resolved} cannot be read`,
      { path: resolved },
      { cause: error }
    );
  }
  if (!pem.includes("-----BEGIN CERTIFICATE-----")) {
    throw new ConfigurationError(
      `USE_SSL is true but ${resolved} does not contain a PEM certificate`,
      { path: resolved }
    );
  }
  return { path: resolved, pem };
};

/**
 * Build the process configuration from environment variables.
 *
 * Unset and empty variables fall back to their defaults; required ones
 * (DB_USER, DB_PASSWD, DB_DATABASE, JWT_SECRET) must be present. With
 * USE_SSL=true the certificate bundle is read here, so a missing bundle stops
 * the process before it serves anything.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  readCertificate: CertificateReader = readFromDisk
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${problems.join("; ")}`,
      problems
    );
  }

  const vars = parsed.data;
  const transport: DatabaseTransport = vars.USE_SSL
    ? { kind: "encrypted", certificate: loadCertificate(vars.DB_CERT_PATH, readCertificate) }
    : { kind: "plain" };

  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.APP_PORT,
    jwtSecret: vars.JWT_SECRET,
    allowedOrigins: vars.ALLOWED_ORIGINS
      ? vars.ALLOWED_ORIGINS.split(",").map((origin) => origin.trim()).filter(Boolean)
      : DEV_ORIGINS,
    database: {
      host: vars.DB_SERVER,
      port: vars.DB_PORT,
      user: vars.DB_USER,
      password: vars.DB_PASSWD,
      database: vars.DB_DATABASE,
      transport,
      poolSize: vars.DB_POOL_SIZE,
      connectTimeoutMs: vars.DB_CONNECT_TIMEOUT_MS,
      acquireTimeoutMs: vars.DB_ACQUIRE_TIMEOUT_MS,
      statementTimeoutMs: vars.DB_STATEMENT_TIMEOUT_MS,
    },
  };
}
