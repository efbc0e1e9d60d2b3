import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { parse as parseDuration, toSeconds } from "iso8601-duration";
import { isLogLevel, LOG_LEVELS } from "./logger.js";
import type { LogLevel } from "./logger.js";

/**
 * Process-wide settings, read once at startup and passed explicitly to the
 * components that need them.
 */
export interface BridgeConfig {
  /** Base URL of the remote content API, without a trailing slash. */
  readonly centralContextUrl: string;
  /** Target bucket for forwarded notifications. */
  readonly bucketName: string;
  /** Port of the status server. */
  readonly port: number;
  /** Interface the status server binds to. */
  readonly host: string;
  /** Abort a forward request after this many milliseconds. */
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
}

/** Raw environment-style input, keyed by variable name. */
export type ConfigSource = Record<string, string | undefined>;

export const DEFAULT_CONFIG: BridgeConfig = Object.freeze({
  centralContextUrl: "http://localhost:9000",
  bucketName: "notifications",
  port: 9001,
  host: "0.0.0.0",
  requestTimeoutMs: 5000,
  logLevel: "info",
});

/**
 * Parse an ISO 8601 duration string and return the equivalent value in milliseconds.
 *
 * @param duration - An ISO 8601 duration string (e.g., `"PT30S"`, `"PT5M"`).
 */
export function parseISO8601Duration(duration: string): number {
  return toSeconds(parseDuration(duration)) * 1000;
}

function invalid(detail: string): Error {
  return new Error(`Invalid bridge config: ${detail}`);
}

function lookup(source: ConfigSource, name: string): string | undefined {
  const direct = source[name];
  if (direct !== undefined) {
    return direct.trim();
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(source)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value.trim();
    }
  }
  return undefined;
}

function parseBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw invalid(`CENTRAL_CONTEXT_URL must be an absolute URL, got "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalid(`CENTRAL_CONTEXT_URL must use http or https, got "${raw}"`);
  }
  return raw.replace(/\/+$/, "");
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isInteger(port) || port > 65535) {
    throw invalid(`PORT must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function parseTimeout(raw: string): number {
  let ms: number;
  try {
    ms = parseISO8601Duration(raw);
  } catch {
    throw invalid(`REQUEST_TIMEOUT must be an ISO 8601 duration, got "${raw}"`);
  }
  if (!(ms > 0)) {
    throw invalid(`REQUEST_TIMEOUT must be greater than zero, got "${raw}"`);
  }
  return ms;
}

function nonEmpty(name: string, raw: string): string {
  if (raw === "") {
    throw invalid(`${name} must not be empty`);
  }
  return raw;
}

/**
 * Build a validated {@link BridgeConfig} from environment-style variables.
 *
 * Variable names are matched case-insensitively; missing variables take their
 * defaults and unknown ones are ignored.
 *
 * @throws {Error} If a variable holds an invalid value.
 */
export function parseConfig(source: ConfigSource): BridgeConfig {
  const url = lookup(source, "CENTRAL_CONTEXT_URL");
  const bucket = lookup(source, "BUCKET_NAME");
  const port = lookup(source, "PORT");
  const host = lookup(source, "HOST");
  const timeout = lookup(source, "REQUEST_TIMEOUT");
  const level = lookup(source, "LOG_LEVEL");

  let logLevel: LogLevel = DEFAULT_CONFIG.logLevel;
  if (level !== undefined) {
    const normalized = level.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw invalid(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${level}"`);
    }
    logLevel = normalized;
  }

  return Object.freeze({
    centralContextUrl: url === undefined ? DEFAULT_CONFIG.centralContextUrl : parseBaseUrl(url),
    bucketName: bucket === undefined ? DEFAULT_CONFIG.bucketName : nonEmpty("BUCKET_NAME", bucket),
    port: port === undefined ? DEFAULT_CONFIG.port : parsePort(port),
    host: host === undefined ? DEFAULT_CONFIG.host : nonEmpty("HOST", host),
    requestTimeoutMs: timeout === undefined ? DEFAULT_CONFIG.requestTimeoutMs : parseTimeout(timeout),
    logLevel,
  });
}

/**
 * Read a `.env` file into a variable map. A missing file yields an empty map.
 *
 * @throws {Error} If the file exists but cannot be read.
 */
export function readEnvFile(path: string): ConfigSource {
  try {
    return parseDotenv(readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
}

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: ConfigSource;
  /** Defaults to `.env` in the current working directory. */
  envFile?: string;
}

/**
 * Load the bridge configuration from the process environment, falling back to
 * values from a `.env` file for variables the environment does not set.
 *
 * @throws {Error} If a variable holds an invalid value.
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const fileValues = readEnvFile(options.envFile ?? join(process.cwd(), ".env"));
  const merged: ConfigSource = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) {
      continue;
    }
    // an environment variable overrides a .env entry that differs only in case
    for (const fileKey of Object.keys(merged)) {
      if (fileKey.toLowerCase() === key.toLowerCase()) {
        delete merged[fileKey];
      }
    }
    merged[key] = value;
  }
  return parseConfig(merged);
}
