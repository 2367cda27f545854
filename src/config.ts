import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { isNonEmptyString, isPositiveInteger, isRecord } from "./utils.js";

/** Module-level config cache to avoid redundant fs.readFileSync calls. */
let cachedConfig: JrdConfig | null = null;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * What to do when the lookup succeeds but yields no device id.
 *
 * - `forward`: send the command with an empty id and let the server reject it.
 * - `fail`: stop before the command is sent.
 */
export type EmptyDeviceIdPolicy = "forward" | "fail";

export const DEFAULT_PREFERENCE_DOMAIN = "/Library/Preferences/com.jamfsoftware.jamf.plist";
export const DEFAULT_PREFERENCE_KEY = "jss_url";
export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

export interface JrdConfig {
  /** Logging verbosity (stderr). */
  logLevel: LogLevel;

  /**
   * Jamf Pro base URL, e.g. `https://jss.example.com:8443`.
   *
   * If omitted, the URL is read from the Jamf agent's preference store at startup.
   */
  serverUrl?: string;

  /** `defaults` domain holding the agent's server URL. */
  preferenceDomain: string;

  /** Key inside {@link preferenceDomain}. */
  preferenceKey: string;

  emptyDeviceId: EmptyDeviceIdPolicy;

  /** HTTP request timeout. If omitted, the HTTP client's default applies. */
  requestTimeoutMs?: number;

  /** Timeout for `defaults` / `ioreg`. */
  commandTimeoutMs: number;

  /** Skip TLS certificate verification (self-signed Jamf servers). */
  allowInsecureTls: boolean;

  /** Path to a JSON file holding `{ "username", "password" }`. */
  credentialsFile?: string;

  /**
   * Accept API credentials from Jamf script parameters 4 and 5.
   *
   * Off by default: process arguments are visible to every local user.
   */
  allowArgvCredentials: boolean;
}

/**
 * Get the project root directory by resolving from this file's location.
 * Works regardless of the process's current working directory.
 */
export function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  const thisDir = path.dirname(thisFile);
  // src/config.ts under test, dist/config.js at runtime: root is one level up either way
  return path.resolve(thisDir, "..");
}

/**
 * Validate a parsed config object and apply defaults.
 *
 * @param parsed - Raw JSON value.
 * @param source - Where the value came from, for error messages.
 * @throws If a field is present but malformed.
 */
export function parseConfig(parsed: unknown, source: string): JrdConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config: expected JSON object at ${source}`);
  }

  const logLevel = parsed.logLevel ?? "info";
  const serverUrl = parsed.serverUrl;
  const preferenceDomain = parsed.preferenceDomain ?? DEFAULT_PREFERENCE_DOMAIN;
  const preferenceKey = parsed.preferenceKey ?? DEFAULT_PREFERENCE_KEY;
  const emptyDeviceId = parsed.emptyDeviceId ?? "forward";
  const requestTimeoutMs = parsed.requestTimeoutMs;
  const commandTimeoutMs = parsed.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const allowInsecureTls = parsed.allowInsecureTls ?? false;
  const credentialsFile = parsed.credentialsFile;
  const allowArgvCredentials = parsed.allowArgvCredentials ?? false;

  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid config.logLevel: expected debug|info|warn|error at ${source}`);
  }
  if (serverUrl !== undefined && !isNonEmptyString(serverUrl)) {
    throw new Error(`Invalid config.serverUrl: expected non-empty string at ${source}`);
  }
  if (!isNonEmptyString(preferenceDomain)) {
    throw new Error(`Invalid config.preferenceDomain: expected non-empty string at ${source}`);
  }
  if (!isNonEmptyString(preferenceKey)) {
    throw new Error(`Invalid config.preferenceKey: expected non-empty string at ${source}`);
  }
  if (!isEmptyDeviceIdPolicy(emptyDeviceId)) {
    throw new Error(`Invalid config.emptyDeviceId: expected forward|fail at ${source}`);
  }
  if (requestTimeoutMs !== undefined && !isPositiveInteger(requestTimeoutMs)) {
    throw new Error(`Invalid config.requestTimeoutMs: expected positive integer at ${source}`);
  }
  if (!isPositiveInteger(commandTimeoutMs)) {
    throw new Error(`Invalid config.commandTimeoutMs: expected positive integer at ${source}`);
  }
  if (typeof allowInsecureTls !== "boolean") {
    throw new Error(`Invalid config.allowInsecureTls: expected boolean at ${source}`);
  }
  if (credentialsFile !== undefined && !isNonEmptyString(credentialsFile)) {
    throw new Error(`Invalid config.credentialsFile: expected non-empty string at ${source}`);
  }
  if (typeof allowArgvCredentials !== "boolean") {
    throw new Error(`Invalid config.allowArgvCredentials: expected boolean at ${source}`);
  }

  return {
    logLevel,
    serverUrl: serverUrl?.trim(),
    preferenceDomain,
    preferenceKey,
    emptyDeviceId,
    requestTimeoutMs,
    commandTimeoutMs,
    allowInsecureTls,
    credentialsFile: credentialsFile?.trim(),
    allowArgvCredentials,
  };
}

/**
 * Apply `JRD_*` environment overrides on top of a file config.
 *
 * @throws If an override holds an invalid value.
 */
export function applyEnvOverrides(config: JrdConfig, env: NodeJS.ProcessEnv): JrdConfig {
  const next: JrdConfig = { ...config };

  if (isNonEmptyString(env.JRD_SERVER_URL)) {
    next.serverUrl = env.JRD_SERVER_URL.trim();
  }
  if (env.JRD_LOG_LEVEL !== undefined) {
    if (!isLogLevel(env.JRD_LOG_LEVEL)) {
      throw new Error("Invalid JRD_LOG_LEVEL: expected debug|info|warn|error");
    }
    next.logLevel = env.JRD_LOG_LEVEL;
  }
  if (isNonEmptyString(env.JRD_CREDENTIALS_FILE)) {
    next.credentialsFile = env.JRD_CREDENTIALS_FILE.trim();
  }

  return next;
}

/**
 * Load runtime configuration.
 *
 * Precedence:
 * - `JRD_CONFIG_PATH` env var (must exist)
 * - `<projectRoot>/config.json` (optional; defaults apply when absent)
 *
 * `JRD_*` environment overrides are applied last.
 *
 * @throws If the config file is malformed, or `JRD_CONFIG_PATH` points nowhere.
 */
export function loadConfig(): JrdConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const explicitPath = process.env.JRD_CONFIG_PATH;
  const configPath = explicitPath
    ? path.resolve(explicitPath)
    : path.join(getProjectRootDir(), "config.json");

  let parsed: unknown = {};
  if (explicitPath || fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, "utf-8");
    parsed = JSON.parse(raw);
  }

  cachedConfig = applyEnvOverrides(parseConfig(parsed, configPath), process.env);
  return cachedConfig;
}

/**
 * Clear the cached config and re-read from disk on the next `loadConfig()` call.
 */
export function reloadConfig(): JrdConfig {
  cachedConfig = null;
  return loadConfig();
}

function isLogLevel(v: unknown): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export function isEmptyDeviceIdPolicy(v: unknown): v is EmptyDeviceIdPolicy {
  return v === "forward" || v === "fail";
}
