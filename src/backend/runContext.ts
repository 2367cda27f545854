import type { JrdConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { err, ok, type Result } from "../result.js";
import { resolveCredentials, type ApiCredentials } from "./credentials.js";
import type { CommandRunner } from "./host/exec.js";
import { readServerUrlFromPreferences } from "./host/preferences.js";
import { readSerialNumber } from "./host/serialNumber.js";
import type { AxiosAdapter } from "axios";
import { JamfClassicClient } from "./jamf/client.js";

/**
 * Everything the pipeline needs, read once before the first request goes out.
 *
 * Each value is a `Result` so a failure is reported by the stage it belongs to
 * rather than where it was read.
 */
export interface RunInputs {
  serverUrl: Result<string>;
  serialNumber: Result<string>;
  credentials: Result<ApiCredentials>;
}

export interface PrepareRunOptions {
  /** Target another device instead of reading this machine's serial. */
  serialNumber?: string;
  env: NodeJS.ProcessEnv;
  /** Jamf script parameters (parameter 1 first). */
  scriptParameters: string[];
  runner?: CommandRunner;
  logger?: Logger;
}

/** {@link RunInputs} once every read succeeded. */
export interface ReadyInputs {
  serverUrl: string;
  serialNumber: string;
  credentials: ApiCredentials;
}

/**
 * Short-circuit on the first failed read, in stage order.
 */
export function requireInputs(inputs: RunInputs): Result<ReadyInputs> {
  if (!inputs.serverUrl.ok) return inputs.serverUrl;
  if (!inputs.serialNumber.ok) return inputs.serialNumber;
  if (!inputs.credentials.ok) return inputs.credentials;
  return ok({
    serverUrl: inputs.serverUrl.value,
    serialNumber: inputs.serialNumber.value,
    credentials: inputs.credentials.value,
  });
}

/** Client surface the pipeline drives. `JamfClassicClient` implements it. */
export type DeviceCommandClient = Pick<JamfClassicClient, "lookupDeviceId" | "sendComputerCommand">;

export type ConnectFn = (serverUrl: string, credentials: ApiCredentials) => DeviceCommandClient;

/**
 * Drop trailing slashes from an explicitly configured server URL.
 */
export function normalizeServerUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

/**
 * Resolve the server URL: explicit configuration first, then the Jamf agent's
 * preference store.
 */
export function resolveServerUrl(
  config: Pick<JrdConfig, "serverUrl" | "preferenceDomain" | "preferenceKey" | "commandTimeoutMs">,
  runner?: CommandRunner
): Result<string> {
  if (config.serverUrl !== undefined) {
    const url = normalizeServerUrl(config.serverUrl);
    return url.length > 0 ? ok(url) : err("config", "Configured serverUrl is empty");
  }
  const fromPreferences = readServerUrlFromPreferences(config, runner);
  if (fromPreferences.ok && fromPreferences.value.length === 0) {
    return err("config", `Preference ${config.preferenceKey} holds no server URL`, {
      domain: config.preferenceDomain,
    });
  }
  return fromPreferences;
}

/**
 * Use the explicit serial when given, otherwise read this machine's.
 */
export function resolveSerialNumber(
  config: Pick<JrdConfig, "commandTimeoutMs">,
  explicit?: string,
  runner?: CommandRunner
): Result<string> {
  if (explicit !== undefined) {
    const serial = explicit.trim();
    return serial.length > 0
      ? ok(serial)
      : err("input", "Serial number must not be empty", { argument: "serial_number" });
  }
  return readSerialNumber(config, runner);
}

/**
 * Read server URL, serial number and credentials, in that order.
 */
export function prepareRun(config: JrdConfig, options: PrepareRunOptions): RunInputs {
  return {
    serverUrl: resolveServerUrl(config, options.runner),
    serialNumber: resolveSerialNumber(config, options.serialNumber, options.runner),
    credentials: resolveCredentials({
      config,
      env: options.env,
      scriptParameters: options.scriptParameters,
      logger: options.logger,
    }),
  };
}

/**
 * Build the production {@link ConnectFn}: a Classic API client honouring the
 * configured timeout and TLS settings.
 */
export function jamfConnector(
  config: Pick<JrdConfig, "requestTimeoutMs" | "allowInsecureTls">,
  adapter?: AxiosAdapter
): ConnectFn {
  return (serverUrl, credentials) =>
    new JamfClassicClient({
      baseUrl: serverUrl,
      username: credentials.username,
      password: credentials.password,
      timeoutMs: config.requestTimeoutMs,
      allowInsecureTls: config.allowInsecureTls,
      adapter,
    });
}
