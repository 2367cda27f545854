import fs from "node:fs";
import type { JrdConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { err, ok, type Result } from "../result.js";
import { errorMessage, isNonEmptyString, isRecord } from "../utils.js";

export type CredentialSource = "env" | "file" | "argv";

export interface ApiCredentials {
  username: string;
  password: string;
  source: CredentialSource;
}

export interface CredentialInputs {
  config: Pick<JrdConfig, "credentialsFile" | "allowArgvCredentials">;
  env: NodeJS.ProcessEnv;
  /**
   * Jamf script parameters in order (parameter 1 first). Jamf reserves 1–3 for
   * mount point, computer name and user name; 4 and 5 hold username and password.
   */
  scriptParameters: string[];
  logger?: Logger;
}

/**
 * Read `{ "username", "password" }` from a secrets file.
 *
 * The file must not be accessible to group or other.
 */
export function readCredentialsFile(filePath: string): Result<ApiCredentials> {
  let mode: number;
  let raw: string;
  try {
    mode = fs.statSync(filePath).mode;
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    return err("credentials", `Could not read credentials file: ${errorMessage(e)}`, { path: filePath });
  }

  if ((mode & 0o077) !== 0) {
    return err("credentials", "Credentials file must not be accessible to group or other (chmod 600)", {
      path: filePath,
      mode: (mode & 0o777).toString(8),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return err("credentials", `Credentials file is not valid JSON: ${errorMessage(e)}`, { path: filePath });
  }
  if (!isRecord(parsed) || !isNonEmptyString(parsed.username) || !isNonEmptyString(parsed.password)) {
    return err("credentials", "Credentials file must hold non-empty username and password strings", {
      path: filePath,
    });
  }

  return ok({ username: parsed.username, password: parsed.password, source: "file" });
}

/**
 * Resolve API credentials: environment first, then the secrets file, then
 * (only when enabled) Jamf script parameters 4 and 5.
 */
export function resolveCredentials(inputs: CredentialInputs): Result<ApiCredentials> {
  const { config, env, scriptParameters, logger } = inputs;

  if (isNonEmptyString(env.JRD_API_USERNAME) && isNonEmptyString(env.JRD_API_PASSWORD)) {
    return ok({ username: env.JRD_API_USERNAME, password: env.JRD_API_PASSWORD, source: "env" });
  }

  if (config.credentialsFile) {
    return readCredentialsFile(config.credentialsFile);
  }

  const username = scriptParameters[3];
  const password = scriptParameters[4];
  if (config.allowArgvCredentials) {
    if (isNonEmptyString(username) && isNonEmptyString(password)) {
      logger?.warn("Using API credentials from script parameters 4 and 5; they are visible in process listings");
      return ok({ username, password, source: "argv" });
    }
  } else if (isNonEmptyString(username) || isNonEmptyString(password)) {
    logger?.warn("Ignoring script parameters 4 and 5: allowArgvCredentials is off");
  }

  return err(
    "credentials",
    "No API credentials: set JRD_API_USERNAME and JRD_API_PASSWORD, or configure credentialsFile"
  );
}
