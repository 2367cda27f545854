import type { JrdConfig } from "../../config.js";
import { err, ok, type Result } from "../../result.js";
import { HostCommandError, hostExec, type CommandRunner } from "./exec.js";

/**
 * Remove exactly one trailing character.
 *
 * The agent stores its server URL with a trailing slash
 * (`https://jss.example.com/`); the REST paths are appended with their own.
 */
export function stripTrailingCharacter(value: string): string {
  return value.slice(0, -1);
}

/**
 * Read one key from a `defaults` domain.
 *
 * @returns trimmed value, or an error of kind `config` if the key is absent or
 * `defaults` cannot run.
 */
export function readPreference(
  domain: string,
  key: string,
  options?: { timeoutMs?: number; runner?: CommandRunner }
): Result<string> {
  try {
    const value = hostExec("defaults", ["read", domain, key], options);
    if (value.length === 0) {
      return err("config", `Preference ${key} is empty in ${domain}`, { domain, key });
    }
    return ok(value);
  } catch (e) {
    if (e instanceof HostCommandError) {
      return err("config", `Could not read preference ${key} from ${domain}: ${e.message}`, {
        domain,
        key,
        ...e.details,
      });
    }
    throw e;
  }
}

/**
 * Read the Jamf server URL the management agent was enrolled against.
 */
export function readServerUrlFromPreferences(
  config: Pick<JrdConfig, "preferenceDomain" | "preferenceKey" | "commandTimeoutMs">,
  runner?: CommandRunner
): Result<string> {
  const raw = readPreference(config.preferenceDomain, config.preferenceKey, {
    timeoutMs: config.commandTimeoutMs,
    runner,
  });
  if (!raw.ok) {
    return raw;
  }
  return ok(stripTrailingCharacter(raw.value));
}
