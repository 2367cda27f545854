import type { JrdConfig } from "../../config.js";
import { err, ok, type Result } from "../../result.js";
import { HostCommandError, hostExec, type CommandRunner } from "./exec.js";

const SERIAL_PROPERTY = "IOPlatformSerialNumber";

/**
 * Extract the serial number from `ioreg -c IOPlatformExpertDevice -d 2` output.
 *
 * The matching line looks like:
 *
 *     |   "IOPlatformSerialNumber" = "C02ABC123XYZ"
 *
 * The value is the second-to-last `"`-delimited field of the first line that
 * mentions the property.
 *
 * @returns the serial, or `""` when no line carries the property.
 */
export function parseIoregSerial(output: string): string {
  for (const line of output.split("\n")) {
    if (!line.includes(SERIAL_PROPERTY)) continue;
    const fields = line.split('"');
    return fields.length >= 2 ? fields[fields.length - 2] : "";
  }
  return "";
}

/**
 * Read this machine's hardware serial number from the I/O registry.
 */
export function readSerialNumber(
  config: Pick<JrdConfig, "commandTimeoutMs">,
  runner?: CommandRunner
): Result<string> {
  let output: string;
  try {
    output = hostExec("ioreg", ["-c", "IOPlatformExpertDevice", "-d", "2"], {
      timeoutMs: config.commandTimeoutMs,
      runner,
    });
  } catch (e) {
    if (e instanceof HostCommandError) {
      return err("hardware", `Could not query the I/O registry: ${e.message}`, e.details);
    }
    throw e;
  }

  const serial = parseIoregSerial(output);
  if (serial.length === 0) {
    return err("hardware", `${SERIAL_PROPERTY} not found in I/O registry output`);
  }
  return ok(serial);
}
