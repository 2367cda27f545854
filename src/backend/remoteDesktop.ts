import type { EmptyDeviceIdPolicy } from "../config.js";
import type { Logger } from "../logger.js";
import { err, ok, type Result, type StageError, type StageErrorKind } from "../result.js";
import { JamfApiError } from "./jamf/client.js";
import { requireInputs, type ConnectFn, type DeviceCommandClient, type RunInputs } from "./runContext.js";

export const ENABLE_REMOTE_DESKTOP = "EnableRemoteDesktop";

export interface RemoteDesktopOutcome {
  ok: boolean;
  serialNumber: string;
  /** Present once the lookup stage has run. */
  deviceId?: string;
  /** The single line printed on stdout. */
  message: string;
  /** Diagnostic of the stage that stopped the run. */
  error?: StageError;
}

export interface RemoteDesktopRun extends RunInputs {
  emptyDeviceId: EmptyDeviceIdPolicy;
  connect: ConnectFn;
  logger: Logger;
}

export function successMessage(serialNumber: string): string {
  return `Screen Sharing was enabled for device ${serialNumber}`;
}

export function failureMessage(serialNumber: string): string {
  return `Screen Sharing was NOT enabled for device ${serialNumber}`;
}

async function callStage<T>(kind: StageErrorKind, fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (e) {
    if (e instanceof JamfApiError) {
      return err(kind, e.message, { transport: e.kind, ...e.details });
    }
    throw e;
  }
}

/**
 * Resolve a serial number to the server's device id.
 *
 * `Ok("")` means the server answered but the record carried no id.
 */
export function lookupStage(client: DeviceCommandClient, serialNumber: string): Promise<Result<string>> {
  return callStage("lookup", () => client.lookupDeviceId(serialNumber));
}

/**
 * Send EnableRemoteDesktop for the device id.
 *
 * @returns the accepted HTTP status.
 */
export function commandStage(client: DeviceCommandClient, deviceId: string): Promise<Result<number>> {
  return callStage("command", () => client.sendComputerCommand(ENABLE_REMOTE_DESKTOP, deviceId));
}

/**
 * Run the whole pipeline: server URL → serial number → credentials → lookup →
 * command. The first failing stage stops the run and is logged with its
 * diagnostic; the outcome message stays one of the two fixed lines.
 */
export async function enableRemoteDesktop(run: RemoteDesktopRun): Promise<RemoteDesktopOutcome> {
  const { logger } = run;
  const serialNumber = run.serialNumber.ok ? run.serialNumber.value : "";

  const fail = (error: StageError, deviceId?: string): RemoteDesktopOutcome => {
    logger.error(error.message, { stage: error.kind, ...error.details });
    return { ok: false, serialNumber, deviceId, message: failureMessage(serialNumber), error };
  };

  const ready = requireInputs(run);
  if (!ready.ok) return fail(ready.error);

  const { serverUrl, credentials } = ready.value;
  logger.debug("Resolved run inputs", { serverUrl, serialNumber, credentials: credentials.source });

  const client = run.connect(serverUrl, credentials);

  const lookup = await lookupStage(client, serialNumber);
  if (!lookup.ok) return fail(lookup.error);

  const deviceId = lookup.value;
  if (deviceId.length === 0) {
    if (run.emptyDeviceId === "fail") {
      return fail({ kind: "lookup", message: `No device id found for serial ${serialNumber}` }, deviceId);
    }
    logger.warn("No device id found; sending the command anyway", { serialNumber });
  } else {
    logger.debug("Resolved device id", { serialNumber, deviceId });
  }

  const command = await commandStage(client, deviceId);
  if (!command.ok) return fail(command.error, deviceId);

  logger.info(`${ENABLE_REMOTE_DESKTOP} accepted`, { deviceId, status: command.value });
  return { ok: true, serialNumber, deviceId, message: successMessage(serialNumber) };
}
