import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { EmptyDeviceIdPolicy, JrdConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { CommandRunner } from "../backend/host/exec.js";
import { enableRemoteDesktop, lookupStage } from "../backend/remoteDesktop.js";
import { jamfConnector, prepareRun, requireInputs, type ConnectFn } from "../backend/runContext.js";
import { errorMessage } from "../utils.js";
import { TOOL_NAMES } from "./about.js";
import { stageToolError, toolErr, toolOk } from "./result.js";

/**
 * What tool handlers need from the hosting process.
 */
export interface JrdToolContext {
  config: JrdConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  runner?: CommandRunner;
  connect?: ConnectFn;
}

function prepare(ctx: JrdToolContext, serialNumber: string | undefined) {
  // Script parameters only exist for policy runs.
  return prepareRun(ctx.config, {
    serialNumber,
    env: ctx.env,
    scriptParameters: [],
    runner: ctx.runner,
    logger: ctx.logger,
  });
}

/**
 * Resolve a serial number to its Jamf Pro computer id.
 */
export async function jrdDevicesLookup(
  ctx: JrdToolContext,
  args: { serial_number?: string }
): Promise<CallToolResult> {
  const tool = TOOL_NAMES.devices_lookup;

  try {
    const ready = requireInputs(prepare(ctx, args.serial_number));
    if (!ready.ok) {
      return toolErr(stageToolError(tool, ready.error));
    }

    const { serverUrl, serialNumber, credentials } = ready.value;
    const connect = ctx.connect ?? jamfConnector(ctx.config);
    const lookup = await lookupStage(connect(serverUrl, credentials), serialNumber);
    if (!lookup.ok) {
      return toolErr(stageToolError(tool, lookup.error));
    }
    if (lookup.value.length === 0) {
      return toolErr({
        code: "NOT_FOUND",
        tool,
        message: `No device id found for serial ${serialNumber}`,
        retryable: false,
        suggestion: "Verify the serial number is enrolled in Jamf Pro",
      });
    }

    return toolOk({ serial_number: serialNumber, device_id: lookup.value });
  } catch (err) {
    return toolErr({
      code: "INTERNAL",
      tool,
      message: `Failed to look up device: ${errorMessage(err)}`,
      retryable: false,
    });
  }
}

/**
 * Send EnableRemoteDesktop for a serial number.
 */
export async function jrdRemoteDesktopEnable(
  ctx: JrdToolContext,
  args: { serial_number?: string; empty_device_id?: EmptyDeviceIdPolicy }
): Promise<CallToolResult> {
  const tool = TOOL_NAMES.remote_desktop_enable;

  try {
    const outcome = await enableRemoteDesktop({
      ...prepare(ctx, args.serial_number),
      emptyDeviceId: args.empty_device_id ?? ctx.config.emptyDeviceId,
      connect: ctx.connect ?? jamfConnector(ctx.config),
      logger: ctx.logger,
    });

    if (outcome.ok) {
      return toolOk({
        serial_number: outcome.serialNumber,
        device_id: outcome.deviceId ?? "",
        message: outcome.message,
      });
    }
    if (outcome.error) {
      return toolErr(stageToolError(tool, outcome.error));
    }
    return toolErr({ code: "INTERNAL", tool, message: outcome.message, retryable: false });
  } catch (err) {
    return toolErr({
      code: "INTERNAL",
      tool,
      message: `Failed to send EnableRemoteDesktop: ${errorMessage(err)}`,
      retryable: false,
    });
  }
}
