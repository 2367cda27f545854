import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { EmptyDeviceIdPolicy } from "../config.js";
import { toolOk } from "./result.js";

export interface JrdAboutContext {
  serverName: string;
  serverVersion: string;
  logLevel: string;
  serverUrlSource: "config" | "preferences";
  emptyDeviceId: EmptyDeviceIdPolicy;
}

export const TOOL_NAMES = {
  about: "jrd_about",
  devices_lookup: "jrd_devices_lookup",
  remote_desktop_enable: "jrd_remote_desktop_enable",
} as const;

/**
 * Return a compact description of the toolkit and how its tools fit together.
 */
export function jrdAbout(ctx: JrdAboutContext): CallToolResult {
  return toolOk({
    schema_version: 1,
    toolkit: {
      name: ctx.serverName,
      version: ctx.serverVersion,
      log_level: ctx.logLevel,
      server_url_source: ctx.serverUrlSource,
      empty_device_id: ctx.emptyDeviceId,
    },
    tools: { ...TOOL_NAMES },
    workflow: [
      `Call ${TOOL_NAMES.devices_lookup} with a serial number to confirm the Mac is enrolled and get its Jamf id.`,
      `Call ${TOOL_NAMES.remote_desktop_enable} with the same serial number to queue EnableRemoteDesktop.`,
      "Jamf delivers the command on the Mac's next MDM check-in; screen sharing access settings still need kickstart.",
    ],
    failure_modes: [
      "UNAUTHORIZED: API credentials missing, wrong, or lacking privileges.",
      "NOT_FOUND: no computer with that serial number.",
      "UNAVAILABLE: server URL not configured, serial unreadable, or Jamf unreachable (retryable).",
      "INTERNAL: Jamf rejected the request for another reason.",
    ],
  });
}
