import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { jrdAbout, TOOL_NAMES, type JrdAboutContext } from "./about.js";
import { jrdDevicesLookup, jrdRemoteDesktopEnable, type JrdToolContext } from "./remoteDesktop.js";
import {
  zEmptyDeviceIdPolicy,
  zOutAbout,
  zOutDevicesLookup,
  zOutRemoteDesktopEnable,
  zSerialNumber,
} from "./schemas.js";

/**
 * Register the MCP tool surface.
 */
export function registerTools(server: McpServer, ctx: JrdToolContext, about: JrdAboutContext): void {
  server.registerTool(
    TOOL_NAMES.about,
    {
      title: "About this toolkit",
      description:
        "Returns the toolkit version, how the Jamf Pro server URL is configured, the empty-device-id policy, the tool list, the typical workflow and expected failure modes.",
      inputSchema: {},
      outputSchema: zOutAbout,
    },
    async () => jrdAbout(about)
  );

  server.registerTool(
    TOOL_NAMES.devices_lookup,
    {
      title: "Look up a Mac in Jamf Pro",
      description:
        "Resolves a hardware serial number to the Jamf Pro computer id via the Classic API. Read-only. Use this to confirm a Mac is enrolled before sending commands. Omit `serial_number` to use the serial of the machine running this server.",
      inputSchema: {
        serial_number: zSerialNumber.optional(),
      },
      outputSchema: zOutDevicesLookup,
    },
    async (args) => jrdDevicesLookup(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.remote_desktop_enable,
    {
      title: "Enable Remote Desktop on a Mac",
      description:
        "Looks up the Mac by serial number and queues the EnableRemoteDesktop MDM command for it. The Mac applies it on its next check-in. Returns the device id the command was sent for.",
      inputSchema: {
        serial_number: zSerialNumber.optional(),
        empty_device_id: zEmptyDeviceIdPolicy.optional(),
      },
      outputSchema: zOutRemoteDesktopEnable,
    },
    async (args) => jrdRemoteDesktopEnable(ctx, args)
  );
}
