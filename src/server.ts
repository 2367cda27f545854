#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { registerTools } from "./tools/register.js";

/**
 * MCP server entrypoint.
 *
 * Exposes device lookup and EnableRemoteDesktop as tools over stdio. Credentials
 * come from the environment or the configured credentials file only.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const server = new McpServer({ name: pkg.name, version: pkg.version });

  // Tools must be registered before connecting, since registration mutates
  // server capabilities.
  registerTools(
    server,
    { config, env: process.env, logger },
    {
      serverName: pkg.name,
      serverVersion: pkg.version,
      logLevel: config.logLevel,
      serverUrlSource: config.serverUrl !== undefined ? "config" : "preferences",
      emptyDeviceId: config.emptyDeviceId,
    }
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.printBanner({
    name: pkg.name,
    version: pkg.version,
    serverUrl: config.serverUrl ?? `${config.preferenceKey} (${config.preferenceDomain})`,
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[jamf-remote-desktop-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});
