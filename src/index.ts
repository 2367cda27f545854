#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { runCli } from "./cli.js";

/**
 * CLI entrypoint, suitable as a Jamf policy script.
 *
 * stdout carries exactly one outcome line; diagnostics go to stderr.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logLevel);

  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    env: process.env,
    logger,
    meta: loadPackageMeta(),
    print: (line) => {
      process.stdout.write(line.endsWith("\n") ? line : line + "\n");
    },
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[jamf-remote-desktop] fatal ${msg}\n`);
  process.exitCode = 1;
});
