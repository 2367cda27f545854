import { parseArgs } from "node:util";
import { isEmptyDeviceIdPolicy, type JrdConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { PackageMeta } from "./meta.js";
import type { CommandRunner } from "./backend/host/exec.js";
import { enableRemoteDesktop } from "./backend/remoteDesktop.js";
import { jamfConnector, prepareRun, type ConnectFn } from "./backend/runContext.js";
import { errorMessage } from "./utils.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: jamf-remote-desktop [options] [mount-point computer-name user-name [api-user api-password]]

Sends the EnableRemoteDesktop command for this Mac (or --serial) through the
Jamf Pro Classic API.

Options:
  --serial <serial>            Target this serial number instead of the local one
  --server-url <url>           Jamf Pro URL (default: config, then jss_url preference)
  --empty-device-id <policy>   forward | fail when the lookup yields no id
  --version                    Print the version
  --help                       Print this help

Credentials come from JRD_API_USERNAME / JRD_API_PASSWORD or the configured
credentialsFile. Script parameters 4 and 5 are read only when
allowArgvCredentials is set.
`;

export interface CliDeps {
  config: JrdConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  meta: PackageMeta;
  /** Outcome line sink (stdout in production). */
  print: (line: string) => void;
  runner?: CommandRunner;
  connect?: ConnectFn;
}

/**
 * Jamf runs policy scripts with positional parameters only, and a password may
 * start with "-". Options are parsed only when the first argument is one.
 */
function parseCliArgs(args: string[]) {
  const jamfParameters = args.length > 0 && !args[0].startsWith("--");
  return parseArgs({
    args: jamfParameters ? ["--", ...args] : args,
    allowPositionals: true,
    options: {
      serial: { type: "string" },
      "server-url": { type: "string" },
      "empty-device-id": { type: "string" },
      version: { type: "boolean" },
      help: { type: "boolean" },
    },
  });
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(args);
  } catch (e) {
    deps.logger.error(errorMessage(e));
    deps.logger.error(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    deps.print(USAGE);
    return EXIT_OK;
  }
  if (values.version) {
    deps.print(`${deps.meta.name} ${deps.meta.version}`);
    return EXIT_OK;
  }

  const emptyDeviceId = values["empty-device-id"] ?? deps.config.emptyDeviceId;
  if (!isEmptyDeviceIdPolicy(emptyDeviceId)) {
    deps.logger.error(`Invalid --empty-device-id: expected forward|fail, got ${emptyDeviceId}`);
    return EXIT_USAGE;
  }

  const config: JrdConfig = {
    ...deps.config,
    serverUrl: values["server-url"] ?? deps.config.serverUrl,
    emptyDeviceId,
  };

  const inputs = prepareRun(config, {
    serialNumber: values.serial,
    env: deps.env,
    scriptParameters: positionals,
    runner: deps.runner,
    logger: deps.logger,
  });

  const outcome = await enableRemoteDesktop({
    ...inputs,
    emptyDeviceId,
    connect: deps.connect ?? jamfConnector(config),
    logger: deps.logger,
  });

  deps.print(outcome.message);
  return outcome.ok ? EXIT_OK : EXIT_FAILED;
}
