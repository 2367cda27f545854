import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_PREFERENCE_DOMAIN,
  DEFAULT_PREFERENCE_KEY,
  type JrdConfig,
} from "./config.js";
import { Logger, stripAnsi } from "./logger.js";
import type { CommandOutput, CommandRunner } from "./backend/host/exec.js";

export const SERIAL = "C02ABC123XYZ";
export const SERVER_URL = "https://jss.example.com";

export const IOREG_OUTPUT = [
  "+-o Root  <class IORegistryEntry, id 0x100000100, retain 18>",
  "  +-o MacBookPro18,3  <class IOPlatformExpertDevice, id 0x100000110, registered, matched, active, busy 0 (1 ms), retain 35>",
  "    {",
  '      "IOPlatformUUID" = "00000000-0000-0000-0000-000000000000"',
  `      "IOPlatformSerialNumber" = "${SERIAL}"`,
  '      "model" = <"MacBookPro18,3">',
  "    }",
].join("\n");

export const COMPUTER_XML =
  '<?xml version="1.0" encoding="UTF-8"?><computer><general><id>42</id><name>lab-mac-01</name>' +
  `<serial_number>${SERIAL}</serial_number></general></computer>`;

export const LOOKUP_URL = `${SERVER_URL}/JSSResource/computers/serialnumber/${SERIAL}`;
export const COMMAND_URL = `${SERVER_URL}/JSSResource/computercommands/command/EnableRemoteDesktop/id/42`;

export function testConfig(overrides: Partial<JrdConfig> = {}): JrdConfig {
  return {
    logLevel: "debug",
    serverUrl: SERVER_URL,
    preferenceDomain: DEFAULT_PREFERENCE_DOMAIN,
    preferenceKey: DEFAULT_PREFERENCE_KEY,
    emptyDeviceId: "forward",
    commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    allowInsecureTls: false,
    allowArgvCredentials: false,
    ...overrides,
  };
}

/** Logger that keeps plain-text lines in memory. */
export function memoryLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger("debug", (chunk) => {
    lines.push(stripAnsi(chunk).trimEnd());
  });
  return { logger, lines };
}

export interface RecordedCall {
  command: string;
  args: string[];
  timeoutMs?: number;
}

/**
 * Command runner answering by executable name. Unknown executables behave like
 * a missing binary.
 */
export function fakeRunner(responses: Record<string, Partial<CommandOutput>>): {
  runner: CommandRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = (command, args, timeoutMs) => {
    calls.push({ command, args, timeoutMs });
    const response = responses[command];
    if (!response) {
      return {
        status: null,
        stdout: "",
        stderr: "",
        error: Object.assign(new Error(`spawnSync ${command} ENOENT`), { code: "ENOENT" }),
      };
    }
    return { status: 0, stdout: "", stderr: "", ...response };
  };
  return { runner, calls };
}

export interface FakeRoute {
  method: "get" | "post";
  url: string;
  status: number;
  body?: string;
}

/**
 * In-process Jamf server: answers requests from a route table, 404 otherwise.
 * A route with status 0 fails like a refused connection.
 */
export function fakeJamf(routes: FakeRoute[]): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const route = routes.find((r) => r.method === config.method && r.url === config.url);
    if (route && route.status === 0) {
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:8443", "ECONNREFUSED", config);
    }
    const status = route?.status ?? 404;
    return {
      data: route?.body ?? "",
      status,
      statusText: String(status),
      headers: {},
      config,
      request: {},
    };
  };
  return { adapter, requests };
}
