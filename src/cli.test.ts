import { describe, expect, it } from "vitest";
import { EXIT_FAILED, EXIT_OK, EXIT_USAGE, runCli, type CliDeps } from "./cli.js";
import type { JrdConfig } from "./config.js";
import { JamfClassicClient } from "./backend/jamf/client.js";
import {
  COMMAND_URL,
  COMPUTER_XML,
  IOREG_OUTPUT,
  LOOKUP_URL,
  SERIAL,
  fakeJamf,
  fakeRunner,
  memoryLogger,
  testConfig,
  type FakeRoute,
} from "./test-utils.js";

const ENV = { JRD_API_USERNAME: "api-user", JRD_API_PASSWORD: "test-secret" };

function setup(routes: FakeRoute[], options: { config?: JrdConfig; env?: NodeJS.ProcessEnv } = {}) {
  const jamf = fakeJamf(routes);
  const { logger, lines: logs } = memoryLogger();
  const host = fakeRunner({
    ioreg: { stdout: IOREG_OUTPUT },
    defaults: { stdout: "https://jss.example.com/\n" },
  });
  const printed: string[] = [];
  const deps: CliDeps = {
    config: options.config ?? testConfig(),
    env: options.env ?? ENV,
    logger,
    meta: { name: "jamf-remote-desktop", version: "0.1.0" },
    print: (line) => printed.push(line),
    runner: host.runner,
    connect: (serverUrl, credentials) =>
      new JamfClassicClient({
        baseUrl: serverUrl,
        username: credentials.username,
        password: credentials.password,
        adapter: jamf.adapter,
      }),
  };
  return { deps, jamf, printed, logs, calls: host.calls };
}

const HAPPY_ROUTES: FakeRoute[] = [
  { method: "get", url: LOOKUP_URL, status: 200, body: COMPUTER_XML },
  { method: "post", url: COMMAND_URL, status: 200 },
];

describe("runCli", () => {
  it("enables screen sharing for the local serial number", async () => {
    const { deps, printed } = setup(HAPPY_ROUTES);

    const code = await runCli([], deps);

    expect(code).toBe(EXIT_OK);
    expect(printed).toEqual(["Screen Sharing was enabled for device C02ABC123XYZ"]);
  });

  it("reports failure when the command endpoint returns 404", async () => {
    const { deps, printed } = setup([
      { method: "get", url: LOOKUP_URL, status: 200, body: COMPUTER_XML },
      { method: "post", url: COMMAND_URL, status: 404 },
    ]);

    const code = await runCli([], deps);

    expect(code).toBe(EXIT_FAILED);
    expect(printed).toEqual(["Screen Sharing was NOT enabled for device C02ABC123XYZ"]);
  });

  it("reads the server URL from the agent preferences when none is configured", async () => {
    const { deps, printed, calls, jamf } = setup(HAPPY_ROUTES, { config: testConfig({ serverUrl: undefined }) });

    const code = await runCli([], deps);

    expect(code).toBe(EXIT_OK);
    expect(printed).toEqual([`Screen Sharing was enabled for device ${SERIAL}`]);
    expect(calls.map((c) => c.command)).toEqual(["defaults", "ioreg"]);
    expect(jamf.requests[0].url).toBe(LOOKUP_URL);
  });

  it("targets another device with --serial without querying ioreg", async () => {
    const otherLookup = "https://jss.example.com/JSSResource/computers/serialnumber/FVFXYZ987654";
    const { deps, printed, calls } = setup([
      { method: "get", url: otherLookup, status: 200, body: "<computer><general><id>7</id></general></computer>" },
      { method: "post", url: "https://jss.example.com/JSSResource/computercommands/command/EnableRemoteDesktop/id/7", status: 201 },
    ]);

    const code = await runCli(["--serial", "FVFXYZ987654"], deps);

    expect(code).toBe(EXIT_OK);
    expect(printed).toEqual(["Screen Sharing was enabled for device FVFXYZ987654"]);
    expect(calls).toEqual([]);
  });

  it("honours --server-url over the configured URL", async () => {
    const { deps, jamf } = setup([], { config: testConfig({ serverUrl: "https://old.example.com" }) });

    await runCli(["--server-url", "https://jss.example.com/"], deps);

    expect(jamf.requests[0].url).toBe(LOOKUP_URL);
  });

  it("accepts Jamf script parameters 4 and 5 only when allowed", async () => {
    const args = ["/", "lab-mac-01", "jdoe", "api-user", "test-secret"];

    const denied = setup(HAPPY_ROUTES, { env: {} });
    expect(await runCli(args, denied.deps)).toBe(EXIT_FAILED);
    expect(denied.jamf.requests).toEqual([]);

    const allowed = setup(HAPPY_ROUTES, { env: {}, config: testConfig({ allowArgvCredentials: true }) });
    expect(await runCli(args, allowed.deps)).toBe(EXIT_OK);
    expect(allowed.jamf.requests[0].auth).toEqual({ username: "api-user", password: "test-secret" });
  });

  it("treats a Jamf password starting with a dash as a parameter", async () => {
    const { deps, jamf, printed } = setup(HAPPY_ROUTES, {
      env: {},
      config: testConfig({ allowArgvCredentials: true }),
    });

    const code = await runCli(["/", "lab-mac-01", "jdoe", "api-user", "-s3cret!"], deps);

    expect(code).toBe(EXIT_OK);
    expect(printed).toEqual([`Screen Sharing was enabled for device ${SERIAL}`]);
    expect(jamf.requests[0].auth).toEqual({ username: "api-user", password: "-s3cret!" });
  });

  it("fails fast on an empty device id with --empty-device-id fail", async () => {
    const { deps, jamf, printed } = setup([{ method: "get", url: LOOKUP_URL, status: 200, body: "" }]);

    const code = await runCli(["--empty-device-id", "fail"], deps);

    expect(code).toBe(EXIT_FAILED);
    expect(printed).toEqual(["Screen Sharing was NOT enabled for device C02ABC123XYZ"]);
    expect(jamf.requests).toHaveLength(1);
  });

  it("rejects an unknown --empty-device-id policy", async () => {
    const { deps, printed } = setup(HAPPY_ROUTES);

    expect(await runCli(["--empty-device-id", "retry"], deps)).toBe(EXIT_USAGE);
    expect(printed).toEqual([]);
  });

  it("rejects unknown options", async () => {
    const { deps, jamf } = setup(HAPPY_ROUTES);

    expect(await runCli(["--verbose"], deps)).toBe(EXIT_USAGE);
    expect(jamf.requests).toEqual([]);
  });

  it("prints the version", async () => {
    const { deps, printed } = setup([]);

    expect(await runCli(["--version"], deps)).toBe(EXIT_OK);
    expect(printed).toEqual(["jamf-remote-desktop 0.1.0"]);
  });
});
