import https from "node:https";
import { describe, expect, it } from "vitest";
import { err, ok } from "../result.js";
import {
  COMPUTER_XML,
  IOREG_OUTPUT,
  LOOKUP_URL,
  SERIAL,
  SERVER_URL,
  fakeJamf,
  fakeRunner,
  testConfig,
} from "../test-utils.js";
import {
  jamfConnector,
  normalizeServerUrl,
  prepareRun,
  requireInputs,
  resolveSerialNumber,
  resolveServerUrl,
} from "./runContext.js";

describe("normalizeServerUrl", () => {
  it("drops every trailing slash", () => {
    expect(normalizeServerUrl("https://jss.example.com:8443//")).toBe("https://jss.example.com:8443");
    expect(normalizeServerUrl("https://jss.example.com")).toBe("https://jss.example.com");
  });
});

describe("resolveServerUrl", () => {
  it("uses the configured URL without touching the preference store", () => {
    const { runner, calls } = fakeRunner({});

    expect(resolveServerUrl(testConfig({ serverUrl: "https://jss.example.com/" }), runner)).toEqual(ok(SERVER_URL));
    expect(calls).toEqual([]);
  });

  it("falls back to the agent preference", () => {
    const { runner } = fakeRunner({ defaults: { stdout: "https://jss.example.com/\n" } });

    expect(resolveServerUrl(testConfig({ serverUrl: undefined }), runner)).toEqual(ok(SERVER_URL));
  });

  it("rejects a preference that holds only the trailing character", () => {
    const { runner } = fakeRunner({ defaults: { stdout: "/\n" } });
    const result = resolveServerUrl(testConfig({ serverUrl: undefined }), runner);

    expect(result).toMatchObject({ ok: false, error: { kind: "config", message: "Preference jss_url holds no server URL" } });
  });
});

describe("resolveSerialNumber", () => {
  it("prefers an explicit serial", () => {
    const { runner, calls } = fakeRunner({ ioreg: { stdout: IOREG_OUTPUT } });

    expect(resolveSerialNumber(testConfig(), " FVFXYZ987654 ", runner)).toEqual(ok("FVFXYZ987654"));
    expect(calls).toEqual([]);
  });

  it("rejects a blank explicit serial", () => {
    expect(resolveSerialNumber(testConfig(), "  ")).toEqual(err("input", "Serial number must not be empty", { argument: "serial_number" }));
  });

  it("reads the local serial otherwise", () => {
    const { runner } = fakeRunner({ ioreg: { stdout: IOREG_OUTPUT } });

    expect(resolveSerialNumber(testConfig(), undefined, runner)).toEqual(ok(SERIAL));
  });
});

describe("prepareRun / requireInputs", () => {
  it("collects every input", () => {
    const { runner } = fakeRunner({ ioreg: { stdout: IOREG_OUTPUT } });
    const inputs = prepareRun(testConfig(), {
      env: { JRD_API_USERNAME: "api-user", JRD_API_PASSWORD: "test-secret" },
      scriptParameters: [],
      runner,
    });

    expect(requireInputs(inputs)).toEqual(
      ok({
        serverUrl: SERVER_URL,
        serialNumber: SERIAL,
        credentials: { username: "api-user", password: "test-secret", source: "env" },
      })
    );
  });

  it("returns the first failure in stage order", () => {
    const inputs = {
      serverUrl: ok(SERVER_URL),
      serialNumber: err("hardware", "no serial"),
      credentials: err("credentials", "no credentials"),
    };

    expect(requireInputs(inputs)).toEqual(err("hardware", "no serial"));
  });
});

describe("jamfConnector", () => {
  const credentials = { username: "api-user", password: "test-secret", source: "env" as const };
  const routes = [{ method: "get" as const, url: LOOKUP_URL, status: 200, body: COMPUTER_XML }];

  it("applies the configured request timeout and TLS settings", async () => {
    const jamf = fakeJamf(routes);
    const connect = jamfConnector(testConfig({ requestTimeoutMs: 5000, allowInsecureTls: true }), jamf.adapter);

    expect(await connect(SERVER_URL, credentials).lookupDeviceId(SERIAL)).toBe("42");

    const request = jamf.requests[0];
    expect(request.timeout).toBe(5000);
    expect(request.httpsAgent).toBeInstanceOf(https.Agent);
    expect(request.httpsAgent.options.rejectUnauthorized).toBe(false);
    expect(request.auth).toEqual({ username: "api-user", password: "test-secret" });
  });

  it("keeps certificate verification on by default", async () => {
    const jamf = fakeJamf(routes);

    await jamfConnector(testConfig(), jamf.adapter)(SERVER_URL, credentials).lookupDeviceId(SERIAL);

    expect(jamf.requests[0].httpsAgent).toBeUndefined();
  });
});
