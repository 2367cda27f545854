import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { applyEnvOverrides, parseConfig, reloadConfig } from "./config.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("parseConfig", () => {
  it("applies defaults to an empty object", () => {
    expect(parseConfig({}, "config.json")).toEqual({
      logLevel: "info",
      serverUrl: undefined,
      preferenceDomain: "/Library/Preferences/com.jamfsoftware.jamf.plist",
      preferenceKey: "jss_url",
      emptyDeviceId: "forward",
      requestTimeoutMs: undefined,
      commandTimeoutMs: 10_000,
      allowInsecureTls: false,
      credentialsFile: undefined,
      allowArgvCredentials: false,
    });
  });

  it("keeps explicit values", () => {
    const config = parseConfig(
      {
        logLevel: "debug",
        serverUrl: " https://jss.example.com:8443 ",
        emptyDeviceId: "fail",
        requestTimeoutMs: 15_000,
        allowInsecureTls: true,
        credentialsFile: "/etc/jrd/api.json",
        allowArgvCredentials: true,
      },
      "config.json"
    );

    expect(config).toMatchObject({
      logLevel: "debug",
      serverUrl: "https://jss.example.com:8443",
      emptyDeviceId: "fail",
      requestTimeoutMs: 15_000,
      allowInsecureTls: true,
      credentialsFile: "/etc/jrd/api.json",
      allowArgvCredentials: true,
    });
  });

  it("rejects a non-object", () => {
    expect(() => parseConfig([], "config.json")).toThrow("Invalid config: expected JSON object at config.json");
  });

  it("rejects an unknown empty-device-id policy", () => {
    expect(() => parseConfig({ emptyDeviceId: "retry" }, "config.json")).toThrow(
      "Invalid config.emptyDeviceId: expected forward|fail at config.json"
    );
  });

  it("rejects a non-integer timeout", () => {
    expect(() => parseConfig({ commandTimeoutMs: 1.5 }, "config.json")).toThrow(
      "Invalid config.commandTimeoutMs: expected positive integer at config.json"
    );
  });

  it("rejects an empty server URL", () => {
    expect(() => parseConfig({ serverUrl: "  " }, "config.json")).toThrow(
      "Invalid config.serverUrl: expected non-empty string at config.json"
    );
  });
});

describe("applyEnvOverrides", () => {
  it("lets JRD_* variables override the file", () => {
    const base = parseConfig({ serverUrl: "https://old.example.com" }, "config.json");
    const config = applyEnvOverrides(base, {
      JRD_SERVER_URL: "https://jss.example.com",
      JRD_LOG_LEVEL: "warn",
      JRD_CREDENTIALS_FILE: "/etc/jrd/api.json",
    });

    expect(config.serverUrl).toBe("https://jss.example.com");
    expect(config.logLevel).toBe("warn");
    expect(config.credentialsFile).toBe("/etc/jrd/api.json");
    expect(base.serverUrl).toBe("https://old.example.com");
  });

  it("rejects an invalid JRD_LOG_LEVEL", () => {
    expect(() => applyEnvOverrides(parseConfig({}, "config.json"), { JRD_LOG_LEVEL: "verbose" })).toThrow(
      "Invalid JRD_LOG_LEVEL: expected debug|info|warn|error"
    );
  });
});

describe("reloadConfig", () => {
  it("reads the file named by JRD_CONFIG_PATH", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jrd-config-"));
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ serverUrl: "https://jss.example.com", emptyDeviceId: "fail" }));
    vi.stubEnv("JRD_CONFIG_PATH", file);
    vi.stubEnv("JRD_SERVER_URL", "");

    try {
      const config = reloadConfig();
      expect(config.serverUrl).toBe("https://jss.example.com");
      expect(config.emptyDeviceId).toBe("fail");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("fails when JRD_CONFIG_PATH points at a missing file", () => {
    vi.stubEnv("JRD_CONFIG_PATH", path.join(os.tmpdir(), "jrd-missing", "config.json"));

    expect(() => reloadConfig()).toThrow();
  });
});
