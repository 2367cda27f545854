import fs from "fs";
import path from "path";
import { getProjectRootDir } from "./config.js";
import { isRecord } from "./utils.js";

/**
 * Minimal subset of `package.json` metadata that we treat as authoritative at runtime.
 */
export interface PackageMeta {
  name: string;
  version: string;
}

/**
 * Load name and version from `package.json`, so `--version` and the MCP server
 * info always reflect the installed build.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): PackageMeta {
  const packageJsonPath = path.join(getProjectRootDir(), "package.json");

  const raw = fs.readFileSync(packageJsonPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const name = parsed.name;
  const version = parsed.version;

  if (typeof name !== "string" || name.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string name at ${packageJsonPath}`);
  }
  if (typeof version !== "string" || version.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string version at ${packageJsonPath}`);
  }

  return { name, version };
}
