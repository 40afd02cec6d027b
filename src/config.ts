import fs from "fs";
import path from "path";
import type { ConfigTable, DeviceCredentials } from "./ports/config/DeviceTablePort";
import { configNotFound, configParseError, type ConfigError } from "./shared/errors";
import { err, ok, type Result } from "./shared/result";

export const DEVICE_TABLE_FILENAME = "apb.json";

/**
 * `/etc/apb/apb.json` on POSIX systems, `%ProgramData%\apb\apb.json` on Windows.
 */
export function defaultDeviceTablePath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === "win32") {
    const base = env.ProgramData || "C:\\ProgramData";
    return path.win32.join(base, "apb", DEVICE_TABLE_FILENAME);
  }
  return path.posix.join("/etc/apb", DEVICE_TABLE_FILENAME);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isCredentials(value: unknown): value is DeviceCredentials {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((part) => typeof part === "string" && part.length > 0)
  );
}

/**
 * Reads the device table: a JSON object mapping a host's FQDN or IP to
 * `[deviceId, deviceKey]`, e.g.
 *
 *   { "apb0.home.example": ["dev123", "key456"] }
 */
export function loadDeviceTable(tablePath: string): Result<ConfigTable, ConfigError> {
  const resolved = path.resolve(tablePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf8");
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") return err(configNotFound(tablePath));
    return err(configParseError(tablePath, error instanceof Error ? error.message : String(error)));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return err(configParseError(tablePath, error instanceof Error ? error.message : String(error)));
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return err(configParseError(tablePath, "expected an object mapping host to [id, key]"));
  }

  const table: Record<string, DeviceCredentials> = {};
  for (const [host, value] of Object.entries(parsed)) {
    if (!isCredentials(value)) {
      return err(configParseError(tablePath, `entry for "${host}" must be [deviceId, deviceKey]`));
    }
    table[host] = [value[0], value[1]];
  }
  return ok(Object.freeze(table));
}
