import type { Result } from "../../shared/result";
import type { ConfigError } from "../../shared/errors";

export type DeviceCredentials = readonly [deviceId: string, deviceKey: string];
export type ConfigTable = Readonly<Record<string, DeviceCredentials>>;

export interface DeviceTablePort {
  load(): Promise<Result<ConfigTable, ConfigError>>;
}
