import { loadDeviceTable } from "../../config";
import type { ConfigTable, DeviceTablePort } from "../../ports/config/DeviceTablePort";
import type { ConfigError } from "../../shared/errors";
import type { Result } from "../../shared/result";

/** Reads the table file on first use and keeps the outcome for the rest of the run. */
export class FileDeviceTable implements DeviceTablePort {
  private cached: Result<ConfigTable, ConfigError> | null = null;

  constructor(
    readonly path: string,
    private readonly read: (tablePath: string) => Result<ConfigTable, ConfigError> = loadDeviceTable
  ) {}

  async load(): Promise<Result<ConfigTable, ConfigError>> {
    if (!this.cached) {
      this.cached = this.read(this.path);
    }
    return this.cached;
  }
}
