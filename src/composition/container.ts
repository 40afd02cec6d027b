import { DEBUG_MODE, DEVICE_TABLE_PATH } from "../env";
import { FileDeviceTable } from "../adapters/config/FileDeviceTable";
import { tuyaTransportFactory } from "../adapters/devices/TuyaOutletTransport";
import { NodeHostResolver } from "../adapters/net/NodeHostResolver";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import type { CliRuntime } from "../cli/run";

export function buildRuntime(overrides: Partial<CliRuntime> = {}): CliRuntime {
  return {
    io: {
      out: (text) => console.log(text),
      err: (text) => console.error(text),
    },
    defaults: {
      configPath: DEVICE_TABLE_PATH,
      verbose: DEBUG_MODE,
    },
    createLogger: (verbose) => new ConsoleLogger(verbose),
    createTable: (configPath) => new FileDeviceTable(configPath),
    createResolver: (logger) => new NodeHostResolver(undefined, logger),
    createTransport: (logger) => tuyaTransportFactory(logger),
    ...overrides,
  };
}
