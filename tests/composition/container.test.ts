jest.mock("dotenv", () => ({ config: jest.fn() }));

import { FileDeviceTable } from "../../src/adapters/config/FileDeviceTable";
import { NodeHostResolver } from "../../src/adapters/net/NodeHostResolver";
import { ConsoleLogger } from "../../src/adapters/sys/ConsoleLogger";
import { TuyaOutletTransport } from "../../src/adapters/devices/TuyaOutletTransport";
import { buildRuntime } from "../../src/composition/container";
import { createDeviceIdentity } from "../../src/domain/device/DeviceIdentity";
import { DEFAULT_TRANSPORT_OPTIONS } from "../../src/ports/devices/OutletTransportPort";
import { silentLogger } from "../../src/ports/sys/LoggerPort";
import { DEBUG_MODE, DEVICE_TABLE_PATH } from "../../src/env";

describe("buildRuntime", () => {
  test("wires the production adapters", () => {
    const runtime = buildRuntime();

    expect(runtime.defaults).toEqual({ configPath: DEVICE_TABLE_PATH, verbose: DEBUG_MODE });
    expect(runtime.createLogger(true)).toBeInstanceOf(ConsoleLogger);
    expect(runtime.createResolver(silentLogger)).toBeInstanceOf(NodeHostResolver);

    const devices = runtime.createTable("/srv/apb.json");
    expect(devices).toBeInstanceOf(FileDeviceTable);
    expect(devices).toMatchObject({ path: "/srv/apb.json" });

    const transport = runtime.createTransport(silentLogger)(
      createDeviceIdentity("apb0.home.example", "dev123", "key456"),
      DEFAULT_TRANSPORT_OPTIONS
    );
    expect(transport).toBeInstanceOf(TuyaOutletTransport);
  });

  test("default io writes through the console", () => {
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    const { io } = buildRuntime();

    io.out("1");
    io.err("ERROR: 902: Timeout Waiting for Device");

    expect(logSpy).toHaveBeenCalledWith("1");
    expect(errorSpy).toHaveBeenCalledWith("ERROR: 902: Timeout Waiting for Device");
    jest.restoreAllMocks();
  });

  test("overrides replace individual pieces", () => {
    const createLogger = () => silentLogger;
    const runtime = buildRuntime({ createLogger });
    expect(runtime.createLogger).toBe(createLogger);
    expect(runtime.createTable("/x.json")).toBeInstanceOf(FileDeviceTable);
  });
});
