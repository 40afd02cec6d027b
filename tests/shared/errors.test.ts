import {
  ExitCode,
  configNotFound,
  configParseError,
  describeError,
  deviceError,
  exitCodeFor,
  unknownHost,
} from "../../src/shared/errors";

describe("error taxonomy", () => {
  test("maps each failure kind to its exit code", () => {
    expect(exitCodeFor(configParseError("/etc/apb/apb.json", "bad"))).toBe(1);
    expect(exitCodeFor(configNotFound("/etc/apb/apb.json"))).toBe(2);
    expect(exitCodeFor(unknownHost("ghost"))).toBe(2);
    expect(exitCodeFor(deviceError("902", "Timeout Waiting for Device"))).toBe(3);
  });

  test("success and usage codes", () => {
    expect(ExitCode.Success).toBe(0);
    expect(ExitCode.Usage).toBe(2);
  });

  test("describes each failure on one line", () => {
    expect(describeError(configParseError("/etc/apb/apb.json", "Unexpected end of JSON input"))).toBe(
      "In config file /etc/apb/apb.json: Unexpected end of JSON input"
    );
    expect(describeError(configNotFound("/etc/apb/apb.json"))).toBe("No such file or directory: '/etc/apb/apb.json'");
    expect(describeError(unknownHost("ghost"))).toBe(
      "no entry in device table for host/ip: ghost; specify --key and --id for this host"
    );
    expect(describeError(deviceError("902", "Timeout Waiting for Device"))).toBe("902: Timeout Waiting for Device");
  });
});
