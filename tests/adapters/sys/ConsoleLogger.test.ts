import { ConsoleLogger } from "../../../src/adapters/sys/ConsoleLogger";

describe("ConsoleLogger", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("debug logs message and meta to stderr when verbose", () => {
    new ConsoleLogger(true).debug("hello", { a: 1 });
    expect(errorSpy).toHaveBeenCalledWith('[apb] DEBUG hello {"a":1}');
  });

  test("debug and info are dropped unless verbose", () => {
    const logger = new ConsoleLogger();
    logger.debug("hidden");
    logger.info("hidden too");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  test("info logs message without meta", () => {
    new ConsoleLogger(true).info("world");
    expect(errorSpy).toHaveBeenCalledWith("[apb] INFO world");
  });

  test("warn is always shown", () => {
    new ConsoleLogger().warn("careful");
    expect(warnSpy).toHaveBeenCalledWith("[apb] WARN careful");
  });

  test("error logs with meta when provided", () => {
    new ConsoleLogger().error("oops", { reason: "bad" });
    expect(errorSpy).toHaveBeenCalledWith('[apb] ERROR oops {"reason":"bad"}');
  });

  test("empty meta is left out", () => {
    new ConsoleLogger().error("oops", {});
    expect(errorSpy).toHaveBeenCalledWith("[apb] ERROR oops");
  });

  test("never writes to stdout", () => {
    const logger = new ConsoleLogger(true);
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(logSpy).not.toHaveBeenCalled();
  });
});
