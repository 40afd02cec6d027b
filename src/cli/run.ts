import yargs from "yargs";
import { DeviceController } from "../app/DeviceController";
import { resolveIdentity } from "../app/ConfigResolver";
import type { DeviceState } from "../domain/device/DeviceState";
import type { DeviceTablePort } from "../ports/config/DeviceTablePort";
import type { OutletTransportFactory } from "../ports/devices/OutletTransportPort";
import type { HostResolverPort } from "../ports/net/HostResolverPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ExitCode, describeError, exitCodeFor, type ApbError, type DeviceError } from "../shared/errors";
import type { Result } from "../shared/result";
import { VERSION } from "../version";
import { COMMAND_CHOICES, DEFAULT_COMMAND, parseCommand, type Command } from "./commands";

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDefaults {
  configPath: string;
  verbose: boolean;
}

export interface CliRuntime {
  io: CliIO;
  defaults: CliDefaults;
  createLogger(verbose: boolean): LoggerPort;
  createTable(configPath: string): DeviceTablePort;
  createResolver(logger: LoggerPort): HostResolverPort;
  createTransport(logger: LoggerPort): OutletTransportFactory;
}

export interface CliOptions {
  host?: string;
  command: Command;
  id?: string;
  key?: string;
  config: string;
  verbose: boolean;
  version: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function buildParser(args: readonly string[], defaults: CliDefaults) {
  return yargs([...args])
    .scriptName("apb")
    .usage("$0 [options] [host] [command]")
    .command("$0 [host] [cmd]", "Query or switch a smart power board", (y) =>
      y
        .positional("host", { type: "string", describe: "hostname or IP number of the device" })
        .positional("cmd", {
          type: "string",
          choices: COMMAND_CHOICES,
          default: DEFAULT_COMMAND,
          describe: "on|1, off|0, toggle|t or state|s|status",
        })
    )
    .option("id", { alias: "d", type: "string", describe: "device id" })
    .option("key", { alias: "k", type: "string", describe: "device key" })
    .option("config", {
      alias: "f",
      type: "string",
      default: defaults.configPath,
      describe: "path to JSON device table (host -> [id, key])",
    })
    .option("verbose", { type: "boolean", default: defaults.verbose, describe: "log debug output to stderr" })
    .option("version", { alias: "v", type: "boolean", default: false, describe: "show version number and exit" })
    .option("help", { alias: "h", type: "boolean", default: false, describe: "show help and exit" })
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw new UsageError(message || error?.message || "invalid arguments");
    });
}

export function parseArgs(args: readonly string[], defaults: CliDefaults): CliOptions {
  const argv = buildParser(args, defaults).parseSync();
  const host = typeof argv.host === "string" ? argv.host : undefined;
  if (host !== undefined && host.trim() === "") {
    throw new UsageError("host must not be blank");
  }
  const token = typeof argv.cmd === "string" ? argv.cmd : DEFAULT_COMMAND;
  const command = parseCommand(token);
  if (!command) {
    throw new UsageError(`invalid command: ${token}`);
  }
  return {
    host,
    command,
    id: argv.id,
    key: argv.key,
    config: argv.config ?? defaults.configPath,
    verbose: argv.verbose ?? defaults.verbose,
    version: argv.version ?? false,
    help: argv.help ?? false,
  };
}

function helpText(defaults: CliDefaults): Promise<string> {
  return buildParser([], defaults).getHelp();
}

async function perform(
  controller: DeviceController,
  command: Command,
  io: CliIO
): Promise<Result<unknown, DeviceError>> {
  switch (command) {
    case "on":
      return controller.turnOn();
    case "off":
      return controller.turnOff();
    case "toggle":
      return controller.toggle();
    case "state": {
      const state: Result<DeviceState, DeviceError> = await controller.getState();
      if (state.ok) io.out(String(state.value));
      return state;
    }
  }
}

function failWith(io: CliIO, error: ApbError): ExitCode {
  io.err(`ERROR: ${describeError(error)}`);
  return exitCodeFor(error);
}

/** Runs one invocation and returns the process exit code. */
export async function runCli(args: readonly string[], runtime: CliRuntime): Promise<ExitCode> {
  const { io, defaults } = runtime;

  let options: CliOptions;
  try {
    options = parseArgs(args, defaults);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`ERROR: ${error.message}`);
    return ExitCode.Usage;
  }

  if (options.version) {
    io.out(VERSION);
    return ExitCode.Success;
  }
  if (options.help || !options.host) {
    io.out(await helpText(defaults));
    return ExitCode.Success;
  }

  const logger = runtime.createLogger(options.verbose);
  const resolved = await resolveIdentity(
    { host: options.host, explicitId: options.id, explicitKey: options.key },
    {
      table: runtime.createTable(options.config),
      resolver: runtime.createResolver(logger),
      logger,
    }
  );
  if (!resolved.ok) return failWith(io, resolved.error);

  const controller = new DeviceController(resolved.value, runtime.createTransport(logger), { logger });
  logger.debug("Sending command", { host: options.host, command: options.command });
  const outcome = await perform(controller, options.command, io);
  if (!outcome.ok) return failWith(io, outcome.error);
  return ExitCode.Success;
}
