export interface ConfigParseError {
  kind: "ConfigParseError";
  path: string;
  message: string;
}

export interface ConfigNotFound {
  kind: "ConfigNotFound";
  path: string;
}

export interface UnknownHost {
  kind: "UnknownHost";
  host: string;
}

export interface DeviceError {
  kind: "DeviceError";
  code: string;
  message: string;
}

export type ConfigError = ConfigParseError | ConfigNotFound;
export type ResolveError = ConfigError | UnknownHost;
export type ApbError = ResolveError | DeviceError;

export const ExitCode = {
  Success: 0,
  ConfigParse: 1,
  ConfigMissing: 2,
  Usage: 2,
  Device: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function configParseError(path: string, message: string): ConfigParseError {
  return { kind: "ConfigParseError", path, message };
}

export function configNotFound(path: string): ConfigNotFound {
  return { kind: "ConfigNotFound", path };
}

export function unknownHost(host: string): UnknownHost {
  return { kind: "UnknownHost", host };
}

export function deviceError(code: string, message: string): DeviceError {
  return { kind: "DeviceError", code, message };
}

export function exitCodeFor(error: ApbError): ExitCode {
  switch (error.kind) {
    case "ConfigParseError":
      return ExitCode.ConfigParse;
    case "ConfigNotFound":
    case "UnknownHost":
      return ExitCode.ConfigMissing;
    case "DeviceError":
      return ExitCode.Device;
  }
}

export function describeError(error: ApbError): string {
  switch (error.kind) {
    case "ConfigParseError":
      return `In config file ${error.path}: ${error.message}`;
    case "ConfigNotFound":
      return `No such file or directory: '${error.path}'`;
    case "UnknownHost":
      return `no entry in device table for host/ip: ${error.host}; specify --key and --id for this host`;
    case "DeviceError":
      return `${error.code}: ${error.message}`;
  }
}
