import { createDeviceIdentity, type DeviceIdentity } from "../domain/device/DeviceIdentity";
import type { DeviceTablePort } from "../ports/config/DeviceTablePort";
import type { HostResolverPort } from "../ports/net/HostResolverPort";
import { silentLogger, type LoggerPort } from "../ports/sys/LoggerPort";
import { unknownHost, type ResolveError } from "../shared/errors";
import { err, ok, type Result } from "../shared/result";

export interface ResolveRequest {
  host: string;
  explicitId?: string;
  explicitKey?: string;
}

export interface ResolveDeps {
  table: DeviceTablePort;
  resolver: HostResolverPort;
  logger?: LoggerPort;
}

function present(value: string | undefined): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Works out the id/key pair used to address `host`. Values given on the command
 * line win; the device table is only loaded when one of them is missing, and is
 * keyed by the host's fully-qualified name.
 */
export async function resolveIdentity(
  request: ResolveRequest,
  deps: ResolveDeps
): Promise<Result<DeviceIdentity, ResolveError>> {
  const log = deps.logger ?? silentLogger;
  const { host, explicitId, explicitKey } = request;

  if (present(explicitId) && present(explicitKey)) {
    log.debug("Using credentials from command line", { host });
    return ok(createDeviceIdentity(host, explicitId, explicitKey));
  }

  const loaded = await deps.table.load();
  if (!loaded.ok) return loaded;

  const canonical = await deps.resolver.canonicalize(host);
  log.debug("Looking up device table entry", { host, canonical });

  const entry = Object.prototype.hasOwnProperty.call(loaded.value, canonical)
    ? loaded.value[canonical]
    : undefined;
  if (!entry) {
    return err(unknownHost(host));
  }

  const [tableId, tableKey] = entry;
  return ok(
    createDeviceIdentity(
      host,
      present(explicitId) ? explicitId : tableId,
      present(explicitKey) ? explicitKey : tableKey
    )
  );
}
