import type { ConfigTable, DeviceTablePort } from "../../src/ports/config/DeviceTablePort";
import type { HostResolverPort } from "../../src/ports/net/HostResolverPort";
import type { ConfigError } from "../../src/shared/errors";
import { err, ok, type Result } from "../../src/shared/result";

export class FakeTable implements DeviceTablePort {
  loads = 0;

  private constructor(private readonly result: Result<ConfigTable, ConfigError>) {}

  static of(table: ConfigTable): FakeTable {
    return new FakeTable(ok(table));
  }

  static failing(error: ConfigError): FakeTable {
    return new FakeTable(err(error));
  }

  async load(): Promise<Result<ConfigTable, ConfigError>> {
    this.loads += 1;
    return this.result;
  }
}

/** Resolves through a fixed alias map; unknown names come back unchanged. */
export class FakeResolver implements HostResolverPort {
  seen: string[] = [];

  constructor(private readonly names: Record<string, string> = {}) {}

  async canonicalize(host: string): Promise<string> {
    this.seen.push(host);
    return this.names[host] ?? host;
  }
}
