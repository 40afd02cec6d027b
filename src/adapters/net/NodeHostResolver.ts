import { promises as dns } from "dns";
import type { HostResolverPort } from "../../ports/net/HostResolverPort";
import { silentLogger, type LoggerPort } from "../../ports/sys/LoggerPort";

export interface DnsLookups {
  lookup(host: string): Promise<{ address: string }>;
  lookupService(address: string, port: number): Promise<{ hostname: string }>;
}

const nodeDns: DnsLookups = {
  lookup: (host) => dns.lookup(host),
  lookupService: (address, port) => dns.lookupService(address, port),
};

/**
 * Canonicalises through the system resolver (hosts file, then DNS): forward
 * lookup to an address, reverse lookup back to a name. Only a dotted name is
 * accepted as fully qualified; anything else leaves the host as given.
 */
export class NodeHostResolver implements HostResolverPort {
  constructor(
    private readonly lookups: DnsLookups = nodeDns,
    private readonly log: LoggerPort = silentLogger
  ) {}

  async canonicalize(host: string): Promise<string> {
    try {
      const { address } = await this.lookups.lookup(host);
      const { hostname } = await this.lookups.lookupService(address, 0);
      if (hostname.includes(".")) return hostname;
      this.log.debug("Resolver returned an unqualified name", { host, hostname });
    } catch (error) {
      this.log.debug("Host name resolution unavailable", {
        host,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return host;
  }
}
