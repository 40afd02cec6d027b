export interface HostResolverPort {
  /** Returns the fully-qualified name for `host`, or `host` itself when none is known. */
  canonicalize(host: string): Promise<string>;
}
