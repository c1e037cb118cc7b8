/** Where a cached availability answer came from. */
export type AvailabilitySource = "probe" | "override";

/** Cached answer for one command name. */
export interface CommandAvailabilityRecord {
  readonly name: string;
  readonly available: boolean;
  /** Install command for this platform; only set while the command is unavailable. */
  readonly installHint?: string;
  /** Epoch milliseconds at which the answer was produced. */
  readonly resolvedAt: number;
  /** Resolved executable path. Null for misses and overrides. */
  readonly path: string | null;
  readonly source: AvailabilitySource;
}

/** Result of a single executable-resolution probe. */
export interface ProbeResult {
  readonly found: boolean;
  readonly path: string | null;
}

/** Resolves a command name against the host. Implementations must not throw for a miss. */
export interface CommandProbe {
  probe(name: string): ProbeResult;
}
