// Command availability cache: every fragment and wrapper asks this before touching a tool.
// Answers come from the override table, then a memoized record, then exactly one probe.
// The cache is an explicit object owned by the server context; there is no module-level state.
import type { CommandAvailabilityRecord, CommandProbe } from "../types/availability.js";
import type { InstallHintSource } from "./hints.js";
import { logger } from "../logger.js";

export interface AvailabilityCacheOptions {
  probe: CommandProbe;
  hints?: InstallHintSource;
  /** Records older than this are re-probed. 0 keeps them for the process lifetime. */
  ttlMs?: number;
  clock?: () => number;
  /** Lower-case names before keying (Windows hosts). */
  caseInsensitive?: boolean;
}

/**
 * Memoized answer to "is executable X runnable right now".
 *
 * Entry lifecycle: Unknown → Known on first lookup; `invalidate` returns an entry to Unknown.
 * Overrides are consulted before the cache and never expire; they exist so tests and pinned
 * configuration can simulate a tool being installed or removed without touching PATH.
 */
export class CommandAvailabilityCache {
  private readonly records = new Map<string, CommandAvailabilityRecord>();
  private readonly overrides = new Map<string, boolean>();
  private readonly probe: CommandProbe;
  private readonly hints?: InstallHintSource;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly caseInsensitive: boolean;

  constructor(options: AvailabilityCacheOptions) {
    this.probe = options.probe;
    this.hints = options.hints;
    this.ttlMs = Math.max(0, options.ttlMs ?? 0);
    this.clock = options.clock ?? Date.now;
    this.caseInsensitive = options.caseInsensitive ?? false;
  }

  isAvailable(name: string): boolean {
    return this.lookup(name).available;
  }

  lookup(name: string): CommandAvailabilityRecord {
    const key = this.normalize(name);
    if (!key) {
      return { name: key, available: false, resolvedAt: this.clock(), path: null, source: "probe" };
    }

    const forced = this.overrides.get(key);
    if (forced !== undefined) {
      const existing = this.records.get(key);
      if (existing?.source === "override" && existing.available === forced) return existing;
      return this.store(key, forced, null, "override");
    }

    const cached = this.records.get(key);
    if (cached && cached.source === "probe" && !this.isExpired(cached)) return cached;

    let found = false;
    let resolvedPath: string | null = null;
    try {
      const result = this.probe.probe(key);
      found = result.found;
      resolvedPath = result.found ? result.path : null;
    } catch (err) {
      logger.warn({ command: key, error: err instanceof Error ? err.message : String(err) }, "Availability probe threw; treating as unavailable");
    }
    logger.debug({ command: key, available: found, path: resolvedPath }, "Command probed");
    return this.store(key, found, resolvedPath, "probe");
  }

  /** Forget the cached answer and any override for `name`. */
  invalidate(name: string): void {
    const key = this.normalize(name);
    this.records.delete(key);
    this.overrides.delete(key);
  }

  invalidateAll(): void {
    this.records.clear();
    this.overrides.clear();
  }

  setOverride(name: string, available: boolean): void {
    const key = this.normalize(name);
    if (!key) return;
    this.overrides.set(key, available);
    this.records.delete(key);
  }

  /** Drop only the override; the next lookup probes again. */
  clearOverride(name: string): void {
    const key = this.normalize(name);
    if (this.overrides.delete(key)) this.records.delete(key);
  }

  hasOverride(name: string): boolean {
    return this.overrides.has(this.normalize(name));
  }

  snapshot(): CommandAvailabilityRecord[] {
    return [...this.records.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  get size(): number {
    return this.records.size;
  }

  /** Key a name is stored under: trimmed, and lower-cased when case-insensitive. */
  normalize(name: string): string {
    const trimmed = name.trim();
    return this.caseInsensitive ? trimmed.toLowerCase() : trimmed;
  }

  private store(key: string, available: boolean, resolvedPath: string | null, source: "probe" | "override"): CommandAvailabilityRecord {
    const installHint = available ? undefined : this.hints?.hintFor(key);
    const record: CommandAvailabilityRecord = {
      name: key,
      available,
      resolvedAt: this.clock(),
      path: resolvedPath,
      source,
      ...(installHint ? { installHint } : {}),
    };
    this.records.set(key, record);
    return record;
  }

  private isExpired(record: CommandAvailabilityRecord): boolean {
    return this.ttlMs > 0 && this.clock() - record.resolvedAt >= this.ttlMs;
  }
}
