// PATH probe: the only code that touches the filesystem to answer "is X installed".
// Mirrors the host's executable search: PATH order, PATHEXT on Windows, execute bit elsewhere.
// Every failure on a candidate is a miss; probe() never throws.
import { accessSync, constants, statSync } from "node:fs";
import path from "node:path";
import type { CommandProbe, ProbeResult } from "../types/availability.js";
import { logger } from "../logger.js";

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/** Filesystem view used to test a candidate path. */
export interface ExecutableLookup {
  isExecutable(candidate: string, platform: NodeJS.Platform): boolean;
}

/** Stat-based lookup: a regular file, with the execute bit off Windows. */
export const nodeExecutableLookup: ExecutableLookup = {
  isExecutable(candidate, platform) {
    try {
      if (!statSync(candidate).isFile()) return false;
      if (platform !== "win32") accessSync(candidate, constants.X_OK);
      return true;
    } catch (err) {
      // ENOENT is the common case; EACCES on a PATH directory lands here too
      logger.trace({ candidate, error: err instanceof Error ? err.message : String(err) }, "Probe candidate rejected");
      return false;
    }
  },
};

export interface PathProbeOptions {
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  /** Directories searched after PATH. */
  extraPaths?: string[];
  fileSystem?: ExecutableLookup;
}

export class PathProbe implements CommandProbe {
  private readonly env: Record<string, string | undefined>;
  private readonly platform: NodeJS.Platform;
  private readonly extraPaths: string[];
  private readonly fileSystem: ExecutableLookup;

  constructor(options: PathProbeOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.extraPaths = options.extraPaths ?? [];
    this.fileSystem = options.fileSystem ?? nodeExecutableLookup;
  }

  probe(name: string): ProbeResult {
    try {
      for (const candidate of this.candidates(name)) {
        if (this.fileSystem.isExecutable(candidate, this.platform)) {
          return { found: true, path: candidate };
        }
      }
    } catch (err) {
      logger.debug({ name, error: err instanceof Error ? err.message : String(err) }, "Probe failed; treating as unavailable");
    }
    return { found: false, path: null };
  }

  /** Ordered list of full paths to test for `name`. */
  candidates(name: string): string[] {
    const isWindows = this.platform === "win32";
    const pathApi = isWindows ? path.win32 : path.posix;
    const names = this.namesWithExtensions(name);

    // A name with a separator is a path, not a PATH search
    if (name.includes("/") || (isWindows && name.includes("\\"))) {
      return names;
    }

    const result: string[] = [];
    for (const dir of this.searchDirs()) {
      for (const n of names) result.push(pathApi.join(dir, n));
    }
    return result;
  }

  /** PATH entries followed by extra paths, deduplicated, in search order. */
  searchDirs(): string[] {
    const isWindows = this.platform === "win32";
    const raw = this.readEnv("PATH") ?? "";
    const seen = new Set<string>();
    const dirs: string[] = [];

    for (const entry of [...raw.split(isWindows ? ";" : ":"), ...this.extraPaths]) {
      let dir = entry.trim();
      if (isWindows) dir = dir.replace(/^"(.*)"$/, "$1");
      if (!dir) continue;
      const key = isWindows ? dir.toLowerCase() : dir;
      if (seen.has(key)) continue;
      seen.add(key);
      dirs.push(dir);
    }
    return dirs;
  }

  private namesWithExtensions(name: string): string[] {
    if (this.platform !== "win32") return [name];

    const exts = (this.readEnv("PATHEXT") ?? DEFAULT_PATHEXT)
      .split(";")
      .map((e) => e.trim())
      .filter(Boolean);
    const lower = name.toLowerCase();
    const hasKnownExt = exts.some((e) => lower.endsWith(e.toLowerCase()));
    const withExts = exts.map((e) => name + e);
    return hasKnownExt ? [name, ...withExts] : withExts;
  }

  /** Windows environment names are case-insensitive (`Path`, `PATH`). */
  private readEnv(key: string): string | undefined {
    if (this.platform !== "win32") return this.env[key];
    const match = Object.keys(this.env).find((k) => k.toUpperCase() === key);
    return match === undefined ? undefined : this.env[match];
  }
}
