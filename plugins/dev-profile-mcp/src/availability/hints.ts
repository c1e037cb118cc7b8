import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../logger.js";

const HintEntrySchema = z.object({
  default: z.string().min(1).optional(),
  darwin: z.string().min(1).optional(),
  linux: z.string().min(1).optional(),
  win32: z.string().min(1).optional(),
});

const HintFileSchema = z.record(z.string(), HintEntrySchema);

/** Per-platform install commands for one executable. */
export type InstallHintEntry = z.infer<typeof HintEntrySchema>;

/** Anything that can suggest an install command for a missing executable. */
export interface InstallHintSource {
  hintFor(name: string): string | undefined;
}

export class InstallHintCatalog implements InstallHintSource {
  private readonly entries = new Map<string, InstallHintEntry>();

  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    entries: Record<string, InstallHintEntry> = {},
  ) {
    for (const [name, entry] of Object.entries(entries)) this.set(name, entry);
  }

  /** Replace the entry for `name`. */
  set(name: string, entry: InstallHintEntry): void {
    this.entries.set(this.key(name), entry);
  }

  hintFor(name: string): string | undefined {
    const entry = this.entries.get(this.key(name));
    if (!entry) return undefined;
    const forPlatform = this.platform === "darwin" || this.platform === "linux" || this.platform === "win32"
      ? entry[this.platform]
      : undefined;
    return forPlatform ?? entry.default;
  }

  get size(): number {
    return this.entries.size;
  }

  private key(name: string): string {
    const trimmed = name.trim();
    return this.platform === "win32" ? trimmed.toLowerCase() : trimmed;
  }
}

export interface LoadHintsOptions {
  builtinFile: string;
  additionalFiles: string[];
  platform?: NodeJS.Platform;
}

export interface HintLoadResult {
  catalog: InstallHintCatalog;
  /** Files that failed to parse or validate: the rest still load. */
  loadErrors: string[];
}

/** Load the built-in catalog, then each additional file; later files win per name. */
export function loadInstallHints(options: LoadHintsOptions): HintLoadResult {
  const catalog = new InstallHintCatalog(options.platform);
  const errors: string[] = [];

  for (const file of [options.builtinFile, ...options.additionalFiles]) {
    if (!existsSync(file)) {
      if (file !== options.builtinFile) errors.push(`${basename(file)}: file not found`);
      continue;
    }
    try {
      const parsed = HintFileSchema.safeParse(parseYaml(readFileSync(file, "utf-8")) ?? {});
      if (!parsed.success) {
        errors.push(`${basename(file)}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
        continue;
      }
      for (const [name, entry] of Object.entries(parsed.data)) catalog.set(name, entry);
    } catch (err) {
      errors.push(`${basename(file)}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (errors.length > 0) logger.warn({ errors }, "Some install hint files could not be loaded");
  logger.debug({ hints: catalog.size }, "Install hints loaded");
  return { catalog, loadErrors: errors };
}
