// Context assembly: builds every long-lived component from config and wires them together.
// server.ts calls this once; tests call it with a fake probe and executor.
import { join } from "node:path";
import type { ProfileConfig } from "./types/config.js";
import type { CommandProbe } from "./types/availability.js";
import { CommandAvailabilityCache } from "./availability/cache.js";
import { PathProbe } from "./availability/probe.js";
import { loadInstallHints } from "./availability/hints.js";
import type { InstallHintSource } from "./availability/hints.js";
import { LocalExecutor } from "./execution/executor.js";
import type { Executor } from "./execution/executor.js";
import { ToolRegistry } from "./tools/registry.js";
import type { ProfileContext } from "./tools/context.js";
import { registerProfileTools, applyPinnedOverrides } from "./tools/profile/index.js";
import { loadFragments } from "./fragments/loader.js";
import type { Fragment, FragmentReport } from "./fragments/types.js";

export const DEFAULT_KNOWLEDGE_DIR = join(__dirname, "..", "knowledge");

export interface ProfileContextOptions {
  config: ProfileConfig;
  configPath: string;
  firstRun?: boolean;
  configErrors?: readonly string[];
  platform?: NodeJS.Platform;
  env?: Record<string, string | undefined>;
  knowledgeDir?: string;
  probe?: CommandProbe;
  hints?: InstallHintSource;
  executor?: Executor;
  clock?: () => number;
}

export function createProfileContext(options: ProfileContextOptions): ProfileContext {
  const { config } = options;
  const platform = options.platform ?? process.platform;
  const loadErrors = [...(options.configErrors ?? [])];

  let hints = options.hints;
  if (!hints) {
    const loaded = loadInstallHints({
      builtinFile: join(options.knowledgeDir ?? DEFAULT_KNOWLEDGE_DIR, "install-hints.yaml"),
      additionalFiles: config.install_hints.additional_files,
      platform,
    });
    hints = loaded.catalog;
    loadErrors.push(...loaded.loadErrors);
  }

  const probe = options.probe ?? new PathProbe({ env: options.env, platform, extraPaths: config.availability.extra_paths });
  const availability = new CommandAvailabilityCache({
    probe,
    hints,
    ttlMs: config.availability.ttl_seconds * 1000,
    clock: options.clock,
    caseInsensitive: platform === "win32",
  });

  return {
    config,
    availability,
    executor: options.executor ?? new LocalExecutor(config.execution.max_output_kb * 1024),
    registry: new ToolRegistry(),
    fragmentReports: [],
    knownCommands: new Set(),
    configPath: options.configPath,
    firstRun: options.firstRun ?? false,
    loadErrors,
  };
}

/** Pin configured overrides, register the profile tools, then load fragments. */
export function initializeProfile(ctx: ProfileContext, fragments: readonly Fragment[]): FragmentReport[] {
  applyPinnedOverrides(ctx);
  registerProfileTools(ctx);
  return loadFragments(fragments, ctx, {
    mode: ctx.config.registration.mode,
    disabled: ctx.config.fragments.disabled,
  });
}
