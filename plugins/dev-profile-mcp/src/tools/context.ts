import type { ProfileConfig } from "../types/config.js";
import type { CommandAvailabilityCache } from "../availability/cache.js";
import type { Executor } from "../execution/executor.js";
import type { FragmentReport } from "../fragments/types.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared profile context: the glue between all components.
 * Created once at startup, passed to the profile tools and every fragment.
 */
export interface ProfileContext {
  readonly config: ProfileConfig;
  readonly availability: CommandAvailabilityCache;
  readonly executor: Executor;
  readonly registry: ToolRegistry;
  /** Filled by the fragment loader; read by profile_fragments and profile_doctor. */
  readonly fragmentReports: FragmentReport[];
  /** Every command any known fragment names, for profile_doctor. */
  readonly knownCommands: Set<string>;
  readonly configPath: string;
  readonly firstRun: boolean;
  /** Config and install hint problems found at startup. */
  readonly loadErrors: string[];
}
