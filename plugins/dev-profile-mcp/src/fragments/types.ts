import type { ProfileContext } from "../tools/context.js";
import type { FragmentScope } from "./scope.js";

/** One tool family: the commands it needs and the wrapper tools it registers. */
export interface Fragment {
  readonly id: string;
  readonly description: string;
  /** Every tool this fragment registers is named `<prefix>_...`. */
  readonly prefix: string;
  /** All of these must be available. */
  readonly requires: readonly string[];
  /** At least one of these must be available. */
  readonly anyOf?: readonly string[];
  /** Used when present; never blocks loading. */
  readonly optional?: readonly string[];
  /** Fragment ids that must load first. */
  readonly dependsOn?: readonly string[];
  register(ctx: ProfileContext, scope: FragmentScope): void;
}

export type FragmentStatus =
  | "loaded"
  | "degraded"
  | "skipped"
  | "disabled"
  | "dependency_missing"
  | "already_loaded";

export interface FragmentReport {
  readonly id: string;
  readonly status: FragmentStatus;
  /** Commands that were unavailable when the fragment was evaluated. */
  readonly missing: string[];
  /** Install hint per missing command, where one is known. */
  readonly hints: Record<string, string>;
  readonly tools: string[];
  readonly reason?: string;
}
