// Fragment loader: decides which tool families register, in dependency order.
// Structural problems (unknown dependency, cycle, duplicate id) throw before anything registers.
// Missing commands never throw: conditional mode skips the fragment, always mode registers it degraded.
import type { ProfileContext } from "../tools/context.js";
import type { RegistrationMode } from "../types/config.js";
import { ProfileError, ProfileErrorCode } from "../errors.js";
import { logger } from "../logger.js";
import { FragmentScope } from "./scope.js";
import type { Fragment, FragmentReport, FragmentStatus } from "./types.js";

export interface LoadFragmentsOptions {
  mode: RegistrationMode;
  disabled?: readonly string[];
}

const ACTIVE: ReadonlySet<FragmentStatus> = new Set(["loaded", "degraded", "already_loaded"]);

/**
 * Order fragments so each comes after its dependencies; otherwise keep declaration order.
 * `preloaded` ids satisfy dependencies without being in `fragments`.
 */
export function orderFragments(fragments: readonly Fragment[], preloaded: ReadonlySet<string> = new Set()): Fragment[] {
  const byId = new Map<string, Fragment>();
  for (const f of fragments) {
    if (byId.has(f.id)) {
      throw new ProfileError(ProfileErrorCode.DUPLICATE_FRAGMENT, `Fragment '${f.id}' is declared more than once`, { fragment: f.id });
    }
    byId.set(f.id, f);
  }

  const ordered: Fragment[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (fragment: Fragment, trail: string[]): void => {
    const current = state.get(fragment.id);
    if (current === "done") return;
    if (current === "visiting") {
      const cycle = [...trail.slice(trail.indexOf(fragment.id)), fragment.id];
      throw new ProfileError(ProfileErrorCode.FRAGMENT_CYCLE, `Fragment dependency cycle: ${cycle.join(" -> ")}`, { cycle });
    }
    state.set(fragment.id, "visiting");
    for (const depId of fragment.dependsOn ?? []) {
      const dep = byId.get(depId);
      if (dep) {
        visit(dep, [...trail, fragment.id]);
      } else if (!preloaded.has(depId)) {
        throw new ProfileError(
          ProfileErrorCode.FRAGMENT_NOT_FOUND,
          `Fragment '${fragment.id}' depends on unknown fragment '${depId}'`,
          { fragment: fragment.id, dependency: depId },
        );
      }
    }
    state.set(fragment.id, "done");
    ordered.push(fragment);
  };

  for (const f of fragments) visit(f, []);
  return ordered;
}

/** Every command a fragment names: required, alternative and optional. */
export function commandsOf(fragment: Fragment): string[] {
  return [...fragment.requires, ...(fragment.anyOf ?? []), ...(fragment.optional ?? [])];
}

/**
 * Evaluate and register fragments against the context.
 * Returns one report per input fragment in load order; ctx.fragmentReports keeps the latest report per id.
 */
export function loadFragments(fragments: readonly Fragment[], ctx: ProfileContext, options: LoadFragmentsOptions): FragmentReport[] {
  const previous = new Map<string, FragmentReport>();
  for (const r of ctx.fragmentReports) previous.set(r.id, r);
  const preloaded = new Set([...previous.values()].filter((r) => ACTIVE.has(r.status)).map((r) => r.id));

  const ordered = orderFragments(fragments, preloaded);
  const disabled = new Set(options.disabled ?? []);
  const statusById = new Map<string, FragmentStatus>();
  for (const [id, r] of previous) statusById.set(id, r.status);

  const reports: FragmentReport[] = [];
  for (const fragment of ordered) {
    for (const cmd of commandsOf(fragment)) ctx.knownCommands.add(cmd);
    const report = evaluate(fragment, ctx, options.mode, disabled, preloaded, statusById);
    statusById.set(fragment.id, report.status);
    reports.push(report);
    if (report.status !== "already_loaded") recordReport(ctx, report);
  }

  const counts: Record<string, number> = {};
  for (const r of reports) counts[r.status] = (counts[r.status] ?? 0) + 1;
  logger.info({ mode: options.mode, ...counts }, "Fragments evaluated");
  return reports;
}

function recordReport(ctx: ProfileContext, report: FragmentReport): void {
  const idx = ctx.fragmentReports.findIndex((r) => r.id === report.id);
  if (idx >= 0) ctx.fragmentReports[idx] = report;
  else ctx.fragmentReports.push(report);
}

function evaluate(
  fragment: Fragment,
  ctx: ProfileContext,
  mode: RegistrationMode,
  disabled: ReadonlySet<string>,
  preloaded: ReadonlySet<string>,
  statusById: ReadonlyMap<string, FragmentStatus>,
): FragmentReport {
  const base = { id: fragment.id, missing: [], hints: {}, tools: [] };

  if (preloaded.has(fragment.id)) {
    return { ...base, status: "already_loaded", tools: ctx.registry.namesFor(fragment.id) };
  }
  if (disabled.has(fragment.id)) {
    logger.debug({ fragment: fragment.id }, "Fragment disabled by config");
    return { ...base, status: "disabled" };
  }

  const inactiveDeps = (fragment.dependsOn ?? []).filter((d) => {
    const s = statusById.get(d);
    return s === undefined || !ACTIVE.has(s);
  });
  if (inactiveDeps.length > 0) {
    return { ...base, status: "dependency_missing", reason: `Requires fragment(s) not loaded: ${inactiveDeps.join(", ")}` };
  }

  const missing = fragment.requires.filter((c) => !ctx.availability.isAvailable(c));
  const alternatives = fragment.anyOf ?? [];
  if (alternatives.length > 0 && !alternatives.some((c) => ctx.availability.isAvailable(c))) {
    missing.push(...alternatives);
  }

  const hints: Record<string, string> = {};
  for (const cmd of missing) {
    const hint = ctx.availability.lookup(cmd).installHint;
    if (hint) hints[cmd] = hint;
  }

  if (missing.length > 0 && mode === "conditional") {
    logger.info({ fragment: fragment.id, missing }, "Fragment skipped; commands unavailable");
    return { ...base, status: "skipped", missing, hints };
  }

  const scope = new FragmentScope(ctx, fragment, mode);
  fragment.register(ctx, scope);
  if (missing.length > 0) {
    logger.warn({ fragment: fragment.id, missing }, "Fragment registered without its commands; wrappers will report them unavailable");
  }
  return { ...base, status: missing.length > 0 ? "degraded" : "loaded", missing, hints, tools: scope.tools };
}
