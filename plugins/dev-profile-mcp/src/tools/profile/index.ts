import { z } from "zod";
import type { ProfileContext } from "../context.js";
import type { CommandAvailabilityRecord } from "../../types/availability.js";
import { registerTool, success } from "../helpers.js";

const MODULE = "profile";

function toView(record: CommandAvailabilityRecord): Record<string, unknown> {
  return {
    name: record.name,
    available: record.available,
    source: record.source,
    path: record.path,
    resolved_at: new Date(record.resolvedAt).toISOString(),
    ...(record.installHint ? { install_hint: record.installHint } : {}),
  };
}

/** Re-apply overrides pinned in config.yaml after an invalidation cleared them. */
export function applyPinnedOverrides(ctx: ProfileContext, only?: string): void {
  const target = only === undefined ? undefined : ctx.availability.normalize(only);
  for (const [name, available] of Object.entries(ctx.config.availability.overrides)) {
    if (target === undefined || ctx.availability.normalize(name) === target) ctx.availability.setOverride(name, available);
  }
}

export function registerProfileTools(ctx: ProfileContext): void {
  registerTool(ctx, {
    name: "profile_command_check",
    description: "Check whether commands are installed and on PATH. Answers are cached; unavailable commands include an install hint when one is known.",
    module: MODULE,
    duration: "instant",
    inputSchema: z.object({
      names: z.array(z.string().min(1)).min(1).describe("Executable names, e.g. [\"docker\", \"kubectl\"]"),
    }),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const records = args.names.map((n) => toView(ctx.availability.lookup(n)));
    const available = records.filter((r) => r.available === true).length;
    return success("profile_command_check", 0, null, { commands: records }, {
      total: records.length,
      summary: `${available} of ${records.length} available`,
    });
  });

  registerTool(ctx, {
    name: "profile_cache_invalidate",
    description: "Forget cached availability for one command, or for all commands when name is omitted. Use after installing or removing a tool. Overrides pinned in config are re-applied.",
    module: MODULE,
    duration: "instant",
    inputSchema: z.object({
      name: z.string().min(1).optional().describe("Command to forget; omit to clear the whole cache"),
    }),
    annotations: { idempotentHint: true },
  }, async (args) => {
    if (args.name !== undefined) {
      ctx.availability.invalidate(args.name);
      applyPinnedOverrides(ctx, args.name);
    } else {
      ctx.availability.invalidateAll();
      applyPinnedOverrides(ctx);
    }
    return success("profile_cache_invalidate", 0, null, {
      invalidated: args.name ?? "all",
      cached_entries: ctx.availability.size,
    });
  });

  registerTool(ctx, {
    name: "profile_cache_override",
    description: "Force a command to be reported available or unavailable for the rest of the session, without probing PATH. Cleared by profile_cache_invalidate.",
    module: MODULE,
    duration: "instant",
    inputSchema: z.object({
      name: z.string().min(1),
      available: z.boolean(),
    }),
    annotations: { idempotentHint: true },
  }, async (args) => {
    ctx.availability.setOverride(args.name, args.available);
    return success("profile_cache_override", 0, null, toView(ctx.availability.lookup(args.name)));
  });

  registerTool(ctx, {
    name: "profile_cache_snapshot",
    description: "Every cached availability answer, sorted by command name.",
    module: MODULE,
    duration: "instant",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const records = ctx.availability.snapshot().map(toView);
    return success("profile_cache_snapshot", 0, null, { commands: records }, { total: records.length });
  });

  registerTool(ctx, {
    name: "profile_fragments",
    description: "Which tool fragments loaded at startup, which were skipped or degraded, and the commands they were missing.",
    module: MODULE,
    duration: "instant",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const fragments = ctx.fragmentReports.map((r) => ({
      id: r.id,
      status: r.status,
      tools: r.tools.length,
      ...(r.missing.length ? { missing: r.missing, install_hints: r.hints } : {}),
      ...(r.reason ? { reason: r.reason } : {}),
    }));
    return success("profile_fragments", 0, null, {
      registration_mode: ctx.config.registration.mode,
      fragments,
      tools_registered: ctx.registry.size,
    }, { total: fragments.length });
  });

  registerTool(ctx, {
    name: "profile_doctor",
    description: "Health report: availability of every command any fragment uses, install hints for the missing ones, and configuration load problems. Call this first in a session.",
    module: MODULE,
    duration: "quick",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async () => {
    const names = [...ctx.knownCommands].sort((a, b) => a.localeCompare(b));
    const records = names.map((n) => ctx.availability.lookup(n));
    const missing = records.filter((r) => !r.available);

    const data: Record<string, unknown> = {
      config_path: ctx.configPath,
      registration_mode: ctx.config.registration.mode,
      available: records.filter((r) => r.available).map((r) => r.name),
      missing: missing.map(toView),
      tools_registered: ctx.registry.size,
    };
    if (ctx.loadErrors.length > 0) data.load_errors = ctx.loadErrors;
    if (ctx.firstRun) data.setup = { first_run: true, message: `Default configuration written to ${ctx.configPath}` };

    return success("profile_doctor", 0, null, data, {
      total: records.length,
      summary: `${records.length - missing.length} of ${records.length} commands available`,
    });
  });
}
