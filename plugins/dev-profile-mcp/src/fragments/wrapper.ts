import { statSync } from "node:fs";
import { z } from "zod";
import type { ProfileContext } from "../tools/context.js";
import type { DurationCategory } from "../types/duration.js";
import type { ToolResponse } from "../types/response.js";
import { success, error, executeCommand, formatArgv } from "../tools/helpers.js";
import { logger } from "../logger.js";
import type { FragmentScope } from "./scope.js";

/** Declarative description of a tool that forwards arguments to an external command. */
export interface WrapperSpec {
  readonly name: string;
  readonly description: string;
  /** Executable, or alternatives tried in order (first available wins). */
  readonly command: string | readonly string[];
  /** Fixed arguments placed before the caller's arguments. */
  readonly baseArgs?: readonly string[];
  readonly duration?: DurationCategory;
  readonly readOnly?: boolean;
  readonly destructive?: boolean;
}

export const wrapperInputSchema = z.object({
  args: z.array(z.string()).optional().default([]).describe("Extra arguments appended after the fixed ones"),
  cwd: z.string().min(1).optional().describe("Working directory for the command"),
});

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/** First available candidate, or null when none is installed. */
export function resolveCommand(ctx: ProfileContext, command: string | readonly string[]): string | null {
  const candidates = typeof command === "string" ? [command] : command;
  return candidates.find((c) => ctx.availability.isAvailable(c)) ?? null;
}

export function registerWrapper(ctx: ProfileContext, scope: FragmentScope, spec: WrapperSpec): void {
  const candidates = typeof spec.command === "string" ? [spec.command] : [...spec.command];
  const duration = spec.duration ?? "normal";

  scope.registerTool({
    name: spec.name,
    description: spec.description,
    duration,
    inputSchema: wrapperInputSchema,
    annotations: {
      readOnlyHint: spec.readOnly ?? false,
      destructiveHint: spec.destructive ?? false,
      openWorldHint: true,
    },
  }, async (args): Promise<ToolResponse> => {
    const cmd = resolveCommand(ctx, candidates);
    if (!cmd) {
      const remediation: string[] = [];
      for (const c of candidates) {
        const hint = ctx.availability.lookup(c).installHint;
        if (hint) remediation.push(`Install ${c}: ${hint}`);
      }
      remediation.push("After installing, run profile_cache_invalidate so the new command is detected");
      return error(spec.name, 0, {
        code: "COMMAND_UNAVAILABLE",
        category: "unavailable",
        message: `${candidates.join(" or ")} is not installed or not on PATH`,
        remediation,
      });
    }

    if (args.cwd !== undefined && !isDirectory(args.cwd)) {
      return error(spec.name, 0, {
        code: "CWD_NOT_FOUND",
        category: "not_found",
        message: `Working directory ${args.cwd} does not exist or is not a directory`,
        remediation: ["Pass an existing directory as cwd, or omit it to use the server's working directory"],
      });
    }

    const argv = [cmd, ...(spec.baseArgs ?? []), ...args.args];
    const shown = formatArgv(argv);
    const r = await executeCommand(ctx, { argv, cwd: args.cwd }, duration);

    if (r.timedOut) {
      return error(spec.name, r.durationMs, {
        code: "COMMAND_TIMEOUT",
        category: "timeout",
        message: `${shown} did not finish in time`,
        remediation: ["Raise execution.timeout_ceiling_seconds or narrow the command"],
        commandExecuted: shown,
      });
    }

    if (r.spawnError !== undefined) {
      // Cached as present but no longer spawnable; re-probe on the next call
      if (!ctx.availability.hasOverride(cmd)) {
        logger.warn({ command: cmd, code: r.spawnError }, "Cached command could not be started; invalidating");
        ctx.availability.invalidate(cmd);
      }
      return error(spec.name, r.durationMs, {
        code: "COMMAND_SPAWN_FAILED",
        category: "unavailable",
        message: `${cmd} could not be started (${r.spawnError})`,
        remediation: ["Check that the command is still installed; run profile_command_check to re-detect it"],
        commandExecuted: shown,
        exitCode: r.exitCode,
      });
    }

    if (r.truncated) {
      return error(spec.name, r.durationMs, {
        code: "OUTPUT_LIMIT_EXCEEDED",
        category: "state",
        message: `${shown} produced more output than execution.max_output_kb allows`,
        remediation: ["Raise execution.max_output_kb or narrow the command"],
        commandExecuted: shown,
        exitCode: r.exitCode,
      });
    }

    if (r.signal) {
      return error(spec.name, r.durationMs, {
        code: "COMMAND_FAILED",
        category: "state",
        message: `${cmd} was killed by ${r.signal}`,
        commandExecuted: shown,
        exitCode: r.exitCode,
      });
    }

    if (r.exitCode !== 0) {
      return error(spec.name, r.durationMs, {
        code: "COMMAND_FAILED",
        category: "state",
        message: r.stderr.trim() || `${cmd} exited with code ${r.exitCode}`,
        commandExecuted: shown,
        exitCode: r.exitCode,
      });
    }

    return success(spec.name, r.durationMs, shown, {
      stdout: r.stdout.trim(),
      ...(r.stderr.trim() ? { stderr: r.stderr.trim() } : {}),
      exit_code: r.exitCode,
    });
  });
}

/** Register several wrappers that share a command. */
export function registerWrappers(ctx: ProfileContext, scope: FragmentScope, command: string | readonly string[], specs: ReadonlyArray<Omit<WrapperSpec, "command">>): void {
  for (const spec of specs) registerWrapper(ctx, scope, { ...spec, command });
}
