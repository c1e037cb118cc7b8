import type { z } from "zod";
import type { ProfileContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import type { Command } from "../types/command.js";
import type { DurationCategory } from "../types/duration.js";
import { DURATION_TIMEOUTS } from "../types/duration.js";
import type { ExecResult } from "../execution/executor.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, durationMs: number, commandExecuted: string | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, duration_ms: durationMs, command_executed: commandExecuted, data, ...extra };
}

export function error(tool: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[]; commandExecuted?: string | null; exitCode?: number }): ErrorResponse {
  return {
    status: "error", tool, duration_ms: durationMs, command_executed: opts.commandExecuted ?? null,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
    ...(opts.exitCode !== undefined ? { exit_code: opts.exitCode } : {}),
  };
}

// ── Execution Helpers ──────────────────────────────────────────────

/** Timeout for a duration category, capped by execution.timeout_ceiling_seconds when set. */
export function timeoutFor(ctx: ProfileContext, duration: DurationCategory): number {
  const ceiling = ctx.config.execution.timeout_ceiling_seconds;
  return ceiling > 0 ? Math.min(DURATION_TIMEOUTS[duration], ceiling * 1000) : DURATION_TIMEOUTS[duration];
}

/** Execute a Command through the context's executor. */
export async function executeCommand(ctx: ProfileContext, command: Command, duration: DurationCategory): Promise<ExecResult> {
  return ctx.executor.execute(command, timeoutFor(ctx, duration));
}

/** Render argv for display in command_executed. Arguments with whitespace are quoted. */
export function formatArgv(argv: readonly string[]): string {
  return argv.map((a) => (a === "" || /[\s"']/.test(a) ? JSON.stringify(a) : a)).join(" ");
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool on the context's registry with less boilerplate.
 * Arguments are parsed with the tool's own schema before the handler sees them.
 */
export function registerTool<T extends z.AnyZodObject>(
  ctx: ProfileContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { inputSchema: T },
  handler: (args: z.infer<T>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (args) => {
      const parsed = metadata.inputSchema.safeParse(args);
      if (!parsed.success) {
        return error(metadata.name, 0, {
          code: "INVALID_ARGUMENTS",
          category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; "),
        });
      }
      return handler(parsed.data);
    },
  });
}
