#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { createProfileContext, initializeProfile } from "./bootstrap.js";
import { BUILTIN_FRAGMENTS } from "./fragments/builtin/index.js";
import type { ToolResponse } from "./types/response.js";

async function main(): Promise<void> {
  logger.info("Starting dev-profile-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun, errors } = loadConfig(process.env.DEV_PROFILE_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Hints, probe, availability cache, executor ───────
  const ctx = createProfileContext({ config, configPath, firstRun, configErrors: errors });

  // ── Phase 3: Profile tools and fragments ──────────────────────
  const reports = initializeProfile(ctx, BUILTIN_FRAGMENTS);
  logger.info({
    toolCount: ctx.registry.size,
    loaded: reports.filter((r) => r.status === "loaded" || r.status === "degraded").map((r) => r.id),
  }, "All fragments evaluated");

  // ── Phase 4: Create MCP server ────────────────────────────────
  const server = new McpServer({
    name: "dev-profile-mcp",
    version: "0.1.0",
  });

  // ── Phase 5: Register tools on MCP server ─────────────────────
  for (const [name, tool] of ctx.registry.getAll()) {
    const meta = tool.metadata;

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputSchema.shape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? false,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        let response: ToolResponse;
        try {
          response = await tool.execute(args);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          response = {
            status: "error",
            tool: name,
            duration_ms: 0,
            command_executed: null,
            error_code: "INTERNAL_ERROR",
            error_category: "state",
            message,
            remediation: ["Check server logs for details"],
          };
        }
        return {
          content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          ...(response.status === "error" ? { isError: true } : {}),
        };
      },
    );
  }

  // ── Phase 6: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size }, "dev-profile-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
