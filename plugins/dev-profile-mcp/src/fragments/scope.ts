import type { z } from "zod";
import type { ProfileContext } from "../tools/context.js";
import type { ToolMetadata } from "../types/tool.js";
import type { ToolResponse } from "../types/response.js";
import type { RegistrationMode } from "../types/config.js";
import { registerTool } from "../tools/helpers.js";
import { ProfileError, ProfileErrorCode } from "../errors.js";
import type { Fragment } from "./types.js";

export const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Registration handle given to a fragment while it loads.
 * Enforces the naming rule and records which tools the fragment added.
 */
export class FragmentScope {
  private readonly registered: string[] = [];

  constructor(
    private readonly ctx: ProfileContext,
    readonly fragment: Fragment,
    readonly mode: RegistrationMode,
  ) {}

  registerTool<T extends z.AnyZodObject>(
    metadata: Omit<ToolMetadata, "module" | "inputSchema"> & { inputSchema: T },
    handler: (args: z.infer<T>) => Promise<ToolResponse>,
  ): void {
    const { name } = metadata;
    if (!TOOL_NAME_PATTERN.test(name) || !name.startsWith(`${this.fragment.prefix}_`)) {
      throw new ProfileError(
        ProfileErrorCode.INVALID_TOOL_NAME,
        `Tool '${name}' in fragment '${this.fragment.id}' must match ${TOOL_NAME_PATTERN} and start with '${this.fragment.prefix}_'`,
        { fragment: this.fragment.id, tool: name },
      );
    }
    registerTool<T>(this.ctx, { ...metadata, module: this.fragment.id }, handler);
    this.registered.push(name);
  }

  get tools(): string[] {
    return [...this.registered];
  }
}
