/**
 * A structured command ready for execution.
 * Wrappers never build shell strings; argv goes to the executable as-is.
 */
export interface Command {
  readonly argv: string[];
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
