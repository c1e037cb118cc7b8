// Command execution layer: every wrapper command passes through this module.
// Provides the Executor interface; LocalExecutor is the sole implementation today.
// argv goes to the executable without a shell, so argument values are never re-parsed.
import { constants } from "node:os";
import execa from "execa";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly timedOut: boolean;
  /** errno code (ENOENT, EACCES) when the process never started. */
  readonly spawnError?: string;
  /** Signal that killed the process, when it did not exit on its own. */
  readonly signal?: string;
  /** Output exceeded the buffer limit; stdout and stderr hold what was read. */
  readonly truncated?: boolean;
}

/** Executor interface: swapped for a fake in tests. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;
/** Exit code reported when the command was killed for exceeding its timeout. */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when a failure carries no exit code or signal of its own. */
export const GENERIC_FAILURE_EXIT_CODE = 1;

/** Shell convention: a process killed by signal n reports 128 + n. */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : GENERIC_FAILURE_EXIT_CODE;
}

export class LocalExecutor implements Executor {
  constructor(private readonly maxBufferBytes: number = 1024 * 1024) {}

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (!cmd) {
      return { stdout: "", stderr: "Empty command", exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs: 0, timedOut: false, spawnError: "EINVAL" };
    }

    const result = await execa(cmd, args, {
      cwd: command.cwd,
      env: command.env,
      input: command.stdin,
      timeout: timeoutMs,
      maxBuffer: this.maxBufferBytes,
      reject: false,
    });
    const durationMs = Math.round(performance.now() - start);
    const stdout = result.stdout ?? "";
    const stderr = result.stderr ?? "";

    if (result.timedOut) {
      return { stdout, stderr, exitCode: TIMEOUT_EXIT_CODE, durationMs, timedOut: true };
    }

    // With reject: false a spawn error resolves with the errno code and no exit code
    if ("code" in result && typeof result.code === "string" && result.exitCode === undefined) {
      const reason = "originalMessage" in result && typeof result.originalMessage === "string" ? result.originalMessage : `Failed to spawn ${cmd}`;
      logger.warn({ command: cmd, code: result.code, error: reason }, "Command failed to spawn");
      return { stdout: "", stderr: reason, exitCode: SPAWN_FAILURE_EXIT_CODE, durationMs, timedOut: false, spawnError: result.code };
    }

    if ("name" in result && result.name === "MaxBufferError") {
      logger.warn({ command: cmd, maxBufferBytes: this.maxBufferBytes }, "Command output exceeded the buffer limit");
      return { stdout, stderr, exitCode: result.exitCode ?? GENERIC_FAILURE_EXIT_CODE, durationMs, timedOut: false, truncated: true };
    }

    if (result.signal) {
      return { stdout, stderr, exitCode: signalExitCode(result.signal), durationMs, timedOut: false, signal: result.signal };
    }

    if (result.exitCode === undefined) {
      const reason = "shortMessage" in result && typeof result.shortMessage === "string" ? result.shortMessage : `${cmd} failed`;
      logger.warn({ command: cmd, error: reason }, "Command failed without an exit code");
      return { stdout, stderr: stderr || reason, exitCode: GENERIC_FAILURE_EXIT_CODE, durationMs, timedOut: false };
    }

    return { stdout, stderr, exitCode: result.exitCode, durationMs, timedOut: false };
  }
}
