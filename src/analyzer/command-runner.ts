import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandOptions {
  /** Kill the process after this many milliseconds. Unset means no limit. */
  readonly timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, [...args], {
    encoding: "utf8",
    maxBuffer: MAX_OUTPUT_BYTES,
    windowsHide: true,
    timeout: options?.timeoutMs ?? 0,
  });
  return { stdout, stderr };
};

export interface ExternalTool {
  /** Capitalized name used in messages, e.g. "Analyzer". */
  readonly name: string;
  readonly command: string;
  /** CLI option that selects the command. */
  readonly option: string;
  readonly description: string;
}

export function describeCommandFailure(
  tool: ExternalTool,
  error: unknown,
  stderr: string | undefined,
  timeoutMs?: number,
): string {
  if (errorCode(error) === "ENOENT") {
    return `${tool.name} command not found: ${tool.command}. Pass ${tool.option} <command> to point at ${tool.description}.`;
  }
  if (timeoutMs !== undefined && wasKilled(error)) {
    return `${tool.name} timed out after ${timeoutMs / 1000} seconds.`;
  }
  const lastLine = stderr?.trim().split(/\r?\n/).pop();
  if (lastLine) {
    return lastLine;
  }
  return error instanceof Error ? error.message : String(error);
}

// execFile attaches the captured streams to the error it rejects with.
export function readStderr(error: unknown): string | undefined {
  if (error instanceof Error && "stderr" in error) {
    return typeof error.stderr === "string" ? error.stderr : undefined;
  }
  return undefined;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function wasKilled(error: unknown): boolean {
  return error instanceof Error && "killed" in error && error.killed === true;
}
