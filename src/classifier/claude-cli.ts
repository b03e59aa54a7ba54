/**
 * Claude CLI wrapper module.
 * Provides a single interface for all `claude` subprocess calls.
 * Supports dependency injection for testing.
 */

import { execFile } from "node:child_process";

/** Result from a claude CLI invocation */
export interface ClaudeResult {
  success: boolean;
  output: string;
  error?: string;
  /** True when the call was cut off by the timeout */
  timedOut?: boolean;
  /** True when the caller aborted the call */
  aborted?: boolean;
}

/** Options for a claude CLI call */
export interface ClaudeOptions {
  /** The prompt to send */
  prompt: string;
  /** Output format (default: "json") */
  outputFormat?: "json" | "text";
  maxTokens?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SpawnResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

export interface SpawnOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Spawn function signature for dependency injection */
export type SpawnFn = (args: string[], options: SpawnOptions) => Promise<SpawnResult>;

const MAX_BUFFER = 4 * 1024 * 1024;

/** Default spawn using child_process.execFile */
function defaultSpawn(args: string[], options: SpawnOptions): Promise<SpawnResult> {
  const [command, ...rest] = args;
  return new Promise((resolve) => {
    execFile(
      command,
      rest,
      { timeout: options.timeoutMs ?? 0, signal: options.signal, maxBuffer: MAX_BUFFER, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false, aborted: false });
          return;
        }
        const aborted = error.name === "AbortError";
        // execFile kills with SIGTERM when the timeout elapses
        const timedOut = !aborted && error.killed === true && error.signal === "SIGTERM";
        const exitCode = typeof error.code === "number" ? error.code : 1;
        resolve({ exitCode, stdout, stderr: stderr || error.message, timedOut, aborted });
      },
    );
  });
}

/**
 * Create a Claude CLI client.
 * @param spawnFn - Optional custom spawn function for testing
 */
export function createClaudeCli(spawnFn?: SpawnFn, command = "claude") {
  const spawn = spawnFn ?? defaultSpawn;

  return {
    /**
     * Run a prompt through the claude CLI and return the result.
     */
    async run(options: ClaudeOptions): Promise<ClaudeResult> {
      const args = [command, "-p", options.prompt];
      args.push("--output-format", options.outputFormat ?? "json");

      if (options.maxTokens) {
        args.push("--max-tokens", String(options.maxTokens));
      }

      try {
        const result = await spawn(args, { timeoutMs: options.timeoutMs, signal: options.signal });

        if (result.aborted) {
          return { success: false, output: "", error: "claude CLI call was aborted", aborted: true };
        }
        if (result.timedOut) {
          return { success: false, output: "", error: "claude CLI timed out", timedOut: true };
        }
        if (result.exitCode !== 0) {
          return {
            success: false,
            output: "",
            error: `claude CLI exited with code ${result.exitCode}: ${result.stderr}`,
          };
        }

        return { success: true, output: result.stdout.trim() };
      } catch (err) {
        return {
          success: false,
          output: "",
          error: `Failed to invoke claude CLI: ${err}`,
        };
      }
    },
  };
}

/** Type of the claude CLI client */
export type ClaudeCli = ReturnType<typeof createClaudeCli>;
