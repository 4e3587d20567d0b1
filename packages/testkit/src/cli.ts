/**
 * CLI testing utilities
 *
 * Runs a CLI entry function in-process against buffered streams, so tests
 * need neither a build nor a child process.
 */

import { readFile } from "node:fs/promises";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code returned by the entry function */
  exitCode: number;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Input to serve as stdin; when omitted stdin behaves like an interactive terminal */
  input?: string;
}

/**
 * Stream surface handed to the CLI under test.
 * Mirrors the shape of the CLI's own I/O interface.
 */
export interface BufferedIo {
  readonly colors: boolean;
  writeOut(text: string): void;
  writeErr(text: string): void;
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
  stdinIsTTY(): boolean;
}

/**
 * Create buffered streams; `out` and `err` collect everything written
 */
export function createBufferedIo(options: CliExecOptions = {}): BufferedIo & {
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];

  return {
    out,
    err,
    colors: false,
    writeOut: (text) => {
      out.push(text);
    },
    writeErr: (text) => {
      err.push(text);
    },
    readStdin: async () => options.input ?? "",
    readFile: (path) => readFile(path, "utf8"),
    stdinIsTTY: () => options.input === undefined,
  };
}

/**
 * Execute a CLI entry function in-process
 * @param run - Entry function taking arguments (without node and script path) and streams
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  run: (args: string[], io: BufferedIo) => Promise<number>,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const io = createBufferedIo(options);
  const exitCode = await run(args, io);

  return {
    stdout: io.out.join(""),
    stderr: io.err.join(""),
    exitCode,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
