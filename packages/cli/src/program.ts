/**
 * prioset CLI program
 */

import { Command, CommanderError } from "commander";
import { createBenchCommand } from "./commands/bench.js";
import { createSortCommand } from "./commands/sort.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { processIo, type CliIo } from "./lib/io.js";
import { colorize } from "./lib/render.js";

export const CLI_VERSION = "0.1.0";

export type { CliIo } from "./lib/io.js";

/**
 * Build the command tree. Commander never exits the process: usage errors,
 * --help and --version surface as CommanderError for runProgram to map.
 */
export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.writeOut(str),
      writeErr: (str) => io.writeErr(str),
      outputError: (str, write) => write(colorize(str, "red", io.colors)),
    })
    .exitOverride();

  program
    .name("prioset")
    .description("prioset - d-ary min-heap tools: heap sort and heap benchmarks")
    .version(CLI_VERSION)
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program.addCommand(createSortCommand(program, io));
  program.addCommand(createBenchCommand(program, io));

  // addCommand() does not copy output and exit settings the way .command() does
  for (const command of program.commands) {
    command.copyInheritedSettings(program);
  }

  return program;
}

/**
 * Run the CLI and return the process exit code
 * @param args - Arguments after the node binary and script path
 */
export async function runProgram(args: string[], io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed the message (or the help/version text)
      return err.exitCode;
    }

    const verbose = isVerbose(program.opts<{ verbose?: boolean }>().verbose);
    io.writeErr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.colors) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
