import { Command } from "commander";

import { createCliContext, type CliContextFactory, type GlobalOptions } from "./cli/context.js";
import { registerListCommand } from "./cli/list.js";
import { registerRemoveCommand } from "./cli/remove.js";
import { renderErrorLines, resolveColorEnabled } from "./core/error-format.js";

export function buildCli(createContext: CliContextFactory = createCliContext): Command {
  const program = new Command();

  program
    .name("ddev-lite")
    .description("List and remove local ddev applications running under Docker")
    .version("0.1.0")
    .option("--debug", "Print error codes and stack traces", false)
    .option("--no-color", "Disable colored output");

  registerListCommand(program, createContext);
  registerRemoveCommand(program, createContext);

  return program;
}

export async function main(argv: string[], createContext?: CliContextFactory): Promise<void> {
  const program = buildCli(createContext);

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const opts = program.opts<GlobalOptions>();
    const lines = renderErrorLines(err, {
      mode: opts.debug ? "debug" : "short",
      color: resolveColorEnabled({ stream: process.stderr, useColor: opts.color }),
    });
    for (const line of lines) {
      console.error(line);
    }
    process.exitCode = 1;
  }
}
