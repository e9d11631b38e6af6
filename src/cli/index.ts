#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { CliContext, defaultContext } from "./context";
import { fitCommand } from "./commands/fit";
import { inspectCommand } from "./commands/inspect";

export function createCli(ctx: CliContext = defaultContext()): Command {
  const program = new Command();

  program
    .name("tether")
    .description("Fit, save and inspect models on a remote engine")
    .version("0.1.0");

  program.addCommand(fitCommand(ctx));
  program.addCommand(inspectCommand(ctx));

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
