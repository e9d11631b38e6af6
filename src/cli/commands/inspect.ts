/**
 * src/cli/commands/inspect.ts
 * tether inspect <path>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";
import { formatSummary } from "../utils/printTable";

export function inspectCommand(ctx: CliContext): Command {
  const cmd = new Command("inspect");
  cmd
    .description("Read a saved model and print what the engine knows about it")
    .argument("<path>", "path the model was saved to")
    .action((path: string) =>
      runAction(ctx, async () => {
        const { models } = ctx.tether();
        const model = await models.read(path);
        try {
          ctx.io.out(`${model.kind} model ${model.handle.id} (${model.state})`);
          if (model.summaryAvailable) {
            ctx.io.out(formatSummary(await model.summary()));
          } else {
            ctx.io.out("Summary is not available for models read from storage.");
          }
        } finally {
          await model.close();
        }
      })
    );

  return cmd;
}
