/**
 * src/cli/commands/fit.ts
 * tether fit <kind> --data <ref> --formula <formula> [--set key=value]... [--save <path>]
 */

import { Command } from "commander";
import { InvalidConfigurationError } from "../../core/errors";
import { MODEL_KINDS, isModelKind } from "../../core/models/modelManager";
import { RemoteObject } from "../../core/remote/types";
import { CliContext, runAction } from "../context";
import { formatSummary } from "../utils/printTable";

/**
 * Parse `key=value`. Values that read as JSON (numbers, booleans, arrays,
 * null) are taken as such; anything else stays a string.
 */
export function parseAssignment(text: string): [string, unknown] {
  const eq = text.indexOf("=");
  if (eq <= 0) {
    throw new InvalidConfigurationError(`expected key=value, got "${text}"`);
  }
  const key = text.slice(0, eq);
  const raw = text.slice(eq + 1);
  try {
    const value: unknown = JSON.parse(raw);
    return [key, value];
  } catch {
    return [key, raw];
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

interface FitOptions {
  data: string;
  formula: string;
  set: string[];
  save?: string;
  overwrite?: boolean;
}

export function fitCommand(ctx: CliContext): Command {
  const cmd = new Command("fit");
  cmd
    .description(`Fit a model on the engine (${MODEL_KINDS.join(", ")})`)
    .argument("<kind>", "model kind")
    .requiredOption("--data <ref>", "engine reference of the training table")
    .requiredOption("--formula <formula>", "model formula, e.g. 'label ~ .'")
    .option("--set <key=value>", "hyperparameter, repeatable", collect, [])
    .option("--save <path>", "persist the fitted model to this path")
    .option("--overwrite", "replace an existing saved model")
    .action((kind: string, opts: FitOptions) =>
      runAction(ctx, async () => {
        if (!isModelKind(kind)) {
          throw new InvalidConfigurationError(`unknown model kind "${kind}"; expected one of ${MODEL_KINDS.join(", ")}`);
        }
        const options = Object.fromEntries(opts.set.map(parseAssignment));
        const { models } = ctx.tether();

        const model = await models.fitKind(kind, new RemoteObject(opts.data), opts.formula, options);
        try {
          ctx.io.out(`Fitted ${model.kind} model ${model.handle.id}`);
          ctx.io.out(formatSummary(await model.summary()));

          if (opts.save) {
            await model.save(opts.save, opts.overwrite ?? false);
            ctx.io.out(`Saved to ${opts.save}`);
          }
        } finally {
          await model.close();
        }
      })
    );

  return cmd;
}
