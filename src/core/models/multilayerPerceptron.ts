/**
 * Multilayer perceptron classifier binding.
 */

import { z } from "zod";
import { MalformedResponseError } from "../errors";
import { ModelBinding } from "./binding";
import {
  arg,
  doubleOption,
  integerArrayOption,
  integerOption,
  numericArrayOption,
} from "./normalize";

export const PERCEPTRON_SOLVERS = ["l-bfgs", "gd"] as const;

const LAYERS_MESSAGE = "layers must be an integer array with length > 1";

export const MultilayerPerceptronOptionsSchema = z
  .object({
    layers: integerArrayOption
      .nullable()
      .optional()
      .superRefine((layers, ctx) => {
        if (!layers || layers.length <= 1) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: LAYERS_MESSAGE });
        } else if (layers.some((size) => size < 1)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "layer sizes must be positive" });
        }
      })
      .transform((layers) => layers ?? []),
    blockSize: integerOption(1).default(128),
    solver: z.enum(PERCEPTRON_SOLVERS).default("l-bfgs"),
    maxIter: integerOption(1).default(100),
    tol: doubleOption.positive().default(1e-6),
    stepSize: doubleOption.positive().default(0.03),
    seed: integerOption(-2147483648).nullable().optional(),
    initialWeights: numericArrayOption.nullable().optional(),
  })
  .strict();

export type MultilayerPerceptronOptions = z.input<typeof MultilayerPerceptronOptionsSchema>;
export type MultilayerPerceptronParsedOptions = z.output<typeof MultilayerPerceptronOptionsSchema>;

export interface MultilayerPerceptronSummary {
  numOfInputs: number;
  numOfOutputs: number;
  layers: number[];
  weights: number[];
}

/**
 * Number of weights in a fully connected network with a bias unit feeding
 * every layer after the first: sum of (inputs + 1) * outputs.
 */
export function expectedWeightCount(layers: readonly number[]): number {
  let total = 0;
  for (let i = 0; i + 1 < layers.length; i++) {
    total += (layers[i] + 1) * layers[i + 1];
  }
  return total;
}

export const multilayerPerceptron: ModelBinding<
  "multilayerPerceptron",
  MultilayerPerceptronOptions,
  MultilayerPerceptronParsedOptions,
  MultilayerPerceptronSummary
> = {
  kind: "multilayerPerceptron",
  wrapperClass: "MultilayerPerceptronClassifierWrapper",
  summaryAfterLoad: true,

  optionsSchema: MultilayerPerceptronOptionsSchema,

  toArgs(data, formula, o) {
    const seed = o.seed ?? undefined;
    const initialWeights = o.initialWeights ?? undefined;
    return [
      arg.ref(data),
      arg.string(formula),
      arg.integer(o.blockSize),
      arg.integerArray(o.layers),
      arg.string(o.solver),
      arg.integer(o.maxIter),
      arg.double(o.tol),
      arg.double(o.stepSize),
      arg.optionalString(seed === undefined ? undefined : String(seed)),
      arg.optionalDoubleArray(initialWeights),
    ];
  },

  async summarize(client, handle) {
    const layers = await client.layers(handle);
    const weights = await client.weights(handle);

    if (layers.length < 2) {
      throw new MalformedResponseError(`perceptron reports ${layers.length} layer(s)`);
    }
    const expected = expectedWeightCount(layers);
    if (weights.length !== expected) {
      throw new MalformedResponseError(
        `layers [${layers.join(", ")}] need ${expected} weights, engine returned ${weights.length}`
      );
    }

    return {
      numOfInputs: layers[0],
      numOfOutputs: layers[layers.length - 1],
      layers,
      weights,
    };
  },
};
