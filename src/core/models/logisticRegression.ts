/**
 * Logistic regression binding (binomial or multinomial).
 */

import { z } from "zod";
import { ModelBinding } from "./binding";
import { LabeledMatrix, coefficientMatrix } from "./matrix";
import { arg, columnOption, doubleOption, integerOption, numericArrayOption } from "./normalize";

export const LOGISTIC_FAMILIES = ["auto", "binomial", "multinomial"] as const;

const thresholdsOption = z
  .union([doubleOption, numericArrayOption])
  .transform((value) => (Array.isArray(value) ? value : [value]))
  .superRefine((values, ctx) => {
    if (values.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "thresholds must not be empty" });
    }
    if (values.some((v) => v < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "thresholds must be non-negative" });
    }
    if (values.filter((v) => v === 0).length > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "at most one threshold may be 0" });
    }
  });

export const LogisticRegressionOptionsSchema = z
  .object({
    regParam: doubleOption.min(0).default(0),
    elasticNetParam: doubleOption.min(0).max(1).default(0),
    maxIter: integerOption(1).default(100),
    tol: doubleOption.positive().default(1e-6),
    family: z.enum(LOGISTIC_FAMILIES).default("auto"),
    standardization: z.boolean().default(true),
    thresholds: thresholdsOption.default(0.5),
    weightCol: columnOption,
    aggregationDepth: integerOption(2).default(2),
  })
  .strict();

export type LogisticRegressionOptions = z.input<typeof LogisticRegressionOptionsSchema>;
export type LogisticRegressionParsedOptions = z.output<typeof LogisticRegressionOptionsSchema>;

export interface LogisticRegressionSummary {
  /**
   * One row per feature, led by "(Intercept)" when the model fits an
   * intercept. A binomial model with pivoting has the single
   * column "Estimate"; a multinomial model has one column per class label.
   */
  coefficients: LabeledMatrix;
}

export const logisticRegression: ModelBinding<
  "logisticRegression",
  LogisticRegressionOptions,
  LogisticRegressionParsedOptions,
  LogisticRegressionSummary
> = {
  kind: "logisticRegression",
  wrapperClass: "LogisticRegressionWrapper",
  summaryAfterLoad: false,

  optionsSchema: LogisticRegressionOptionsSchema,

  toArgs(data, formula, o) {
    return [
      arg.ref(data),
      arg.string(formula),
      arg.double(o.regParam),
      arg.double(o.elasticNetParam),
      arg.integer(o.maxIter),
      arg.double(o.tol),
      arg.string(o.family),
      arg.boolean(o.standardization),
      arg.doubleArray(o.thresholds),
      arg.optionalString(o.weightCol),
      arg.integer(o.aggregationDepth),
    ];
  },

  async summarize(client, handle) {
    const features = await client.rFeatures(handle);
    const labels = await client.labels(handle);
    const coefficients = await client.rCoefficients(handle);

    return { coefficients: coefficientMatrix(coefficients, features, labels) };
  },
};
