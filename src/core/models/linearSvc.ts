/**
 * Linear support vector classifier binding.
 */

import { z } from "zod";
import { ModelBinding } from "./binding";
import { LabeledMatrix, coefficientMatrix } from "./matrix";
import { arg, columnOption, doubleOption, integerOption } from "./normalize";

export const LinearSvcOptionsSchema = z
  .object({
    regParam: doubleOption.min(0).default(0),
    maxIter: integerOption(1).default(100),
    tol: doubleOption.positive().default(1e-6),
    standardization: z.boolean().default(true),
    threshold: doubleOption.default(0),
    weightCol: columnOption,
    aggregationDepth: integerOption(2).default(2),
  })
  .strict();

export type LinearSvcOptions = z.input<typeof LinearSvcOptionsSchema>;
export type LinearSvcParsedOptions = z.output<typeof LinearSvcOptionsSchema>;

export interface LinearSvcSummary {
  coefficients: LabeledMatrix;
  intercept: number;
  numClasses: number;
  numFeatures: number;
}

export const linearSvc: ModelBinding<
  "linearSvc",
  LinearSvcOptions,
  LinearSvcParsedOptions,
  LinearSvcSummary
> = {
  kind: "linearSvc",
  wrapperClass: "LinearSVCWrapper",
  summaryAfterLoad: false,

  optionsSchema: LinearSvcOptionsSchema,

  toArgs(data, formula, o) {
    return [
      arg.ref(data),
      arg.string(formula),
      arg.double(o.regParam),
      arg.integer(o.maxIter),
      arg.double(o.tol),
      arg.boolean(o.standardization),
      arg.double(o.threshold),
      arg.optionalString(o.weightCol),
      arg.integer(o.aggregationDepth),
    ];
  },

  async summarize(client, handle) {
    const features = await client.features(handle);
    const labels = await client.labels(handle);
    const coefficients = await client.coefficients(handle);
    const intercept = await client.intercept(handle);
    const numClasses = await client.numClasses(handle);
    const numFeatures = await client.numFeatures(handle);

    return {
      coefficients: coefficientMatrix(coefficients, features, labels),
      intercept,
      numClasses,
      numFeatures,
    };
  },
};
