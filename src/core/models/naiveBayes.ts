/**
 * Naive Bayes classifier binding.
 */

import { z } from "zod";
import { ModelBinding } from "./binding";
import { LabeledMatrix, fromColumnMajor } from "./matrix";
import { arg, doubleOption } from "./normalize";

export const NaiveBayesOptionsSchema = z
  .object({
    smoothing: doubleOption.min(0).default(1),
  })
  .strict();

export type NaiveBayesOptions = z.input<typeof NaiveBayesOptionsSchema>;
export type NaiveBayesParsedOptions = z.output<typeof NaiveBayesOptionsSchema>;

export interface NaiveBayesSummary {
  /** Class priors: a single unnamed row, one column per class label. */
  apriori: LabeledMatrix;
  /** Conditional probabilities: one row per class label, one column per feature. */
  tables: LabeledMatrix;
}

export const naiveBayes: ModelBinding<
  "naiveBayes",
  NaiveBayesOptions,
  NaiveBayesParsedOptions,
  NaiveBayesSummary
> = {
  kind: "naiveBayes",
  wrapperClass: "NaiveBayesWrapper",
  summaryAfterLoad: true,

  optionsSchema: NaiveBayesOptionsSchema,

  // The engine's naive Bayes wrapper takes the formula before the data.
  toArgs(data, formula, o) {
    return [arg.string(formula), arg.ref(data), arg.double(o.smoothing)];
  },

  async summarize(client, handle) {
    const features = await client.features(handle);
    const labels = await client.labels(handle);
    const apriori = await client.apriori(handle);
    const tables = await client.tables(handle);

    return {
      apriori: fromColumnMajor(apriori, 1, labels.length, null, labels),
      tables: fromColumnMajor(tables, labels.length, features.length, labels, features),
    };
  },
};
