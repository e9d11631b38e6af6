import { UnsupportedOperationError } from "../errors";
import { EventBus } from "../eventBus";
import { EngineClient } from "../remote/engineClient";
import { DataFrameRef, ModelHandle } from "../remote/types";
import { FittedModel, ModelBinding, ModelKind, SummaryBinding } from "./binding";
import { FormulaInput, serializeFormula } from "./formula";
import { LinearSvcOptions, LinearSvcSummary, linearSvc } from "./linearSvc";
import { LogisticRegressionOptions, LogisticRegressionSummary, logisticRegression } from "./logisticRegression";
import {
  MultilayerPerceptronOptions,
  MultilayerPerceptronSummary,
  multilayerPerceptron,
} from "./multilayerPerceptron";
import { NaiveBayesOptions, NaiveBayesSummary, naiveBayes } from "./naiveBayes";
import { parseOptions } from "./normalize";

export type LinearSvcModel = FittedModel<"linearSvc", LinearSvcSummary>;
export type LogisticRegressionModel = FittedModel<"logisticRegression", LogisticRegressionSummary>;
export type MultilayerPerceptronModel = FittedModel<"multilayerPerceptron", MultilayerPerceptronSummary>;
export type NaiveBayesModel = FittedModel<"naiveBayes", NaiveBayesSummary>;

export type AnyFittedModel = LinearSvcModel | LogisticRegressionModel | MultilayerPerceptronModel | NaiveBayesModel;

export const MODEL_KINDS: readonly ModelKind[] = [
  "linearSvc",
  "logisticRegression",
  "multilayerPerceptron",
  "naiveBayes",
];

export function isModelKind(value: string): value is ModelKind {
  return MODEL_KINDS.some((k) => k === value);
}

/**
 * Entry point for fitting and reading models. Every method is a thin
 * delegation to the engine; nothing is retried.
 */
export class ModelManager {
  constructor(private readonly client: EngineClient, private readonly eventBus?: EventBus) {}

  svmLinear(data: DataFrameRef, formula: FormulaInput, options?: LinearSvcOptions): Promise<LinearSvcModel> {
    return this.fit(linearSvc, data, formula, options);
  }

  logit(
    data: DataFrameRef,
    formula: FormulaInput,
    options?: LogisticRegressionOptions
  ): Promise<LogisticRegressionModel> {
    return this.fit(logisticRegression, data, formula, options);
  }

  mlp(
    data: DataFrameRef,
    formula: FormulaInput,
    options: MultilayerPerceptronOptions
  ): Promise<MultilayerPerceptronModel> {
    return this.fit(multilayerPerceptron, data, formula, options);
  }

  naiveBayes(data: DataFrameRef, formula: FormulaInput, options?: NaiveBayesOptions): Promise<NaiveBayesModel> {
    return this.fit(naiveBayes, data, formula, options);
  }

  /**
   * Fit any binding. Options and formula are validated before the engine
   * sees anything.
   */
  fit<K extends ModelKind, O, P, S>(
    binding: ModelBinding<K, O, P, S>,
    data: DataFrameRef,
    formula: FormulaInput,
    options?: O
  ): Promise<FittedModel<K, S>> {
    return this.fitUnchecked(binding, data, formula, options);
  }

  /**
   * Fit by kind name with options that have not been typed yet, e.g. parsed
   * from the command line.
   */
  fitKind(kind: ModelKind, data: DataFrameRef, formula: FormulaInput, options: unknown): Promise<AnyFittedModel> {
    switch (kind) {
      case "linearSvc":
        return this.fitUnchecked(linearSvc, data, formula, options);
      case "logisticRegression":
        return this.fitUnchecked(logisticRegression, data, formula, options);
      case "multilayerPerceptron":
        return this.fitUnchecked(multilayerPerceptron, data, formula, options);
      case "naiveBayes":
        return this.fitUnchecked(naiveBayes, data, formula, options);
    }
  }

  /**
   * Load a persisted model. The engine reports the wrapper class of the
   * handle, which selects the binding.
   */
  async read(path: string): Promise<AnyFittedModel> {
    const handle = await this.client.load(path);
    const className = await this.client.className(handle);
    const model = this.wrapLoaded(className, handle);

    if (!model) {
      await this.client.release(handle);
      throw new UnsupportedOperationError("read", `no binding for engine class ${className}`);
    }

    this.eventBus?.emit("ModelReadEvent", { kind: model.kind, handle: handle.id, path });
    return model;
  }

  private async fitUnchecked<K extends ModelKind, P, S>(
    binding: ModelBinding<K, unknown, P, S>,
    data: DataFrameRef,
    formula: FormulaInput,
    options: unknown
  ): Promise<FittedModel<K, S>> {
    const serialized = serializeFormula(formula);
    const parsed = parseOptions(binding.optionsSchema, options, binding.kind);
    const args = binding.toArgs(data, serialized, parsed);

    const started = Date.now();
    const handle = await this.client.fit(this.client.qualify(binding.wrapperClass), args);

    this.eventBus?.emit("ModelFitEvent", {
      kind: binding.kind,
      formula: serialized,
      handle: handle.id,
      duration: Date.now() - started,
    });
    return this.wrap(binding, handle, "fitted");
  }

  private wrapLoaded(className: string, handle: ModelHandle): AnyFittedModel | undefined {
    const is = (binding: SummaryBinding<ModelKind, unknown>) =>
      className === this.client.qualify(binding.wrapperClass);

    if (is(linearSvc)) return this.wrap(linearSvc, handle, "loaded");
    if (is(logisticRegression)) return this.wrap(logisticRegression, handle, "loaded");
    if (is(multilayerPerceptron)) return this.wrap(multilayerPerceptron, handle, "loaded");
    if (is(naiveBayes)) return this.wrap(naiveBayes, handle, "loaded");
    return undefined;
  }

  private wrap<K extends ModelKind, S>(
    binding: SummaryBinding<K, S>,
    handle: ModelHandle,
    state: "fitted" | "loaded"
  ): FittedModel<K, S> {
    return new FittedModel(binding, handle, state, { client: this.client, eventBus: this.eventBus });
  }
}
