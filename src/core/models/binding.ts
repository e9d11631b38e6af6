/**
 * Generic model binding
 *
 * A ModelBinding describes one model variant: which engine wrapper class fits
 * it, how user options become positional remote arguments and how the
 * engine's flat introspection arrays become a summary. FittedModel is the
 * single wrapper type every variant shares.
 */

import { z } from "zod";
import { UnsupportedOperationError } from "../errors";
import { EventBus } from "../eventBus";
import { EngineClient } from "../remote/engineClient";
import { DataFrameRef, ModelHandle, RemoteArg } from "../remote/types";

export type ModelKind = "linearSvc" | "logisticRegression" | "multilayerPerceptron" | "naiveBayes";

export type ModelState = "fitted" | "loaded" | "closed";

/**
 * The part of a binding a wrapper needs after the fit.
 */
export interface SummaryBinding<K extends ModelKind, S> {
  readonly kind: K;
  /** Simple class name of the engine wrapper, qualified by the client's namespace. */
  readonly wrapperClass: string;
  /**
   * Whether summary() works on a model read back from storage. The engine's
   * reloaded SVM and logistic models serve no summary.
   */
  readonly summaryAfterLoad: boolean;
  summarize(client: EngineClient, handle: ModelHandle): Promise<S>;
}

export interface ModelBinding<K extends ModelKind, Options, Parsed, S> extends SummaryBinding<K, S> {
  /** Validates user options and fills in defaults. */
  readonly optionsSchema: z.ZodType<Parsed, z.ZodTypeDef, Options>;
  /** Positional arguments of the wrapper's fit method. */
  toArgs(data: DataFrameRef, formula: string, options: Parsed): RemoteArg[];
}

export interface FittedModelContext {
  client: EngineClient;
  eventBus?: EventBus;
}

export class FittedModel<K extends ModelKind = ModelKind, S = unknown> {
  private current: ModelState;

  constructor(
    private readonly binding: SummaryBinding<K, S>,
    readonly handle: ModelHandle,
    state: "fitted" | "loaded",
    private readonly context: FittedModelContext
  ) {
    this.current = state;
  }

  get kind(): K {
    return this.binding.kind;
  }

  get state(): ModelState {
    return this.current;
  }

  get summaryAvailable(): boolean {
    return this.current === "fitted" || (this.current === "loaded" && this.binding.summaryAfterLoad);
  }

  /**
   * Score new data. The engine appends a prediction column and returns a
   * reference to the resulting table.
   */
  async predict(newData: DataFrameRef): Promise<DataFrameRef> {
    this.assertOpen("predict");
    const result = await this.context.client.transform(this.handle, newData);
    this.context.eventBus?.emit("ModelPredictEvent", {
      kind: this.kind,
      handle: this.handle.id,
      data: newData.id,
      result: result.id,
    });
    return result;
  }

  async summary(): Promise<S> {
    this.assertOpen("summary");
    if (!this.summaryAvailable) {
      throw new UnsupportedOperationError(
        "summary",
        `${this.kind} models read back from storage carry no summary data`
      );
    }
    const summary = await this.binding.summarize(this.context.client, this.handle);
    this.context.eventBus?.emit("ModelSummaryEvent", { kind: this.kind, handle: this.handle.id });
    return summary;
  }

  async save(path: string, overwrite = false): Promise<void> {
    this.assertOpen("save");
    await this.context.client.save(this.handle, path, overwrite);
    this.context.eventBus?.emit("ModelSaveEvent", {
      kind: this.kind,
      handle: this.handle.id,
      path,
      overwrite,
    });
  }

  /**
   * Release the remote handle. Idempotent; every other operation fails once
   * the model is closed.
   */
  async close(): Promise<void> {
    if (this.current === "closed") return;
    await this.context.client.release(this.handle);
    this.current = "closed";
    this.context.eventBus?.emit("ModelCloseEvent", { kind: this.kind, handle: this.handle.id });
  }

  toString(): string {
    return `FittedModel(${this.kind}, ${this.current}, ${this.handle.id})`;
  }

  private assertOpen(operation: string): void {
    if (this.current === "closed") {
      throw new UnsupportedOperationError(operation, `model handle ${this.handle.id} has been closed`);
    }
  }
}
