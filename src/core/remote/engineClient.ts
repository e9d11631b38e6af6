/**
 * Typed engine client: one method per remote operation, backed by a single
 * RemoteTransport. Results are validated with zod before they reach the
 * bindings.
 */

import { z } from "zod";
import { AlreadyExistsError, MalformedResponseError, RemoteCallError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { TetherLogger } from "../logger";
import { RemoteTransport } from "./transport";
import {
  CallTarget,
  DataFrameRef,
  ModelHandle,
  RemoteArg,
  RemoteCall,
  RemoteObject,
  RemoteObjectSchema,
  describeTarget,
} from "./types";

export const DEFAULT_NAMESPACE = "ml.wrappers";
export const ALREADY_EXISTS_CODE = "ALREADY_EXISTS";

export interface EngineClientOptions {
  namespace?: string;
  eventBus?: EventBus;
  logger?: TetherLogger;
}

const StringArraySchema = z.array(z.string());
const NumberArraySchema = z.array(z.number());
const IntArraySchema = z.array(z.number().int());

export class EngineClient {
  readonly namespace: string;
  private readonly eventBus?: EventBus;
  private readonly logger?: TetherLogger;

  constructor(private readonly transport: RemoteTransport, options: EngineClientOptions = {}) {
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.eventBus = options.eventBus;
    this.logger = options.logger?.child({ component: "engine-client" });
  }

  /** Fully qualified name of a wrapper class on the engine. */
  qualify(simpleName: string): string {
    return `${this.namespace}.${simpleName}`;
  }

  fit(wrapperClass: string, args: RemoteArg[]): Promise<ModelHandle> {
    return this.invoke({ className: wrapperClass }, "fit", args, RemoteObjectSchema);
  }

  transform(handle: ModelHandle, data: DataFrameRef): Promise<DataFrameRef> {
    return this.invoke(
      { ref: handle.id },
      "transform",
      [{ type: "ref", value: data.id }],
      RemoteObjectSchema
    );
  }

  async save(handle: ModelHandle, path: string, overwrite: boolean): Promise<void> {
    try {
      await this.invoke(
        { ref: handle.id },
        "save",
        [
          { type: "string", value: path },
          { type: "boolean", value: overwrite },
        ],
        z.unknown()
      );
    } catch (err) {
      if (err instanceof RemoteCallError && err.code === ALREADY_EXISTS_CODE) {
        throw new AlreadyExistsError(path, err);
      }
      throw err;
    }
  }

  load(path: string): Promise<ModelHandle> {
    return this.invoke(
      { className: this.qualify("ModelReader") },
      "load",
      [{ type: "string", value: path }],
      RemoteObjectSchema
    );
  }

  className(handle: ModelHandle): Promise<string> {
    return this.invoke({ ref: handle.id }, "className", [], z.string());
  }

  async release(handle: RemoteObject): Promise<void> {
    await this.invoke({ ref: handle.id }, "release", [], z.unknown());
  }

  features(handle: ModelHandle): Promise<string[]> {
    return this.get(handle, "features", StringArraySchema);
  }

  labels(handle: ModelHandle): Promise<string[]> {
    return this.get(handle, "labels", StringArraySchema);
  }

  coefficients(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "coefficients", NumberArraySchema);
  }

  /** Feature names with a leading "(Intercept)" when the model fits one. */
  rFeatures(handle: ModelHandle): Promise<string[]> {
    return this.get(handle, "rFeatures", StringArraySchema);
  }

  /** Coefficients aligned with rFeatures, intercept row included. */
  rCoefficients(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "rCoefficients", NumberArraySchema);
  }

  intercept(handle: ModelHandle): Promise<number> {
    return this.get(handle, "intercept", z.number());
  }

  numClasses(handle: ModelHandle): Promise<number> {
    return this.get(handle, "numClasses", z.number().int());
  }

  numFeatures(handle: ModelHandle): Promise<number> {
    return this.get(handle, "numFeatures", z.number().int());
  }

  layers(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "layers", IntArraySchema);
  }

  weights(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "weights", NumberArraySchema);
  }

  apriori(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "apriori", NumberArraySchema);
  }

  tables(handle: ModelHandle): Promise<number[]> {
    return this.get(handle, "tables", NumberArraySchema);
  }

  private get<T>(handle: ModelHandle, attribute: string, schema: z.ZodType<T>): Promise<T> {
    return this.invoke({ ref: handle.id }, attribute, [], schema);
  }

  private async invoke<T>(
    target: CallTarget,
    method: string,
    args: RemoteArg[],
    schema: z.ZodType<T>
  ): Promise<T> {
    const call: RemoteCall = { target, method, args };
    const name = describeTarget(target);
    const logged = args.map((a) => (a.type === "null" ? null : a.value));
    const started = Date.now();

    let raw: unknown;
    try {
      raw = await this.transport.invoke(call);
    } catch (err) {
      const error = toError(err);
      this.logger?.traceRemoteCall(name, method, logged, Date.now() - started, false, { error: error.message });
      this.eventBus?.emit("RemoteErrorEvent", {
        target: name,
        method,
        code: err instanceof RemoteCallError ? err.code : undefined,
        message: error.message,
      });
      throw err;
    }

    this.logger?.traceRemoteCall(name, method, logged, Date.now() - started, true);
    this.eventBus?.emit("RemoteCallEvent", { target: name, method, duration: Date.now() - started });

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedResponseError(`${name}.${method} returned an unexpected value`, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
      });
    }
    return parsed.data;
  }
}
