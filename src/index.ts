/**
 * Tether: typed client bindings for classification models trained on a
 * remote distributed engine.
 */

import { EventBus, EventBusConfig } from "./core/eventBus";
import { TetherLogger } from "./core/logger";
import { LoggerConfig } from "./core/logger/config";
import { ModelManager } from "./core/models/modelManager";
import { EngineClient } from "./core/remote/engineClient";
import { HttpRpcTransport, HttpRpcTransportOptions, RemoteTransport } from "./core/remote/transport";

export interface TetherOptions {
  /** Engine endpoint; ignored when a transport is given. */
  engine?: HttpRpcTransportOptions;
  transport?: RemoteTransport;
  namespace?: string;
  eventBus?: EventBus | EventBusConfig;
  logger?: TetherLogger | Partial<LoggerConfig>;
}

export interface Tether {
  models: ModelManager;
  client: EngineClient;
  eventBus: EventBus;
  logger: TetherLogger;
}

export function createTether(options: TetherOptions = {}): Tether {
  const eventBus = options.eventBus instanceof EventBus ? options.eventBus : new EventBus(options.eventBus);
  const logger =
    options.logger instanceof TetherLogger ? options.logger : new TetherLogger(eventBus, options.logger);

  let transport = options.transport;
  if (!transport) {
    if (!options.engine) {
      throw new Error("createTether needs either a transport or engine options");
    }
    transport = new HttpRpcTransport(options.engine);
  }

  const client = new EngineClient(transport, { namespace: options.namespace, eventBus, logger });
  const models = new ModelManager(client, eventBus);

  return { models, client, eventBus, logger };
}

export * from "./core/errors";
export { EventBus, EventEnvelope, EventType } from "./core/eventBus";
export { TetherLogger, initializeLogger, getLogger } from "./core/logger";
export { RemoteObject, RemoteArg, RemoteCall, ModelHandle, DataFrameRef } from "./core/remote/types";
export { RemoteTransport, HttpRpcTransport, HttpRpcTransportOptions, FetchLike } from "./core/remote/transport";
export { EngineClient, DEFAULT_NAMESPACE } from "./core/remote/engineClient";
export { FittedModel, ModelBinding, ModelKind, ModelState } from "./core/models/binding";
export { serializeFormula, buildFormula, FormulaInput, FormulaSpec } from "./core/models/formula";
export {
  LabeledMatrix,
  ESTIMATE_COLUMN,
  cell,
  valueAt,
  toRows,
  flattenColumnMajor,
} from "./core/models/matrix";
export * from "./core/models/modelManager";
export { linearSvc, LinearSvcOptions, LinearSvcSummary } from "./core/models/linearSvc";
export {
  logisticRegression,
  LogisticRegressionOptions,
  LogisticRegressionSummary,
} from "./core/models/logisticRegression";
export {
  multilayerPerceptron,
  MultilayerPerceptronOptions,
  MultilayerPerceptronSummary,
  expectedWeightCount,
} from "./core/models/multilayerPerceptron";
export { naiveBayes, NaiveBayesOptions, NaiveBayesSummary } from "./core/models/naiveBayes";
