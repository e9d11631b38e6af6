/**
 * Linear SVM binding tests
 */

import { InvalidConfigurationError } from "../src/core/errors";
import { EventBus } from "../src/core/eventBus";
import { valueAt } from "../src/core/models/matrix";
import { ModelManager } from "../src/core/models/modelManager";
import { EngineClient } from "../src/core/remote/engineClient";
import { RemoteObject } from "../src/core/remote/types";
import { InMemoryEngine } from "./fakes/inMemoryEngine";

const data = new RemoteObject("df-0");

function setup() {
  const engine = new InMemoryEngine().onFit("LinearSVCWrapper", {
    features: ["age", "income"],
    labels: ["0", "1"],
    coefficients: [0.5, -1.25],
    intercept: 0.1,
    numClasses: 2,
    numFeatures: 2,
  });
  const eventBus = new EventBus();
  const models = new ModelManager(new EngineClient(engine, { eventBus }), eventBus);
  return { engine, eventBus, models };
}

describe("linear SVM", () => {
  test("sends defaults in positional order", async () => {
    const { engine, models } = setup();

    const model = await models.svmLinear(data, "label~age+income");

    expect(model.kind).toBe("linearSvc");
    expect(model.state).toBe("fitted");
    expect(model.handle.id).toBe("obj-1");
    expect(engine.callsTo("fit")[0]).toEqual({
      target: { className: "ml.wrappers.LinearSVCWrapper" },
      method: "fit",
      args: [
        { type: "ref", value: "df-0" },
        { type: "string", value: "label ~ age + income" },
        { type: "double", value: 0 },
        { type: "integer", value: 100 },
        { type: "double", value: 1e-6 },
        { type: "boolean", value: true },
        { type: "double", value: 0 },
        { type: "null" },
        { type: "integer", value: 2 },
      ],
    });
  });

  test("passes explicit options and truncates integers", async () => {
    const { engine, models } = setup();

    await models.svmLinear(data, "label ~ .", {
      regParam: 0.01,
      maxIter: 50.9,
      standardization: false,
      threshold: -0.5,
      weightCol: "w",
      aggregationDepth: 3,
    });

    expect(engine.callsTo("fit")[0].args.slice(2)).toEqual([
      { type: "double", value: 0.01 },
      { type: "integer", value: 50 },
      { type: "double", value: 1e-6 },
      { type: "boolean", value: false },
      { type: "double", value: -0.5 },
      { type: "string", value: "w" },
      { type: "integer", value: 3 },
    ]);
  });

  test("an empty weight column is the same as none", async () => {
    const { engine, models } = setup();

    await models.svmLinear(data, "label ~ age", { weightCol: "" });
    await models.svmLinear(data, "label ~ age");

    const [first, second] = engine.callsTo("fit");
    expect(first.args).toEqual(second.args);
  });

  test.each([
    [{ regParam: -1 }, "regParam"],
    [{ maxIter: 0 }, "maxIter"],
    [{ tol: 0 }, "tol"],
    [{ aggregationDepth: 1 }, "aggregationDepth"],
    [{ bogus: true }, "Unrecognized key"],
  ])("rejects %p before any remote call", async (options, fragment) => {
    const { engine, models } = setup();

    const attempt = models.fitKind("linearSvc", data, "label ~ age", options);
    await expect(attempt).rejects.toBeInstanceOf(InvalidConfigurationError);
    await expect(attempt).rejects.toThrow(fragment);
    expect(engine.calls).toHaveLength(0);
  });

  test("rejects a malformed formula before any remote call", async () => {
    const { engine, models } = setup();
    await expect(models.svmLinear(data, "label ~")).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(engine.calls).toHaveLength(0);
  });

  test("summarizes a binary model", async () => {
    const { models } = setup();
    const model = await models.svmLinear(data, "label ~ age + income");

    const summary = await model.summary();

    expect(summary.coefficients.rowNames).toEqual(["age", "income"]);
    expect(summary.coefficients.colNames).toEqual(["Estimate"]);
    expect(valueAt(summary.coefficients, "income", "Estimate")).toBe(-1.25);
    expect(summary.intercept).toBe(0.1);
    expect(summary.numClasses).toBe(2);
    expect(summary.numFeatures).toBe(2);
  });

  test("predict returns the scored table", async () => {
    const { engine, eventBus, models } = setup();
    const model = await models.svmLinear(data, "label ~ age");

    const scored = await model.predict(new RemoteObject("df-5"));

    expect(scored.id).toBe("df-2");
    expect(engine.callsTo("transform")[0].target).toEqual({ ref: "obj-1" });
    expect(eventBus.getHistory({ type: "ModelPredictEvent" })[0].payload).toEqual({
      kind: "linearSvc",
      handle: "obj-1",
      data: "df-5",
      result: "df-2",
    });
  });

  test("publishes a fit event", async () => {
    const { eventBus, models } = setup();
    await models.svmLinear(data, { label: "label", terms: ["age", "income"] });

    const [fit] = eventBus.getHistory({ type: "ModelFitEvent" });
    expect(fit.payload).toMatchObject({ kind: "linearSvc", formula: "label ~ age + income", handle: "obj-1" });
  });
});
