/**
 * tests/cli/inspect.test.ts
 * `tether inspect` against the in-process engine
 */

import { InMemoryEngine } from "../fakes/inMemoryEngine";
import { cliHarness } from "./harness";

describe("tether inspect", () => {
  test("prints the perceptron summary of a saved model and releases it", async () => {
    const engine = new InMemoryEngine();
    engine.storage.set("/models/mlp", {
      className: "ml.wrappers.MultilayerPerceptronClassifierWrapper",
      attributes: { layers: [1, 2], weights: [1, 2, 3, 4] },
    });
    const cli = cliHarness(engine);

    await cli.run("inspect", "/models/mlp");

    expect(cli.err).toEqual([]);
    expect(cli.out).toEqual([
      "multilayerPerceptron model obj-1 (loaded)",
      "numOfInputs: 1\n\nnumOfOutputs: 2\n\nlayers: [1, 2]\n\nweights: [1, 2, 3, 4]",
    ]);
    expect(engine.callsTo("release")).toHaveLength(1);
  });

  test("explains when no summary is available", async () => {
    const engine = new InMemoryEngine();
    engine.storage.set("/models/logit", { className: "ml.wrappers.LogisticRegressionWrapper", attributes: {} });
    const cli = cliHarness(engine);

    await cli.run("inspect", "/models/logit");

    expect(cli.out).toEqual([
      "logisticRegression model obj-1 (loaded)",
      "Summary is not available for models read from storage.",
    ]);
    expect(engine.objects.size).toBe(0);
  });

  test("reports a missing path and exits 1", async () => {
    const cli = cliHarness(new InMemoryEngine());

    await cli.run("inspect", "/models/none");

    expect(cli.err).toEqual(["RemoteCallError: Path does not exist: /models/none"]);
    expect(cli.exitCodes).toEqual([1]);
  });
});
