import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { SimulationStatistics } from "../../src/core/stats/SimulationStatistics";

describe("SimulationStatistics", () => {
  it("starts from zero", () => {
    const snapshot = new SimulationStatistics().getSnapshot();

    assert.deepEqual(snapshot, {
      instructionsRetired: 0,
      notTaken: { predictions: 0, mispredictions: 0 },
      backwardTaken: { predictions: 0, mispredictions: 0 },
      bimodal: {
        predictions: 0,
        mispredictions: 0,
        predictionsByCounter: [0, 0, 0, 0],
        mispredictionsByCounter: [0, 0, 0, 0],
      },
      gshare: {
        predictions: 0,
        mispredictions: 0,
        predictionsByCounter: [0, 0, 0, 0],
        mispredictionsByCounter: [0, 0, 0, 0],
      },
      exitReason: "exit",
    });
  });

  it("hands out snapshots that later records do not change", () => {
    const statistics = new SimulationStatistics();
    statistics.recordRetired();
    statistics.recordPrediction("gshare", { taken: true, counter: 3 }, false);

    const first = statistics.getSnapshot();
    statistics.recordRetired();
    statistics.recordPrediction("gshare", { taken: true, counter: 2 }, true);

    assert.ok(Object.isFrozen(first));
    assert.equal(first.instructionsRetired, 1);
    assert.deepEqual(first.gshare.predictionsByCounter, [0, 0, 0, 1]);
    assert.deepEqual(first.gshare.mispredictionsByCounter, [0, 0, 0, 1]);
    assert.equal(statistics.getSnapshot().gshare.predictions, 2);
  });

  it("records the fault that ended a run", () => {
    const statistics = new SimulationStatistics();
    const snapshot = statistics.getSnapshot("fault", { name: "InvalidInstruction", message: "bad", pc: 0x40 });

    assert.equal(snapshot.exitReason, "fault");
    assert.deepEqual(snapshot.fault, { name: "InvalidInstruction", message: "bad", pc: 0x40 });
  });

  it("resets every tally", () => {
    const statistics = new SimulationStatistics();
    statistics.recordRetired();
    statistics.recordPrediction("notTaken", { taken: false }, true);
    statistics.reset();

    const snapshot = statistics.getSnapshot();
    assert.equal(snapshot.instructionsRetired, 0);
    assert.deepEqual(snapshot.notTaken, { predictions: 0, mispredictions: 0 });
  });
});
