import { describe, expect, it } from "vitest";

import { harvestAt, plantAt, waterAt } from "../actions";
import { createInitialState } from "../tick";
import { at, errorKind, T0 } from "./helpers";

describe("plantAt", () => {
  it("plants into an empty plot and spends one seed", () => {
    const state = createInitialState();
    const planted = plantAt(state, 2, "carrot", T0);

    expect(planted).toMatchObject({ id: 2, state: "growing", vegetable: "carrot", pausedMs: 0 });
    expect(planted.plantedAt).toEqual(T0);
    expect(state.plots[2]).toBe(planted);
    expect(state.seeds.carrot).toBe(2);
  });

  it("rejects an occupied plot without touching seeds", () => {
    const state = createInitialState();
    plantAt(state, 0, "carrot", T0);

    expect(errorKind(() => plantAt(state, 0, "lettuce", at(1)))).toBe("InvalidState");
    expect(state.seeds.lettuce).toBe(5);
    expect(state.plots[0].vegetable).toBe("carrot");
  });

  it("rejects a vegetable with no seeds", () => {
    const state = createInitialState();

    expect(errorKind(() => plantAt(state, 0, "cucumber", T0))).toBe("InsufficientSeeds");
    expect(state.plots[0].state).toBe("empty");
  });

  it("rejects an unknown plot id", () => {
    const state = createInitialState();
    expect(errorKind(() => plantAt(state, 99, "carrot", T0))).toBe("InvalidState");
  });

  it("drops the seed entry when the last seed is planted", () => {
    const state = createInitialState();
    plantAt(state, 0, "carrot", T0);
    plantAt(state, 1, "carrot", T0);
    plantAt(state, 2, "carrot", T0);

    expect("carrot" in state.seeds).toBe(false);
    expect(errorKind(() => plantAt(state, 3, "carrot", T0))).toBe("InsufficientSeeds");
  });

  it("counts towards the planting quest", () => {
    const state = createInitialState();
    plantAt(state, 0, "lettuce", T0);

    expect(state.quests.find((q) => q.id === "green-thumb")?.progress).toBe(1);
  });
});

describe("harvestAt", () => {
  it("refuses plots that are not ready", () => {
    const state = createInitialState();
    plantAt(state, 0, "carrot", T0);

    expect(errorKind(() => harvestAt(state, 0, at(59)))).toBe("InvalidState");
    expect(errorKind(() => harvestAt(state, 1, at(59)))).toBe("InvalidState");
    expect(state.harvested).toEqual({});
  });

  it("collects the yield, pays its value, grants XP and empties the plot", () => {
    const state = createInitialState();
    plantAt(state, 0, "carrot", T0);

    const result = harvestAt(state, 0, at(60));

    expect(result).toEqual({
      leveledUp: false,
      playerLevel: 1,
      unlocked: [],
      vegetable: "carrot",
      quantity: 1,
      coins: 5,
    });
    expect(state.harvested).toEqual({ carrot: 1 });
    expect(state.xp).toBe(10);
    expect(state.coins).toBe(105);
    expect(state.plots[0].state).toBe("empty");
    expect(state.quests.find((q) => q.id === "harvest-time")?.progress).toBe(1);
  });

  it("harvests four tomatoes once a thirsty plant is watered", () => {
    const state = createInitialState();
    plantAt(state, 0, "tomato", T0);

    expect(errorKind(() => harvestAt(state, 0, at(90)))).toBe("InvalidState");
    expect(state.plots[0].state).toBe("needsWater");

    waterAt(state, 0, at(90));
    const result = harvestAt(state, 0, at(120));
    expect(result.quantity).toBe(4);
    expect(result.coins).toBe(32);
    expect(state.harvested.tomato).toBe(4);
    expect(state.coins).toBe(132);
  });
});
