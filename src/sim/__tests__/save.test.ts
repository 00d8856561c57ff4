import { describe, expect, it, vi } from "vitest";

import { harvestAt, plantAt } from "../actions";
import { SAVE_KEY } from "../constants";
import { isGameError } from "../errors";
import { parseProgress, ProgressionStore, serializeProgress } from "../save";
import { MemoryStorage } from "../storage";
import { createInitialState, tick } from "../tick";
import { buyPantryItem } from "../systems/economy";
import { cook } from "../systems/recipes";
import { at, T0 } from "./helpers";

function fakeLogger() {
  return { warn: vi.fn(), info: vi.fn() };
}

class FlakyStorage extends MemoryStorage {
  failures = 0;

  async write(key: string, data: string): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("disk full");
    }
    await super.write(key, data);
  }
}

class SlowStorage extends MemoryStorage {
  inFlight = 0;
  maxInFlight = 0;
  readonly writes: string[] = [];

  async write(key: string, data: string): Promise<void> {
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.writes.push(data);
    this.inFlight -= 1;
    await super.write(key, data);
  }
}

function playedState() {
  const state = createInitialState();
  buyPantryItem(state, "dressing");
  plantAt(state, 0, "lettuce", T0);
  plantAt(state, 1, "lettuce", T0);
  harvestAt(state, 0, at(30));
  harvestAt(state, 1, at(30));
  cook(state, "garden-salad", { score: 90 });
  plantAt(state, 2, "tomato", at(40));
  tick(state, at(100));
  return state;
}

describe("ProgressionStore", () => {
  it("starts a new game when nothing is stored", async () => {
    const logger = fakeLogger();
    const store = new ProgressionStore(new MemoryStorage(), { logger });

    const state = await store.load();

    expect(serializeProgress(state)).toBe(serializeProgress(createInitialState()));
    expect(logger.info).toHaveBeenCalledWith("[save] no saved progress, starting a new game", { key: SAVE_KEY });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("restores exactly what was saved", async () => {
    const logger = fakeLogger();
    const store = new ProgressionStore(new MemoryStorage(), { logger, now: () => at(120) });
    const state = playedState();

    await store.save(state);
    expect(state.lastSaved).toEqual(at(120));

    const loaded = await store.load();
    expect(serializeProgress(loaded)).toBe(serializeProgress(state));
    expect(loaded.plots[2]).toEqual(state.plots[2]);
    expect(loaded.plots[2].state).toBe("needsWater");
    expect(loaded.recipeStars).toEqual({ "garden-salad": 3 });
    expect(loaded.completedBadgeIds.has("first-flip")).toBe(true);
    expect(loaded.unlockedRecipeIds.has("cheesy-broccoli-bites")).toBe(true);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("writes identical bytes when an unchanged state is saved again", async () => {
    const storage = new MemoryStorage();
    const store = new ProgressionStore(storage, { now: () => at(120), logger: fakeLogger() });

    await store.save(playedState());
    const first = await storage.read(SAVE_KEY);

    await store.save(await store.load());
    expect(await storage.read(SAVE_KEY)).toBe(first);
  });

  it("resets to a new game and persists it", async () => {
    const storage = new MemoryStorage();
    const store = new ProgressionStore(storage, { logger: fakeLogger() });
    await store.save(playedState());

    const fresh = await store.reset();
    expect(fresh.coins).toBe(100);
    expect((await store.load()).harvested).toEqual({});
  });

  it("keeps progress in memory and rethrows when a write fails", async () => {
    const logger = fakeLogger();
    const storage = new FlakyStorage();
    storage.failures = 1;
    const store = new ProgressionStore(storage, { logger, now: () => at(5) });
    const state = createInitialState();
    state.coins = 77;

    await expect(store.save(state)).rejects.toMatchObject({ name: "GameError", kind: "PersistenceWriteFailed" });
    expect(state.lastSaved).toBeNull();
    expect(state.coins).toBe(77);
    expect(await storage.read(SAVE_KEY)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toBe("[save] write failed, progress kept in memory");

    await store.save(state);
    expect(state.lastSaved).toEqual(at(5));
    expect((await store.load()).coins).toBe(77);
  });

  it("does not report a save time when two queued writes both fail", async () => {
    const storage = new FlakyStorage();
    storage.failures = 2;
    let seconds = 0;
    const store = new ProgressionStore(storage, { logger: fakeLogger(), now: () => at(++seconds) });
    const state = createInitialState();

    await Promise.all([
      expect(store.save(state)).rejects.toMatchObject({ kind: "PersistenceWriteFailed" }),
      expect(store.save(state)).rejects.toMatchObject({ kind: "PersistenceWriteFailed" }),
    ]);
    expect(await storage.read(SAVE_KEY)).toBeNull();
    expect(state.lastSaved).toBeNull();
  });

  it("falls back to the last write that landed when a later one fails", async () => {
    const storage = new FlakyStorage();
    let seconds = 0;
    const store = new ProgressionStore(storage, { logger: fakeLogger(), now: () => at(++seconds) });
    const state = createInitialState();

    await store.save(state);
    expect(state.lastSaved).toEqual(at(1));

    storage.failures = 1;
    await expect(store.save(state)).rejects.toMatchObject({ kind: "PersistenceWriteFailed" });
    expect(state.lastSaved).toEqual(at(1));
  });

  it("runs saves one at a time, each with the state it was given", async () => {
    const storage = new SlowStorage();
    const store = new ProgressionStore(storage, { logger: fakeLogger() });
    const state = createInitialState();

    const first = store.save(state);
    state.coins = 50;
    const second = store.save(state);
    await Promise.all([first, second]);
    await store.flush();

    expect(storage.maxInFlight).toBe(1);
    expect(storage.writes.map((w) => JSON.parse(w).coins)).toEqual([100, 50]);
  });
});

describe("parseProgress", () => {
  it("fills gaps in a partial snapshot with new-player values", () => {
    const logger = fakeLogger();
    const state = parseProgress('{"version":1,"coins":42}', logger);

    expect(state.coins).toBe(42);
    expect(state.seeds).toEqual({ lettuce: 5, carrot: 3, tomato: 3 });
    expect(state.plots).toHaveLength(4);
    expect([...state.unlockedRecipeIds].sort()).toEqual(["garden-salad", "veggie-wrap"]);
    expect(state.playerLevel).toBe(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("drops ids the catalog no longer knows", () => {
    const logger = fakeLogger();
    const raw = JSON.stringify({
      version: 1,
      unlockedRecipeIds: ["veggie-wrap", "space-soup"],
      pantry: [
        { id: "dragonfruit", quantity: 2 },
        { id: "salt", quantity: 3 },
      ],
    });

    const state = parseProgress(raw, logger);

    expect(state.pantry).toEqual({ salt: 3 });
    expect(state.unlockedRecipeIds.has("space-soup")).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("[save] dropped entries that no longer match the catalog", {
      dropped: ["space-soup", "dragonfruit"],
    });
  });

  it.each([
    ["malformed JSON", "{not json"],
    ["wrong field types", '{"coins":"lots"}'],
    ["a top-level array", "[]"],
    ["null", "null"],
  ])("falls back to a new game on %s", (_label, raw) => {
    const logger = fakeLogger();
    const state = parseProgress(raw, logger);

    expect(state.coins).toBe(100);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    const [message, error] = logger.warn.mock.calls[0];
    expect(message).toBe("[save] falling back to a new game");
    expect(isGameError(error, "PersistenceCorrupt")).toBe(true);
  });

  it("warns about snapshots from a newer build but still loads them", () => {
    const logger = fakeLogger();
    const state = parseProgress('{"version":99,"coins":5}', logger);

    expect(state.coins).toBe(5);
    expect(logger.warn).toHaveBeenCalledWith("[save] snapshot comes from a newer build", { version: 99, supported: 1 });
  });

  it("rounds and clamps health stats", () => {
    const state = parseProgress('{"health":{"brain":140,"heart":-3,"immune":42.6}}', fakeLogger());
    expect(state.health).toEqual({ brain: 100, muscle: 50, bone: 50, heart: 0, immune: 43, energy: 50 });
  });

  it("clamps star ratings and drops stars for locked recipes", () => {
    const logger = fakeLogger();
    const raw = JSON.stringify({
      unlockedRecipeIds: ["carrot-sticks"],
      recipeStars: { "garden-salad": 7, "carrot-sticks": 2, "pumpkin-soup": 3 },
    });

    const state = parseProgress(raw, logger);

    expect(state.recipeStars).toEqual({ "garden-salad": 3, "carrot-sticks": 2 });
    expect(logger.warn).toHaveBeenCalledWith("[save] dropped entries that no longer match the catalog", {
      dropped: ["stars:pumpkin-soup"],
    });
  });

  it("restores planted plots and drops ones it cannot rebuild", () => {
    const logger = fakeLogger();
    const raw = JSON.stringify({
      plots: [
        { id: 1, state: "growing", vegetable: "dragonfruit", plantedAt: T0.toISOString() },
        { id: 0, state: "growing", vegetable: "carrot", plantedAt: T0.toISOString() },
        { id: 0, state: "empty" },
      ],
    });

    const state = parseProgress(raw, logger);

    expect(state.plots.map((p) => [p.id, p.state, p.vegetable])).toEqual([
      [0, "growing", "carrot"],
      [1, "empty", null],
    ]);
    expect(state.plots[0].wateredAt).toEqual(T0);
    expect(logger.warn).toHaveBeenCalledWith("[save] dropped entries that no longer match the catalog", {
      dropped: ["plot:0", "plot:1"],
    });

    tick(state, at(60));
    expect(state.plots[0].state).toBe("ready");
  });

  it("derives the level from XP and unlocks what that level earns", () => {
    const state = parseProgress('{"xp":350,"playerLevel":1}', fakeLogger());

    expect(state.playerLevel).toBe(3);
    expect(state.unlockedRecipeIds.has("veggie-omelette")).toBe(true);
    expect(state.unlockedRecipeIds.has("pumpkin-soup")).toBe(false);
  });
});
