import { STARTER_PLOT_COUNT, STARTER_RECIPE_IDS, STARTER_SEEDS, STARTING_COINS, STARTING_HEALTH, STARTING_LEVEL } from "./constants";
import { createStarterPlots } from "./actions";
import type { GameState } from "./types";
import { systemGrowth } from "./systems/growth";
import { xpForLevel } from "./systems/leveling";
import { createDailyQuests } from "./systems/quests";

export type InitialStateOptions = {
  plotCount?: number;
  coins?: number;
};

export function createInitialState(opts?: InitialStateOptions): GameState {
  const plotCount = Math.max(1, Math.floor(opts?.plotCount ?? STARTER_PLOT_COUNT));
  return {
    coins: Math.max(0, Math.floor(opts?.coins ?? STARTING_COINS)),
    xp: xpForLevel(STARTING_LEVEL),
    playerLevel: STARTING_LEVEL,
    seeds: { ...STARTER_SEEDS },
    harvested: {},
    plots: createStarterPlots(plotCount),
    pantry: {},
    unlockedRecipeIds: new Set(STARTER_RECIPE_IDS),
    recipeStars: {},
    health: { ...STARTING_HEALTH },
    completedBadgeIds: new Set(),
    quests: createDailyQuests(),
    lastSaved: null,
  };
}

// Applies the plot transitions due by `now`; repeat calls are no-ops.
export function tick(state: GameState, now: Date): number {
  return systemGrowth(state, now);
}
