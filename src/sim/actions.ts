import { HARVEST_XP, VEGETABLES } from "./constants";
import { GameError } from "./errors";
import type { EmptyPlot, GameState, GardenPlot, PlantedPlot, VegetableId } from "./types";
import { refreshPlot } from "./systems/growth";
import { grantXp, type XpGrant } from "./systems/leveling";
import { recordQuestProgress } from "./systems/quests";

export function createEmptyPlot(id: number): EmptyPlot {
  return {
    id,
    state: "empty",
    vegetable: null,
    plantedAt: null,
    wateredAt: null,
    thirstySince: null,
    pausedMs: 0,
  };
}

export function createStarterPlots(count: number): GardenPlot[] {
  return Array.from({ length: count }, (_, i) => createEmptyPlot(i));
}

function getPlot(state: GameState, plotId: number): GardenPlot {
  const plot = state.plots.find((p) => p.id === plotId);
  if (!plot) {
    throw new GameError("InvalidState", `no plot with id ${plotId}`, { details: { plotId } });
  }
  return plot;
}

function replacePlot(state: GameState, next: GardenPlot): void {
  const idx = state.plots.findIndex((p) => p.id === next.id);
  state.plots[idx] = next;
}

function wrongState(plot: GardenPlot, action: string): GameError {
  return new GameError("InvalidState", `cannot ${action} plot ${plot.id} while it is ${plot.state}`, {
    details: { plotId: plot.id, state: plot.state },
  });
}

export function plantAt(state: GameState, plotId: number, vegetable: VegetableId, now: Date): PlantedPlot {
  const plot = getPlot(state, plotId);
  if (plot.state !== "empty") throw wrongState(plot, "plant");

  const seeds = state.seeds[vegetable] ?? 0;
  if (seeds <= 0) {
    throw new GameError("InsufficientSeeds", `no ${VEGETABLES[vegetable].label} seeds left`, {
      details: { vegetable },
    });
  }

  if (seeds === 1) delete state.seeds[vegetable];
  else state.seeds[vegetable] = seeds - 1;

  const planted: PlantedPlot = {
    id: plot.id,
    state: "growing",
    vegetable,
    plantedAt: new Date(now),
    wateredAt: new Date(now),
    thirstySince: null,
    pausedMs: 0,
  };
  replacePlot(state, planted);
  recordQuestProgress(state, "plant");
  return planted;
}

export function waterAt(state: GameState, plotId: number, now: Date): void {
  const plot = getPlot(state, plotId);
  refreshPlot(plot, now);
  if (plot.state !== "needsWater" || plot.thirstySince === null) throw wrongState(plot, "water");

  plot.pausedMs += Math.max(0, now.getTime() - plot.thirstySince.getTime());
  plot.wateredAt = new Date(now);
  plot.thirstySince = null;
  plot.state = "growing";
  refreshPlot(plot, now);
}

export type HarvestResult = XpGrant & {
  vegetable: VegetableId;
  quantity: number;
  coins: number;
};

export function harvestAt(state: GameState, plotId: number, now: Date): HarvestResult {
  const plot = getPlot(state, plotId);
  refreshPlot(plot, now);
  if (plot.state !== "ready") throw wrongState(plot, "harvest");

  const vegetable = plot.vegetable;
  const def = VEGETABLES[vegetable];
  const quantity = def.harvestYield;
  const coins = def.harvestValue * quantity;
  state.harvested[vegetable] = (state.harvested[vegetable] ?? 0) + quantity;
  state.coins += coins;
  replacePlot(state, createEmptyPlot(plot.id));

  recordQuestProgress(state, "harvest");
  return { ...grantXp(state, HARVEST_XP), vegetable, quantity, coins };
}
