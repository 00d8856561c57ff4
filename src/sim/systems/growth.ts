import { VEGETABLES } from "../constants";
import { addSeconds, MS_PER_SECOND, msBetween } from "../time";
import type { GameState, GardenPlot, PlantedPlot, PlotState } from "../types";

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function growthMs(plot: PlantedPlot): number {
  return VEGETABLES[plot.vegetable].growthSeconds * MS_PER_SECOND;
}

export function plotReadyAt(plot: PlantedPlot): Date {
  return new Date(plot.plantedAt.getTime() + plot.pausedMs + growthMs(plot));
}

// When the current neglect window runs out, or null for vegetables that never need water.
export function neglectDeadline(plot: PlantedPlot): Date | null {
  const policy = VEGETABLES[plot.vegetable].water;
  if (policy === null) return null;
  return addSeconds(plot.wateredAt, policy.neglectSeconds);
}

export type PlotEvaluation = {
  state: PlotState;
  thirstySince: Date | null;
};

// Where a plot stands at `now`, without mutating it.
export function evaluatePlot(plot: GardenPlot, now: Date): PlotEvaluation {
  if (plot.state !== "growing") {
    return { state: plot.state, thirstySince: plot.thirstySince };
  }

  const readyAt = plotReadyAt(plot);
  const deadline = neglectDeadline(plot);

  // A plot that finishes growing before the neglect window closes never gets thirsty.
  if (deadline !== null && deadline < readyAt && now >= deadline) {
    return { state: "needsWater", thirstySince: deadline };
  }
  if (now >= readyAt) {
    return { state: "ready", thirstySince: null };
  }
  return { state: "growing", thirstySince: null };
}

export function refreshPlot(plot: GardenPlot, now: Date): boolean {
  if (plot.state !== "growing") return false;
  const next = evaluatePlot(plot, now);
  if (next.state === "empty" || next.state === plot.state) return false;
  plot.state = next.state;
  plot.thirstySince = next.thirstySince;
  return true;
}

// Applies every pending time-driven transition. Returns how many plots changed.
export function systemGrowth(state: GameState, now: Date): number {
  let changed = 0;
  for (const plot of state.plots) {
    if (refreshPlot(plot, now)) changed += 1;
  }
  return changed;
}

export function growthProgress(plot: GardenPlot, now: Date): number {
  if (plot.state === "empty") return 0;

  const evaluation = evaluatePlot(plot, now);
  if (evaluation.state === "ready") return 1;

  // Growth is frozen while the plot waits for water.
  const asOf = evaluation.thirstySince ?? now;
  const elapsed = msBetween(plot.plantedAt, asOf) - plot.pausedMs;
  return clamp(elapsed / growthMs(plot), 0, 1);
}

export function secondsUntilReady(plot: GardenPlot, now: Date): number | null {
  if (plot.state === "empty") return null;
  const evaluation = evaluatePlot(plot, now);
  if (evaluation.state === "ready") return 0;
  if (evaluation.state === "needsWater") return null;
  return Math.max(0, msBetween(now, plotReadyAt(plot)) / MS_PER_SECOND);
}
