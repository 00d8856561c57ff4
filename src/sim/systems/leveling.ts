import { LEVEL_TUNING, RECIPES, STARTING_LEVEL } from "../constants";
import type { GameState, RecipeDef, RecipeId } from "../types";

// Total XP needed to reach `level`: step * (1 + 2 + ... + (level - 1)).
export function xpForLevel(level: number): number {
  const l = Math.max(STARTING_LEVEL, Math.floor(level));
  return (LEVEL_TUNING.xpStep * l * (l - 1)) / 2;
}

export function levelForXp(xp: number): number {
  const total = Math.max(0, Math.floor(xp));
  // Closed-form inverse of xpForLevel, then nudged to guard against float error.
  let level = Math.max(STARTING_LEVEL, Math.floor((1 + Math.sqrt(1 + (8 * total) / LEVEL_TUNING.xpStep)) / 2));
  while (xpForLevel(level + 1) <= total) level += 1;
  while (level > STARTING_LEVEL && xpForLevel(level) > total) level -= 1;
  return level;
}

export function xpToNextLevel(xp: number): number {
  return xpForLevel(levelForXp(xp) + 1) - Math.max(0, Math.floor(xp));
}

export function isRecipeEarned(state: GameState, recipe: RecipeDef): boolean {
  if (recipe.unlockLevel !== undefined && state.playerLevel >= recipe.unlockLevel) return true;
  if (recipe.unlockBadge !== undefined && state.completedBadgeIds.has(recipe.unlockBadge)) return true;
  return false;
}

// Unlocks every recipe whose level or badge gate is now met.
export function unlockEarnedRecipes(state: GameState): RecipeId[] {
  const unlocked: RecipeId[] = [];
  for (const recipe of RECIPES) {
    if (state.unlockedRecipeIds.has(recipe.id)) continue;
    if (!isRecipeEarned(state, recipe)) continue;
    state.unlockedRecipeIds.add(recipe.id);
    unlocked.push(recipe.id);
  }
  return unlocked;
}

export type XpGrant = {
  leveledUp: boolean;
  playerLevel: number;
  unlocked: RecipeId[];
};

export function grantXp(state: GameState, amount: number): XpGrant {
  const before = state.playerLevel;
  state.xp += Math.max(0, Math.floor(amount));
  // Never drop a level, even if an old save carried a level above its XP.
  state.playerLevel = Math.max(before, levelForXp(state.xp));
  const leveledUp = state.playerLevel > before;
  const unlocked = leveledUp ? unlockEarnedRecipes(state) : [];
  return { leveledUp, playerLevel: state.playerLevel, unlocked };
}
