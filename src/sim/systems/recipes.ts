import {
  BADGES_BY_ID,
  COOK_TUNING,
  FIRST_COOK_BADGE,
  HEALTH_STATS,
  HEALTH_TUNING,
  RECIPES,
  RECIPES_BY_ID,
} from "../constants";
import { GameError } from "../errors";
import type {
  BadgeId,
  CookContext,
  CookResult,
  GameState,
  HealthStat,
  MissingIngredients,
  PantryItemId,
  RecipeDef,
  RecipeId,
  Shortfall,
  VegetableId,
} from "../types";
import { consumeHarvest, consumePantry, harvestedQuantity, pantryQuantity } from "./economy";
import { grantXp, unlockEarnedRecipes } from "./leveling";
import { recordQuestProgress } from "./quests";

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function entries<K extends string>(record: Partial<Record<K, number>>): [K, number][] {
  const out: [K, number][] = [];
  for (const key of Object.keys(record) as K[]) {
    const n = record[key];
    if (n !== undefined && n > 0) out.push([key, n]);
  }
  return out;
}

export function getRecipe(recipeId: RecipeId): RecipeDef {
  const recipe = RECIPES_BY_ID.get(recipeId);
  if (!recipe) {
    throw new GameError("InvalidState", `unknown recipe "${recipeId}"`, { details: { recipeId } });
  }
  return recipe;
}

export function isUnlocked(state: GameState, recipeId: RecipeId): boolean {
  return state.unlockedRecipeIds.has(recipeId);
}

export function missingIngredients(state: GameState, recipe: RecipeDef): MissingIngredients {
  const vegetables: Shortfall<VegetableId>[] = [];
  for (const [id, required] of entries(recipe.vegetables)) {
    const available = harvestedQuantity(state, id);
    if (available < required) vegetables.push({ id, required, available });
  }
  const pantry: Shortfall<PantryItemId>[] = [];
  for (const [id, required] of entries(recipe.pantry)) {
    const available = pantryQuantity(state, id);
    if (available < required) pantry.push({ id, required, available });
  }
  return { vegetables, pantry };
}

export function hasIngredients(state: GameState, recipe: RecipeDef): boolean {
  const missing = missingIngredients(state, recipe);
  return missing.vegetables.length === 0 && missing.pantry.length === 0;
}

// Unlocked recipes the current inventory covers. Re-reads the inventory on every call.
export function* cookableRecipes(state: GameState): Generator<RecipeDef> {
  for (const recipe of RECIPES) {
    if (!isUnlocked(state, recipe.id)) continue;
    if (hasIngredients(state, recipe)) yield recipe;
  }
}

// One star per threshold in `starThresholds` the score reaches.
export function rateCook(recipe: RecipeDef, score: number): number {
  const s = clamp(Number.isFinite(score) ? score : 0, 0, 100);
  const stars = recipe.starThresholds.filter((t) => s >= t).length;
  return clamp(stars, 0, COOK_TUNING.maxStars);
}

export function applyHealth(state: GameState, deltas: Partial<Record<HealthStat, number>>): void {
  for (const stat of HEALTH_STATS) {
    const delta = deltas[stat];
    if (delta === undefined) continue;
    state.health[stat] = clamp(state.health[stat] + delta, HEALTH_TUNING.min, HEALTH_TUNING.max);
  }
}

export function cook(state: GameState, recipeId: RecipeId, ctx: CookContext = {}): CookResult {
  const recipe = getRecipe(recipeId);
  if (!isUnlocked(state, recipe.id)) {
    throw new GameError("RecipeLocked", `"${recipe.title}" is still locked`, { details: { recipeId } });
  }

  // Validate everything up front so a shortfall leaves the inventory untouched.
  const missing = missingIngredients(state, recipe);
  if (missing.vegetables.length > 0 || missing.pantry.length > 0) {
    throw new GameError("RecipeNotCookable", `missing ingredients for "${recipe.title}"`, {
      details: { recipeId, missing },
    });
  }

  for (const [id, n] of entries(recipe.vegetables)) consumeHarvest(state, id, n);
  for (const [id, n] of entries(recipe.pantry)) consumePantry(state, id, n);

  const firstCook = Object.keys(state.recipeStars).length === 0;
  const stars = rateCook(recipe, ctx.score ?? COOK_TUNING.defaultScore);
  const bestStars = Math.max(state.recipeStars[recipe.id] ?? 0, stars);
  state.recipeStars[recipe.id] = bestStars;

  state.coins += recipe.coinReward;
  applyHealth(state, recipe.health);
  const grant = grantXp(state, recipe.xpReward);
  const unlocked = [...grant.unlocked];
  if (firstCook) unlocked.push(...completeBadge(state, FIRST_COOK_BADGE));
  recordQuestProgress(state, "cook");

  return {
    recipeId: recipe.id,
    stars,
    bestStars,
    coins: recipe.coinReward,
    xp: recipe.xpReward,
    leveledUp: grant.leveledUp,
    playerLevel: state.playerLevel,
    unlocked,
  };
}

// Returns false when the recipe was already unlocked.
export function unlockRecipe(state: GameState, recipeId: RecipeId): boolean {
  const recipe = getRecipe(recipeId);
  if (state.unlockedRecipeIds.has(recipe.id)) return false;
  state.unlockedRecipeIds.add(recipe.id);
  return true;
}

// Records a badge and returns the recipes it unlocked.
export function completeBadge(state: GameState, badgeId: BadgeId): RecipeId[] {
  if (!BADGES_BY_ID.has(badgeId)) {
    throw new GameError("InvalidState", `unknown badge "${badgeId}"`, { details: { badgeId } });
  }
  if (state.completedBadgeIds.has(badgeId)) return [];
  state.completedBadgeIds.add(badgeId);
  return unlockEarnedRecipes(state);
}
