export * from "./sim/types";
export * from "./sim/constants";
export { GameError, isGameError, type GameErrorKind } from "./sim/errors";
export { createInitialState, tick, type InitialStateOptions } from "./sim/tick";
export { harvestAt, plantAt, waterAt, type HarvestResult } from "./sim/actions";
export { evaluatePlot, growthProgress, plotReadyAt, secondsUntilReady } from "./sim/systems/growth";
export {
  buyPantryItem,
  buySeeds,
  canAfford,
  harvestedQuantity,
  pantryQuantity,
  pantryRefund,
  seedQuantity,
  sellHarvest,
  sellPantryItem,
} from "./sim/systems/economy";
export {
  completeBadge,
  cook,
  cookableRecipes,
  getRecipe,
  isUnlocked,
  missingIngredients,
  rateCook,
  unlockRecipe,
} from "./sim/systems/recipes";
export { grantXp, levelForXp, xpForLevel, xpToNextLevel, type XpGrant } from "./sim/systems/leveling";
export { claimQuest, isQuestComplete, resetDailyQuests } from "./sim/systems/quests";
export { FileStorage, MemoryStorage, type StorageAdapter } from "./sim/storage";
export {
  parseProgress,
  ProgressionStore,
  serializeProgress,
  type Logger,
  type ProgressionStoreOptions,
} from "./sim/save";
export {
  GameSession,
  type ChangeSource,
  type DeepReadonly,
  type GameSessionOptions,
  type Intent,
  type SessionEvent,
  type SessionListener,
} from "./sim/session";
