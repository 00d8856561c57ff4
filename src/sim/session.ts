import { harvestAt, plantAt, waterAt } from "./actions";
import { GameError, isGameError } from "./errors";
import type { ProgressionStore } from "./save";
import { tick } from "./tick";
import type {
  BadgeId,
  CookContext,
  CookResult,
  GameState,
  PantryItemId,
  RecipeDef,
  RecipeId,
  VegetableId,
} from "./types";
import { buyPantryItem, buySeeds, pantryQuantity, sellHarvest, sellPantryItem } from "./systems/economy";
import { growthProgress } from "./systems/growth";
import { claimQuest } from "./systems/quests";
import { completeBadge, cook, cookableRecipes, unlockRecipe } from "./systems/recipes";

export type DeepReadonly<T> = T extends Date
  ? Readonly<Date>
  : T extends ReadonlySet<infer U>
    ? ReadonlySet<DeepReadonly<U>>
    : T extends (infer U)[]
      ? readonly DeepReadonly<U>[]
      : T extends object
        ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
        : T;

export type Intent =
  | "plant"
  | "water"
  | "harvest"
  | "buyPantryItem"
  | "sellPantryItem"
  | "buySeeds"
  | "sellHarvest"
  | "cook"
  | "unlock"
  | "completeBadge"
  | "claimQuest";

// "tick" marks plot transitions the clock applied before an intent or query ran.
export type ChangeSource = Intent | "tick";

export type SessionEvent =
  | { type: "changed"; intent: ChangeSource; state: DeepReadonly<GameState> }
  | { type: "rejected"; intent: Intent; error: GameError };

export type SessionListener = (event: SessionEvent) => void;

export type GameSessionOptions = {
  now?: () => Date;
  store?: ProgressionStore;
};

// Owns the running game state. Intents return true on success and false on a
// recoverable engine failure; listeners get a read-only view after each change.
export class GameSession {
  private readonly state: GameState;
  private readonly now: () => Date;
  private readonly store: ProgressionStore | null;
  private readonly listeners = new Set<SessionListener>();
  private lastCook: CookResult | null = null;

  constructor(state: GameState, opts: GameSessionOptions = {}) {
    this.state = state;
    this.now = opts.now ?? (() => new Date());
    this.store = opts.store ?? null;
  }

  static async open(store: ProgressionStore, opts: Omit<GameSessionOptions, "store"> = {}): Promise<GameSession> {
    const state = await store.load();
    return new GameSession(state, { ...opts, store });
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: SessionEvent): void {
    for (const listener of [...this.listeners]) listener(event);
  }

  // Time-driven transitions are part of what the caller sees, so listeners hear
  // about them even when the intent that triggered the tick is rejected.
  private advance(now: Date): void {
    if (tick(this.state, now) > 0) this.emit({ type: "changed", intent: "tick", state: this.state });
  }

  // `mutate` returns false when the intent turned out to be a no-op.
  private run(intent: Intent, mutate: (state: GameState, now: Date) => boolean | void): boolean {
    const now = this.now();
    this.advance(now);
    let applied: boolean | void;
    try {
      applied = mutate(this.state, now);
    } catch (error) {
      if (!isGameError(error)) throw error;
      this.emit({ type: "rejected", intent, error });
      return false;
    }
    if (applied !== false) this.emit({ type: "changed", intent, state: this.state });
    return true;
  }

  // --------------------------------------------------------------------------
  // Read-only queries
  // --------------------------------------------------------------------------

  snapshot(): DeepReadonly<GameState> {
    this.advance(this.now());
    return this.state;
  }

  pantryQuantity(item: PantryItemId): number {
    return pantryQuantity(this.state, item);
  }

  cookableRecipes(): RecipeDef[] {
    return [...cookableRecipes(this.state)];
  }

  growthProgress(plotId: number): number {
    const plot = this.state.plots.find((p) => p.id === plotId);
    return plot ? growthProgress(plot, this.now()) : 0;
  }

  lastCookResult(): CookResult | null {
    return this.lastCook;
  }

  // --------------------------------------------------------------------------
  // Intents
  // --------------------------------------------------------------------------

  plant(plotId: number, vegetable: VegetableId): boolean {
    return this.run("plant", (s, now) => {
      plantAt(s, plotId, vegetable, now);
    });
  }

  water(plotId: number): boolean {
    return this.run("water", (s, now) => waterAt(s, plotId, now));
  }

  harvest(plotId: number): boolean {
    return this.run("harvest", (s, now) => {
      harvestAt(s, plotId, now);
    });
  }

  buyPantryItem(item: PantryItemId, quantity = 1): boolean {
    return this.run("buyPantryItem", (s) => buyPantryItem(s, item, quantity));
  }

  sellPantryItem(item: PantryItemId, quantity = 1): boolean {
    return this.run("sellPantryItem", (s) => {
      sellPantryItem(s, item, quantity);
    });
  }

  buySeeds(vegetable: VegetableId, quantity = 1): boolean {
    return this.run("buySeeds", (s) => buySeeds(s, vegetable, quantity));
  }

  sellHarvest(vegetable: VegetableId, quantity = 1): boolean {
    return this.run("sellHarvest", (s) => {
      sellHarvest(s, vegetable, quantity);
    });
  }

  cook(recipeId: RecipeId, ctx?: CookContext): boolean {
    return this.run("cook", (s) => {
      this.lastCook = cook(s, recipeId, ctx);
    });
  }

  unlock(recipeId: RecipeId): boolean {
    return this.run("unlock", (s) => unlockRecipe(s, recipeId));
  }

  completeBadge(badgeId: BadgeId): boolean {
    return this.run("completeBadge", (s) => {
      completeBadge(s, badgeId);
    });
  }

  claimQuest(questId: string): boolean {
    return this.run("claimQuest", (s) => {
      claimQuest(s, questId);
    });
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  async save(): Promise<void> {
    if (this.store === null) {
      throw new GameError("InvalidState", "this session has no progression store");
    }
    await this.store.save(this.state);
  }
}
