import { ECONOMY_TUNING, PANTRY_ITEMS, VEGETABLES } from "../constants";
import { assertQuantity, GameError } from "../errors";
import type { GameState, PantryItemId, VegetableId } from "../types";

type Ledger<Id extends string> = Partial<Record<Id, number>>;

function credit<Id extends string>(ledger: Ledger<Id>, id: Id, quantity: number): void {
  ledger[id] = (ledger[id] ?? 0) + quantity;
}

// Callers check the balance first; zero entries are pruned.
function debit<Id extends string>(ledger: Ledger<Id>, id: Id, quantity: number): void {
  const left = (ledger[id] ?? 0) - quantity;
  if (left <= 0) delete ledger[id];
  else ledger[id] = left;
}

function spend(state: GameState, cost: number, what: string): void {
  if (state.coins < cost) {
    throw new GameError("InsufficientFunds", `${what} costs ${cost} coins, only ${state.coins} available`, {
      details: { cost, coins: state.coins },
    });
  }
  state.coins -= cost;
}

function requireStock(available: number, quantity: number, what: string): void {
  if (available < quantity) {
    throw new GameError("InsufficientStock", `need ${quantity} ${what}, only ${available} in stock`, {
      details: { required: quantity, available },
    });
  }
}

export function canAfford(state: GameState, cost: number): boolean {
  return state.coins >= cost;
}

export function pantryQuantity(state: GameState, item: PantryItemId): number {
  return state.pantry[item] ?? 0;
}

export function seedQuantity(state: GameState, vegetable: VegetableId): number {
  return state.seeds[vegetable] ?? 0;
}

export function harvestedQuantity(state: GameState, vegetable: VegetableId): number {
  return state.harvested[vegetable] ?? 0;
}

export function buyPantryItem(state: GameState, item: PantryItemId, quantity = 1): void {
  assertQuantity(quantity);
  const def = PANTRY_ITEMS[item];
  spend(state, def.shopPrice * quantity, `${quantity} × ${def.label}`);
  credit(state.pantry, item, quantity);
}

export function pantryRefund(item: PantryItemId): number {
  return Math.floor(PANTRY_ITEMS[item].shopPrice * ECONOMY_TUNING.pantryRefundRate);
}

export function sellPantryItem(state: GameState, item: PantryItemId, quantity = 1): number {
  assertQuantity(quantity);
  requireStock(pantryQuantity(state, item), quantity, PANTRY_ITEMS[item].label);
  const earned = pantryRefund(item) * quantity;
  debit(state.pantry, item, quantity);
  state.coins += earned;
  return earned;
}

export function buySeeds(state: GameState, vegetable: VegetableId, quantity = 1): void {
  assertQuantity(quantity);
  const def = VEGETABLES[vegetable];
  spend(state, def.seedCost * quantity, `${quantity} × ${def.label} seeds`);
  credit(state.seeds, vegetable, quantity);
}

export function sellHarvest(state: GameState, vegetable: VegetableId, quantity = 1): number {
  assertQuantity(quantity);
  const def = VEGETABLES[vegetable];
  requireStock(harvestedQuantity(state, vegetable), quantity, def.label);
  const earned = def.harvestValue * quantity;
  debit(state.harvested, vegetable, quantity);
  state.coins += earned;
  return earned;
}

export function consumePantry(state: GameState, item: PantryItemId, quantity: number): void {
  requireStock(pantryQuantity(state, item), quantity, PANTRY_ITEMS[item].label);
  debit(state.pantry, item, quantity);
}

export function consumeHarvest(state: GameState, vegetable: VegetableId, quantity: number): void {
  requireStock(harvestedQuantity(state, vegetable), quantity, VEGETABLES[vegetable].label);
  debit(state.harvested, vegetable, quantity);
}
