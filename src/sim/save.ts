import { z } from "zod";

import {
  BADGES_BY_ID,
  COOK_TUNING,
  DAILY_QUESTS,
  HEALTH_TUNING,
  PANTRY_ITEMS,
  RECIPES_BY_ID,
  SAVE_KEY,
  SAVE_VERSION,
  STARTER_PLOT_COUNT,
  STARTER_RECIPE_IDS,
  STARTER_SEEDS,
  STARTING_COINS,
  STARTING_LEVEL,
  VEGETABLES,
} from "./constants";
import { createEmptyPlot, createStarterPlots } from "./actions";
import { GameError } from "./errors";
import type { StorageAdapter } from "./storage";
import { createInitialState } from "./tick";
import { isValidDate } from "./time";
import type { GameState, GardenPlot, HealthStat, HealthStats, PantryItemId, Quest, VegetableId } from "./types";
import { levelForXp, unlockEarnedRecipes } from "./systems/leveling";

export type Logger = Pick<Console, "warn" | "info">;

// ============================================================================
// Persisted record
// ============================================================================

const IsoDateSchema = z.string().transform((s, ctx) => {
  const d = new Date(s);
  if (!isValidDate(d)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${s}"` });
    return z.NEVER;
  }
  return d;
});

const CountSchema = z.object({
  id: z.string(),
  quantity: z.number().finite(),
});

const PlotSchema = z.object({
  id: z.number().int().nonnegative(),
  state: z.enum(["empty", "growing", "ready", "needsWater"]),
  vegetable: z.string().nullable().default(null),
  plantedAt: IsoDateSchema.nullable().default(null),
  wateredAt: IsoDateSchema.nullable().default(null),
  thirstySince: IsoDateSchema.nullable().default(null),
  pausedMs: z.number().finite().nonnegative().default(0),
});

const QuestProgressSchema = z.object({
  id: z.string(),
  progress: z.number().finite().default(0),
  claimed: z.boolean().default(false),
});

const HealthSchema = z.object({
  brain: z.number().finite().optional(),
  muscle: z.number().finite().optional(),
  bone: z.number().finite().optional(),
  heart: z.number().finite().optional(),
  immune: z.number().finite().optional(),
  energy: z.number().finite().optional(),
});

// Every field is optional so that snapshots written by older builds still load;
// gaps are filled with new-player values in `hydrate`.
export const SaveRecordSchema = z.object({
  version: z.number().int().default(0),
  coins: z.number().finite().optional(),
  xp: z.number().finite().optional(),
  playerLevel: z.number().finite().optional(),
  seeds: z.array(CountSchema).optional(),
  harvested: z.array(CountSchema).optional(),
  plots: z.array(PlotSchema).optional(),
  pantry: z.array(CountSchema).optional(),
  unlockedRecipeIds: z.array(z.string()).optional(),
  recipeStars: z.record(z.number().finite()).optional(),
  health: HealthSchema.optional(),
  completedBadgeIds: z.array(z.string()).optional(),
  quests: z.array(QuestProgressSchema).optional(),
  lastSaved: IsoDateSchema.nullable().default(null),
});

export type ParsedSaveRecord = z.infer<typeof SaveRecordSchema>;

type CountRecord = { id: string; quantity: number };

type PlotRecord = {
  id: number;
  state: GardenPlot["state"];
  vegetable: string | null;
  plantedAt: string | null;
  wateredAt: string | null;
  thirstySince: string | null;
  pausedMs: number;
};

// The JSON written to storage. Lists are kept sorted so equal states serialise identically.
export type SaveRecord = {
  version: number;
  coins: number;
  xp: number;
  playerLevel: number;
  seeds: CountRecord[];
  harvested: CountRecord[];
  plots: PlotRecord[];
  pantry: CountRecord[];
  unlockedRecipeIds: string[];
  recipeStars: Record<string, number>;
  health: HealthStats;
  completedBadgeIds: string[];
  quests: { id: string; progress: number; claimed: boolean }[];
  lastSaved: string | null;
};

function byId(a: { id: string }, b: { id: string }): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

function countList(ledger: Partial<Record<string, number>>): CountRecord[] {
  const out: CountRecord[] = [];
  for (const [id, quantity] of Object.entries(ledger)) {
    if (quantity !== undefined && quantity > 0) out.push({ id, quantity });
  }
  return out.sort(byId);
}

function isoOrNull(d: Date | null): string | null {
  return d === null ? null : d.toISOString();
}

export function toSaveRecord(state: GameState): SaveRecord {
  const stars: Record<string, number> = {};
  for (const id of Object.keys(state.recipeStars).sort()) stars[id] = state.recipeStars[id];

  return {
    version: SAVE_VERSION,
    coins: state.coins,
    xp: state.xp,
    playerLevel: state.playerLevel,
    seeds: countList(state.seeds),
    harvested: countList(state.harvested),
    plots: [...state.plots]
      .sort((a, b) => a.id - b.id)
      .map((p) => ({
        id: p.id,
        state: p.state,
        vegetable: p.vegetable,
        plantedAt: isoOrNull(p.plantedAt),
        wateredAt: isoOrNull(p.wateredAt),
        thirstySince: isoOrNull(p.thirstySince),
        pausedMs: p.pausedMs,
      })),
    pantry: countList(state.pantry),
    unlockedRecipeIds: [...state.unlockedRecipeIds].sort(),
    recipeStars: stars,
    health: {
      brain: state.health.brain,
      muscle: state.health.muscle,
      bone: state.health.bone,
      heart: state.health.heart,
      immune: state.health.immune,
      energy: state.health.energy,
    },
    completedBadgeIds: [...state.completedBadgeIds].sort(),
    quests: state.quests.map((q) => ({ id: q.id, progress: q.progress, claimed: q.claimed })),
    lastSaved: isoOrNull(state.lastSaved),
  };
}

export function serializeProgress(state: GameState): string {
  return JSON.stringify(toSaveRecord(state), null, 2);
}

// ============================================================================
// Hydration (record -> GameState)
// ============================================================================

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function count(v: number): number {
  return Math.max(0, Math.floor(v));
}

function isVegetableId(id: string): id is VegetableId {
  return Object.prototype.hasOwnProperty.call(VEGETABLES, id);
}

function isPantryItemId(id: string): id is PantryItemId {
  return Object.prototype.hasOwnProperty.call(PANTRY_ITEMS, id);
}

function toLedger<Id extends string>(
  list: CountRecord[],
  isKnown: (id: string) => id is Id,
  dropped: string[],
): Partial<Record<Id, number>> {
  const ledger: Partial<Record<Id, number>> = {};
  for (const entry of list) {
    if (!isKnown(entry.id)) {
      dropped.push(entry.id);
      continue;
    }
    const total = (ledger[entry.id] ?? 0) + count(entry.quantity);
    if (total > 0) ledger[entry.id] = total;
  }
  return ledger;
}

function toPlot(record: z.infer<typeof PlotSchema>, dropped: string[]): GardenPlot {
  if (record.state === "empty") return createEmptyPlot(record.id);

  const vegetable = record.vegetable;
  if (vegetable === null || !isVegetableId(vegetable) || record.plantedAt === null) {
    dropped.push(`plot:${record.id}`);
    return createEmptyPlot(record.id);
  }

  const wateredAt = record.wateredAt ?? record.plantedAt;
  return {
    id: record.id,
    state: record.state,
    vegetable,
    plantedAt: record.plantedAt,
    wateredAt,
    thirstySince: record.state === "needsWater" ? (record.thirstySince ?? wateredAt) : null,
    pausedMs: record.pausedMs,
  };
}

function toPlots(records: z.infer<typeof PlotSchema>[], dropped: string[]): GardenPlot[] {
  const seen = new Set<number>();
  const plots: GardenPlot[] = [];
  for (const record of [...records].sort((a, b) => a.id - b.id)) {
    if (seen.has(record.id)) {
      dropped.push(`plot:${record.id}`);
      continue;
    }
    seen.add(record.id);
    plots.push(toPlot(record, dropped));
  }
  return plots;
}

function toHealth(record: ParsedSaveRecord["health"]): HealthStats {
  const stat = (name: HealthStat): number =>
    clamp(Math.round(record?.[name] ?? HEALTH_TUNING.start), HEALTH_TUNING.min, HEALTH_TUNING.max);
  return {
    brain: stat("brain"),
    muscle: stat("muscle"),
    bone: stat("bone"),
    heart: stat("heart"),
    immune: stat("immune"),
    energy: stat("energy"),
  };
}

function toQuests(records: ParsedSaveRecord["quests"]): Quest[] {
  const byQuestId = new Map((records ?? []).map((q) => [q.id, q]));
  return DAILY_QUESTS.map((t) => {
    const saved = byQuestId.get(t.id);
    return {
      ...t,
      progress: clamp(count(saved?.progress ?? 0), 0, t.target),
      claimed: saved?.claimed ?? false,
    };
  });
}

export type HydrateResult = {
  state: GameState;
  // Ids that no longer match the catalog, or plots that could not be restored.
  dropped: string[];
};

export function hydrate(record: ParsedSaveRecord): HydrateResult {
  const dropped: string[] = [];

  const xp = count(record.xp ?? 0);
  const playerLevel = Math.max(STARTING_LEVEL, count(record.playerLevel ?? 0), levelForXp(xp));

  const unlockedRecipeIds = new Set<string>(STARTER_RECIPE_IDS);
  for (const id of record.unlockedRecipeIds ?? []) {
    if (RECIPES_BY_ID.has(id)) unlockedRecipeIds.add(id);
    else dropped.push(id);
  }

  const completedBadgeIds = new Set<string>();
  for (const id of record.completedBadgeIds ?? []) {
    if (BADGES_BY_ID.has(id)) completedBadgeIds.add(id);
    else dropped.push(id);
  }

  const plots =
    record.plots !== undefined && record.plots.length > 0
      ? toPlots(record.plots, dropped)
      : createStarterPlots(STARTER_PLOT_COUNT);

  const state: GameState = {
    coins: count(record.coins ?? STARTING_COINS),
    xp,
    playerLevel,
    seeds: record.seeds === undefined ? { ...STARTER_SEEDS } : toLedger(record.seeds, isVegetableId, dropped),
    harvested: toLedger(record.harvested ?? [], isVegetableId, dropped),
    plots,
    pantry: toLedger(record.pantry ?? [], isPantryItemId, dropped),
    unlockedRecipeIds,
    recipeStars: {},
    health: toHealth(record.health),
    completedBadgeIds,
    quests: toQuests(record.quests),
    lastSaved: record.lastSaved,
  };

  // Older builds could save a level without the recipes it earns.
  unlockEarnedRecipes(state);

  for (const [id, stars] of Object.entries(record.recipeStars ?? {})) {
    if (!unlockedRecipeIds.has(id)) {
      dropped.push(`stars:${id}`);
      continue;
    }
    state.recipeStars[id] = clamp(count(stars), 0, COOK_TUNING.maxStars);
  }
  return { state, dropped };
}

// Parses a stored snapshot. Unreadable data is reported through the logger as a
// PersistenceCorrupt error and replaced by a new-player state.
export function parseProgress(raw: string, logger: Logger = console): GameState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (cause) {
    const error = new GameError("PersistenceCorrupt", "saved progress is not valid JSON", { cause });
    logger.warn("[save] falling back to a new game", error);
    return createInitialState();
  }

  const parsed = SaveRecordSchema.safeParse(json);
  if (!parsed.success) {
    const error = new GameError("PersistenceCorrupt", "saved progress does not match the save format", {
      details: { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      cause: parsed.error,
    });
    logger.warn("[save] falling back to a new game", error);
    return createInitialState();
  }

  if (parsed.data.version > SAVE_VERSION) {
    logger.warn("[save] snapshot comes from a newer build", { version: parsed.data.version, supported: SAVE_VERSION });
  }

  const { state, dropped } = hydrate(parsed.data);
  if (dropped.length > 0) {
    logger.warn("[save] dropped entries that no longer match the catalog", { dropped });
  }
  return state;
}

// ============================================================================
// Store
// ============================================================================

export type ProgressionStoreOptions = {
  key?: string;
  now?: () => Date;
  logger?: Logger;
};

export class ProgressionStore {
  private readonly key: string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  // Tail of the write chain; saves never overlap.
  private pending: Promise<void> = Promise.resolve();
  // Per state, the `lastSaved` of the last write that reached storage.
  private readonly confirmed = new WeakMap<GameState, Date | null>();

  constructor(
    private readonly storage: StorageAdapter,
    opts: ProgressionStoreOptions = {},
  ) {
    this.key = opts.key ?? SAVE_KEY;
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? console;
  }

  async load(): Promise<GameState> {
    const raw = await this.storage.read(this.key);
    if (raw === null) {
      this.logger.info("[save] no saved progress, starting a new game", { key: this.key });
      return createInitialState();
    }
    return parseProgress(raw, this.logger);
  }

  // The snapshot is taken before the first await, so later mutations never leak
  // into an in-flight write. On failure `lastSaved` falls back to the last write
  // that landed and the error is rethrown.
  save(state: GameState): Promise<void> {
    if (!this.confirmed.has(state)) this.confirmed.set(state, state.lastSaved);
    const stamp = this.now();
    state.lastSaved = stamp;
    const data = serializeProgress(state);

    const write = this.pending
      .then(() => this.storage.write(this.key, data))
      .then(() => {
        this.confirmed.set(state, stamp);
      });
    // The caller sees the failure below; the chain itself must keep going.
    this.pending = write.then(
      () => undefined,
      () => undefined,
    );

    return write.catch((cause: unknown) => {
      // A later save may have stamped the state since; only undo our own stamp.
      if (state.lastSaved === stamp) state.lastSaved = this.confirmed.get(state) ?? null;
      const error = new GameError("PersistenceWriteFailed", "could not write saved progress", { cause });
      this.logger.warn("[save] write failed, progress kept in memory", error);
      throw error;
    });
  }

  async reset(): Promise<GameState> {
    const state = createInitialState();
    await this.save(state);
    return state;
  }

  // Resolves once every queued write has settled.
  flush(): Promise<void> {
    return this.pending;
  }
}
