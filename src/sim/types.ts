export type VegetableId =
  | "lettuce"
  | "carrot"
  | "tomato"
  | "cucumber"
  | "broccoli"
  | "zucchini"
  | "onion"
  | "pumpkin"
  | "spinach"
  | "bellPepperRed"
  | "bellPepperYellow"
  | "avocado";

export type PantryItemId =
  | "salt"
  | "pepper"
  | "sugar"
  | "flour"
  | "butter"
  | "oliveOil"
  | "vegetableOil"
  | "eggs"
  | "milk"
  | "cheese"
  | "cream"
  | "chicken"
  | "groundBeef"
  | "rice"
  | "pasta"
  | "bread"
  | "tortilla"
  | "soySauce"
  | "tomatoSauce"
  | "vinegar"
  | "honey"
  | "dressing";

export type RecipeId = string;
export type BadgeId = string;

export type Nutrient =
  | "vitaminA"
  | "vitaminC"
  | "vitaminK"
  | "vitaminB6"
  | "fiber"
  | "iron"
  | "calcium"
  | "potassium"
  | "healthyFats"
  | "antioxidants"
  | "hydration";

export type WaterPolicy = { neglectSeconds: number } | null;

export type VegetableDef = {
  id: VegetableId;
  label: string;
  emoji: string;
  imageName: string;
  growthSeconds: number;
  harvestYield: number;
  seedCost: number;
  harvestValue: number;
  nutrients: Nutrient[];
  water: WaterPolicy;
};

export type ShopCategory = "basics" | "oilsAndFats" | "dairy" | "protein" | "grains" | "sauces";

export type PantryItemDef = {
  id: PantryItemId;
  label: string;
  emoji: string;
  category: ShopCategory;
  shopPrice: number;
};

export type HealthStat = "brain" | "muscle" | "bone" | "heart" | "immune" | "energy";

export type HealthStats = Record<HealthStat, number>;

export type RecipeCategory = "breakfast" | "lunch" | "dinner" | "snacks";

export type Difficulty = "easy" | "medium" | "hard";

export type RecipeDef = {
  id: RecipeId;
  title: string;
  category: RecipeCategory;
  difficulty: Difficulty;
  vegetables: Partial<Record<VegetableId, number>>;
  pantry: Partial<Record<PantryItemId, number>>;
  xpReward: number;
  coinReward: number;
  health: Partial<HealthStats>;
  // Minimum cook score for 1, 2 and 3 stars.
  starThresholds: readonly [number, number, number];
  unlockLevel?: number;
  unlockBadge?: BadgeId;
};

export type BadgeCategory = "streak" | "nutrition" | "cooking" | "learning";

export type BadgeDef = {
  id: BadgeId;
  label: string;
  description: string;
  category: BadgeCategory;
};

export type PlotState = "empty" | "growing" | "ready" | "needsWater";

export type EmptyPlot = {
  id: number;
  state: "empty";
  vegetable: null;
  plantedAt: null;
  wateredAt: null;
  thirstySince: null;
  pausedMs: 0;
};

export type PlantedPlot = {
  id: number;
  state: "growing" | "ready" | "needsWater";
  vegetable: VegetableId;
  plantedAt: Date;
  // Start of the current neglect window.
  wateredAt: Date;
  thirstySince: Date | null;
  // Time spent thirsty; growth is paused meanwhile.
  pausedMs: number;
};

export type GardenPlot = EmptyPlot | PlantedPlot;

export type QuestKind = "plant" | "harvest" | "cook";

export type Quest = {
  id: string;
  kind: QuestKind;
  title: string;
  description: string;
  target: number;
  progress: number;
  rewardCoins: number;
  rewardXp: number;
  claimed: boolean;
};

export type GameState = {
  coins: number;
  xp: number;
  playerLevel: number;
  seeds: Partial<Record<VegetableId, number>>;
  harvested: Partial<Record<VegetableId, number>>;
  plots: GardenPlot[];
  pantry: Partial<Record<PantryItemId, number>>;
  unlockedRecipeIds: Set<RecipeId>;
  recipeStars: Record<RecipeId, number>;
  health: HealthStats;
  completedBadgeIds: Set<BadgeId>;
  quests: Quest[];
  lastSaved: Date | null;
};

export type CookContext = {
  // Mini-game score, 0..100.
  score?: number;
};

export type CookResult = {
  recipeId: RecipeId;
  stars: number;
  bestStars: number;
  coins: number;
  xp: number;
  leveledUp: boolean;
  playerLevel: number;
  unlocked: RecipeId[];
};

export type Shortfall<Id extends string> = {
  id: Id;
  required: number;
  available: number;
};

export type MissingIngredients = {
  vegetables: Shortfall<VegetableId>[];
  pantry: Shortfall<PantryItemId>[];
};
