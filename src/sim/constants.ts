import type {
  BadgeDef,
  HealthStat,
  HealthStats,
  PantryItemDef,
  PantryItemId,
  QuestKind,
  RecipeDef,
  RecipeId,
  VegetableDef,
  VegetableId,
} from "./types";

export const STARTING_COINS = 100;
export const STARTING_LEVEL = 1;
export const STARTER_PLOT_COUNT = 4;

export const STARTER_SEEDS: Partial<Record<VegetableId, number>> = {
  lettuce: 5,
  carrot: 3,
  tomato: 3,
};

export const STARTER_RECIPE_IDS: readonly RecipeId[] = ["veggie-wrap", "garden-salad"];

export const HEALTH_STATS: readonly HealthStat[] = ["brain", "muscle", "bone", "heart", "immune", "energy"];

export const HEALTH_TUNING = {
  min: 0,
  max: 100,
  start: 50,
};

export const STARTING_HEALTH: HealthStats = {
  brain: HEALTH_TUNING.start,
  muscle: HEALTH_TUNING.start,
  bone: HEALTH_TUNING.start,
  heart: HEALTH_TUNING.start,
  immune: HEALTH_TUNING.start,
  energy: HEALTH_TUNING.start,
};

// XP for harvesting one plot, regardless of yield.
export const HARVEST_XP = 10;

export const ECONOMY_TUNING = {
  // Fraction of the shop price credited when a pantry item is sold back.
  pantryRefundRate: 0.5,
};

export const COOK_TUNING = {
  // Used when the caller reports no mini-game score.
  defaultScore: 60,
  // Same cut-offs as the cooking session rewards: any finish, 60+, 85+.
  defaultStarThresholds: [0, 60, 85] as const,
  maxStars: 3,
};

export const LEVEL_TUNING = {
  // Reaching level L+1 takes xpStep * L more XP than reaching level L.
  xpStep: 100,
};

// Snapshot schema version written by the progression store.
export const SAVE_VERSION = 1;
export const SAVE_KEY = "kitchen-garden-progress";

export const VEGETABLES: Record<VegetableId, VegetableDef> = {
  lettuce: {
    id: "lettuce",
    label: "Lettuce",
    emoji: "🥬",
    imageName: "veggie_lettuce",
    growthSeconds: 30,
    harvestYield: 1,
    seedCost: 5,
    harvestValue: 3,
    nutrients: ["fiber", "vitaminK"],
    water: null,
  },
  carrot: {
    id: "carrot",
    label: "Carrot",
    emoji: "🥕",
    imageName: "veggie_carrot",
    growthSeconds: 60,
    harvestYield: 1,
    seedCost: 10,
    harvestValue: 5,
    nutrients: ["vitaminA", "fiber"],
    water: null,
  },
  tomato: {
    id: "tomato",
    label: "Tomato",
    emoji: "🍅",
    imageName: "veggie_tomato",
    growthSeconds: 90,
    harvestYield: 4,
    seedCost: 15,
    harvestValue: 8,
    nutrients: ["vitaminC", "antioxidants"],
    water: { neglectSeconds: 60 },
  },
  cucumber: {
    id: "cucumber",
    label: "Cucumber",
    emoji: "🥒",
    imageName: "veggie_cucumber",
    growthSeconds: 60,
    harvestYield: 2,
    seedCost: 10,
    harvestValue: 5,
    nutrients: ["hydration", "vitaminK"],
    water: null,
  },
  broccoli: {
    id: "broccoli",
    label: "Broccoli",
    emoji: "🥦",
    imageName: "veggie_broccoli",
    growthSeconds: 75,
    harvestYield: 1,
    seedCost: 12,
    harvestValue: 6,
    nutrients: ["vitaminK", "vitaminC", "fiber"],
    water: null,
  },
  zucchini: {
    id: "zucchini",
    label: "Zucchini",
    emoji: "🥒",
    imageName: "veggie_zucchini",
    growthSeconds: 60,
    harvestYield: 2,
    seedCost: 10,
    harvestValue: 5,
    nutrients: ["vitaminC", "potassium"],
    water: { neglectSeconds: 45 },
  },
  onion: {
    id: "onion",
    label: "Onion",
    emoji: "🧅",
    imageName: "veggie_onion",
    growthSeconds: 45,
    harvestYield: 1,
    seedCost: 5,
    harvestValue: 3,
    nutrients: ["vitaminC", "antioxidants"],
    water: null,
  },
  pumpkin: {
    id: "pumpkin",
    label: "Pumpkin",
    emoji: "🎃",
    imageName: "veggie_pumpkin",
    growthSeconds: 150,
    harvestYield: 1,
    seedCost: 25,
    harvestValue: 18,
    nutrients: ["vitaminA", "fiber", "potassium"],
    water: { neglectSeconds: 60 },
  },
  spinach: {
    id: "spinach",
    label: "Spinach",
    emoji: "🥬",
    imageName: "veggie_spinach",
    growthSeconds: 45,
    harvestYield: 3,
    seedCost: 10,
    harvestValue: 6,
    nutrients: ["iron", "vitaminK", "calcium"],
    water: null,
  },
  bellPepperRed: {
    id: "bellPepperRed",
    label: "Red Pepper",
    emoji: "🫑",
    imageName: "veggie_pepper_red",
    growthSeconds: 120,
    harvestYield: 2,
    seedCost: 20,
    harvestValue: 12,
    nutrients: ["vitaminC", "vitaminA"],
    water: { neglectSeconds: 60 },
  },
  bellPepperYellow: {
    id: "bellPepperYellow",
    label: "Yellow Pepper",
    emoji: "🫑",
    imageName: "veggie_pepper_yellow",
    growthSeconds: 120,
    harvestYield: 2,
    seedCost: 20,
    harvestValue: 12,
    nutrients: ["vitaminC", "vitaminB6"],
    water: { neglectSeconds: 60 },
  },
  avocado: {
    id: "avocado",
    label: "Avocado",
    emoji: "🥑",
    imageName: "veggie_avocado",
    growthSeconds: 180,
    harvestYield: 1,
    seedCost: 30,
    harvestValue: 20,
    nutrients: ["healthyFats", "potassium", "fiber"],
    water: { neglectSeconds: 90 },
  },
};

export const PANTRY_ITEMS: Record<PantryItemId, PantryItemDef> = {
  salt: { id: "salt", label: "Salt", emoji: "🧂", category: "basics", shopPrice: 2 },
  pepper: { id: "pepper", label: "Pepper", emoji: "🌶️", category: "basics", shopPrice: 2 },
  sugar: { id: "sugar", label: "Sugar", emoji: "🍬", category: "basics", shopPrice: 3 },
  flour: { id: "flour", label: "Flour", emoji: "🌾", category: "basics", shopPrice: 3 },
  butter: { id: "butter", label: "Butter", emoji: "🧈", category: "oilsAndFats", shopPrice: 5 },
  oliveOil: { id: "oliveOil", label: "Olive Oil", emoji: "🫒", category: "oilsAndFats", shopPrice: 4 },
  vegetableOil: { id: "vegetableOil", label: "Vegetable Oil", emoji: "🫒", category: "oilsAndFats", shopPrice: 4 },
  eggs: { id: "eggs", label: "Eggs", emoji: "🥚", category: "dairy", shopPrice: 5 },
  milk: { id: "milk", label: "Milk", emoji: "🥛", category: "dairy", shopPrice: 4 },
  cheese: { id: "cheese", label: "Cheese", emoji: "🧀", category: "dairy", shopPrice: 6 },
  cream: { id: "cream", label: "Cream", emoji: "🥛", category: "dairy", shopPrice: 5 },
  chicken: { id: "chicken", label: "Chicken", emoji: "🍗", category: "protein", shopPrice: 12 },
  groundBeef: { id: "groundBeef", label: "Ground Beef", emoji: "🥩", category: "protein", shopPrice: 15 },
  rice: { id: "rice", label: "Rice", emoji: "🍚", category: "grains", shopPrice: 4 },
  pasta: { id: "pasta", label: "Pasta", emoji: "🍝", category: "grains", shopPrice: 4 },
  bread: { id: "bread", label: "Bread", emoji: "🍞", category: "grains", shopPrice: 3 },
  tortilla: { id: "tortilla", label: "Tortilla", emoji: "🫓", category: "grains", shopPrice: 3 },
  soySauce: { id: "soySauce", label: "Soy Sauce", emoji: "🫙", category: "sauces", shopPrice: 3 },
  tomatoSauce: { id: "tomatoSauce", label: "Tomato Sauce", emoji: "🥫", category: "sauces", shopPrice: 4 },
  vinegar: { id: "vinegar", label: "Vinegar", emoji: "🫙", category: "sauces", shopPrice: 3 },
  honey: { id: "honey", label: "Honey", emoji: "🍯", category: "sauces", shopPrice: 6 },
  dressing: { id: "dressing", label: "Salad Dressing", emoji: "🥗", category: "sauces", shopPrice: 4 },
};

const STARS = COOK_TUNING.defaultStarThresholds;

export const RECIPES: readonly RecipeDef[] = [
  // Starters
  {
    id: "veggie-wrap",
    title: "Rainbow Veggie Wrap",
    category: "lunch",
    difficulty: "easy",
    vegetables: { lettuce: 1, carrot: 1 },
    pantry: { tortilla: 1, cheese: 1 },
    xpReward: 25,
    coinReward: 30,
    health: { energy: 5, bone: 3 },
    starThresholds: STARS,
  },
  {
    id: "garden-salad",
    title: "Fresh Garden Salad",
    category: "lunch",
    difficulty: "easy",
    vegetables: { lettuce: 2 },
    pantry: { dressing: 1 },
    xpReward: 20,
    coinReward: 25,
    health: { immune: 5, heart: 3 },
    starThresholds: STARS,
  },

  // Snacks
  {
    id: "cheesy-broccoli-bites",
    title: "Cheesy Broccoli Bites",
    category: "snacks",
    difficulty: "easy",
    vegetables: { broccoli: 2 },
    pantry: { cheese: 1, eggs: 1, flour: 1, salt: 1 },
    xpReward: 25,
    coinReward: 25,
    health: { bone: 5, muscle: 2 },
    starThresholds: STARS,
    unlockBadge: "first-flip",
  },
  {
    id: "carrot-sticks",
    title: "Carrot Crunch Sticks",
    category: "snacks",
    difficulty: "easy",
    vegetables: { carrot: 2 },
    pantry: { honey: 1 },
    xpReward: 15,
    coinReward: 15,
    health: { brain: 2, immune: 2 },
    starThresholds: STARS,
    unlockLevel: 2,
  },
  {
    id: "cucumber-bites",
    title: "Cool Cucumber Bites",
    category: "snacks",
    difficulty: "easy",
    vegetables: { cucumber: 1 },
    pantry: { salt: 1 },
    xpReward: 10,
    coinReward: 10,
    health: { energy: 3 },
    starThresholds: STARS,
    unlockLevel: 2,
  },
  {
    id: "lettuce-cups",
    title: "Veggie Lettuce Cups",
    category: "snacks",
    difficulty: "easy",
    vegetables: { lettuce: 1, carrot: 1, tomato: 1 },
    pantry: { cheese: 1, salt: 1 },
    xpReward: 20,
    coinReward: 20,
    health: { immune: 3, bone: 2 },
    starThresholds: STARS,
    unlockLevel: 2,
  },

  // Breakfast
  {
    id: "veggie-omelette",
    title: "Garden Veggie Omelette",
    category: "breakfast",
    difficulty: "easy",
    vegetables: { tomato: 1, onion: 1 },
    pantry: { eggs: 2, butter: 1, cheese: 1, salt: 1, pepper: 1 },
    xpReward: 30,
    coinReward: 35,
    health: { muscle: 6, bone: 3, immune: 2 },
    starThresholds: STARS,
    unlockLevel: 3,
  },
  {
    id: "veggie-scramble",
    title: "Scrambled Egg Veggie Bowl",
    category: "breakfast",
    difficulty: "easy",
    vegetables: { broccoli: 1, zucchini: 1 },
    pantry: { eggs: 2, butter: 1, salt: 1, pepper: 1 },
    xpReward: 30,
    coinReward: 35,
    health: { muscle: 5, heart: 3 },
    starThresholds: STARS,
    unlockLevel: 3,
  },
  {
    id: "green-smoothie",
    title: "Popeye Green Smoothie",
    category: "breakfast",
    difficulty: "easy",
    vegetables: { spinach: 2 },
    pantry: { milk: 1, honey: 1 },
    xpReward: 25,
    coinReward: 25,
    health: { bone: 4, energy: 4 },
    starThresholds: STARS,
    unlockLevel: 3,
  },
  {
    id: "avocado-toast",
    title: "Brainy Avocado Toast",
    category: "breakfast",
    difficulty: "easy",
    vegetables: { avocado: 1 },
    pantry: { bread: 1, salt: 1 },
    xpReward: 35,
    coinReward: 40,
    health: { brain: 8, heart: 5 },
    starThresholds: STARS,
    unlockBadge: "brain-booster",
  },

  // Lunch
  {
    id: "pumpkin-soup",
    title: "Cozy Pumpkin Soup",
    category: "lunch",
    difficulty: "medium",
    vegetables: { pumpkin: 1, onion: 1 },
    pantry: { butter: 1, cream: 1, salt: 1, pepper: 1 },
    xpReward: 40,
    coinReward: 45,
    health: { immune: 6, heart: 4 },
    starThresholds: [10, 65, 90],
    unlockLevel: 4,
  },
  {
    id: "chicken-lettuce-wrap",
    title: "Chicken Lettuce Wrap",
    category: "lunch",
    difficulty: "medium",
    vegetables: { lettuce: 2, carrot: 1, onion: 1 },
    pantry: { chicken: 1, soySauce: 1, vegetableOil: 1, salt: 1 },
    xpReward: 40,
    coinReward: 45,
    health: { muscle: 8, energy: 4 },
    starThresholds: [10, 65, 90],
    unlockLevel: 4,
  },

  // Dinner
  {
    id: "chicken-stir-fry",
    title: "Chicken Veggie Stir Fry",
    category: "dinner",
    difficulty: "medium",
    vegetables: { broccoli: 1, carrot: 1, zucchini: 1 },
    pantry: { chicken: 1, soySauce: 1, vegetableOil: 1, rice: 1, salt: 1, pepper: 1 },
    xpReward: 50,
    coinReward: 55,
    health: { muscle: 8, immune: 4, energy: 4 },
    starThresholds: [10, 65, 90],
    unlockLevel: 5,
  },
  {
    id: "garden-pasta",
    title: "Garden Pasta",
    category: "dinner",
    difficulty: "medium",
    vegetables: { tomato: 2, zucchini: 1, onion: 1 },
    pantry: { pasta: 1, oliveOil: 1, salt: 1, pepper: 1, cheese: 1 },
    xpReward: 50,
    coinReward: 55,
    health: { energy: 8, heart: 3 },
    starThresholds: [10, 65, 90],
    unlockLevel: 5,
  },
  {
    id: "rainbow-pepper-rice",
    title: "Rainbow Pepper Rice",
    category: "dinner",
    difficulty: "medium",
    vegetables: { bellPepperRed: 1, bellPepperYellow: 1 },
    pantry: { rice: 1, oliveOil: 1, salt: 1 },
    xpReward: 45,
    coinReward: 50,
    health: { immune: 8 },
    starThresholds: [10, 65, 90],
    unlockLevel: 6,
  },
  {
    id: "beef-veggie-rice",
    title: "Beef & Veggie Rice Bowl",
    category: "dinner",
    difficulty: "medium",
    vegetables: { broccoli: 1, onion: 1 },
    pantry: { groundBeef: 1, rice: 1, soySauce: 1, vegetableOil: 1, salt: 1, pepper: 1 },
    xpReward: 55,
    coinReward: 60,
    health: { muscle: 10, brain: 3 },
    starThresholds: [10, 65, 90],
    unlockLevel: 6,
  },
  {
    id: "stuffed-pumpkin",
    title: "Stuffed Pumpkin Bowl",
    category: "dinner",
    difficulty: "hard",
    vegetables: { pumpkin: 1, broccoli: 1, onion: 1, carrot: 1 },
    pantry: { rice: 1, butter: 1, cheese: 1, salt: 1, pepper: 1 },
    xpReward: 80,
    coinReward: 90,
    health: { immune: 8, bone: 5, brain: 5 },
    starThresholds: [20, 70, 95],
    unlockLevel: 7,
  },
];

export const RECIPES_BY_ID: ReadonlyMap<RecipeId, RecipeDef> = new Map(RECIPES.map((r) => [r.id, r]));

export const BADGES: readonly BadgeDef[] = [
  { id: "sprout-chef", label: "Sprout Chef", description: "Visit Pip for 3 days", category: "streak" },
  { id: "veggie-visitor", label: "Veggie Visitor", description: "Visit Pip for 7 days", category: "streak" },
  { id: "kitchen-regular", label: "Kitchen Regular", description: "Visit Pip for 14 days", category: "streak" },
  { id: "pips-best-friend", label: "Pip's Best Friend", description: "Visit Pip for 30 days", category: "streak" },
  { id: "eye-spy", label: "Eye Spy", description: "Learn about Vitamin A", category: "nutrition" },
  { id: "muscle-builder", label: "Muscle Builder", description: "Learn about Protein", category: "nutrition" },
  { id: "bone-boss", label: "Bone Boss", description: "Learn about Calcium", category: "nutrition" },
  { id: "brain-booster", label: "Brain Booster", description: "Learn about Omega-3", category: "nutrition" },
  { id: "energy-expert", label: "Energy Expert", description: "Learn about Carbohydrates", category: "nutrition" },
  { id: "first-flip", label: "First Flip", description: "Complete your first recipe", category: "cooking" },
  { id: "salad-star", label: "Salad Star", description: "Make 3 salads", category: "cooking" },
  { id: "breakfast-champ", label: "Breakfast Champ", description: "Make 5 breakfasts", category: "cooking" },
  { id: "junior-chef", label: "Junior Chef", description: "Complete 10 recipes", category: "cooking" },
  { id: "rainbow-eater", label: "Rainbow Eater", description: "Eat all colors of veggies", category: "cooking" },
];

export const BADGES_BY_ID: ReadonlyMap<string, BadgeDef> = new Map(BADGES.map((b) => [b.id, b]));

export const FIRST_COOK_BADGE = "first-flip";

export type QuestTemplate = {
  id: string;
  kind: QuestKind;
  title: string;
  description: string;
  target: number;
  rewardCoins: number;
  rewardXp: number;
};

export const DAILY_QUESTS: readonly QuestTemplate[] = [
  {
    id: "green-thumb",
    kind: "plant",
    title: "Green Thumb",
    description: "Plant 2 seeds in your garden",
    target: 2,
    rewardCoins: 20,
    rewardXp: 15,
  },
  {
    id: "harvest-time",
    kind: "harvest",
    title: "Harvest Time",
    description: "Harvest 1 vegetable",
    target: 1,
    rewardCoins: 15,
    rewardXp: 10,
  },
  {
    id: "junior-chef",
    kind: "cook",
    title: "Junior Chef",
    description: "Complete 1 recipe",
    target: 1,
    rewardCoins: 30,
    rewardXp: 25,
  },
];
