import { DAILY_QUESTS } from "../constants";
import { GameError } from "../errors";
import type { GameState, Quest, QuestKind } from "../types";
import { grantXp, type XpGrant } from "./leveling";

export function createDailyQuests(): Quest[] {
  return DAILY_QUESTS.map((t) => ({ ...t, progress: 0, claimed: false }));
}

export function isQuestComplete(quest: Quest): boolean {
  return quest.progress >= quest.target;
}

export function recordQuestProgress(state: GameState, kind: QuestKind, amount = 1): void {
  for (const quest of state.quests) {
    if (quest.kind !== kind || quest.claimed) continue;
    quest.progress = Math.min(quest.target, quest.progress + amount);
  }
}

export function claimQuest(state: GameState, questId: string): XpGrant & { coins: number } {
  const quest = state.quests.find((q) => q.id === questId);
  if (!quest) {
    throw new GameError("InvalidState", `unknown quest "${questId}"`, { details: { questId } });
  }
  if (quest.claimed) {
    throw new GameError("InvalidState", `quest "${questId}" was already claimed`, { details: { questId } });
  }
  if (!isQuestComplete(quest)) {
    throw new GameError("InvalidState", `quest "${questId}" is not complete`, {
      details: { questId, progress: quest.progress, target: quest.target },
    });
  }

  quest.claimed = true;
  state.coins += quest.rewardCoins;
  return { ...grantXp(state, quest.rewardXp), coins: quest.rewardCoins };
}

export function resetDailyQuests(state: GameState): void {
  state.quests = createDailyQuests();
}
