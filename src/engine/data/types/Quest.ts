// ─────────────────────────────────────────────
//  Quest Types
//  Objective keys link world events to progress:
//    gather:<resource>   travel:<area>   craft:<item>
//    defeat:<entityId>   defeat_tag:<tag>
// ─────────────────────────────────────────────

import { freeze } from 'immer';
import { RecordUtils } from '@/engine/utils/RecordUtils';

export type ObjectiveMap = Readonly<Record<string, number>>;

/** Static quest definition — objectives are frozen on creation */
export interface Quest {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  /** Objective key → required count */
  readonly objectives: ObjectiveMap;
}

/** Per-entity progress on one quest */
export interface QuestProgress {
  readonly questId: string;
  progress: Record<string, number>;
  /** Monotonic: never goes back to false once set */
  completed: boolean;
}

export function createQuest(
  id: string,
  title: string,
  description: string,
  objectives: Record<string, number>,
): Quest {
  return freeze({ id, title, description, objectives: RecordUtils.create(objectives) }, true);
}

export function createQuestProgress(questId: string): QuestProgress {
  return { questId, progress: RecordUtils.create<number>(), completed: false };
}

export const ObjectiveKey = {
  gather:    (resource: string) => `gather:${resource}`,
  travel:    (area: string)     => `travel:${area}`,
  craft:     (item: string)     => `craft:${item}`,
  defeat:    (entityId: string) => `defeat:${entityId}`,
  defeatTag: (tag: string)      => `defeat_tag:${tag}`,
};

/** True when every objective has reached its required count */
export function isQuestSatisfied(quest: Quest, progress: QuestProgress): boolean {
  return Object.entries(quest.objectives).every(
    ([key, required]) => RecordUtils.count(progress.progress, key) >= required,
  );
}
