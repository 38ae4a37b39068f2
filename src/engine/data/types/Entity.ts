// ─────────────────────────────────────────────
//  Entity Types — players, NPCs, creatures
// ─────────────────────────────────────────────

import type { QuestProgress } from './Quest';
import { DEFAULT_HP, DEFAULT_MANA, MAX_HP, MAX_MANA } from '@/config';
import { MathUtils } from '@/engine/utils/MathUtils';
import { RecordUtils } from '@/engine/utils/RecordUtils';

/** Item kind → non-negative quantity */
export type Inventory = Record<string, number>;

export interface Entity {
  /** Unique key */
  readonly id: string;
  name: string;
  /** Name of the Area the entity stands in */
  area: string;
  /** 0..MAX_HP */
  hp: number;
  /** 0..MAX_MANA */
  mana: number;
  inventory: Inventory;
  /** Categorical labels used for matching, e.g. "mob", "player" */
  tags: string[];
  /** Quest id → progress; at most one entry per quest */
  questLog: Record<string, QuestProgress>;
}

export interface EntityStats {
  hp?: number;
  mana?: number;
  inventory?: Inventory;
}

export function createEntity(
  id: string,
  name: string,
  area: string,
  tags: Iterable<string> = [],
  stats: EntityStats = {},
): Entity {
  return {
    id,
    name,
    area,
    hp: MathUtils.clamp(stats.hp ?? DEFAULT_HP, 0, MAX_HP),
    mana: MathUtils.clamp(stats.mana ?? DEFAULT_MANA, 0, MAX_MANA),
    inventory: RecordUtils.create(stats.inventory),
    tags: [...tags],
    questLog: RecordUtils.create<QuestProgress>(),
  };
}

export function isAlive(entity: Entity): boolean {
  return entity.hp > 0;
}

export function itemCount(entity: Entity, item: string): number {
  return RecordUtils.count(entity.inventory, item);
}
