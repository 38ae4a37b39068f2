// ─────────────────────────────────────────────
//  Skill Types
// ─────────────────────────────────────────────

import type { Entity } from './Entity';
import type { WorldState } from '@/engine/state/WorldState';

/**
 * Effect of a skill. Receives the live world, the caster and an optional
 * target, and returns a short result tag that ends up in the action detail.
 */
export type SkillEffect = (world: WorldState, caster: Entity, target: Entity | undefined) => string;

export interface Skill {
  /** Unique key */
  readonly id: string;
  name: string;
  /** Mana cost to cast */
  manaCost: number;
  effect: SkillEffect;
}
