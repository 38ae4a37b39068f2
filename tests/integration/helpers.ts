// ─────────────────────────────────────────────
//  Test Helpers
//  Build small headless worlds; drive them through the action
//  pipeline or a GameEngine.
// ─────────────────────────────────────────────

import { WorldState } from '@/engine/state/WorldState';
import { WorldToolkit } from '@/engine/loader/WorldToolkit';
import type { AgentBrain } from '@/engine/systems/ai/AgentBrain';
import type { GameAction } from '@/engine/state/actions/GameAction';
import type { Entity } from '@/engine/data/types/Entity';

export interface TestWorld {
  world: WorldState;
  kit: WorldToolkit;
}

/**
 * Village ⇄ Forest.
 * Village holds no wood (the key exists at 0), Forest holds 5.
 */
export function makeVillageForest(): TestWorld {
  const world = new WorldState();
  const kit = new WorldToolkit(world);
  kit.createArea('Village', 'Starting zone', ['Forest'], { wood: 0 });
  kit.createArea('Forest', 'Wild zone', ['Village'], { wood: 5 });
  return { world, kit };
}

export function spawnPlayer(kit: WorldToolkit, area = 'Village', id = 'p1'): Entity {
  return kit.spawnEntity(id, 'Hero', area, ['player'], { hp: 100 });
}

/** Brain that proposes the same actions every tick */
export function scriptedBrain(build: (actorId: string) => GameAction[]): AgentBrain {
  return { decide: (_world, actorId) => build(actorId) };
}
