import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { isAlive } from '@/engine/data/types/Entity';
import { ObjectiveKey } from '@/engine/data/types/Quest';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export interface AttackAction {
  readonly type: 'ATTACK';
  readonly actorId: string;
  readonly targetId: string;
  /** Caller-supplied; the engine does not compute damage */
  readonly damage: number;
}

export function attack(actorId: string, targetId: string, damage = 10): AttackAction {
  return { type: 'ATTACK', actorId, targetId, damage };
}

interface AttackContext {
  attacker: Entity;
  defender: Entity;
}

export const AttackHandler: ActionHandler<AttackAction, AttackContext> = {
  resolve(world, action) {
    if (!Number.isFinite(action.damage) || action.damage < 0) return rejected('invalid_amount');
    const attacker = world.getEntity(action.actorId);
    if (!attacker) return rejected('actor_not_found');
    const defender = world.getEntity(action.targetId);
    if (!defender) return rejected('target_not_found');
    if (attacker.area !== defender.area) return rejected('target_out_of_reach');
    if (!isAlive(defender)) return rejected('target_defeated');
    return resolved({ attacker, defender });
  },

  apply(world, action, { attacker, defender }) {
    defender.hp = Math.max(0, defender.hp - action.damage);

    const text = `${attacker.name} hit ${defender.name} for ${action.damage} (hp ${defender.hp})`;
    world.logEvent('attack', text, attacker.id);
    Logger.log(`⚔ ${text}`, 'combat');

    // resolve() guarantees the defender was alive, so this is the killing blow
    if (!isAlive(defender)) {
      Logger.log(`💀 ${defender.name} defeated!`, 'combat');
      EventBus.emit('entityDefeated', { entityId: defender.id, byId: attacker.id });
      world.updateEntityQuestProgress(attacker.id, ObjectiveKey.defeat(defender.id));
      for (const tag of defender.tags) {
        world.updateEntityQuestProgress(attacker.id, ObjectiveKey.defeatTag(tag));
      }
    }

    return ok(`hit:${defender.id}:${action.damage}`);
  },
};
