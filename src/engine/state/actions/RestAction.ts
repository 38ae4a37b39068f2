import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { MAX_HP, MAX_MANA } from '@/config';
import { Logger } from '@/engine/utils/Logger';

export interface RestAction {
  readonly type: 'REST';
  readonly actorId: string;
  readonly hpRestore: number;
  readonly manaRestore: number;
}

export function rest(actorId: string, hpRestore = 10, manaRestore = 5): RestAction {
  return { type: 'REST', actorId, hpRestore, manaRestore };
}

export const RestHandler: ActionHandler<RestAction, Entity> = {
  resolve(world, action) {
    if (!(action.hpRestore >= 0) || !(action.manaRestore >= 0)) return rejected('invalid_amount');
    const actor = world.getEntity(action.actorId);
    return actor ? resolved(actor) : rejected('actor_not_found');
  },

  apply(world, action, actor) {
    actor.hp = Math.min(MAX_HP, actor.hp + action.hpRestore);
    actor.mana = Math.min(MAX_MANA, actor.mana + action.manaRestore);

    const text = `${actor.name} rests (hp ${actor.hp}, mana ${actor.mana})`;
    world.logEvent('rest', text, actor.id);
    Logger.log(`💚 ${text}`, 'action');

    return ok(`rested:hp+${action.hpRestore}:mana+${action.manaRestore}`);
  },
};
