import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { itemCount } from '@/engine/data/types/Entity';
import { ObjectiveKey } from '@/engine/data/types/Quest';
import { Logger } from '@/engine/utils/Logger';

export interface GatherAction {
  readonly type: 'GATHER';
  readonly actorId: string;
  readonly resource: string;
  /** Requested quantity; capped by what the area holds */
  readonly amount: number;
}

export function gather(actorId: string, resource: string, amount = 1): GatherAction {
  return { type: 'GATHER', actorId, resource, amount };
}

interface GatherContext {
  actor: Entity;
  available: number;
}

export const GatherHandler: ActionHandler<GatherAction, GatherContext> = {
  resolve(world, action) {
    if (!Number.isInteger(action.amount) || action.amount < 1) return rejected('invalid_amount');
    const actor = world.getEntity(action.actorId);
    if (!actor) return rejected('actor_not_found');
    if (!world.getArea(actor.area)) return rejected('area_not_found');
    const available = world.getAreaResource(actor.area, action.resource);
    if (available <= 0) return rejected('resource_depleted');
    return resolved({ actor, available });
  },

  apply(world, action, { actor, available }) {
    // Pre-clamp so the area adjustment never absorbs an over-request
    const actual = Math.min(action.amount, available);
    world.adjustAreaResource(actor.area, action.resource, -actual);
    actor.inventory[action.resource] = itemCount(actor, action.resource) + actual;

    const text = `${actor.name} gathered ${actual} ${action.resource} in ${actor.area}`;
    world.logEvent('gather', text, actor.id);
    Logger.log(text, 'action');
    world.updateEntityQuestProgress(actor.id, ObjectiveKey.gather(action.resource), actual);

    return ok(`gathered:${action.resource}:${actual}`);
  },
};
