import type { ActionHandler } from './GameAction';
import { err, ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { itemCount } from '@/engine/data/types/Entity';
import { Logger } from '@/engine/utils/Logger';

export interface TradeAction {
  readonly type: 'TRADE';
  readonly actorId: string;
  readonly targetId: string;
  readonly item: string;
  readonly amount: number;
}

export function trade(actorId: string, targetId: string, item: string, amount = 1): TradeAction {
  return { type: 'TRADE', actorId, targetId, item, amount };
}

interface TradeContext {
  giver: Entity;
  receiver: Entity;
}

export const TradeHandler: ActionHandler<TradeAction, TradeContext> = {
  resolve(world, action) {
    if (!Number.isInteger(action.amount) || action.amount < 1) return rejected('invalid_amount');
    const giver = world.getEntity(action.actorId);
    const receiver = world.getEntity(action.targetId);
    if (!giver || !receiver) return rejected('entity_not_found');
    if (giver.area !== receiver.area) return rejected('target_out_of_reach');
    return resolved({ giver, receiver });
  },

  apply(world, action, { giver, receiver }) {
    // Stock is checked at execution time, not as a precondition
    if (itemCount(giver, action.item) < action.amount) return err('insufficient_items');

    giver.inventory[action.item] = itemCount(giver, action.item) - action.amount;
    receiver.inventory[action.item] = itemCount(receiver, action.item) + action.amount;

    const text = `${giver.name} traded ${action.amount} ${action.item} to ${receiver.name}`;
    world.logEvent('trade', text, giver.id);
    Logger.log(text, 'action');

    return ok(`traded:${action.item}:${action.amount}`);
  },
};
