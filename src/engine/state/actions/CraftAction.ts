import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { itemCount } from '@/engine/data/types/Entity';
import { ObjectiveKey } from '@/engine/data/types/Quest';
import { Logger } from '@/engine/utils/Logger';
import { RecordUtils } from '@/engine/utils/RecordUtils';

export interface CraftAction {
  readonly type: 'CRAFT';
  readonly actorId: string;
  /** Item kind → quantity consumed */
  readonly requirements: Readonly<Record<string, number>>;
  /** Item kind produced (one unit per craft) */
  readonly output: string;
}

export function craft(
  actorId: string,
  requirements: Record<string, number>,
  output: string,
): CraftAction {
  return { type: 'CRAFT', actorId, requirements: RecordUtils.create(requirements), output };
}

export const CraftHandler: ActionHandler<CraftAction, Entity> = {
  resolve(world, action) {
    const quantities = Object.values(action.requirements);
    if (quantities.some(qty => !Number.isInteger(qty) || qty < 0)) return rejected('invalid_amount');
    const actor = world.getEntity(action.actorId);
    if (!actor) return rejected('actor_not_found');
    // All-or-nothing: every requirement is checked before anything is consumed
    const short = Object.entries(action.requirements).some(
      ([item, qty]) => itemCount(actor, item) < qty,
    );
    if (short) return rejected('missing_materials');
    return resolved(actor);
  },

  apply(world, action, actor) {
    for (const [item, qty] of Object.entries(action.requirements)) {
      actor.inventory[item] = itemCount(actor, item) - qty;
    }
    actor.inventory[action.output] = itemCount(actor, action.output) + 1;

    const text = `${actor.name} crafted ${action.output}`;
    world.logEvent('craft', text, actor.id);
    Logger.log(text, 'action');
    world.updateEntityQuestProgress(actor.id, ObjectiveKey.craft(action.output));

    return ok(`crafted:${action.output}`);
  },
};
