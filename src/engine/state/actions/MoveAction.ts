import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { ObjectiveKey } from '@/engine/data/types/Quest';
import { Logger } from '@/engine/utils/Logger';

export interface MoveAction {
  readonly type: 'MOVE';
  readonly actorId: string;
  readonly destination: string;
}

export function move(actorId: string, destination: string): MoveAction {
  return { type: 'MOVE', actorId, destination };
}

export const MoveHandler: ActionHandler<MoveAction, Entity> = {
  resolve(world, action) {
    const actor = world.getEntity(action.actorId);
    if (!actor) return rejected('actor_not_found');
    if (!world.getArea(action.destination)) return rejected('area_not_found');
    // Adjacency is read from the current area only; edges may be one-way
    const here = world.getArea(actor.area);
    if (!here?.neighbors.includes(action.destination)) return rejected('not_adjacent');
    return resolved(actor);
  },

  apply(world, action, actor) {
    const from = actor.area;
    actor.area = action.destination;

    const text = `${actor.name} moved from ${from} to ${action.destination}`;
    world.logEvent('move', text, actor.id);
    Logger.log(text, 'action');
    world.updateEntityQuestProgress(actor.id, ObjectiveKey.travel(action.destination));

    return ok(`moved_to:${action.destination}`);
  },
};
