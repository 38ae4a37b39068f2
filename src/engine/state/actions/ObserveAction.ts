import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import type { Area } from '@/engine/data/types/Area';
import { Logger } from '@/engine/utils/Logger';
import { RecordUtils } from '@/engine/utils/RecordUtils';

export interface ObserveAction {
  readonly type: 'OBSERVE';
  readonly actorId: string;
}

export function observe(actorId: string): ObserveAction {
  return { type: 'OBSERVE', actorId };
}

interface ObserveContext {
  actor: Entity;
  area: Area;
}

/**
 * Read-only apart from the log entry.
 * Detail format: `observe:<area>|entities:<id,...>|resources:<kind=qty,...>`
 * with resources sorted by kind.
 */
export const ObserveHandler: ActionHandler<ObserveAction, ObserveContext> = {
  resolve(world, action) {
    const actor = world.getEntity(action.actorId);
    if (!actor) return rejected('actor_not_found');
    const area = world.getArea(actor.area);
    if (!area) return rejected('area_not_found');
    return resolved({ actor, area });
  },

  apply(world, _action, { actor, area }) {
    const others = world.getEntitiesInArea(area.name)
      .filter(e => e.id !== actor.id)
      .map(e => e.id);
    const resources = Object.keys(area.resources)
      .sort()
      .map(kind => `${kind}=${RecordUtils.count(area.resources, kind)}`);

    const detail = `observe:${area.name}|entities:${others.join(',')}|resources:${resources.join(',')}`;
    world.logEvent('observe', `${actor.name} looks around ${area.name}`, actor.id);
    Logger.log(`${actor.name} observes ${area.name}`);

    return ok(detail);
  },
};
