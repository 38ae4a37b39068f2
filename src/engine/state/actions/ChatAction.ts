import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { Logger } from '@/engine/utils/Logger';

export interface ChatAction {
  readonly type: 'CHAT';
  readonly actorId: string;
  readonly message: string;
}

export function chat(actorId: string, message: string): ChatAction {
  return { type: 'CHAT', actorId, message };
}

export const ChatHandler: ActionHandler<ChatAction, Entity> = {
  resolve(world, action) {
    const actor = world.getEntity(action.actorId);
    return actor ? resolved(actor) : rejected('actor_not_found');
  },

  apply(world, action, actor) {
    const text = `${actor.name} says: ${action.message}`;
    world.logEvent('chat', text, actor.id);
    Logger.log(text);
    return ok(`chat:${actor.name}:${action.message}`);
  },
};
