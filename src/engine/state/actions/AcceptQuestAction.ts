import type { ActionHandler } from './GameAction';
import { err, ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import type { Quest } from '@/engine/data/types/Quest';
import { Logger } from '@/engine/utils/Logger';

export interface AcceptQuestAction {
  readonly type: 'ACCEPT_QUEST';
  readonly actorId: string;
  readonly questId: string;
}

export function acceptQuest(actorId: string, questId: string): AcceptQuestAction {
  return { type: 'ACCEPT_QUEST', actorId, questId };
}

interface AcceptContext {
  actor: Entity;
  quest: Quest;
}

export const AcceptQuestHandler: ActionHandler<AcceptQuestAction, AcceptContext> = {
  resolve(world, action) {
    const actor = world.getEntity(action.actorId);
    if (!actor) return rejected('actor_not_found');
    const quest = world.getQuest(action.questId);
    if (!quest) return rejected('quest_unavailable');
    return resolved({ actor, quest });
  },

  apply(world, _action, { actor, quest }) {
    // Already-held quests fail here; assignQuest never overwrites
    if (!world.assignQuest(actor.id, quest.id)) return err('quest_unavailable');

    const text = `${actor.name} accepted "${quest.title}"`;
    world.logEvent('quest_accept', text, actor.id);
    Logger.log(`📜 ${text}`, 'quest');

    return ok(`quest_accepted:${quest.id}`);
  },
};
