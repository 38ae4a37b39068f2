import type { ActionHandler } from './GameAction';
import { ok, rejected, resolved } from './GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import type { Skill } from '@/engine/data/types/Skill';
import { Logger } from '@/engine/utils/Logger';

export interface UseSkillAction {
  readonly type: 'USE_SKILL';
  readonly actorId: string;
  readonly skillId: string;
  readonly targetId?: string;
}

export function useSkill(actorId: string, skillId: string, targetId?: string): UseSkillAction {
  return targetId === undefined
    ? { type: 'USE_SKILL', actorId, skillId }
    : { type: 'USE_SKILL', actorId, skillId, targetId };
}

interface SkillContext {
  caster: Entity;
  skill: Skill;
}

export const UseSkillHandler: ActionHandler<UseSkillAction, SkillContext> = {
  resolve(world, action) {
    const caster = world.getEntity(action.actorId);
    if (!caster) return rejected('actor_not_found');
    const skill = world.getSkill(action.skillId);
    if (!skill) return rejected('skill_missing');
    if (caster.mana < skill.manaCost) return rejected('insufficient_mana');
    return resolved({ caster, skill });
  },

  apply(world, action, { caster, skill }) {
    // An unknown target id is passed to the effect as "no target"
    const target = action.targetId === undefined ? undefined : world.getEntity(action.targetId);

    caster.mana -= skill.manaCost;
    let tag: string;
    try {
      tag = skill.effect(world, caster, target);
    } catch (error) {
      // A failed cast spends no mana
      caster.mana += skill.manaCost;
      throw error;
    }

    const text = target
      ? `${caster.name} used ${skill.name} on ${target.name}: ${tag}`
      : `${caster.name} used ${skill.name}: ${tag}`;
    world.logEvent('skill', text, caster.id);
    Logger.log(`✦ ${text}`, 'skill');

    return ok(`skill:${skill.id}:${tag}`);
  },
};
