// ─────────────────────────────────────────────
//  Rule-Based Brain — reference policy
//  Strict priority, first match wins, at most one action per tick:
//    rest → skill → attack → gather → move → observe
//  Ties resolve positionally (insertion order of entities, skills,
//  neighbours).
// ─────────────────────────────────────────────

import type { AgentBrain } from './AgentBrain';
import type { WorldView } from '@/engine/state/WorldState';
import type { GameAction } from '@/engine/state/actions/GameAction';
import type { Entity } from '@/engine/data/types/Entity';
import { isAlive } from '@/engine/data/types/Entity';
import type { BrainTuning } from '@/config';
import { BRAIN_DEFAULTS } from '@/config';
import { rest } from '@/engine/state/actions/RestAction';
import { useSkill } from '@/engine/state/actions/UseSkillAction';
import { attack } from '@/engine/state/actions/AttackAction';
import { gather } from '@/engine/state/actions/GatherAction';
import { move } from '@/engine/state/actions/MoveAction';
import { observe } from '@/engine/state/actions/ObserveAction';

export class RuleBasedBrain implements AgentBrain {
  readonly options: Readonly<BrainTuning>;

  constructor(options: Partial<BrainTuning> = {}) {
    this.options = { ...BRAIN_DEFAULTS, ...options };
  }

  decide(world: WorldView, actorId: string): GameAction[] {
    const actor = world.getEntity(actorId);
    if (!actor || !isAlive(actor)) return [];

    const o = this.options;

    if (actor.hp <= o.restThreshold) {
      return [rest(actorId, o.restHp, o.restMana)];
    }

    const target = this.pickTarget(world, actor);
    if (target) {
      const skill = world.listSkills().find(s => s.manaCost <= actor.mana);
      if (skill) return [useSkill(actorId, skill.id, target.id)];
      return [attack(actorId, target.id, o.attackDamage)];
    }

    if (world.getAreaResource(actor.area, o.gatherResource) > 0) {
      return [gather(actorId, o.gatherResource, o.gatherAmount)];
    }

    const firstNeighbor = world.getArea(actor.area)?.neighbors[0];
    if (firstNeighbor !== undefined) {
      return [move(actorId, firstNeighbor)];
    }

    return [observe(actorId)];
  }

  /** First live, co-located entity other than the actor (filtered by hostileTags when set) */
  pickTarget(world: WorldView, actor: Entity): Entity | undefined {
    const hostile = this.options.hostileTags;
    return world.getEntitiesInArea(actor.area).find(e =>
      e.id !== actor.id &&
      isAlive(e) &&
      (hostile.length === 0 || e.tags.some(t => hostile.includes(t))),
    );
  }
}
