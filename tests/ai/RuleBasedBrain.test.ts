import { describe, it, expect, beforeEach } from 'vitest';
import { RuleBasedBrain } from '@/engine/systems/ai/RuleBasedBrain';
import { rest } from '@/engine/state/actions/RestAction';
import { useSkill } from '@/engine/state/actions/UseSkillAction';
import { attack } from '@/engine/state/actions/AttackAction';
import { gather } from '@/engine/state/actions/GatherAction';
import { move } from '@/engine/state/actions/MoveAction';
import { observe } from '@/engine/state/actions/ObserveAction';
import { EventBus } from '@/engine/utils/EventBus';
import { makeVillageForest } from '../integration/helpers';

beforeEach(() => {
  EventBus.clear();
});

describe('RuleBasedBrain', () => {
  it('proposes nothing for a missing or defeated actor', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('dead', 'Ghost', 'Village', [], { hp: 0 });
    const brain = new RuleBasedBrain();

    expect(brain.decide(world, 'nobody')).toEqual([]);
    expect(brain.decide(world, 'dead')).toEqual([]);
  });

  it('rests at or below the threshold, before anything else', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest', [], { hp: 30 });
    kit.spawnEntity('m1', 'Wolf', 'Forest', ['mob']);
    const brain = new RuleBasedBrain({ restHp: 20, restMana: 4 });

    expect(brain.decide(world, 'p1')).toEqual([rest('p1', 20, 4)]);
  });

  it('uses the first affordable skill on the first live co-located target', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest', [], { mana: 10 });
    kit.spawnEntity('m0', 'Carcass', 'Forest', ['mob'], { hp: 0 });
    kit.spawnEntity('m1', 'Wolf', 'Forest', ['mob']);
    kit.spawnEntity('m2', 'Bear', 'Forest', ['mob']);
    kit.addSkill('nova', 'Nova', 40, () => 'boom');
    kit.addSkill('spark', 'Spark', 5, () => 'zap');

    expect(new RuleBasedBrain().decide(world, 'p1')).toEqual([useSkill('p1', 'spark', 'm1')]);
  });

  it('attacks when no skill is affordable', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest', [], { mana: 0 });
    kit.spawnEntity('m1', 'Wolf', 'Forest', ['mob']);
    kit.addSkill('spark', 'Spark', 5, () => 'zap');

    expect(new RuleBasedBrain({ attackDamage: 12 }).decide(world, 'p1')).toEqual([attack('p1', 'm1', 12)]);
  });

  it('only targets hostile tags when configured', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest', ['player']);
    kit.spawnEntity('p2', 'Friend', 'Forest', ['player']);
    kit.spawnEntity('m1', 'Wolf', 'Forest', ['mob']);
    const brain = new RuleBasedBrain({ hostileTags: ['mob'] });

    expect(brain.decide(world, 'p1')).toEqual([attack('p1', 'm1', 8)]);
  });

  it('gathers when alone and the area has the resource', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest');

    expect(new RuleBasedBrain({ gatherAmount: 2 }).decide(world, 'p1')).toEqual([gather('p1', 'wood', 2)]);
  });

  it('moves to the first neighbour when nothing can be gathered', () => {
    const { world, kit } = makeVillageForest();
    kit.createArea('Crossroads', 'Junction', ['Forest', 'Village']);
    kit.spawnEntity('p1', 'Hero', 'Crossroads');

    expect(new RuleBasedBrain().decide(world, 'p1')).toEqual([move('p1', 'Forest')]);
  });

  it('observes as the last resort', () => {
    const { world, kit } = makeVillageForest();
    kit.createArea('Cell', 'Dead end', []);
    kit.spawnEntity('p1', 'Hero', 'Cell');

    expect(new RuleBasedBrain().decide(world, 'p1')).toEqual([observe('p1')]);
  });

  it('does not mutate the world while deciding', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest');
    kit.spawnEntity('m1', 'Wolf', 'Forest', ['mob']);

    const before = JSON.stringify(world.listEntities());
    new RuleBasedBrain().decide(world, 'p1');

    expect(JSON.stringify(world.listEntities())).toBe(before);
    expect(world.events).toHaveLength(0);
    expect(world.clock).toBe(0);
  });
});
