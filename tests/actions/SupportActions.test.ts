import { describe, it, expect, beforeEach, vi } from 'vitest';
import { checkAction, executeAction } from '@/engine/state/actions/ActionPipeline';
import { chat } from '@/engine/state/actions/ChatAction';
import { rest } from '@/engine/state/actions/RestAction';
import { useSkill } from '@/engine/state/actions/UseSkillAction';
import { observe } from '@/engine/state/actions/ObserveAction';
import { acceptQuest } from '@/engine/state/actions/AcceptQuestAction';
import type { SkillEffect } from '@/engine/data/types/Skill';
import { EventBus } from '@/engine/utils/EventBus';
import { makeVillageForest, spawnPlayer } from '../integration/helpers';

beforeEach(() => {
  EventBus.clear();
});

describe('CHAT', () => {
  it('logs the message', () => {
    const { world, kit } = makeVillageForest();
    spawnPlayer(kit);

    expect(executeAction(world, chat('p1', 'hello'))).toEqual({ status: 'ok', detail: 'chat:Hero:hello' });
    expect(world.events).toEqual([{ tick: 0, kind: 'chat', detail: 'Hero says: hello', actorId: 'p1' }]);
  });

  it('rejects an unknown actor', () => {
    const { world } = makeVillageForest();
    expect(executeAction(world, chat('ghost', 'hi'))).toEqual({ status: 'error', detail: 'actor_not_found' });
    expect(world.events).toHaveLength(0);
  });
});

describe('REST', () => {
  it('restores hp and mana up to their caps', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Village', [], { hp: 95, mana: 20 });

    const result = executeAction(world, rest('p1', 10, 5));

    expect(result).toEqual({ status: 'ok', detail: 'rested:hp+10:mana+5' });
    expect(world.getEntity('p1')!.hp).toBe(100);
    expect(world.getEntity('p1')!.mana).toBe(25);
  });

  it('caps mana at 50', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Village', [], { hp: 10, mana: 48 });

    executeAction(world, rest('p1', 0, 30));
    expect(world.getEntity('p1')!.mana).toBe(50);
    expect(world.getEntity('p1')!.hp).toBe(10);
  });

  it('rejects negative restores', () => {
    const { world, kit } = makeVillageForest();
    spawnPlayer(kit);
    expect(checkAction(world, rest('p1', -1, 0))).toBe('invalid_amount');
  });
});

describe('USE_SKILL', () => {
  it('spends mana, runs the effect and reports its tag', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Mage', 'Village', [], { mana: 20 });
    kit.spawnEntity('m1', 'Wolf', 'Village', ['mob'], { hp: 50 });
    const effect = vi.fn<SkillEffect>((_w, _caster, target) => {
      if (target) target.hp -= 15;
      return 'burn';
    });
    kit.addSkill('fire', 'Firebolt', 12, effect);

    const result = executeAction(world, useSkill('p1', 'fire', 'm1'));

    expect(result).toEqual({ status: 'ok', detail: 'skill:fire:burn' });
    expect(world.getEntity('p1')!.mana).toBe(8);
    expect(world.getEntity('m1')!.hp).toBe(35);
    expect(effect).toHaveBeenCalledTimes(1);
    expect(world.events[0]).toEqual({
      tick: 0, kind: 'skill', detail: 'Mage used Firebolt on Wolf: burn', actorId: 'p1',
    });
  });

  it('passes no target when none is given or the id is unknown', () => {
    const { world, kit } = makeVillageForest();
    spawnPlayer(kit);
    const targets: unknown[] = [];
    kit.addSkill('shout', 'Shout', 0, (_w, _c, target) => {
      targets.push(target);
      return 'loud';
    });

    executeAction(world, useSkill('p1', 'shout'));
    executeAction(world, useSkill('p1', 'shout', 'ghost'));
    expect(targets).toEqual([undefined, undefined]);
  });

  it('refunds mana when the effect throws', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Mage', 'Village', [], { mana: 20 });
    kit.addSkill('fizzle', 'Fizzle', 12, () => {
      throw new Error('fizzle');
    });

    expect(() => executeAction(world, useSkill('p1', 'fizzle'))).toThrow('fizzle');
    expect(world.getEntity('p1')!.mana).toBe(20);
    expect(world.events).toHaveLength(0);
  });

  it('rejects unknown skills and insufficient mana without spending', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Mage', 'Village', [], { mana: 5 });
    const effect = vi.fn(() => 'x');
    kit.addSkill('nova', 'Nova', 30, effect);

    expect(executeAction(world, useSkill('p1', 'missing'))).toEqual({ status: 'error', detail: 'skill_missing' });
    expect(executeAction(world, useSkill('p1', 'nova'))).toEqual({ status: 'error', detail: 'insufficient_mana' });
    expect(checkAction(world, useSkill('ghost', 'nova'))).toBe('actor_not_found');
    expect(world.getEntity('p1')!.mana).toBe(5);
    expect(effect).not.toHaveBeenCalled();
  });
});

describe('OBSERVE', () => {
  it('describes co-located entities and sorted resources', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('p1', 'Hero', 'Forest');
    kit.spawnEntity('m1', 'Wolf', 'Forest');
    kit.spawnEntity('n1', 'Elder', 'Village');
    kit.spawnEntity('m2', 'Bear', 'Forest');
    kit.addResourceNode('Forest', 'berries', 2);

    const result = executeAction(world, observe('p1'));

    expect(result).toEqual({
      status: 'ok',
      detail: 'observe:Forest|entities:m1,m2|resources:berries=2,wood=5',
    });
    expect(world.events).toEqual([
      { tick: 0, kind: 'observe', detail: 'Hero looks around Forest', actorId: 'p1' },
    ]);
    expect(world.getAreaResource('Forest', 'wood')).toBe(5);
  });

  it('rejects an actor standing in an unknown area', () => {
    const { world, kit } = makeVillageForest();
    kit.spawnEntity('lost', 'Lost', 'Nowhere');
    expect(checkAction(world, observe('lost'))).toBe('area_not_found');
    expect(checkAction(world, observe('ghost'))).toBe('actor_not_found');
  });
});

describe('ACCEPT_QUEST', () => {
  it('assigns the quest and logs only on success', () => {
    const { world, kit } = makeVillageForest();
    spawnPlayer(kit);
    kit.addQuest('q1', 'First steps', 'Go', { 'travel:Forest': 1 });

    expect(executeAction(world, acceptQuest('p1', 'q1'))).toEqual({ status: 'ok', detail: 'quest_accepted:q1' });
    expect(executeAction(world, acceptQuest('p1', 'q1'))).toEqual({ status: 'error', detail: 'quest_unavailable' });

    expect(world.events.map(e => e.kind)).toEqual(['quest_accept']);
    expect(Object.keys(world.getEntity('p1')!.questLog)).toEqual(['q1']);
  });

  it('rejects unknown quests', () => {
    const { world, kit } = makeVillageForest();
    spawnPlayer(kit);
    expect(checkAction(world, acceptQuest('p1', 'nope'))).toBe('quest_unavailable');
    expect(checkAction(world, acceptQuest('ghost', 'nope'))).toBe('actor_not_found');
  });
});
