// ─────────────────────────────────────────────
//  WorldToolkit — content authoring
//  Builds records and registers them in the world. No referential
//  checks: a bad area or neighbour name surfaces when an action runs.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { Area, ResourcePool } from '@/engine/data/types/Area';
import { createArea } from '@/engine/data/types/Area';
import type { Entity, EntityStats } from '@/engine/data/types/Entity';
import { createEntity } from '@/engine/data/types/Entity';
import type { Quest } from '@/engine/data/types/Quest';
import { createQuest } from '@/engine/data/types/Quest';
import type { Skill, SkillEffect } from '@/engine/data/types/Skill';
import type { ItemDefinition } from '@/engine/data/types/Item';
import type { Faction } from '@/engine/data/types/Faction';
import type { MethodEntry, MethodHandler } from '@/engine/systems/methods/MethodLibrary';
import { MethodLibrary } from '@/engine/systems/methods/MethodLibrary';

export class WorldToolkit {
  constructor(
    readonly world: WorldState,
    readonly methods: MethodLibrary = new MethodLibrary(),
  ) {}

  createArea(name: string, description: string, neighbors: Iterable<string>, resources: ResourcePool = {}): Area {
    const area = createArea(name, description, neighbors, resources);
    this.world.addArea(area);
    return area;
  }

  spawnEntity(id: string, name: string, area: string, tags: Iterable<string> = [], stats: EntityStats = {}): Entity {
    const entity = createEntity(id, name, area, tags, stats);
    this.world.addEntity(entity);
    return entity;
  }

  addQuest(id: string, title: string, description: string, objectives: Record<string, number>): Quest {
    const quest = createQuest(id, title, description, objectives);
    this.world.addQuest(quest);
    return quest;
  }

  assignQuestToEntity(entityId: string, questId: string): boolean {
    return this.world.assignQuest(entityId, questId);
  }

  /** Seeds (or tops up) a gatherable resource; returns the new quantity */
  addResourceNode(area: string, resource: string, amount: number): number {
    return this.world.adjustAreaResource(area, resource, amount);
  }

  addSkill(id: string, name: string, manaCost: number, effect: SkillEffect): Skill {
    const skill: Skill = { id, name, manaCost, effect };
    this.world.addSkill(skill);
    return skill;
  }

  addItem(id: string, name: string, description: string, stackable = true): ItemDefinition {
    const item: ItemDefinition = { id, name, description, stackable };
    this.world.addItem(item);
    return item;
  }

  addFaction(id: string, name: string, description: string): Faction {
    const faction: Faction = { id, name, description, reputation: {} };
    this.world.addFaction(faction);
    return faction;
  }

  registerMethod(name: string, description: string, tags: Iterable<string>, handler: MethodHandler): MethodEntry {
    return this.methods.register(name, description, tags, handler);
  }
}
