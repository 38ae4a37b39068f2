// ─────────────────────────────────────────────
//  World State — single source of truth
//  Mutable aggregate owned by the engine for the duration of a step.
//  All collections are insertion-ordered Maps so "first match"
//  lookups are deterministic.
// ─────────────────────────────────────────────

import { freeze } from 'immer';
import type { Area } from '@/engine/data/types/Area';
import type { Entity } from '@/engine/data/types/Entity';
import type { Quest } from '@/engine/data/types/Quest';
import { createQuestProgress, isQuestSatisfied } from '@/engine/data/types/Quest';
import type { Skill } from '@/engine/data/types/Skill';
import type { ItemDefinition } from '@/engine/data/types/Item';
import type { Faction } from '@/engine/data/types/Faction';
import type { WorldEvent } from '@/engine/data/types/WorldEvent';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { RecordUtils } from '@/engine/utils/RecordUtils';

export class WorldState {
  private readonly areas = new Map<string, Area>();
  private readonly entities = new Map<string, Entity>();
  private readonly quests = new Map<string, Quest>();
  private readonly skills = new Map<string, Skill>();
  private readonly items = new Map<string, ItemDefinition>();
  private readonly factions = new Map<string, Faction>();
  private readonly eventLog: WorldEvent[] = [];
  private _clock = 0;

  get clock(): number { return this._clock; }

  /** Full chronological log */
  get events(): readonly WorldEvent[] { return this.eventLog; }

  // ── Registration (insert or overwrite by key) ──

  addArea(area: Area): void { this.areas.set(area.name, area); }
  addEntity(entity: Entity): void { this.entities.set(entity.id, entity); }
  addQuest(quest: Quest): void { this.quests.set(quest.id, quest); }
  addSkill(skill: Skill): void { this.skills.set(skill.id, skill); }
  addItem(item: ItemDefinition): void { this.items.set(item.id, item); }
  addFaction(faction: Faction): void { this.factions.set(faction.id, faction); }

  // ── Queries ──

  getArea(name: string): Area | undefined { return this.areas.get(name); }
  getEntity(id: string): Entity | undefined { return this.entities.get(id); }
  getQuest(id: string): Quest | undefined { return this.quests.get(id); }
  getSkill(id: string): Skill | undefined { return this.skills.get(id); }
  getItem(id: string): ItemDefinition | undefined { return this.items.get(id); }
  getFaction(id: string): Faction | undefined { return this.factions.get(id); }

  listEntities(): Entity[] { return [...this.entities.values()]; }
  listSkills(): Skill[] { return [...this.skills.values()]; }

  getEntitiesInArea(areaName: string): Entity[] {
    return this.listEntities().filter(e => e.area === areaName);
  }

  getAreaResource(areaName: string, resource: string): number {
    const area = this.areas.get(areaName);
    return area ? RecordUtils.count(area.resources, resource) : 0;
  }

  /** Last `limit` events, oldest first */
  getRecentEvents(limit: number): WorldEvent[] {
    if (!(limit > 0)) return [];
    return this.eventLog.slice(-limit);
  }

  // ── Mutations ──

  /**
   * Give an entity a fresh progress record for a quest.
   * Returns false when either side is unknown or the quest is already held;
   * an existing record is never overwritten.
   */
  assignQuest(entityId: string, questId: string): boolean {
    const entity = this.entities.get(entityId);
    if (!entity || !this.quests.has(questId)) return false;
    if (Object.hasOwn(entity.questLog, questId)) return false;

    entity.questLog[questId] = createQuestProgress(questId);
    EventBus.emit('questAssigned', { entityId, questId });
    return true;
  }

  /**
   * Clamped adjustment. Returns the stored quantity, or 0 when the area
   * does not exist.
   */
  adjustAreaResource(areaName: string, resource: string, delta: number): number {
    const area = this.areas.get(areaName);
    if (!area) return 0;
    const next = Math.max(0, RecordUtils.count(area.resources, resource) + delta);
    area.resources[resource] = next;
    return next;
  }

  /**
   * Advance every open quest of the entity that tracks `objectiveKey`.
   * A single call may progress several quests at once.
   */
  updateEntityQuestProgress(entityId: string, objectiveKey: string, amount = 1): void {
    const entity = this.entities.get(entityId);
    if (!entity) return;

    for (const record of Object.values(entity.questLog)) {
      if (record.completed) continue;
      const quest = this.quests.get(record.questId);
      if (!quest || !Object.hasOwn(quest.objectives, objectiveKey)) continue;

      record.progress[objectiveKey] = RecordUtils.count(record.progress, objectiveKey) + amount;
      if (isQuestSatisfied(quest, record)) {
        record.completed = true;
        Logger.log(`${entity.name} completed "${quest.title}"`, 'quest');
        EventBus.emit('questCompleted', { entityId, questId: quest.id, tick: this._clock });
      }
    }
  }

  logEvent(kind: string, detail: string, actorId?: string): void {
    const event: WorldEvent = actorId === undefined
      ? { tick: this._clock, kind, detail }
      : { tick: this._clock, kind, detail, actorId };
    this.eventLog.push(freeze(event));
  }

  tick(): void {
    this._clock += 1;
    EventBus.emit('tickAdvanced', { tick: this._clock });
  }
}

/**
 * Read-only projection handed to brains. Deciding must never mutate the
 * world, so none of the mutating members are reachable through it.
 */
export type WorldView = Pick<
  WorldState,
  | 'clock'
  | 'events'
  | 'getArea'
  | 'getEntity'
  | 'getQuest'
  | 'getSkill'
  | 'getItem'
  | 'getFaction'
  | 'listEntities'
  | 'listSkills'
  | 'getEntitiesInArea'
  | 'getAreaResource'
  | 'getRecentEvents'
>;
