// ─────────────────────────────────────────────
//  tick-world — public surface
// ─────────────────────────────────────────────

// Engine
export { GameEngine } from './engine/coordinator/GameEngine';

// State
export { WorldState } from './engine/state/WorldState';
export type { WorldView } from './engine/state/WorldState';

// Data
export { createArea } from './engine/data/types/Area';
export type { Area, ResourcePool } from './engine/data/types/Area';
export { createEntity, isAlive, itemCount } from './engine/data/types/Entity';
export type { Entity, EntityStats, Inventory } from './engine/data/types/Entity';
export { createQuest, createQuestProgress, isQuestSatisfied, ObjectiveKey } from './engine/data/types/Quest';
export type { Quest, QuestProgress, ObjectiveMap } from './engine/data/types/Quest';
export type { Skill, SkillEffect } from './engine/data/types/Skill';
export type { WorldEvent } from './engine/data/types/WorldEvent';
export type { ItemDefinition } from './engine/data/types/Item';
export type { Faction } from './engine/data/types/Faction';

// Actions
export type {
  GameAction,
  GameActionType,
  ActionResult,
  ActionStatus,
  ActionErrorCode,
} from './engine/state/actions/GameAction';
export { checkAction, canExecute, executeAction } from './engine/state/actions/ActionPipeline';
export { move } from './engine/state/actions/MoveAction';
export type { MoveAction } from './engine/state/actions/MoveAction';
export { attack } from './engine/state/actions/AttackAction';
export type { AttackAction } from './engine/state/actions/AttackAction';
export { gather } from './engine/state/actions/GatherAction';
export type { GatherAction } from './engine/state/actions/GatherAction';
export { craft } from './engine/state/actions/CraftAction';
export type { CraftAction } from './engine/state/actions/CraftAction';
export { chat } from './engine/state/actions/ChatAction';
export type { ChatAction } from './engine/state/actions/ChatAction';
export { rest } from './engine/state/actions/RestAction';
export type { RestAction } from './engine/state/actions/RestAction';
export { trade } from './engine/state/actions/TradeAction';
export type { TradeAction } from './engine/state/actions/TradeAction';
export { useSkill } from './engine/state/actions/UseSkillAction';
export type { UseSkillAction } from './engine/state/actions/UseSkillAction';
export { observe } from './engine/state/actions/ObserveAction';
export type { ObserveAction } from './engine/state/actions/ObserveAction';
export { acceptQuest } from './engine/state/actions/AcceptQuestAction';
export type { AcceptQuestAction } from './engine/state/actions/AcceptQuestAction';

// AI
export type { AgentBrain } from './engine/systems/ai/AgentBrain';
export { RuleBasedBrain } from './engine/systems/ai/RuleBasedBrain';

// Authoring & methods
export { WorldToolkit } from './engine/loader/WorldToolkit';
export { MethodLibrary } from './engine/systems/methods/MethodLibrary';
export type { MethodEntry, MethodHandler } from './engine/systems/methods/MethodLibrary';

// Ambient
export { EventBus } from './engine/utils/EventBus';
export type { SimEventMap } from './engine/utils/EventBus';
export { Logger } from './engine/utils/Logger';
export { RecordUtils } from './engine/utils/RecordUtils';
export type { LogClass } from './engine/utils/Logger';
export { SimulationError, UnknownMethodError } from './engine/utils/errors';
export * as config from './config';
