// ─────────────────────────────────────────────
//  Action Pipeline — every action (brain-proposed or direct) goes
//  through checkAction / executeAction. Exhaustive over GameAction:
//  adding a variant without a handler fails to compile.
// ─────────────────────────────────────────────

import type { WorldState } from '../WorldState';
import type { ActionErrorCode, ActionHandler, ActionResult, GameAction } from './GameAction';
import { err } from './GameAction';
import { MoveHandler } from './MoveAction';
import { AttackHandler } from './AttackAction';
import { GatherHandler } from './GatherAction';
import { CraftHandler } from './CraftAction';
import { ChatHandler } from './ChatAction';
import { RestHandler } from './RestAction';
import { TradeHandler } from './TradeAction';
import { UseSkillHandler } from './UseSkillAction';
import { ObserveHandler } from './ObserveAction';
import { AcceptQuestHandler } from './AcceptQuestAction';

function assertNever(action: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(action)}`);
}

function reasonOf<A extends GameAction, C>(
  handler: ActionHandler<A, C>,
  world: WorldState,
  action: A,
): ActionErrorCode | null {
  const resolution = handler.resolve(world, action);
  return resolution.ok ? null : resolution.reason;
}

function run<A extends GameAction, C>(
  handler: ActionHandler<A, C>,
  world: WorldState,
  action: A,
): ActionResult {
  const resolution = handler.resolve(world, action);
  if (!resolution.ok) return err(resolution.reason);
  return handler.apply(world, action, resolution.value);
}

/** Precondition. Side-effect free; null means the action may run. */
export function checkAction(world: WorldState, action: GameAction): ActionErrorCode | null {
  switch (action.type) {
    case 'MOVE':         return reasonOf(MoveHandler, world, action);
    case 'ATTACK':       return reasonOf(AttackHandler, world, action);
    case 'GATHER':       return reasonOf(GatherHandler, world, action);
    case 'CRAFT':        return reasonOf(CraftHandler, world, action);
    case 'CHAT':         return reasonOf(ChatHandler, world, action);
    case 'REST':         return reasonOf(RestHandler, world, action);
    case 'TRADE':        return reasonOf(TradeHandler, world, action);
    case 'USE_SKILL':    return reasonOf(UseSkillHandler, world, action);
    case 'OBSERVE':      return reasonOf(ObserveHandler, world, action);
    case 'ACCEPT_QUEST': return reasonOf(AcceptQuestHandler, world, action);
    default:             return assertNever(action);
  }
}

export function canExecute(world: WorldState, action: GameAction): boolean {
  return checkAction(world, action) === null;
}

/**
 * Run an action against the world. Re-checks the precondition first, so
 * calling this directly with an invalid action yields an error result and
 * leaves the world untouched.
 */
export function executeAction(world: WorldState, action: GameAction): ActionResult {
  switch (action.type) {
    case 'MOVE':         return run(MoveHandler, world, action);
    case 'ATTACK':       return run(AttackHandler, world, action);
    case 'GATHER':       return run(GatherHandler, world, action);
    case 'CRAFT':        return run(CraftHandler, world, action);
    case 'CHAT':         return run(ChatHandler, world, action);
    case 'REST':         return run(RestHandler, world, action);
    case 'TRADE':        return run(TradeHandler, world, action);
    case 'USE_SKILL':    return run(UseSkillHandler, world, action);
    case 'OBSERVE':      return run(ObserveHandler, world, action);
    case 'ACCEPT_QUEST': return run(AcceptQuestHandler, world, action);
    default:             return assertNever(action);
  }
}
