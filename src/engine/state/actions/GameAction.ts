// ─────────────────────────────────────────────
//  Game Action — closed command set
//  Every variant is a plain record tagged by `type`; behaviour lives in
//  one handler per variant and is selected by exhaustive switch in
//  ActionPipeline.
// ─────────────────────────────────────────────

import type { WorldState } from '../WorldState';
import type { MoveAction } from './MoveAction';
import type { AttackAction } from './AttackAction';
import type { GatherAction } from './GatherAction';
import type { CraftAction } from './CraftAction';
import type { ChatAction } from './ChatAction';
import type { RestAction } from './RestAction';
import type { TradeAction } from './TradeAction';
import type { UseSkillAction } from './UseSkillAction';
import type { ObserveAction } from './ObserveAction';
import type { AcceptQuestAction } from './AcceptQuestAction';

/** Discriminated union of all possible actions */
export type GameAction =
  | MoveAction
  | AttackAction
  | GatherAction
  | CraftAction
  | ChatAction
  | RestAction
  | TradeAction
  | UseSkillAction
  | ObserveAction
  | AcceptQuestAction;

export type GameActionType = GameAction['type'];

// ── Results ──────────────────────────────────

export type ActionStatus = 'ok' | 'error';

export interface ActionResult {
  readonly status: ActionStatus;
  readonly detail: string;
}

export type ActionErrorCode =
  | 'actor_not_found'
  | 'target_not_found'
  | 'entity_not_found'
  | 'area_not_found'
  | 'not_adjacent'
  | 'target_out_of_reach'
  | 'target_defeated'
  | 'resource_depleted'
  | 'missing_materials'
  | 'insufficient_items'
  | 'skill_missing'
  | 'insufficient_mana'
  | 'quest_unavailable'
  | 'invalid_amount';

export function ok(detail: string): ActionResult {
  return { status: 'ok', detail };
}

export function err(code: ActionErrorCode): ActionResult {
  return { status: 'error', detail: code };
}

// ── Handlers ─────────────────────────────────

export type Resolution<C> =
  | { readonly ok: true; readonly value: C }
  | { readonly ok: false; readonly reason: ActionErrorCode };

export function resolved<C>(value: C): Resolution<C> {
  return { ok: true, value };
}

export function rejected(reason: ActionErrorCode): { readonly ok: false; readonly reason: ActionErrorCode } {
  return { ok: false, reason };
}

/**
 * Behaviour of one action variant.
 *
 * `resolve` is the precondition: side-effect free, it either rejects with a
 * reason code or hands the looked-up participants to `apply`. `apply` only
 * runs after a successful resolve and may still refuse (returning an error
 * result) as long as it has not mutated anything yet.
 */
export interface ActionHandler<A extends GameAction, C> {
  resolve(world: WorldState, action: A): Resolution<C>;
  apply(world: WorldState, action: A, ctx: C): ActionResult;
}
